/**
 * Stable song identifier: lowercase `artist-title` with every run of
 * non-alphanumeric characters collapsed to a single hyphen.
 */
export function makeSongId(artist: string, title: string): string {
  return `${artist}-${title}`
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** Plain code-unit comparison, independent of the host locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function formatSongLabel(song: { artist: string; title: string }): string {
  return `${song.artist} - ${song.title}`;
}

export type SongDataErrorKind = "not-found" | "validation" | "unexpected";

export abstract class SongDataError extends Error {
  abstract readonly kind: SongDataErrorKind;
}

export class SongFileNotFoundError extends SongDataError {
  readonly kind = "not-found" as const;

  constructor(readonly path: string) {
    super(`Song data file not found: ${path}`);
    this.name = "SongFileNotFoundError";
  }
}

export class SongDataValidationError extends SongDataError {
  readonly kind = "validation" as const;
  readonly missingColumns: string[];

  constructor(message: string, missingColumns: string[] = []) {
    super(message);
    this.name = "SongDataValidationError";
    this.missingColumns = missingColumns;
  }
}

export class SongDataUnexpectedError extends SongDataError {
  readonly kind = "unexpected" as const;

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Unexpected error loading song data: ${detail}`, { cause });
    this.name = "SongDataUnexpectedError";
  }
}

export function toSongDataError(error: unknown): SongDataError {
  if (error instanceof SongDataError) return error;
  return new SongDataUnexpectedError(error);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

import assert from "node:assert/strict";
import test from "node:test";

import { compareText, formatSongLabel, makeSongId } from "@/lib/utils";

test("makeSongId lowercases and collapses punctuation runs", () => {
  assert.equal(makeSongId("AC/DC", "Highway to Hell"), "ac-dc-highway-to-hell");
  assert.equal(makeSongId("Guns N' Roses", "Sweet Child O' Mine"), "guns-n-roses-sweet-child-o-mine");
  assert.equal(makeSongId("  The Beatles ", "Come Together!"), "the-beatles-come-together");
  assert.equal(makeSongId("Maná", "Rayando el Sol"), "man-rayando-el-sol");
});

test("makeSongId only yields lowercase alphanumerics and single inner hyphens", () => {
  const pairs: Array<[string, string]> = [
    ["Queen", "Don't Stop Me Now"],
    ["--Deep  Purple--", "Smoke on the Water (Live)"],
    ["Artist 99", "Track #1 ... ~ remix"],
    ["Café Tacvba", "Eres"],
  ];
  for (const [artist, title] of pairs) {
    const id = makeSongId(artist, title);
    assert.match(id, /^[a-z0-9]+(-[a-z0-9]+)*$/);
    assert.equal(makeSongId(artist, title), id);
  }
});

test("makeSongId of punctuation-only input is empty", () => {
  assert.equal(makeSongId("!!!", "???"), "");
});

test("compareText orders by code unit", () => {
  assert.equal(compareText("A", "B"), -1);
  assert.equal(compareText("b", "B"), 1);
  assert.equal(compareText("same", "same"), 0);
});

test("formatSongLabel joins artist and title", () => {
  assert.equal(formatSongLabel({ artist: "Queen", title: "Bohemian Rhapsody" }), "Queen - Bohemian Rhapsody");
});

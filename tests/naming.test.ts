import test from "node:test";
import assert from "node:assert/strict";
import {
  captionFileName,
  mediaFileName,
  playlistDirName,
  searchDirName,
  textFileNameForRow,
} from "../src/storage/naming.js";

test("row file names are sanitized and end in .txt", () => {
  assert.equal(textFileNameForRow("clip01.mp4", 1), "clip01.txt");
  assert.equal(textFileNameForRow("CLIP02.MP4", 2), "CLIP02.txt");
  assert.equal(textFileNameForRow("notes.txt", 3), "notes.txt");
  assert.equal(textFileNameForRow("a/b\\c|d", 4), "a_b_c_d.txt");
  assert.equal(textFileNameForRow("  spaced  ", 5), "spaced.txt");
});

test("empty row file names fall back to the row number", () => {
  assert.equal(textFileNameForRow("", 7), "row_7.txt");
  assert.equal(textFileNameForRow("   ", 8), "row_8.txt");
});

test("playlist folder keeps letters, digits, space, dash and underscore", () => {
  assert.equal(playlistDirName("Főzés: a legjobb receptek!"), "Főzés_ a legjobb receptek_");
  assert.equal(playlistDirName(""), "YouTube_Playlist");
});

test("search folder names", () => {
  assert.equal(searchDirName("cooking show", false), "search_cooking_show");
  assert.equal(searchDirName("cooking show", true), "search_cooking_show_exact");
});

test("media and caption file names are keyed by video id", () => {
  assert.equal(mediaFileName("dQw4w9WgXcQ", "wav"), "dQw4w9WgXcQ.wav");
  assert.equal(captionFileName("dQw4w9WgXcQ", "hu"), "dQw4w9WgXcQ.hu.txt");
  assert.equal(captionFileName("dQw4w9WgXcQ"), "dQw4w9WgXcQ.txt");
});

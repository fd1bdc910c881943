import test from "node:test";
import assert from "node:assert/strict";
import { parseCsv, parseCsvRecords } from "../src/utils/csv.js";

test("parseCsv handles quotes, doubled quotes and CRLF", () => {
  const rows = parseCsv('a,b\r\n"x, y","he said ""hi"""\r\n');
  assert.deepEqual(rows, [
    ["a", "b"],
    ["x, y", 'he said "hi"'],
  ]);
});

test("parseCsv keeps newlines inside quoted fields and strips a BOM", () => {
  const rows = parseCsv('\uFEFFname,text\nclip,"line one\nline two"');
  assert.deepEqual(rows, [
    ["name", "text"],
    ["clip", "line one\nline two"],
  ]);
});

test("parseCsvRecords maps header columns and fills short rows", () => {
  const { columns, records } = parseCsvRecords("path,caption\n\nclip1.mp4,hello\nclip2.mp4\n");
  assert.deepEqual(columns, ["path", "caption"]);
  assert.deepEqual(records, [
    { path: "clip1.mp4", caption: "hello" },
    { path: "clip2.mp4", caption: "" },
  ]);
});

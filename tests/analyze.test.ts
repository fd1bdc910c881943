import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createMediaTools } from "../src/media/tools.js";
import { analyzeFolder, formatHeader, formatRow, truncateName } from "../src/tools/analyze.js";
import { fakeExec, probeJson } from "./helpers/fakeExec.js";

test("truncateName shortens names longer than 38 characters", () => {
  const long = "a".repeat(39);
  assert.equal(truncateName(long), `${"a".repeat(35)}...`);
  assert.equal(truncateName("a".repeat(38)), "a".repeat(38));
});

test("header widths with and without the frames/FPS columns", () => {
  const short = formatHeader(false);
  assert.equal(short.header, `${"Filename".padEnd(40)} ${"Resolution".padEnd(15)} Aspect Ratio`);
  assert.equal(short.separator.length, 80);
  assert.equal(formatHeader(true).separator.length, 105);
});

test("formatRow prints resolution, rounded aspect ratio, frames and fps", () => {
  const line = formatRow(
    "clip.mp4",
    { ok: true, info: { width: 1920, height: 1080, fps: 29.97, frameCount: 300 } },
    true
  );
  assert.equal(
    line,
    `${"clip.mp4".padEnd(40)} ${"1920x1080".padEnd(15)} ${"1.78".padEnd(12)} ${"300".padEnd(12)} ${"29.97".padEnd(8)}`
  );
});

test("formatRow marks timeouts, errors and missing video streams", () => {
  assert.equal(
    formatRow("slow.mkv", { ok: false, reason: "timeout", message: "" }, false),
    `${"slow.mkv".padEnd(40)} ${"Timeout".padEnd(15)} ${"N/A".padEnd(12)}`
  );
  assert.equal(
    formatRow("bad.mp4", { ok: false, reason: "error", message: "" }, true),
    `${"bad.mp4".padEnd(40)} ${"Error".padEnd(15)} ${"N/A".padEnd(12)} ${"N/A".padEnd(12)} ${"N/A".padEnd(8)}`
  );
  assert.equal(
    formatRow("audio.mp4", { ok: false, reason: "no_video_stream", message: "" }, true),
    `${"No video stream found".padEnd(40)} ${"N/A".padEnd(15)} ${"N/A".padEnd(12)}`
  );
});

test("analyzeFolder prints one row per video and the total", async () => {
  const dir = await mkdtemp(join(tmpdir(), "vidprep-analyze-"));
  await writeFile(join(dir, "a.mp4"), "");
  await writeFile(join(dir, "b.AVI"), "");
  await writeFile(join(dir, "c.txt"), "");

  const { exec, calls } = fakeExec((call) =>
    call.args.at(-1) === join(dir, "a.mp4")
      ? { stdout: probeJson({ width: 640, height: 480 }) }
      : { exitCode: 1, stderr: "Invalid data found" }
  );
  const tools = createMediaTools({ ffmpeg: "ffmpeg", ffprobe: "ffprobe", exec });
  const lines: string[] = [];
  const count = await analyzeFolder(tools, {
    folder: dir,
    showDuration: false,
    write: (line) => lines.push(line),
  });

  assert.equal(count, 2);
  assert.equal(calls.some((c) => c.args.includes("-count_frames")), false);
  const { header, separator } = formatHeader(false);
  assert.deepEqual(lines, [
    separator,
    header,
    separator,
    `${"a.mp4".padEnd(40)} ${"640x480".padEnd(15)} ${"1.33".padEnd(12)}`,
    `${"b.AVI".padEnd(40)} ${"Error".padEnd(15)} ${"N/A".padEnd(12)}`,
    separator,
    "Total files processed: 2",
  ]);
});

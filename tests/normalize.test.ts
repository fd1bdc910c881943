import test from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createMediaTools } from "../src/media/tools.js";
import { UsageError } from "../src/tools/errors.js";
import { normalizeAspectRatios, normalizedOutputName } from "../src/tools/normalizeAspect.js";
import { fakeExec, probeJson } from "./helpers/fakeExec.js";

test("normalizedOutputName keeps the extension", () => {
  assert.equal(normalizedOutputName(join("in", "clip.MOV")), "clip_normalized.MOV");
});

test("normalizeAspectRatios copies matching videos and crops the rest", async () => {
  const root = await mkdtemp(join(tmpdir(), "vidprep-normalize-"));
  const input = join(root, "in");
  const output = join(root, "out");
  await mkdir(input);
  await writeFile(join(input, "wide.mp4"), "wide-bytes");
  await writeFile(join(input, "square.mp4"), "square-bytes");
  await writeFile(join(input, "broken.mov"), "");

  const dims: Record<string, [number, number]> = {
    [join(input, "wide.mp4")]: [1920, 1080],
    [join(input, "square.mp4")]: [1000, 1000],
  };
  const { exec, calls } = fakeExec((call) => {
    if (call.command !== "ffprobe") return undefined;
    const size = dims[call.args.at(-1) ?? ""];
    if (!size) return { exitCode: 1, stderr: "moov atom not found" };
    return { stdout: probeJson({ width: size[0], height: size[1] }) };
  });
  const tools = createMediaTools({ ffmpeg: "ffmpeg", ffprobe: "ffprobe", exec });

  const summary = await normalizeAspectRatios(tools, {
    inputDir: input,
    outputDir: output,
    aspectRatio: 1,
    crf: 18,
    preset: "slow",
  });

  assert.deepEqual(summary, { total: 3, succeeded: 2, copied: 1, encoded: 1, failed: 1 });
  assert.equal(await readFile(join(output, "square_normalized.mp4"), "utf8"), "square-bytes");

  const encodes = calls.filter((c) => c.command === "ffmpeg");
  assert.equal(encodes.length, 1);
  assert.deepEqual(encodes[0]?.args, [
    "-i", join(input, "wide.mp4"),
    "-vf", "crop=1080:1080,scale=1920:1920",
    "-c:v", "libx264",
    "-crf", "18",
    "-preset", "slow",
    "-c:a", "copy",
    "-y", join(output, "wide_normalized.mp4"),
  ]);
});

test("normalizeAspectRatios skips videos probed with zero dimensions", async () => {
  const root = await mkdtemp(join(tmpdir(), "vidprep-normalize-"));
  const input = join(root, "in");
  await mkdir(input);
  await writeFile(join(input, "empty.mp4"), "");
  const { exec, calls } = fakeExec((call) =>
    call.command === "ffprobe" ? { stdout: probeJson({ width: 0, height: 0 }) } : undefined
  );

  const summary = await normalizeAspectRatios(
    createMediaTools({ ffmpeg: "ffmpeg", ffprobe: "ffprobe", exec }),
    { inputDir: input, outputDir: join(root, "out"), aspectRatio: 1.78, crf: 18, preset: "slow" }
  );

  assert.deepEqual(summary, { total: 1, succeeded: 0, copied: 0, encoded: 0, failed: 1 });
  assert.equal(calls.filter((c) => c.command === "ffmpeg").length, 0);
});

test("normalizeAspectRatios rejects --width with --height", async () => {
  const tools = createMediaTools({ ffmpeg: "ffmpeg", ffprobe: "ffprobe", exec: fakeExec().exec });
  await assert.rejects(
    normalizeAspectRatios(tools, {
      inputDir: tmpdir(),
      outputDir: join(tmpdir(), "vidprep-unused"),
      aspectRatio: 1.78,
      width: 1280,
      height: 720,
      crf: 18,
      preset: "slow",
    }),
    UsageError
  );
});

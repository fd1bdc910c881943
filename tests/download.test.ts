import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  downloadMedia,
  planDownloadAttempts,
  videoFormatSelector,
  type DownloadRequest,
} from "../src/youtube/download.js";
import { createYtDlpContext } from "../src/youtube/ytDlp.js";
import { YtDlpError } from "../src/youtube/ytDlpErrors.js";
import { argAfter, fakeExec } from "./helpers/fakeExec.js";

const VIDEO_URL = "https://www.youtube.com/watch?v=vid00000001";

function request(outputDir: string, overrides: Partial<DownloadRequest> = {}): DownloadRequest {
  return {
    url: VIDEO_URL,
    videoId: "vid00000001",
    outputDir,
    audioOnly: false,
    videoFormat: "mp4",
    ...overrides,
  };
}

/** Writes `<id>.<ext>` where yt-dlp's output template points. */
async function writeOutput(args: string[], ext: string) {
  const template = argAfter(args, "-o");
  if (template) await writeFile(template.replace("%(ext)s", ext), "media", "utf8");
}

test("videoFormatSelector prefers codecs per container", () => {
  assert.equal(
    videoFormatSelector("mp4"),
    "bestvideo[ext=mp4][vcodec^=avc]+bestaudio[ext=m4a]/best[ext=mp4]/best"
  );
  assert.equal(videoFormatSelector("flv"), "bestvideo+bestaudio/best[ext=flv]/best");
});

test("planDownloadAttempts builds audio invocations", () => {
  const { primary, fallback } = planDownloadAttempts(request("/out", { audioOnly: true }));
  assert.deepEqual(primary.args, [
    "-f", "bestaudio/best",
    "-x", "--audio-format", "wav", "--audio-quality", "192K",
    "--no-playlist",
    "-o", join("/out", "vid00000001.%(ext)s"),
    VIDEO_URL,
  ]);
  assert.deepEqual(primary.candidates, [join("/out", "vid00000001.wav")]);
  assert.equal(fallback.label, "alternate audio");
  assert.equal(argAfter(fallback.args, "-f"), "best");
});

test("planDownloadAttempts merges only into mergeable containers", () => {
  const mp4 = planDownloadAttempts(request("/out"));
  assert.equal(argAfter(mp4.primary.args, "--merge-output-format"), "mp4");
  assert.ok(mp4.primary.args.includes("--restrict-filenames"));

  const flv = planDownloadAttempts(request("/out", { videoFormat: "flv" }));
  assert.equal(flv.primary.args.includes("--merge-output-format"), false);
  assert.deepEqual(
    flv.primary.candidates,
    ["flv", "mp4", "webm", "mkv"].map((ext) => join("/out", `vid00000001.${ext}`))
  );
  assert.equal(argAfter(flv.fallback.args, "-f"), "22/18/best");
});

test("downloadMedia returns the written file and passes context args first", async () => {
  const outputDir = await mkdtemp(join(tmpdir(), "vidprep-dl-"));
  const { exec, calls } = fakeExec(async ({ args }) => {
    await writeOutput(args, "mp4");
    return undefined;
  });
  const ctx = createYtDlpContext({
    command: "yt-dlp",
    extraArgs: ["--proxy", "socks5://127.0.0.1:9050"],
    auth: { browser: "firefox" },
    exec,
  });

  const path = await downloadMedia(ctx, request(outputDir));
  assert.equal(path, join(outputDir, "vid00000001.mp4"));
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.command, "yt-dlp");
  assert.deepEqual(calls[0]?.args.slice(0, 4), [
    "--proxy",
    "socks5://127.0.0.1:9050",
    "--cookies-from-browser",
    "firefox",
  ]);
});

test("downloadMedia falls back after a retryable failure", async () => {
  const outputDir = await mkdtemp(join(tmpdir(), "vidprep-dl-"));
  let attempt = 0;
  const { exec, calls } = fakeExec(async ({ args }) => {
    attempt += 1;
    if (attempt === 1) return { exitCode: 1, stderr: "ERROR: HTTP Error 429: Too Many Requests" };
    await writeOutput(args, "webm");
    return undefined;
  });

  const path = await downloadMedia(createYtDlpContext({ command: "yt-dlp", exec }), request(outputDir));
  assert.equal(path, join(outputDir, "vid00000001.webm"));
  assert.equal(calls.length, 2);
  assert.equal(argAfter(calls[1]?.args ?? [], "-f"), "22/18/best");
});

for (const stderr of [
  "ERROR: unable to download video data: HTTP Error 404: Not Found",
  "WARNING: ffmpeg not found. The downloaded format may not be the best available.\n" +
    "ERROR: unable to download video data: HTTP Error 403: Forbidden",
]) {
  test(`downloadMedia retries after: ${stderr.split("\n").at(-1) ?? stderr}`, async () => {
    const outputDir = await mkdtemp(join(tmpdir(), "vidprep-dl-"));
    let attempt = 0;
    const { exec, calls } = fakeExec(async ({ args }) => {
      attempt += 1;
      if (attempt === 1) return { exitCode: 1, stderr };
      await writeOutput(args, "mp4");
      return undefined;
    });

    const path = await downloadMedia(createYtDlpContext({ command: "yt-dlp", exec }), request(outputDir));
    assert.equal(path, join(outputDir, "vid00000001.mp4"));
    assert.equal(calls.length, 2);
    assert.equal(argAfter(calls[1]?.args ?? [], "-f"), "22/18/best");
  });
}

test("downloadMedia does not retry a private video", async () => {
  const outputDir = await mkdtemp(join(tmpdir(), "vidprep-dl-"));
  const { exec, calls } = fakeExec(() => ({
    exitCode: 1,
    stderr: "ERROR: [youtube] vid00000001: Private video. Sign in if you've been granted access",
  }));

  await assert.rejects(
    downloadMedia(createYtDlpContext({ command: "yt-dlp", exec }), request(outputDir)),
    (error: unknown) => error instanceof YtDlpError && error.info.reason === "private"
  );
  assert.equal(calls.length, 1);
});

test("downloadMedia fails when neither attempt writes a file", async () => {
  const outputDir = await mkdtemp(join(tmpdir(), "vidprep-dl-"));
  const { exec, calls } = fakeExec();

  await assert.rejects(
    downloadMedia(
      createYtDlpContext({ command: "yt-dlp", exec }),
      request(outputDir, { audioOnly: true })
    ),
    { message: "yt-dlp finished but no alternate audio file was written" }
  );
  assert.equal(calls.length, 2);
});

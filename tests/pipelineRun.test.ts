import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  processPlaylist,
  processSearch,
  processVideo,
  runDownloads,
  type DownloadSettings,
} from "../src/pipeline/run.js";
import { readLogEntries } from "../src/storage/downloadLog.js";
import { createYtDlpContext } from "../src/youtube/ytDlp.js";
import { argAfter, fakeExec, type ExecCall } from "./helpers/fakeExec.js";

const track = [{ ext: "vtt", url: "https://example.invalid/cc" }];

const VTT = ["WEBVTT", "", "00:00:02.000 --> 00:00:04.000", "Jó étvágyat", ""].join("\n");

type Listing = { title?: string; entries: Array<{ id: string } | null> } | "fail";

/**
 * Fake yt-dlp: answers listings and metadata from the given tables and
 * writes the files a download or subtitle fetch would produce.
 */
function fakeYtDlp(tables: {
  metadata?: Record<string, Record<string, unknown>>;
  listings?: Record<string, Listing>;
  /** When set, every media download exits 1 with this stderr. */
  downloadFailure?: string;
}) {
  return fakeExec(async ({ args }: ExecCall) => {
    const target = args[args.length - 1] ?? "";
    if (args.includes("--flat-playlist")) {
      const listing = tables.listings?.[target];
      if (!listing || listing === "fail") {
        return { exitCode: 1, stderr: "ERROR: This playlist does not exist" };
      }
      return { stdout: JSON.stringify(listing) };
    }
    if (args.includes("--dump-single-json")) {
      const id = Object.keys(tables.metadata ?? {}).find((key) => target.endsWith(`v=${key}`));
      const meta = id ? tables.metadata?.[id] : undefined;
      if (!id || !meta) return { exitCode: 1, stderr: "ERROR: Video unavailable" };
      return { stdout: JSON.stringify({ id, ...meta }) };
    }
    const template = argAfter(args, "-o");
    if (!template) return undefined;
    const key = argAfter(args, "--sub-langs");
    if (key) {
      await writeFile(template.replace("%(ext)s", `${key}.vtt`), VTT, "utf8");
    } else if (tables.downloadFailure) {
      return { exitCode: 1, stderr: tables.downloadFailure };
    } else {
      await writeFile(template.replace("%(ext)s", args.includes("-x") ? "wav" : "mp4"), "media");
    }
    return undefined;
  });
}

async function settingsIn(overrides: Partial<DownloadSettings> = {}): Promise<DownloadSettings> {
  return {
    outputDir: await mkdtemp(join(tmpdir(), "vidprep-run-")),
    audioOnly: false,
    language: "hu",
    logFileName: "download_log.jsonl",
    captions: true,
    filterLanguage: false,
    includeLivestreams: false,
    videoFormat: "mp4",
    captionType: "any",
    maxResults: 5,
    pureSearch: false,
    ...overrides,
  };
}

const VIDEO_URL = "https://youtu.be/vid00000001";

test("processVideo downloads media and captions, then reuses them", async () => {
  const settings = await settingsIn();
  const logFile = join(settings.outputDir, "download_log.jsonl");
  const { exec, calls } = fakeYtDlp({
    metadata: {
      vid00000001: { title: "Gulyás recept", automatic_captions: { "hu-orig": track } },
    },
  });
  const ctx = createYtDlpContext({ command: "yt-dlp", exec });

  const first = await processVideo(ctx, VIDEO_URL, settings);
  assert.deepEqual(first, { downloaded: 1, existing: 0, skipped: 0, failed: 0 });
  assert.equal(calls.length, 3);

  const entries = await readLogEntries(logFile);
  assert.deepEqual(
    entries.map((e) => e.type),
    ["video", "caption", "caption_status"]
  );
  assert.equal(entries[0]?.file_path, join(settings.outputDir, "vid00000001.mp4"));
  assert.equal(entries[0]?.title, "Gulyás recept");
  assert.equal(entries[1]?.file_path, join(settings.outputDir, "vid00000001.hu.txt"));
  assert.equal(entries[2]?.has_caption, true);
  assert.equal(entries[2]?.reason, "downloaded");

  const second = await processVideo(ctx, VIDEO_URL, settings);
  assert.deepEqual(second, { downloaded: 0, existing: 1, skipped: 0, failed: 0 });
  assert.equal(calls.length, 4);
  assert.equal((await readLogEntries(logFile)).length, 3);
});

test("processVideo skips livestreams unless asked to include them", async () => {
  const settings = await settingsIn({ captions: false });
  const { exec, calls } = fakeYtDlp({
    metadata: { vid00000001: { title: "Live now", live_status: "is_upcoming" } },
  });

  const summary = await processVideo(createYtDlpContext({ command: "yt-dlp", exec }), VIDEO_URL, settings);
  assert.deepEqual(summary, { downloaded: 0, existing: 0, skipped: 1, failed: 0 });
  assert.equal(calls.length, 1);

  const entries = await readLogEntries(join(settings.outputDir, "download_log.jsonl"));
  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.type, "skipped");
  assert.equal(entries[0]?.reason, "Livestream - skipped");
  assert.equal(entries[0]?.url, "https://www.youtube.com/watch?v=vid00000001");
});

test("processVideo records videos rejected by the language gate", async () => {
  const settings = await settingsIn({ filterLanguage: true, captions: false });
  const { exec } = fakeYtDlp({
    metadata: { vid00000001: { title: "Cooking show", channel: "Kitchen TV" } },
  });

  const summary = await processVideo(createYtDlpContext({ command: "yt-dlp", exec }), VIDEO_URL, settings);
  assert.equal(summary.skipped, 1);
  const entries = await readLogEntries(join(settings.outputDir, "download_log.jsonl"));
  assert.equal(entries[0]?.reason, "No Hungarian indicators found");
});

test("processVideo records a livestream reported by the download", async () => {
  const settings = await settingsIn({ captions: false });
  const { exec, calls } = fakeYtDlp({
    metadata: { vid00000001: { title: "Soon" } },
    downloadFailure: "ERROR: [youtube] vid00000001: This live event will begin in 3 hours.",
  });

  const summary = await processVideo(createYtDlpContext({ command: "yt-dlp", exec }), VIDEO_URL, settings);
  assert.deepEqual(summary, { downloaded: 0, existing: 0, skipped: 1, failed: 0 });
  assert.equal(calls.length, 2);

  const entries = await readLogEntries(join(settings.outputDir, "download_log.jsonl"));
  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.type, "skipped");
  assert.equal(entries[0]?.reason, "Livestream detected during download");
});

test("processVideo counts a failed download without logging it", async () => {
  const settings = await settingsIn({ captions: false });
  const { exec, calls } = fakeYtDlp({
    metadata: { vid00000001: { title: "Broken" } },
    downloadFailure: "ERROR: unable to download video data: HTTP Error 500: Internal Server Error",
  });

  const summary = await processVideo(createYtDlpContext({ command: "yt-dlp", exec }), VIDEO_URL, settings);
  assert.deepEqual(summary, { downloaded: 0, existing: 0, skipped: 0, failed: 1 });
  assert.equal(calls.length, 3);
  assert.deepEqual(await readLogEntries(join(settings.outputDir, "download_log.jsonl")), []);
});

test("processVideo counts a video without an id as failed", async () => {
  const settings = await settingsIn();
  const { exec, calls } = fakeYtDlp({});
  const summary = await processVideo(
    createYtDlpContext({ command: "yt-dlp", exec }),
    "https://example.com/not-a-video",
    settings
  );
  assert.equal(summary.failed, 1);
  assert.equal(calls.length, 0);
});

test("processSearch widens the query and filters by language", async () => {
  const settings = await settingsIn({ captions: false });
  const { exec, calls } = fakeYtDlp({
    listings: {
      "ytsearch5:gulyás recept magyar magyarország": { entries: [{ id: "vid00000002" }] },
    },
    metadata: { vid00000002: { title: "Gulyás leves" } },
  });

  const summary = await processSearch(
    createYtDlpContext({ command: "yt-dlp", exec }),
    "gulyás recept",
    settings
  );
  assert.deepEqual(summary, { downloaded: 1, existing: 0, skipped: 0, failed: 0 });
  assert.equal(calls[0]?.args.at(-1), "ytsearch5:gulyás recept magyar magyarország");

  const dir = join(settings.outputDir, "search_gulyás_recept");
  const entries = await readLogEntries(join(dir, "download_log.jsonl"));
  assert.equal(entries[0]?.file_path, join(dir, "vid00000002.mp4"));
  assert.equal(entries[1]?.type, "caption_status");
  assert.equal(entries[1]?.reason, "skipped");
});

test("processPlaylist writes into a folder named after the playlist", async () => {
  const settings = await settingsIn({ audioOnly: true, captions: false });
  const playlistUrl = "https://www.youtube.com/playlist?list=PLtest";
  const { exec } = fakeYtDlp({
    listings: { [playlistUrl]: { title: "Best of: 2024!", entries: [{ id: "vid00000003" }, null] } },
    metadata: { vid00000003: { title: "Track one" } },
  });

  const summary = await processPlaylist(
    createYtDlpContext({ command: "yt-dlp", exec }),
    playlistUrl,
    settings
  );
  assert.equal(summary.downloaded, 1);

  const dir = join(settings.outputDir, "Best of_ 2024_");
  const entries = await readLogEntries(join(dir, "download_log.jsonl"));
  assert.equal(entries[0]?.type, "audio");
  assert.equal(entries[0]?.file_path, join(dir, "vid00000003.wav"));
});

test("runDownloads keeps going after a failing source", async () => {
  const settings = await settingsIn({ captions: false });
  const { exec } = fakeYtDlp({
    listings: { "https://www.youtube.com/playlist?list=PLgone": "fail" },
    metadata: { vid00000001: { title: "Solo" } },
  });

  const summary = await runDownloads(
    createYtDlpContext({ command: "yt-dlp", exec }),
    { playlist: "https://www.youtube.com/playlist?list=PLgone", video: VIDEO_URL },
    settings
  );
  assert.deepEqual(summary, { downloaded: 1, existing: 0, skipped: 0, failed: 1 });
});

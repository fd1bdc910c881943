import { join } from "node:path";
import type { CaptionType, VideoFormat } from "../config/schema.js";
import {
  hasLoggedArtifact,
  recordCaptionStatus,
  recordDownload,
  recordSkipped,
  type MediaType,
} from "../storage/downloadLog.js";
import { findExistingArtifact } from "../storage/idempotency.js";
import { playlistDirName, searchDirName } from "../storage/naming.js";
import { ensureDir } from "../utils/fs.js";
import { logError, logInfo, logStep, logWarn } from "../utils/logger.js";
import { downloadCaption, type CaptionOutcome } from "../youtube/captions.js";
import { downloadMedia } from "../youtube/download.js";
import { isLivestream, isTargetLanguage, withLanguageSearchTerms } from "../youtube/filters.js";
import { fetchFlatListing, tryFetchVideoMetadata, type YoutubeVideoMetadata } from "../youtube/metadata.js";
import { extractVideoId, watchUrl } from "../youtube/url.js";
import type { YtDlpContext } from "../youtube/ytDlp.js";
import { YtDlpError } from "../youtube/ytDlpErrors.js";

export type DownloadSettings = {
  outputDir: string;
  audioOnly: boolean;
  language: string;
  /** Explicit log path; otherwise `<folder>/<logFileName>` per output folder. */
  logFile?: string;
  logFileName: string;
  captions: boolean;
  filterLanguage: boolean;
  includeLivestreams: boolean;
  videoFormat: VideoFormat;
  captionType: CaptionType;
  maxResults: number;
  pureSearch: boolean;
};

export type VideoOutcome = "downloaded" | "existing" | "skipped" | "failed";

export type DownloadSummary = Record<VideoOutcome, number>;

export function emptySummary(): DownloadSummary {
  return { downloaded: 0, existing: 0, skipped: 0, failed: 0 };
}

export function addToSummary(summary: DownloadSummary, other: DownloadSummary) {
  summary.downloaded += other.downloaded;
  summary.existing += other.existing;
  summary.skipped += other.skipped;
  summary.failed += other.failed;
}

type VideoTarget = {
  url: string;
  outputDir: string;
  logFile: string;
  filterLanguage: boolean;
};

async function fetchCaptionSafely(
  ctx: YtDlpContext,
  settings: DownloadSettings,
  target: VideoTarget,
  videoId: string,
  title: string,
  metadata: YoutubeVideoMetadata | undefined
): Promise<CaptionOutcome> {
  try {
    return await downloadCaption(ctx, {
      videoId,
      outputDir: target.outputDir,
      title,
      language: settings.language,
      captionType: settings.captionType,
      logFile: target.logFile,
      metadata,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logWarn(`Failed to download caption: ${message}`);
    return { ok: false, reason: message };
  }
}

async function handleExisting(
  ctx: YtDlpContext,
  settings: DownloadSettings,
  target: VideoTarget,
  videoId: string,
  mediaType: MediaType,
  existing: { path: string; source: string }
) {
  logStep("skip", `${mediaType} already present (${existing.source}): ${existing.path}`);
  const needsLogEntry =
    existing.source === "disk" &&
    !(await hasLoggedArtifact(target.logFile, videoId, mediaType, existing.path));
  if (!needsLogEntry && !settings.captions) return;

  const meta = await tryFetchVideoMetadata(ctx, watchUrl(videoId));
  const title = meta?.title ?? `video_${videoId}`;
  if (needsLogEntry) {
    await recordDownload(target.logFile, {
      videoId,
      title,
      type: mediaType,
      filePath: existing.path,
    });
  }
  if (settings.captions) {
    await fetchCaptionSafely(ctx, settings, target, videoId, title, meta);
  }
}

async function processTarget(
  ctx: YtDlpContext,
  settings: DownloadSettings,
  target: VideoTarget
): Promise<VideoOutcome> {
  logInfo(`Processing: ${target.url}`);
  const videoId = extractVideoId(target.url);
  if (!videoId) {
    logError(`Could not extract video ID from URL: ${target.url}`);
    return "failed";
  }
  const videoUrl = watchUrl(videoId);
  const mediaType: MediaType = settings.audioOnly ? "audio" : "video";

  const existing = await findExistingArtifact({
    dir: target.outputDir,
    videoId,
    mediaType,
    videoFormat: settings.videoFormat,
    logFile: target.logFile,
  });
  if (existing.found) {
    await handleExisting(ctx, settings, target, videoId, mediaType, existing);
    return "existing";
  }

  const meta = await tryFetchVideoMetadata(ctx, videoUrl);

  if (!settings.includeLivestreams && meta) {
    const live = isLivestream(meta);
    if (live.live) {
      logStep("filter", `Skipping livestream: ${live.reason}`);
      await recordSkipped(target.logFile, {
        videoId,
        url: videoUrl,
        reason: "Livestream - skipped",
      });
      return "skipped";
    }
  }

  if (target.filterLanguage) {
    const check = meta
      ? isTargetLanguage(meta, settings.language)
      : { matched: false, reason: "Error: video metadata unavailable" };
    if (!check.matched) {
      logStep("filter", `Skipping: ${check.reason}`);
      await recordSkipped(target.logFile, { videoId, url: videoUrl, reason: check.reason });
      return "skipped";
    }
    logStep("filter", `Language match: ${check.reason}`);
  }

  const title = meta?.title ?? `video_${videoId}`;
  let mediaPath: string;
  try {
    mediaPath = await downloadMedia(ctx, {
      url: videoUrl,
      videoId,
      outputDir: target.outputDir,
      audioOnly: settings.audioOnly,
      videoFormat: settings.videoFormat,
    });
  } catch (error) {
    if (error instanceof YtDlpError && error.info.reason === "livestream") {
      logStep("filter", `Skipping livestream: ${videoUrl}`);
      await recordSkipped(target.logFile, {
        videoId,
        url: videoUrl,
        reason: "Livestream detected during download",
      });
      return "skipped";
    }
    const message = error instanceof Error ? error.message : String(error);
    logError(`Error downloading media: ${message}`);
    return "failed";
  }
  await recordDownload(target.logFile, { videoId, title, type: mediaType, filePath: mediaPath });
  logStep("download", `${mediaType} path: ${mediaPath}`);

  let caption: CaptionOutcome | undefined;
  if (settings.captions) {
    caption = await fetchCaptionSafely(ctx, settings, target, videoId, title, meta);
  } else {
    logStep("skip", "Skipping captions as requested");
  }
  await recordCaptionStatus(target.logFile, {
    videoId,
    title,
    hasCaption: caption?.ok === true,
    reason: !caption ? "skipped" : caption.ok ? "downloaded" : "not_found",
    language: settings.language,
    captionType: settings.captionType,
  });
  return "downloaded";
}

async function processTargets(
  ctx: YtDlpContext,
  settings: DownloadSettings,
  targets: VideoTarget[]
): Promise<DownloadSummary> {
  const summary = emptySummary();
  for (let i = 0; i < targets.length; i += 1) {
    const target = targets[i];
    if (!target) continue;
    if (targets.length > 1) logInfo(`Video ${i + 1}/${targets.length}`);
    let outcome: VideoOutcome;
    try {
      outcome = await processTarget(ctx, settings, target);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logError(`Error processing video: ${message}`);
      outcome = "failed";
    }
    summary[outcome] += 1;
  }
  return summary;
}

export async function processVideo(
  ctx: YtDlpContext,
  url: string,
  settings: DownloadSettings
): Promise<DownloadSummary> {
  await ensureDir(settings.outputDir);
  return processTargets(ctx, settings, [
    {
      url,
      outputDir: settings.outputDir,
      logFile: settings.logFile ?? join(settings.outputDir, settings.logFileName),
      filterLanguage: settings.filterLanguage,
    },
  ]);
}

export async function processPlaylist(
  ctx: YtDlpContext,
  url: string,
  settings: DownloadSettings
): Promise<DownloadSummary> {
  const listing = await fetchFlatListing(ctx, url);
  const title = listing.title ?? "YouTube_Playlist";
  const dir = join(settings.outputDir, playlistDirName(title));
  await ensureDir(dir);
  logInfo(`Playlist: ${title}`);
  logInfo(`Number of videos: ${listing.videoIds.length}`);

  const logFile = settings.logFile ?? join(dir, settings.logFileName);
  return processTargets(
    ctx,
    settings,
    listing.videoIds.map((id) => ({
      url: watchUrl(id),
      outputDir: dir,
      logFile,
      filterLanguage: settings.filterLanguage,
    }))
  );
}

/**
 * `ytsearch<N>:` query. Without `pureSearch` the language's search terms are
 * appended and only videos passing the language gate are downloaded.
 */
export async function processSearch(
  ctx: YtDlpContext,
  query: string,
  settings: DownloadSettings
): Promise<DownloadSummary> {
  const dir = join(settings.outputDir, searchDirName(query, settings.pureSearch));
  await ensureDir(dir);
  const effectiveQuery = settings.pureSearch
    ? query
    : withLanguageSearchTerms(query, settings.language);
  logStep(
    "meta",
    effectiveQuery === query
      ? `Searching for: '${query}'`
      : `Searching for: '${query}' as '${effectiveQuery}'`
  );

  const listing = await fetchFlatListing(ctx, `ytsearch${settings.maxResults}:${effectiveQuery}`);
  logInfo(`Found ${listing.videoIds.length} videos for query: ${effectiveQuery}`);

  const logFile = settings.logFile ?? join(dir, settings.logFileName);
  return processTargets(
    ctx,
    settings,
    listing.videoIds.map((id) => ({
      url: watchUrl(id),
      outputDir: dir,
      logFile,
      filterLanguage: settings.filterLanguage || !settings.pureSearch,
    }))
  );
}

export type DownloadSources = {
  playlist?: string;
  video?: string;
  search?: string;
};

/**
 * Run every given source in order (playlist, video, search). A failing
 * listing is reported and counted, and the remaining sources still run.
 */
export async function runDownloads(
  ctx: YtDlpContext,
  sources: DownloadSources,
  settings: DownloadSettings
): Promise<DownloadSummary> {
  const summary = emptySummary();
  const steps: Array<[string | undefined, typeof processVideo]> = [
    [sources.playlist, processPlaylist],
    [sources.video, processVideo],
    [sources.search, processSearch],
  ];
  for (const [source, run] of steps) {
    if (!source) continue;
    try {
      addToSummary(summary, await run(ctx, source, settings));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logError(`Failed to process ${source}: ${message}`);
      summary.failed += 1;
    }
  }
  return summary;
}

export function logDownloadSummary(summary: DownloadSummary) {
  logStep(
    "done",
    `Downloaded: ${summary.downloaded}, already present: ${summary.existing}, ` +
      `skipped: ${summary.skipped}, failed: ${summary.failed}`
  );
}

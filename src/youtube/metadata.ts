import { z } from "zod";
import { logStep, logWarn } from "../utils/logger.js";
import { runYtDlp, type YtDlpContext } from "./ytDlp.js";
import { ytDlpFailureFromResult } from "./ytDlpErrors.js";

const captionFormatSchema = z
  .object({
    ext: z.string().optional(),
    url: z.string().optional(),
    name: z.string().optional(),
  })
  .passthrough();

const captionTracksSchema = z.record(z.array(captionFormatSchema));

export const videoMetadataSchema = z
  .object({
    id: z.string(),
    title: z.string().optional(),
    description: z.string().nullable().optional(),
    channel: z.string().nullable().optional(),
    uploader: z.string().nullable().optional(),
    language: z.string().nullable().optional(),
    country: z.string().nullable().optional(),
    is_live: z.boolean().nullable().optional(),
    was_live: z.boolean().nullable().optional(),
    live_status: z.string().nullable().optional(),
    premiere_timestamp: z.number().nullable().optional(),
    subtitles: captionTracksSchema.nullable().optional(),
    automatic_captions: captionTracksSchema.nullable().optional(),
  })
  .passthrough();

export type YoutubeVideoMetadata = z.infer<typeof videoMetadataSchema>;
export type CaptionTracks = z.infer<typeof captionTracksSchema>;

const listingSchema = z
  .object({
    id: z.string().optional(),
    title: z.string().nullable().optional(),
    entries: z
      .array(
        z
          .object({ id: z.string().optional(), title: z.string().nullable().optional() })
          .passthrough()
          .nullable()
      )
      .default([]),
  })
  .passthrough();

export type YoutubeListing = {
  title?: string;
  videoIds: string[];
};

/**
 * `yt-dlp --dump-single-json` for one video. Throws YtDlpError when yt-dlp
 * fails, and a zod error when the JSON lacks an id.
 */
export async function fetchVideoMetadata(
  ctx: YtDlpContext,
  videoUrl: string
): Promise<YoutubeVideoMetadata> {
  logStep("meta", `Fetching video metadata for ${videoUrl}`);
  const result = await runYtDlp(ctx, [
    "--dump-single-json",
    "--no-playlist",
    "--skip-download",
    "--no-warnings",
    videoUrl,
  ]);
  if (result.exitCode !== 0) {
    throw ytDlpFailureFromResult(result);
  }
  return videoMetadataSchema.parse(JSON.parse(result.stdout));
}

/**
 * Best-effort variant: logs and returns undefined instead of throwing.
 */
export async function tryFetchVideoMetadata(
  ctx: YtDlpContext,
  videoUrl: string
): Promise<YoutubeVideoMetadata | undefined> {
  try {
    return await fetchVideoMetadata(ctx, videoUrl);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logWarn(`Failed to fetch metadata: ${message}`);
    return undefined;
  }
}

/**
 * Flat listing of a playlist or `ytsearchN:` query.
 */
export async function fetchFlatListing(
  ctx: YtDlpContext,
  target: string
): Promise<YoutubeListing> {
  const result = await runYtDlp(ctx, [
    "--flat-playlist",
    "--dump-single-json",
    "--no-warnings",
    target,
  ]);
  if (result.exitCode !== 0) {
    throw ytDlpFailureFromResult(result);
  }
  const listing = listingSchema.parse(JSON.parse(result.stdout));
  const videoIds: string[] = [];
  for (const entry of listing.entries) {
    if (entry?.id) videoIds.push(entry.id);
  }
  return { title: listing.title ?? undefined, videoIds };
}

import { join } from "node:path";
import type { VideoFormat } from "../config/schema.js";
import { ensureDir, fileExists } from "../utils/fs.js";
import { logStep, logWarn } from "../utils/logger.js";
import { runYtDlp, type YtDlpContext } from "./ytDlp.js";
import { YtDlpError, ytDlpFailureFromResult } from "./ytDlpErrors.js";

const MERGEABLE_FORMATS: ReadonlySet<VideoFormat> = new Set(["mp4", "webm", "mkv"]);
const VIDEO_CONTAINERS = ["mp4", "webm", "mkv"];

export function videoFormatSelector(format: VideoFormat): string {
  switch (format) {
    case "mp4":
      return "bestvideo[ext=mp4][vcodec^=avc]+bestaudio[ext=m4a]/best[ext=mp4]/best";
    case "webm":
      return "bestvideo[ext=webm][vcodec^=vp9]+bestaudio[ext=webm]/best[ext=webm]/best";
    default:
      return `bestvideo+bestaudio/best[ext=${format}]/best`;
  }
}

type Attempt = { label: string; args: string[]; candidates: string[] };

export type DownloadRequest = {
  url: string;
  videoId: string;
  outputDir: string;
  audioOnly: boolean;
  videoFormat: VideoFormat;
};

/**
 * The primary and the simplified fallback yt-dlp invocation for a request,
 * each with the files it may produce, in lookup order.
 */
export function planDownloadAttempts(request: DownloadRequest): {
  primary: Attempt;
  fallback: Attempt;
} {
  const template = join(request.outputDir, `${request.videoId}.%(ext)s`);
  const fileFor = (ext: string) => join(request.outputDir, `${request.videoId}.${ext}`);

  if (request.audioOnly) {
    const wav = [fileFor("wav")];
    return {
      primary: {
        label: "audio",
        args: [
          "-f", "bestaudio/best",
          "-x", "--audio-format", "wav", "--audio-quality", "192K",
          "--no-playlist",
          "-o", template,
          request.url,
        ],
        candidates: wav,
      },
      fallback: {
        label: "alternate audio",
        args: ["-f", "best", "-x", "--audio-format", "wav", "--no-playlist", "-o", template, request.url],
        candidates: wav,
      },
    };
  }

  const format = request.videoFormat;
  const merge = MERGEABLE_FORMATS.has(format) ? ["--merge-output-format", format] : [];
  const primaryExts = [...new Set([format, ...VIDEO_CONTAINERS])];
  return {
    primary: {
      label: "video",
      args: [
        "-f", videoFormatSelector(format),
        ...merge,
        "--restrict-filenames",
        "--no-playlist",
        "-o", template,
        request.url,
      ],
      candidates: primaryExts.map(fileFor),
    },
    fallback: {
      label: "video (formats 22/18)",
      args: ["-f", "22/18/best", "--no-playlist", "-o", template, request.url],
      candidates: VIDEO_CONTAINERS.map(fileFor),
    },
  };
}

async function firstExisting(paths: string[]): Promise<string | undefined> {
  for (const path of paths) {
    if (await fileExists(path)) return path;
  }
  return undefined;
}

async function runAttempt(ctx: YtDlpContext, attempt: Attempt): Promise<string> {
  const result = await runYtDlp(ctx, attempt.args);
  if (result.exitCode !== 0) throw ytDlpFailureFromResult(result);
  const path = await firstExisting(attempt.candidates);
  if (!path) throw new Error(`yt-dlp finished but no ${attempt.label} file was written`);
  return path;
}

/**
 * Download one video (or its audio as WAV) into `outputDir`, named after the
 * video id. One simplified retry is made unless the first failure is one a
 * retry cannot fix (private, removed, members-only and the like).
 */
export async function downloadMedia(
  ctx: YtDlpContext,
  request: DownloadRequest
): Promise<string> {
  await ensureDir(request.outputDir);
  const { primary, fallback } = planDownloadAttempts(request);

  logStep("download", `Downloading ${primary.label}: ${request.url}`);
  try {
    return await runAttempt(ctx, primary);
  } catch (error) {
    if (error instanceof YtDlpError && !error.info.retryable) throw error;
    const message = error instanceof Error ? error.message : String(error);
    logWarn(`${message}; trying ${fallback.label}`);
  }

  logStep("download", `Retrying with ${fallback.label}: ${request.url}`);
  return runAttempt(ctx, fallback);
}

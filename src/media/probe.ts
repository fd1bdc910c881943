import { z } from "zod";
import type { MediaTools } from "./tools.js";

const numberLike = z.union([z.number(), z.string()]);

const streamSchema = z.object({
  codec_type: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  nb_frames: numberLike.optional(),
  nb_read_frames: numberLike.optional(),
  duration: numberLike.optional(),
  avg_frame_rate: z.string().optional(),
  r_frame_rate: z.string().optional(),
});

const probeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
  format: z
    .object({ duration: numberLike.optional() })
    .optional(),
});

export type FfprobeOutput = z.infer<typeof probeOutputSchema>;

export type VideoInfo = {
  width: number;
  height: number;
  fps?: number;
  frameCount?: number;
  durationSeconds?: number;
};

export type ProbeFailureReason = "timeout" | "error" | "no_video_stream";

export type ProbeResult =
  | { ok: true; info: VideoInfo }
  | { ok: false; reason: ProbeFailureReason; message: string };

/**
 * Parse an ffprobe rate such as `30000/1001` or `25`. `0/0` and junk are undefined.
 */
export function parseFrameRate(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const trimmed = raw.trim();
  if (trimmed.includes("/")) {
    const [num, den] = trimmed.split("/");
    const n = Number(num);
    const d = Number(den);
    if (!Number.isFinite(n) || !Number.isFinite(d) || d === 0) return undefined;
    const fps = n / d;
    return fps > 0 ? fps : undefined;
  }
  const fps = Number(trimmed);
  return Number.isFinite(fps) && fps > 0 ? fps : undefined;
}

function toNumber(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Pick the first video stream out of `ffprobe -print_format json` output.
 * Frame count comes from `nb_frames` (or `nb_read_frames` under -count_frames),
 * otherwise from duration × average frame rate.
 */
export function extractVideoInfo(output: FfprobeOutput): VideoInfo | undefined {
  const stream = output.streams.find((s) => s.codec_type === "video");
  if (!stream || stream.width === undefined || stream.height === undefined) {
    return undefined;
  }

  const fps = parseFrameRate(stream.avg_frame_rate) ?? parseFrameRate(stream.r_frame_rate);
  const streamDuration = toNumber(stream.duration);
  const formatDuration = toNumber(output.format?.duration);
  const durationSeconds = streamDuration ?? formatDuration;

  let frameCount = toNumber(stream.nb_frames) ?? toNumber(stream.nb_read_frames);
  if (frameCount === undefined && durationSeconds !== undefined && fps !== undefined) {
    frameCount = Math.trunc(durationSeconds * fps);
  }

  return {
    width: stream.width,
    height: stream.height,
    fps,
    frameCount,
    durationSeconds,
  };
}

export function parseProbeJson(stdout: string): ProbeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: "error", message: `Malformed ffprobe JSON: ${message}` };
  }
  const parsed = probeOutputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: "error", message: parsed.error.message };
  }
  const info = extractVideoInfo(parsed.data);
  if (!info) {
    return { ok: false, reason: "no_video_stream", message: "No video stream found" };
  }
  if (!(info.width > 0 && info.height > 0)) {
    return {
      ok: false,
      reason: "error",
      message: `Invalid video dimensions ${info.width}x${info.height}`,
    };
  }
  return { ok: true, info };
}

/**
 * Probe a video file. Never throws for a per-file problem: failures come back
 * as `{ ok: false }` so the caller can skip the item and keep going.
 */
export async function probeVideo(
  tools: MediaTools,
  path: string,
  options: { countFrames?: boolean } = {}
): Promise<ProbeResult> {
  const args = [
    "-v",
    "quiet",
    "-print_format",
    "json",
    "-show_format",
    "-show_streams",
    ...(options.countFrames ? ["-count_frames"] : []),
    path,
  ];
  try {
    const res = await tools.exec(tools.ffprobe, args, {
      timeoutMs: tools.probeTimeoutMs,
    });
    if (res.timedOut) {
      return { ok: false, reason: "timeout", message: `ffprobe timed out after ${tools.probeTimeoutMs} ms` };
    }
    if (res.exitCode !== 0) {
      return {
        ok: false,
        reason: "error",
        message: `ffprobe failed: ${res.stderr.trim() || `exit code ${res.exitCode}`}`,
      };
    }
    return parseProbeJson(res.stdout);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: "error", message };
  }
}

export const DEFAULT_FRAME_RATE = 30;

/**
 * `r_frame_rate` of the first video stream; 30 when it cannot be read.
 */
export async function probeFrameRate(
  tools: MediaTools,
  path: string
): Promise<number> {
  const args = [
    "-v",
    "quiet",
    "-select_streams",
    "v:0",
    "-show_entries",
    "stream=r_frame_rate",
    "-of",
    "csv=p=0",
    path,
  ];
  try {
    const res = await tools.exec(tools.ffprobe, args, {
      timeoutMs: tools.probeTimeoutMs,
    });
    if (res.exitCode !== 0 || res.timedOut) return DEFAULT_FRAME_RATE;
    return parseFrameRate(res.stdout.split(/\r?\n/)[0]) ?? DEFAULT_FRAME_RATE;
  } catch {
    return DEFAULT_FRAME_RATE;
  }
}

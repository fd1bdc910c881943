import { z } from "zod";

export const CAPTION_TYPES = ["manual", "auto", "translate", "any"] as const;
export const VIDEO_FORMATS = ["mp4", "webm", "mkv", "flv", "avi"] as const;
export const COOKIE_BROWSERS = [
  "chrome",
  "firefox",
  "opera",
  "edge",
  "safari",
  "brave",
  "chromium",
] as const;

export const configSchema = z.object({
  ffmpegPath: z.string().optional(),
  ffprobePath: z.string().optional(),
  ytDlpPath: z.string().optional(),
  ytDlpExtraArgs: z.array(z.string()).default([]),
  // Applies to ffprobe only; ffmpeg and yt-dlp downloads run without a limit.
  probeTimeoutMs: z.number().int().positive().default(60000),
  videoCrf: z.number().int().min(0).max(51).default(18),
  videoPreset: z.string().min(1).default("slow"),
  fpsPreset: z.string().min(1).default("medium"),
  downloadDir: z.string().default("downloads"),
  logFileName: z.string().min(1).default("download_log.jsonl"),
  captionLanguage: z.string().min(1).default("en"),
  captionType: z.enum(CAPTION_TYPES).default("any"),
  videoFormat: z.enum(VIDEO_FORMATS).default("mp4"),
  cookiesFile: z.string().optional(),
  cookiesBrowser: z.enum(COOKIE_BROWSERS).optional(),
  maxSearchResults: z.number().int().positive().default(20),
});

export type AppConfig = z.infer<typeof configSchema>;
export type CaptionType = (typeof CAPTION_TYPES)[number];
export type VideoFormat = (typeof VIDEO_FORMATS)[number];
export type CookieBrowser = (typeof COOKIE_BROWSERS)[number];

import { promises as fs } from "node:fs";
import { z } from "zod";
import { appendLine } from "../utils/fs.js";
import { formatLogTimestamp } from "../utils/date.js";
import { logWarn } from "../utils/logger.js";

export const MEDIA_TYPES = ["audio", "video", "caption"] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

export const logEntrySchema = z
  .object({
    timestamp: z.string(),
    video_id: z.string(),
    title: z.string().optional(),
    type: z.enum(["audio", "video", "caption", "caption_status", "skipped"]),
    file_path: z.string().nullable().optional(),
    language: z.string().nullable().optional(),
    reason: z.string().optional(),
    url: z.string().optional(),
    has_caption: z.boolean().optional(),
    caption_type: z.string().optional(),
  })
  .passthrough();

export type LogEntry = z.infer<typeof logEntrySchema>;

async function appendEntry(logFile: string, entry: LogEntry) {
  await appendLine(logFile, JSON.stringify(entry));
}

/**
 * Every well-formed entry of a JSON-lines log, in file order. A missing log
 * reads as empty; malformed lines are reported and skipped.
 */
export async function readLogEntries(logFile: string): Promise<LogEntry[]> {
  let text: string;
  try {
    text = await fs.readFile(logFile, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }

  const entries: LogEntry[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i]?.trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logWarn(`${logFile}:${i + 1}: not valid JSON, ignoring line`);
      continue;
    }
    const result = logEntrySchema.safeParse(parsed);
    if (!result.success) {
      logWarn(`${logFile}:${i + 1}: unexpected log entry, ignoring line`);
      continue;
    }
    entries.push(result.data);
  }
  return entries;
}

export async function recordDownload(
  logFile: string,
  download: {
    videoId: string;
    title: string;
    type: MediaType;
    filePath: string;
    language?: string;
  }
) {
  const entry: LogEntry = {
    timestamp: formatLogTimestamp(),
    video_id: download.videoId,
    title: download.title,
    type: download.type,
    file_path: download.filePath,
  };
  if (download.language && download.type === "caption") {
    entry.language = download.language;
  }
  await appendEntry(logFile, entry);
}

export async function recordSkipped(
  logFile: string,
  skipped: { videoId: string; url: string; reason: string }
) {
  await appendEntry(logFile, {
    timestamp: formatLogTimestamp(),
    video_id: skipped.videoId,
    url: skipped.url,
    type: "skipped",
    reason: skipped.reason,
  });
}

export async function recordCaptionStatus(
  logFile: string,
  status: {
    videoId: string;
    title: string;
    hasCaption: boolean;
    language: string;
    captionType: string;
    reason?: string;
  }
) {
  const entry: LogEntry = {
    timestamp: formatLogTimestamp(),
    video_id: status.videoId,
    title: status.title,
    type: "caption_status",
    has_caption: status.hasCaption,
    language: status.language,
    caption_type: status.captionType,
  };
  if (status.reason) entry.reason = status.reason;
  await appendEntry(logFile, entry);
}

/**
 * True when the log already holds an entry for exactly this artifact.
 */
export async function hasLoggedArtifact(
  logFile: string,
  videoId: string,
  type: MediaType,
  filePath: string
): Promise<boolean> {
  const entries = await readLogEntries(logFile);
  return entries.some(
    (e) => e.video_id === videoId && e.type === type && e.file_path === filePath
  );
}

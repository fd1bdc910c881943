import { dirname, extname, join } from "node:path";
import { fileExists, isDirectory, readDirSafe } from "../utils/fs.js";
import { readLogEntries, type MediaType } from "./downloadLog.js";

export type ExistingArtifact =
  | { found: true; path: string; source: "disk" | "log" | "log-dir-scan" }
  | { found: false };

const VIDEO_EXTENSIONS = [".mp4", ".webm", ".mkv"];

function extensionsFor(mediaType: MediaType, videoFormat?: string): string[] {
  switch (mediaType) {
    case "audio":
      return [".wav"];
    case "caption":
      return [".txt"];
    case "video":
      return videoFormat && !VIDEO_EXTENSIONS.includes(`.${videoFormat}`)
        ? [...VIDEO_EXTENSIONS, `.${videoFormat}`]
        : VIDEO_EXTENSIONS;
  }
}

// Prefix match on `<id>.`, so `abc.def.mp4` also matches id `abc`.
function matchesVideoId(fileName: string, videoId: string): boolean {
  return fileName === videoId || fileName.startsWith(`${videoId}.`);
}

/**
 * First file in `dir` named after the video with an extension belonging to
 * the media type.
 */
export async function findOnDisk(
  dir: string,
  videoId: string,
  mediaType: MediaType,
  videoFormat?: string
): Promise<string | undefined> {
  const extensions = extensionsFor(mediaType, videoFormat);
  const entries = await readDirSafe(dir);
  const names = entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort();
  for (const name of names) {
    if (!matchesVideoId(name, videoId)) continue;
    if (extensions.includes(extname(name).toLowerCase())) return join(dir, name);
  }
  return undefined;
}

/**
 * Log lookup: the first matching entry whose file still exists wins. For a
 * stale entry the logged file's folder is scanned for a file named after the
 * video instead.
 */
export async function findInLog(
  logFile: string,
  videoId: string,
  mediaType: MediaType,
  language?: string,
  videoFormat?: string
): Promise<ExistingArtifact> {
  const entries = await readLogEntries(logFile);
  for (const entry of entries) {
    if (entry.video_id !== videoId || entry.type !== mediaType) continue;
    if (mediaType === "caption" && language && entry.language !== language) continue;

    const filePath = entry.file_path;
    if (!filePath) continue;
    if (await fileExists(filePath)) {
      return { found: true, path: filePath, source: "log" };
    }

    const dir = dirname(filePath);
    if (!(await isDirectory(dir))) continue;
    const rescued = await findOnDisk(dir, videoId, mediaType, videoFormat);
    if (rescued) return { found: true, path: rescued, source: "log-dir-scan" };
  }
  return { found: false };
}

export async function findExistingArtifact(query: {
  dir: string;
  videoId: string;
  mediaType: MediaType;
  language?: string;
  videoFormat?: string;
  logFile?: string;
}): Promise<ExistingArtifact> {
  const onDisk = await findOnDisk(query.dir, query.videoId, query.mediaType, query.videoFormat);
  if (onDisk) return { found: true, path: onDisk, source: "disk" };
  if (!query.logFile) return { found: false };
  return findInLog(
    query.logFile,
    query.videoId,
    query.mediaType,
    query.language,
    query.videoFormat
  );
}

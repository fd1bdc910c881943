import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { extname, join } from "node:path";
import type { CaptionType } from "../config/schema.js";
import { hasLoggedArtifact, recordDownload } from "../storage/downloadLog.js";
import { findExistingArtifact } from "../storage/idempotency.js";
import { captionFileName } from "../storage/naming.js";
import { formatCaptionTimestamp } from "../utils/date.js";
import { writeText } from "../utils/fs.js";
import { logInfo, logStep, logWarn } from "../utils/logger.js";
import { tryFetchVideoMetadata, type YoutubeVideoMetadata } from "./metadata.js";
import { watchUrl } from "./url.js";
import { runYtDlp, type YtDlpContext } from "./ytDlp.js";
import { ytDlpFailureFromResult } from "./ytDlpErrors.js";

export type CaptionTrack = {
  /** Key in yt-dlp's `subtitles` / `automatic_captions` maps. */
  key: string;
  languageCode: string;
  name: string;
  generated: boolean;
  translated: boolean;
};

export type CaptionCue = { start: number; text: string };

const ORIG_SUFFIX = "-orig";

function primary(code: string): string {
  return code.toLowerCase().split(/[-_]/)[0] ?? code.toLowerCase();
}

export function languageDisplayName(code: string): string {
  try {
    return new Intl.DisplayNames(["en"], { type: "language" }).of(code) ?? code;
  } catch {
    return code;
  }
}

/** Requested language first, English as the fallback. */
export function captionLanguages(language: string): string[] {
  return language === "en" ? ["en"] : [language, "en"];
}

function trackKeys(tracks: YoutubeVideoMetadata["subtitles"]): string[] {
  return Object.keys(tracks ?? {}).filter((key) => key !== "live_chat");
}

/**
 * Language codes with a caption track that is not a machine translation:
 * uploaded subtitles, plus the automatic track in the spoken language.
 */
export function originalCaptionLanguages(meta: YoutubeVideoMetadata): string[] {
  const codes = new Set(trackKeys(meta.subtitles));
  const autoKeys = trackKeys(meta.automatic_captions);
  for (const key of autoKeys) {
    if (key.endsWith(ORIG_SUFFIX)) codes.add(key.slice(0, -ORIG_SUFFIX.length));
  }
  if (meta.language && autoKeys.includes(meta.language)) codes.add(meta.language);
  return [...codes];
}

function findKey(keys: string[], language: string): string | undefined {
  return keys.find((key) => key === language) ?? keys.find((key) => primary(key) === language);
}

function trackFor(
  key: string,
  languageCode: string,
  kind: { generated: boolean; translated: boolean }
): CaptionTrack {
  return { key, languageCode, name: languageDisplayName(languageCode), ...kind };
}

function findManual(meta: YoutubeVideoMetadata, languages: string[]): CaptionTrack | undefined {
  const keys = trackKeys(meta.subtitles);
  for (const language of languages) {
    const key = findKey(keys, language);
    if (key) return trackFor(key, key, { generated: false, translated: false });
  }
  return undefined;
}

function findGenerated(meta: YoutubeVideoMetadata, languages: string[]): CaptionTrack | undefined {
  const keys = trackKeys(meta.automatic_captions);
  for (const language of languages) {
    const orig = `${language}${ORIG_SUFFIX}`;
    if (keys.includes(orig)) {
      return trackFor(orig, language, { generated: true, translated: false });
    }
    if (meta.language && primary(meta.language) === language) {
      const key = findKey(keys, language);
      if (key) return trackFor(key, key, { generated: true, translated: false });
    }
  }
  return undefined;
}

function findTranslated(meta: YoutubeVideoMetadata, language: string): CaptionTrack | undefined {
  if (originalCaptionLanguages(meta).length === 0) return undefined;
  const key = findKey(
    trackKeys(meta.automatic_captions).filter((k) => !k.endsWith(ORIG_SUFFIX)),
    language
  );
  return key ? trackFor(key, key, { generated: true, translated: true }) : undefined;
}

/**
 * Pick a track by preference: manual, then original-language automatic, then
 * a machine translation into the first language. `captionType` narrows the
 * search to one of those.
 */
export function selectCaptionTrack(
  meta: YoutubeVideoMetadata,
  languages: string[],
  captionType: CaptionType
): CaptionTrack | undefined {
  let track: CaptionTrack | undefined;
  if (captionType === "manual" || captionType === "any") {
    track = findManual(meta, languages);
  }
  if (!track && (captionType === "auto" || captionType === "any")) {
    track = findGenerated(meta, languages);
  }
  const first = languages[0];
  if (!track && first && (captionType === "translate" || captionType === "any")) {
    track = findTranslated(meta, first);
  }
  return track;
}

export function availableCaptionLanguages(meta: YoutubeVideoMetadata): string[] {
  return originalCaptionLanguages(meta).map((code) => `${code} (${languageDisplayName(code)})`);
}

function parseVttTime(raw: string): number | undefined {
  const match = /^(?:(\d+):)?(\d{1,2}):(\d{2})[.,](\d{3})$/.exec(raw.trim());
  if (!match) return undefined;
  const [, h, m, s, ms] = match;
  return Number(h ?? 0) * 3600 + Number(m) * 60 + Number(s) + Number(ms) / 1000;
}

function cleanCueLine(line: string): string {
  return line
    .replace(/<[^>]*>/g, "")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * WebVTT to cues. Inline tags are dropped, and lines repeated from the
 * previous cue (automatic captions roll text upwards) are collapsed.
 */
export function parseVtt(text: string): CaptionCue[] {
  const cues: CaptionCue[] = [];
  let previousLines: string[] = [];
  const blocks = text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n").split(/\n{2,}/);

  for (const block of blocks) {
    const lines = block.split("\n");
    const timingIndex = lines.findIndex((l) => l.includes("-->"));
    if (timingIndex < 0) continue;
    const start = parseVttTime(lines[timingIndex]?.split("-->")[0] ?? "");
    if (start === undefined) continue;

    const cueLines = lines
      .slice(timingIndex + 1)
      .map(cleanCueLine)
      .filter((l) => l.length > 0);
    const fresh = cueLines.filter((l) => !previousLines.includes(l));
    previousLines = cueLines;
    if (fresh.length === 0) continue;
    cues.push({ start, text: fresh.join(" ") });
  }
  return cues;
}

export function formatCaptionText(caption: {
  title: string;
  videoId: string;
  track: CaptionTrack;
  cues: CaptionCue[];
}): string {
  const { track } = caption;
  const header = [
    `Title: ${caption.title}`,
    `Video ID: ${caption.videoId}`,
    `Language: ${track.name} (${track.languageCode})`,
    `Generated: ${track.generated ? "Yes" : "No"}`,
    `Translated: ${track.translated ? "Yes" : "No"}`,
    "",
  ];
  const body = caption.cues.map(
    (cue) => `[${formatCaptionTimestamp(cue.start)}] ${cue.text.replace(/\n/g, " ")}`
  );
  return [...header, ...body].join("\n");
}

export type CaptionOutcome =
  | { ok: true; path: string; languageCode: string; existing: boolean }
  | { ok: false; reason: string };

async function fetchTrackVtt(
  ctx: YtDlpContext,
  videoId: string,
  track: CaptionTrack
): Promise<string> {
  const tempDir = await fs.mkdtemp(join(tmpdir(), "vidprep-captions-"));
  try {
    const result = await runYtDlp(ctx, [
      "--skip-download",
      track.generated ? "--write-auto-subs" : "--write-subs",
      "--sub-langs",
      track.key,
      "--sub-format",
      "vtt",
      "--no-warnings",
      "-o",
      join(tempDir, `${videoId}.%(ext)s`),
      watchUrl(videoId),
    ]);
    if (result.exitCode !== 0) throw ytDlpFailureFromResult(result);

    const files = (await fs.readdir(tempDir)).filter((f) => extname(f).toLowerCase() === ".vtt");
    const first = files.sort()[0];
    if (!first) throw new Error(`yt-dlp wrote no subtitle file for ${track.key}`);
    return await fs.readFile(join(tempDir, first), "utf8");
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
}

/**
 * Fetch the best caption track for a video and write it as timestamped text.
 * An existing caption (on disk, or in the log) is reused.
 */
export async function downloadCaption(
  ctx: YtDlpContext,
  options: {
    videoId: string;
    outputDir: string;
    title: string;
    language: string;
    captionType: CaptionType;
    logFile?: string;
    metadata?: YoutubeVideoMetadata;
  }
): Promise<CaptionOutcome> {
  const { videoId, outputDir, language, logFile } = options;
  const languages = captionLanguages(language);

  const existing = await findExistingArtifact({
    dir: outputDir,
    videoId,
    mediaType: "caption",
    language: languages[0],
    logFile,
  });
  if (existing.found) {
    logStep("skip", `Caption already present (${existing.source}): ${existing.path}`);
    if (
      logFile &&
      existing.source === "disk" &&
      !(await hasLoggedArtifact(logFile, videoId, "caption", existing.path))
    ) {
      await recordDownload(logFile, {
        videoId,
        title: options.title || videoId,
        type: "caption",
        language,
        filePath: existing.path,
      });
    }
    return { ok: true, path: existing.path, languageCode: language, existing: true };
  }

  const meta = options.metadata ?? (await tryFetchVideoMetadata(ctx, watchUrl(videoId)));
  if (!meta) return { ok: false, reason: "Video metadata unavailable" };

  logStep("caption", `Searching for ${options.captionType} captions in ${languages.join(", ")}`);
  const track = selectCaptionTrack(meta, languages, options.captionType);
  if (!track) {
    logWarn(`No ${options.captionType} captions found for the requested language`);
    const available = availableCaptionLanguages(meta);
    if (available.length > 0) logInfo(`Available languages: ${available.join(", ")}`);
    return { ok: false, reason: `No ${options.captionType} captions available` };
  }
  logStep(
    "caption",
    `Using ${track.translated ? "translated" : track.generated ? "auto-generated" : "manual"} ` +
      `captions in ${track.name} (${track.languageCode})`
  );

  const vtt = await fetchTrackVtt(ctx, videoId, track);
  const cues = parseVtt(vtt);
  const path = join(outputDir, captionFileName(videoId, track.languageCode));
  await writeText(path, formatCaptionText({ title: options.title, videoId, track, cues }));

  if (logFile) {
    await recordDownload(logFile, {
      videoId,
      title: options.title,
      type: "caption",
      language: track.languageCode,
      filePath: path,
    });
  }
  logStep("caption", `Caption saved to: ${path}`);
  return { ok: true, path, languageCode: track.languageCode, existing: false };
}

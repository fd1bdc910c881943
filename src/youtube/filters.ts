import { readFileSync } from "node:fs";
import { z } from "zod";
import { findPackageFile } from "../utils/paths.js";
import { originalCaptionLanguages } from "./captions.js";
import type { YoutubeVideoMetadata } from "./metadata.js";

const languageHintSchema = z.object({
  name: z.string(),
  country: z.string().optional(),
  chars: z.array(z.string()).default([]),
  words: z.array(z.string()).default([]),
  searchTerms: z.array(z.string()).default([]),
});

export type LanguageHint = z.infer<typeof languageHintSchema>;

let cachedHints: Record<string, LanguageHint> | undefined;

export function loadLanguageHints(): Record<string, LanguageHint> {
  if (!cachedHints) {
    const raw = readFileSync(findPackageFile("data/language-hints.json"), "utf8");
    cachedHints = z.record(languageHintSchema).parse(JSON.parse(raw));
  }
  return cachedHints;
}

export function languageHintFor(language: string): LanguageHint | undefined {
  return loadLanguageHints()[primaryLanguage(language)];
}

function primaryLanguage(code: string): string {
  return code.toLowerCase().split(/[-_]/)[0] ?? code.toLowerCase();
}

export type LiveCheck = { live: boolean; reason: string };

const LIVE_STATUSES = new Set(["is_live", "is_upcoming", "post_live"]);

export function isLivestream(meta: YoutubeVideoMetadata): LiveCheck {
  if (meta.is_live) {
    return { live: true, reason: `Video ${meta.id} is a livestream` };
  }
  if (meta.premiere_timestamp !== undefined && meta.premiere_timestamp !== null) {
    return { live: true, reason: `Video ${meta.id} is a premiere` };
  }
  if (meta.live_status && LIVE_STATUSES.has(meta.live_status)) {
    return { live: true, reason: `Video ${meta.id} has live status: ${meta.live_status}` };
  }
  return { live: false, reason: "Not a livestream" };
}

export type LanguageCheck = { matched: boolean; reason: string };

function containsWord(haystack: string, word: string): boolean {
  return ` ${haystack} `.includes(` ${word} `);
}

/**
 * Heuristic language gate: language-specific letters or common words in the
 * title/description, metadata language or country, an original caption track
 * in the language, or a telltale channel name. No precision guarantee.
 */
export function isTargetLanguage(
  meta: YoutubeVideoMetadata,
  language: string,
  hint: LanguageHint | undefined = languageHintFor(language)
): LanguageCheck {
  const target = primaryLanguage(language);
  const name = hint?.name ?? target;
  const title = (meta.title ?? "").toLowerCase();
  const description = (meta.description ?? "").toLowerCase();

  for (const ch of hint?.chars ?? []) {
    if (title.includes(ch) || description.includes(ch)) {
      return { matched: true, reason: `Found ${name} character '${ch}' in title/description` };
    }
  }
  for (const word of hint?.words ?? []) {
    if (containsWord(title, word) || containsWord(description, word)) {
      return { matched: true, reason: `Found ${name} word '${word}' in title/description` };
    }
  }

  if (
    (meta.language && primaryLanguage(meta.language) === target) ||
    (hint?.country && meta.country?.toUpperCase() === hint.country)
  ) {
    return { matched: true, reason: `Metadata indicates ${name} content` };
  }

  if (originalCaptionLanguages(meta).some((code) => primaryLanguage(code) === target)) {
    return { matched: true, reason: `Has ${name} captions` };
  }

  const channel = (meta.channel ?? meta.uploader ?? "").toLowerCase();
  if (
    channel.length > 0 &&
    ((hint?.chars ?? []).some((ch) => channel.includes(ch)) ||
      (hint?.words ?? []).some((word) => containsWord(channel, word)))
  ) {
    return { matched: true, reason: `Channel name indicates ${name} content` };
  }

  return { matched: false, reason: `No ${name} indicators found` };
}

/**
 * Query with the language's search terms appended (skipping ones already present).
 */
export function withLanguageSearchTerms(query: string, language: string): string {
  let result = query;
  for (const term of languageHintFor(language)?.searchTerms ?? []) {
    if (!result.toLowerCase().includes(term)) result = `${result} ${term}`;
  }
  return result;
}

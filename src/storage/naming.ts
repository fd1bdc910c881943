const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * File name for one CSV row: invalid characters become `_`, an empty value
 * falls back to `row_<n>`, and the name always ends in `.txt` (a trailing
 * `.mp4` is swapped rather than appended to).
 */
export function textFileNameForRow(raw: string, rowNumber: number): string {
  let name = raw.replace(INVALID_FILENAME_CHARS, "_").trim();
  if (name.length === 0) name = `row_${rowNumber}`;

  const lower = name.toLowerCase();
  if (lower.endsWith(".mp4")) return `${name.slice(0, -4)}.txt`;
  if (!lower.endsWith(".txt")) return `${name}.txt`;
  return name;
}

/** Keep letters, digits, space, `-` and `_`; everything else becomes `_`. */
export function playlistDirName(title: string): string {
  const safe = Array.from(title)
    .map((ch) => (/[\p{L}\p{N} _-]/u.test(ch) ? ch : "_"))
    .join("");
  return safe.length > 0 ? safe : "YouTube_Playlist";
}

export function searchDirName(query: string, pureSearch: boolean): string {
  const base = `search_${query.replace(/ /g, "_").replace(INVALID_FILENAME_CHARS, "_")}`;
  return pureSearch ? `${base}_exact` : base;
}

export function mediaFileName(videoId: string, ext: string): string {
  return `${videoId}.${ext}`;
}

export function captionFileName(videoId: string, languageCode?: string): string {
  return languageCode ? `${videoId}.${languageCode}.txt` : `${videoId}.txt`;
}

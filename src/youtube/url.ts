export function tryExtractVideoIdFromUrl(urlString: string): string | undefined {
  let url: URL;
  try {
    url = new URL(urlString);
  } catch {
    return undefined;
  }
  const host = url.hostname.replace(/^www\./, "");
  if (host === "youtu.be") {
    const id = url.pathname.replace(/^\//, "").split("/")[0]?.trim() ?? "";
    return id.length > 0 ? id : undefined;
  }
  if (host !== "youtube.com" && host !== "m.youtube.com" && host !== "music.youtube.com") {
    return undefined;
  }
  if (url.pathname === "/watch") {
    const id = (url.searchParams.get("v") ?? "").trim();
    return id.length > 0 ? id : undefined;
  }
  const m = url.pathname.match(/^\/(?:shorts|live|embed)\/([^/]+)/);
  if (m?.[1]) return m[1];
  return undefined;
}

export type YoutubeUrlKind = "video" | "playlist" | "unknown";

export function classifyYoutubeUrl(urlString: string): { kind: YoutubeUrlKind } {
  let url: URL;
  try {
    url = new URL(urlString);
  } catch {
    return { kind: "unknown" };
  }
  const host = url.hostname.replace(/^www\./, "");
  if (host === "youtu.be") return { kind: "video" };
  if (host !== "youtube.com" && host !== "m.youtube.com" && host !== "music.youtube.com") {
    return { kind: "unknown" };
  }
  if (url.pathname === "/playlist") {
    const list = (url.searchParams.get("list") ?? "").trim();
    return list.length > 0 ? { kind: "playlist" } : { kind: "unknown" };
  }
  return tryExtractVideoIdFromUrl(urlString) ? { kind: "video" } : { kind: "unknown" };
}

/**
 * Video id from a watch/short/youtu.be URL. A playlist URL has none; any other
 * input is taken to be an id already.
 */
export function extractVideoId(input: string): string | undefined {
  const trimmed = input.trim();
  if (trimmed.length === 0) return undefined;
  const fromUrl = tryExtractVideoIdFromUrl(trimmed);
  if (fromUrl) return fromUrl;
  if (classifyYoutubeUrl(trimmed).kind === "playlist") return undefined;
  if (/^https?:\/\//i.test(trimmed)) return undefined;
  return trimmed;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

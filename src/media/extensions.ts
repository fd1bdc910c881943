const set = (...exts: string[]) => new Set(exts.map((e) => `.${e}`));

export const MP4_ONLY = set("mp4");

export const NORMALIZE_EXTENSIONS = set("mp4", "mov", "avi", "mkv", "m4v", "wmv", "flv", "webm");

export const FPS_EXTENSIONS = set("mp4", "avi", "mkv", "mov", "wmv", "flv", "webm");

export const ANALYZE_EXTENSIONS = set(
  "mp4", "avi", "mkv", "mov", "wmv", "flv", "webm", "m4v", "3gp",
  "mpg", "mpeg", "m2v", "ts", "m2ts", "mts", "vob",
  "ogv", "ogg", "rm", "rmvb", "divx", "f4v", "3g2", "asf",
  "mxf", "dv", "nut", "nsv", "roq", "svi", "amv", "mtv",
  "yuv", "h264", "h265", "hevc"
);

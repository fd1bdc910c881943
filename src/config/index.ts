export { loadConfig, loadConfigSourceSnapshots } from "./loader.js";
export { loadDownloadJobsFile } from "./jobs.js";
export type { DownloadJobItem } from "./jobs.js";
export type { AppConfig, CaptionType, VideoFormat, CookieBrowser } from "./schema.js";

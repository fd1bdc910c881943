import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { CAPTION_TYPES, COOKIE_BROWSERS, VIDEO_FORMATS } from "./schema.js";

const downloadJobSchema = z
  .object({
    video: z.string().min(1).optional(),
    playlist: z.string().url().optional(),
    search: z.string().min(1).optional(),
    output: z.string().optional(),
    audio: z.boolean().optional(),
    language: z.string().min(1).optional(),
    log: z.string().optional(),
    captions: z.boolean().optional(),
    filterLanguage: z.boolean().optional(),
    includeLivestreams: z.boolean().optional(),
    format: z.enum(VIDEO_FORMATS).optional(),
    captionType: z.enum(CAPTION_TYPES).optional(),
    maxResults: z.number().int().positive().optional(),
    pureSearch: z.boolean().optional(),
    cookies: z.string().optional(),
    browser: z.enum(COOKIE_BROWSERS).optional(),
  })
  .refine((job) => Boolean(job.video || job.playlist || job.search), {
    message: "Each job needs one of: video, playlist, search",
  });

const jobsFileSchema = z.union([
  z.object({ jobs: z.array(downloadJobSchema).min(1) }),
  z.array(downloadJobSchema).min(1),
]);

export type DownloadJobItem = z.infer<typeof downloadJobSchema>;

/**
 * Read a YAML list of download jobs (`downloads.yaml` by default).
 * Returns undefined when the file does not exist.
 */
export function loadDownloadJobsFile(
  path = "downloads.yaml"
): DownloadJobItem[] | undefined {
  let fullPath = resolve(path);
  if (!existsSync(fullPath) && path === "downloads.yaml") {
    const alt = resolve("downloads.yml");
    if (existsSync(alt)) fullPath = alt;
  }
  if (!existsSync(fullPath)) return undefined;
  const raw = readFileSync(fullPath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  const validated = jobsFileSchema.parse(parsed);
  return Array.isArray(validated) ? validated : validated.jobs;
}

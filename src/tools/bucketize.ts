import { basename, join, relative } from "node:path";
import { bucketDirName, classifyFrameCount, isBucketDirName } from "../media/buckets.js";
import { MP4_ONLY } from "../media/extensions.js";
import { probeVideo } from "../media/probe.js";
import type { MediaTools } from "../media/tools.js";
import {
  copyFilePreservingTimes,
  ensureDir,
  fileExists,
  isDirectory,
  listFilesByExtension,
} from "../utils/fs.js";
import { logInfo, logLine, logStep, logWarn } from "../utils/logger.js";
import { errorMessage, UsageError } from "./errors.js";

export type BucketizeOptions = {
  inputDir: string;
  buckets: number[];
  outputDir?: string;
};

export type BucketizeSummary = {
  total: number;
  processed: number;
  skipped: number;
  bucketsCreated: number;
  /** bucket -> names of the files copied into it on this run */
  assignments: Map<number, string[]>;
};

/**
 * Copy every `.mp4` under `inputDir` into `bucket_<n>_frames`, where n is the
 * largest bucket not above the file's frame count. Sources are never moved.
 */
export async function bucketizeByFrameCount(
  tools: MediaTools,
  options: BucketizeOptions
): Promise<BucketizeSummary> {
  if (!(await isDirectory(options.inputDir))) {
    throw new UsageError(
      `Input folder '${options.inputDir}' does not exist or is not a directory`
    );
  }
  const buckets = [...options.buckets].sort((a, b) => a - b);
  logInfo(`Using buckets: ${buckets.join(", ")}`);

  const outputRoot = options.outputDir ?? options.inputDir;
  await ensureDir(outputRoot);

  const files = await listFilesByExtension(options.inputDir, {
    extensions: MP4_ONLY,
    recursive: true,
    skipDir: isBucketDirName,
  });
  logInfo(`Found ${files.length} MP4 files`);

  const assignments = new Map<number, string[]>();
  let skipped = 0;

  for (const [index, file] of files.entries()) {
    const label = `${index + 1}/${files.length}: ${relative(options.inputDir, file)}`;
    const probe = await probeVideo(tools, file);
    const frameCount = probe.ok ? probe.info.frameCount : undefined;
    if (frameCount === undefined) {
      logStep("skip", `${label} - could not determine frame count`);
      skipped += 1;
      continue;
    }

    const bucket = classifyFrameCount(frameCount, buckets);
    if (bucket === undefined) {
      logStep("skip", `${label} - ${frameCount} frames, no suitable bucket`);
      skipped += 1;
      continue;
    }

    const list = assignments.get(bucket) ?? [];
    list.push(file);
    assignments.set(bucket, list);
    logStep("bucket", `${label} - ${frameCount} frames - assigned to ${bucketDirName(bucket)}`);
  }

  logLine();
  logInfo("Creating bucket folders and copying files...");
  const copiedNames = new Map<number, string[]>();

  for (const [bucket, bucketFiles] of assignments) {
    const folder = join(outputRoot, bucketDirName(bucket));
    await ensureDir(folder);
    logInfo(`Created ${folder} for ${bucketFiles.length} files`);

    let copied = 0;
    const names: string[] = [];
    for (const file of bucketFiles) {
      const name = basename(file);
      const dest = join(folder, name);
      if (await fileExists(dest)) {
        logStep("skip", `${name} (already exists in bucket)`);
        skipped += 1;
        continue;
      }
      try {
        await copyFilePreservingTimes(file, dest);
        copied += 1;
        names.push(name);
      } catch (error) {
        logWarn(`Error copying ${name}: ${errorMessage(error)}`);
        skipped += 1;
      }
    }
    copiedNames.set(bucket, names);
    logInfo(`Copied ${copied} files to ${bucketDirName(bucket)}`);
  }

  const summary: BucketizeSummary = {
    total: files.length,
    processed: files.length - skipped,
    skipped,
    bucketsCreated: assignments.size,
    assignments: copiedNames,
  };

  logLine();
  logLine("Summary:");
  logLine(`  Total MP4 files: ${summary.total}`);
  logLine(`  Successfully processed: ${summary.processed}`);
  logLine(`  Skipped: ${summary.skipped}`);
  logLine(`  Number of buckets created: ${summary.bucketsCreated}`);
  return summary;
}

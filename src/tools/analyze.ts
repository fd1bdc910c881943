import { basename, relative, resolve } from "node:path";
import { ANALYZE_EXTENSIONS } from "../media/extensions.js";
import { probeVideo, type ProbeResult } from "../media/probe.js";
import type { MediaTools } from "../media/tools.js";
import { fileExists, isDirectory, listFilesByExtension, readDirSafe } from "../utils/fs.js";
import { logInfo, logLine } from "../utils/logger.js";
import { UsageError } from "./errors.js";

export type AnalyzeOptions = {
  folder: string;
  recursive?: boolean;
  showDuration?: boolean;
  debug?: boolean;
  write?: (line: string) => void;
};

const NAME_WIDTH = 40;

export function truncateName(name: string): string {
  return name.length > 38 ? `${name.slice(0, 35)}...` : name;
}

function roundTo2(value: number): string {
  return String(Math.round(value * 100) / 100);
}

export function formatHeader(showDuration: boolean): { header: string; separator: string } {
  let header = `${"Filename".padEnd(NAME_WIDTH)} ${"Resolution".padEnd(15)} ${"Aspect Ratio".padEnd(12)}`;
  let separator = "-".repeat(80);
  if (showDuration) {
    header += ` ${"Frames".padEnd(12)} ${"FPS".padEnd(8)}`;
    separator = "-".repeat(105);
  }
  return { header, separator };
}

export function formatRow(
  name: string,
  result: ProbeResult,
  showDuration: boolean
): string {
  const label = truncateName(name).padEnd(NAME_WIDTH);
  if (!result.ok) {
    if (result.reason === "no_video_stream") {
      return `${"No video stream found".padEnd(NAME_WIDTH)} ${"N/A".padEnd(15)} ${"N/A".padEnd(12)}`;
    }
    const status = result.reason === "timeout" ? "Timeout" : "Error";
    let line = `${label} ${status.padEnd(15)} ${"N/A".padEnd(12)}`;
    if (showDuration) line += ` ${"N/A".padEnd(12)} ${"N/A".padEnd(8)}`;
    return line;
  }

  const { width, height, frameCount, fps } = result.info;
  let line = `${label} ${`${width}x${height}`.padEnd(15)} ${roundTo2(width / height).padEnd(12)}`;
  if (showDuration) {
    const frames = frameCount !== undefined ? String(frameCount) : "N/A";
    const rate = fps !== undefined ? fps.toFixed(2) : "N/A";
    line += ` ${frames.padEnd(12)} ${rate.padEnd(8)}`;
  }
  return line;
}

async function printFolderDebug(folder: string, write: (line: string) => void) {
  write("");
  write("=== DEBUGGING FOLDER CONTENTS ===");
  write(`Folder path: ${folder}`);
  write(`Folder exists: ${await fileExists(folder)}`);
  write(`Is directory: ${await isDirectory(folder)}`);
  write(`Absolute path: ${resolve(folder)}`);
  const entries = await readDirSafe(folder);
  write("");
  write("All files in folder:");
  if (entries.length === 0) write("  (Folder is empty)");
  entries.slice(0, 20).forEach((e, i) => write(`  ${i + 1}. ${e.name}`));
  if (entries.length > 20) write(`  ... and ${entries.length - 20} more files`);
  write("=== END DEBUGGING ===");
  write("");
}

/**
 * Print resolution, aspect ratio, frame count and FPS of every video in a
 * folder. Returns the number of files probed.
 */
export async function analyzeFolder(
  tools: MediaTools,
  options: AnalyzeOptions
): Promise<number> {
  const write = options.write ?? logLine;
  const showDuration = options.showDuration ?? true;
  if (!(await fileExists(options.folder))) {
    throw new UsageError(`Folder '${options.folder}' does not exist.`);
  }
  if (!(await isDirectory(options.folder))) {
    throw new UsageError(`'${options.folder}' is not a directory.`);
  }
  if (options.debug) await printFolderDebug(options.folder, write);

  const root = resolve(options.folder);
  logInfo(`Scanning folder: ${root}${options.recursive ? " (recursive)" : ""}`);

  const files = await listFilesByExtension(root, {
    extensions: ANALYZE_EXTENSIONS,
    recursive: options.recursive,
  });
  if (files.length === 0) {
    write("No video files found in the folder.");
    write(`Supported extensions: ${[...ANALYZE_EXTENSIONS].map((e) => e.slice(1)).join(", ")}`);
    return 0;
  }

  const { header, separator } = formatHeader(showDuration);
  write(separator);
  write(header);
  write(separator);

  for (const file of files) {
    const name = options.recursive ? relative(root, file) : basename(file);
    const result = await probeVideo(tools, file, { countFrames: showDuration });
    write(formatRow(name, result, showDuration));
    if (!result.ok && result.reason !== "no_video_stream" && options.debug) {
      write(`    Error details: ${result.message}`);
    }
  }

  write(separator);
  write(`Total files processed: ${files.length}`);
  return files.length;
}

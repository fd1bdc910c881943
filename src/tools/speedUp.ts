import { basename, extname, join } from "node:path";
import { MP4_ONLY } from "../media/extensions.js";
import { buildSpeedUpArgs, runFfmpeg } from "../media/ffmpeg.js";
import type { MediaTools } from "../media/tools.js";
import { ensureDir, fileExists, isDirectory, listFilesByExtension } from "../utils/fs.js";
import { logError, logInfo, logStep } from "../utils/logger.js";
import { errorMessage, UsageError } from "./errors.js";

export type SpeedUpSummary = { succeeded: number; failed: number };

export function spedUpOutputName(inputPath: string): string {
  return `${basename(inputPath, extname(inputPath))}_sped_up.mp4`;
}

/**
 * Speed up one `.mp4` or every `.mp4` in a folder (video via setpts, audio via atempo).
 */
export async function speedUpVideos(
  tools: MediaTools,
  options: { input: string; outputDir: string; factor: number }
): Promise<SpeedUpSummary> {
  if (!(options.factor > 0)) {
    throw new UsageError(`Speed factor must be positive (got ${options.factor})`);
  }
  let inputs: string[];
  if (await isDirectory(options.input)) {
    inputs = await listFilesByExtension(options.input, { extensions: MP4_ONLY });
  } else if (await fileExists(options.input)) {
    inputs = [options.input];
  } else {
    throw new UsageError("Input is neither a directory nor a file");
  }
  await ensureDir(options.outputDir);

  const summary: SpeedUpSummary = { succeeded: 0, failed: 0 };
  for (const input of inputs) {
    const output = join(options.outputDir, spedUpOutputName(input));
    try {
      await runFfmpeg(tools, buildSpeedUpArgs(input, output, options.factor));
      summary.succeeded += 1;
      logStep("done", basename(output));
    } catch (error) {
      summary.failed += 1;
      logError(`Error speeding up ${basename(input)}: ${errorMessage(error)}`);
    }
  }
  logInfo(`Processing completed: ${summary.succeeded} succeeded, ${summary.failed} failed.`);
  return summary;
}

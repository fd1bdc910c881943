import { basename, extname, join, resolve } from "node:path";
import { FPS_EXTENSIONS } from "../media/extensions.js";
import { planFpsChange, runFfmpeg, type DurationMode } from "../media/ffmpeg.js";
import { probeFrameRate } from "../media/probe.js";
import type { MediaTools } from "../media/tools.js";
import { ensureDir, isDirectory, listFilesByExtension } from "../utils/fs.js";
import { logError, logInfo, logStep } from "../utils/logger.js";
import { errorMessage, UsageError } from "./errors.js";

export type ChangeFpsOptions = {
  inputDir: string;
  outputDir: string;
  targetFps: number;
  mode: DurationMode;
  preset: string;
};

export type ChangeFpsSummary = { successful: number; failed: number };

export function fpsOutputName(inputPath: string, targetFps: number): string {
  const ext = extname(inputPath);
  return `${basename(inputPath, ext)}_fps${Math.trunc(targetFps)}${ext}`;
}

export async function changeFolderFps(
  tools: MediaTools,
  options: ChangeFpsOptions
): Promise<ChangeFpsSummary> {
  if (!(await isDirectory(options.inputDir))) {
    throw new UsageError(
      `Input folder '${options.inputDir}' does not exist or is not a directory`
    );
  }
  if (resolve(options.inputDir) === resolve(options.outputDir)) {
    throw new UsageError("Input and output folders must be different");
  }
  if (!(options.targetFps > 0)) {
    throw new UsageError(`Target FPS must be positive (got ${options.targetFps})`);
  }
  await ensureDir(options.outputDir);

  const files = await listFilesByExtension(options.inputDir, {
    extensions: FPS_EXTENSIONS,
  });
  const summary: ChangeFpsSummary = { successful: 0, failed: 0 };

  for (const file of files) {
    const outputPath = join(options.outputDir, fpsOutputName(file, options.targetFps));
    try {
      const originalFps =
        options.mode === "change" ? await probeFrameRate(tools, file) : undefined;
      const plan = planFpsChange({
        inputPath: file,
        outputPath,
        targetFps: options.targetFps,
        mode: options.mode,
        originalFps,
        preset: options.preset,
      });
      await runFfmpeg(tools, plan.args);
      summary.successful += 1;
      logStep("done", `Successfully converted: ${basename(file)}`);
    } catch (error) {
      summary.failed += 1;
      logError(`Error converting ${file}: ${errorMessage(error)}`);
    }
  }

  logInfo(
    `Conversion completed: ${summary.successful} videos successfully converted, ${summary.failed} failed.`
  );
  return summary;
}

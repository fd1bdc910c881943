import { basename, join } from "node:path";
import { buildSplitCropArgs, buildVerticalCropArgs, runFfmpeg } from "../media/ffmpeg.js";
import { probeVideo } from "../media/probe.js";
import type { MediaTools } from "../media/tools.js";
import { ensureDir, fileExists } from "../utils/fs.js";
import { logStep } from "../utils/logger.js";
import { UsageError } from "./errors.js";

export type CropSplitOptions = {
  inputPath: string;
  outputDir: string;
  cropTop: number;
  cropBottom: number;
  split: boolean;
};

/**
 * Trim rows off the top and bottom of a video; with `split`, also cut it into
 * left and right halves. Returns the written paths.
 */
export async function cropAndSplit(
  tools: MediaTools,
  options: CropSplitOptions
): Promise<string[]> {
  if (!(await fileExists(options.inputPath))) {
    throw new UsageError(`Input video '${options.inputPath}' does not exist`);
  }
  if (options.cropTop < 0 || options.cropBottom < 0) {
    throw new UsageError("Crop values must be non-negative");
  }
  await ensureDir(options.outputDir);
  const base = basename(options.inputPath, ".mp4");

  if (!options.split) {
    const output = join(options.outputDir, `${base}_cropped.mp4`);
    await runFfmpeg(
      tools,
      buildVerticalCropArgs(options.inputPath, output, options.cropTop, options.cropBottom)
    );
    logStep("done", `Cropped video created: ${output}`);
    return [output];
  }

  const probe = await probeVideo(tools, options.inputPath);
  if (!probe.ok) {
    throw new Error(`Could not read dimensions of ${options.inputPath}: ${probe.message}`);
  }
  const leftPath = join(options.outputDir, `${base}_left.mp4`);
  const rightPath = join(options.outputDir, `${base}_right.mp4`);
  await runFfmpeg(
    tools,
    buildSplitCropArgs({
      inputPath: options.inputPath,
      leftPath,
      rightPath,
      width: probe.info.width,
      cropTop: options.cropTop,
      cropBottom: options.cropBottom,
    })
  );
  logStep("done", `Left and right videos created in ${options.outputDir}`);
  return [leftPath, rightPath];
}

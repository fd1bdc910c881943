import { basename, extname, join } from "node:path";
import {
  buildCropScaleFilter,
  computeCrop,
  dimensionsForVideo,
  isWithinAspectTolerance,
  resolveTargetDimensions,
  type TargetSize,
} from "../media/crop.js";
import { NORMALIZE_EXTENSIONS } from "../media/extensions.js";
import { buildCropScaleArgs, FfmpegError, runFfmpeg } from "../media/ffmpeg.js";
import { probeVideo } from "../media/probe.js";
import type { MediaTools } from "../media/tools.js";
import {
  copyFilePreservingTimes,
  ensureDir,
  isDirectory,
  listFilesByExtension,
} from "../utils/fs.js";
import { logError, logInfo, logLine, logStep } from "../utils/logger.js";
import { errorMessage, UsageError } from "./errors.js";

export type NormalizeOptions = {
  inputDir: string;
  outputDir: string;
  aspectRatio: number;
  width?: number;
  height?: number;
  crf: number;
  preset: string;
};

export type NormalizeOutcome = "copied" | "encoded" | "failed";

export type NormalizeSummary = {
  total: number;
  succeeded: number;
  copied: number;
  encoded: number;
  failed: number;
};

export function normalizedOutputName(inputPath: string): string {
  const ext = extname(inputPath);
  return `${basename(inputPath, ext)}_normalized${ext}`;
}

const fmt = (n: number) => n.toFixed(2);

async function normalizeOne(
  tools: MediaTools,
  inputPath: string,
  outputPath: string,
  target: TargetSize,
  options: NormalizeOptions
): Promise<NormalizeOutcome> {
  const name = basename(inputPath);
  const probe = await probeVideo(tools, inputPath);
  if (!probe.ok) {
    logError(`Could not get dimensions for ${inputPath} (${probe.message})`);
    return "failed";
  }
  const input = probe.info;
  const inputAr = input.width / input.height;

  if (isWithinAspectTolerance(input.width, input.height, options.aspectRatio)) {
    logStep("copy", `${name} (already correct AR: ${fmt(inputAr)})`);
    try {
      await copyFilePreservingTimes(inputPath, outputPath);
      logStep("done", basename(outputPath));
      return "copied";
    } catch (error) {
      logError(`Error copying ${name}: ${errorMessage(error)}`);
      return "failed";
    }
  }

  const output = dimensionsForVideo(target, input);
  const crop = computeCrop(input.width, input.height, output.width, output.height);
  const filter = buildCropScaleFilter(crop, output);

  logStep("encode", name);
  logLine(`  Input: ${input.width}x${input.height} (AR: ${fmt(inputAr)})`);
  if (inputAr > output.width / output.height) {
    logLine(
      `  Crop: ${crop.cropWidth}x${crop.cropHeight} (cropping ${input.width - crop.cropWidth}px from width)`
    );
  } else {
    logLine(
      `  Crop: ${crop.cropWidth}x${crop.cropHeight} (cropping ${input.height - crop.cropHeight}px from height)`
    );
  }
  logLine(`  Final: ${output.width}x${output.height} (AR: ${fmt(output.width / output.height)})`);

  try {
    await runFfmpeg(
      tools,
      buildCropScaleArgs(inputPath, outputPath, filter, {
        crf: options.crf,
        preset: options.preset,
      })
    );
    logStep("done", basename(outputPath));
    return "encoded";
  } catch (error) {
    logError(`Error processing ${name}: ${errorMessage(error)}`);
    if (error instanceof FfmpegError && error.details.stderr) {
      logLine(`  FFmpeg error: ${error.details.stderr.trim()}`);
    }
    return "failed";
  }
}

/**
 * Bring every video in a folder to one aspect ratio by centre-cropping and
 * scaling. Videos already within tolerance are copied untouched.
 */
export async function normalizeAspectRatios(
  tools: MediaTools,
  options: NormalizeOptions
): Promise<NormalizeSummary> {
  let target: TargetSize;
  try {
    target = resolveTargetDimensions(options);
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
  if (!(await isDirectory(options.inputDir))) {
    throw new UsageError(`Input folder '${options.inputDir}' does not exist`);
  }
  await ensureDir(options.outputDir);

  const files = await listFilesByExtension(options.inputDir, {
    extensions: NORMALIZE_EXTENSIONS,
  });
  const summary: NormalizeSummary = {
    total: files.length,
    succeeded: 0,
    copied: 0,
    encoded: 0,
    failed: 0,
  };
  if (files.length === 0) {
    logInfo(`No video files found in '${options.inputDir}'`);
    return summary;
  }

  logInfo(`Found ${files.length} video files`);
  if (target.kind === "fixed") {
    logInfo(
      `Target resolution: ${target.width}x${target.height} (AR: ${fmt(target.width / target.height)})`
    );
  } else {
    logInfo(`Target aspect ratio: ${fmt(target.aspectRatio)} (resolution calculated per video)`);
  }
  logLine("=".repeat(60));

  for (const file of files) {
    const outputPath = join(options.outputDir, normalizedOutputName(file));
    const outcome = await normalizeOne(tools, file, outputPath, target, options);
    if (outcome === "failed") summary.failed += 1;
    else {
      summary.succeeded += 1;
      if (outcome === "copied") summary.copied += 1;
      else summary.encoded += 1;
    }
    logLine();
  }

  logLine("=".repeat(60));
  logInfo(`Processed ${summary.succeeded}/${summary.total} videos successfully`);
  return summary;
}

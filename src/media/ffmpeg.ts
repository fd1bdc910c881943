import type { MediaTools } from "./tools.js";

export class FfmpegError extends Error {
  constructor(
    message: string,
    public details: { stderr: string; exitCode: number }
  ) {
    super(message);
    this.name = "FfmpegError";
  }
}

function lastLines(text: string, count: number): string {
  return text
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((l) => l.trimEnd())
    .filter((l) => l.length > 0)
    .slice(-count)
    .join("\n");
}

/**
 * Run ffmpeg to completion (no timeout). Throws FfmpegError on a non-zero exit.
 */
export async function runFfmpeg(tools: MediaTools, args: string[]): Promise<void> {
  const res = await tools.exec(tools.ffmpeg, args);
  if (res.exitCode !== 0) {
    throw new FfmpegError(
      `ffmpeg exited with code ${res.exitCode}: ${lastLines(res.stderr, 3) || "no output"}`,
      { stderr: res.stderr, exitCode: res.exitCode }
    );
  }
}

export type EncodeOptions = { crf: number; preset: string };

export function buildCropScaleArgs(
  inputPath: string,
  outputPath: string,
  videoFilter: string,
  encode: EncodeOptions
): string[] {
  return [
    "-i",
    inputPath,
    "-vf",
    videoFilter,
    "-c:v",
    "libx264",
    "-crf",
    String(encode.crf),
    "-preset",
    encode.preset,
    "-c:a",
    "copy",
    "-y",
    outputPath,
  ];
}

export type DurationMode = "preserve" | "change";

export type FpsChangePlan = {
  args: string[];
  /** Output duration divided by input duration. */
  durationScale: number;
};

/**
 * preserve: the fps filter drops/duplicates frames, so the running time stays put.
 * change: timestamps are rescaled by original/target and the streams are copied,
 * so every frame is kept and the running time stretches or shrinks.
 */
export function planFpsChange(options: {
  inputPath: string;
  outputPath: string;
  targetFps: number;
  mode: DurationMode;
  originalFps?: number;
  preset?: string;
}): FpsChangePlan {
  const { inputPath, outputPath, targetFps, mode } = options;
  if (mode === "preserve") {
    return {
      durationScale: 1,
      args: [
        "-i",
        inputPath,
        "-filter:v",
        `fps=${targetFps}`,
        "-c:v",
        "libx264",
        "-c:a",
        "copy",
        "-preset",
        options.preset ?? "medium",
        "-y",
        outputPath,
      ],
    };
  }

  if (options.originalFps === undefined) {
    throw new Error("Duration mode 'change' needs the original frame rate");
  }
  const scale = options.originalFps / targetFps;
  return {
    durationScale: scale,
    args: [
      "-itsscale",
      String(scale),
      "-i",
      inputPath,
      "-c:v",
      "copy",
      "-c:a",
      "copy",
      "-avoid_negative_ts",
      "make_zero",
      "-y",
      outputPath,
    ],
  };
}

/** atempo accepts at most 2.0 per instance, so larger factors are chained. */
export function buildAtempoChain(factor: number): string {
  if (factor > 2) {
    return `atempo=2.0,atempo=${factor / 2}`;
  }
  return `atempo=${factor}`;
}

export function buildSpeedUpArgs(
  inputPath: string,
  outputPath: string,
  factor: number
): string[] {
  return [
    "-i",
    inputPath,
    "-filter:v",
    `setpts=1/${factor}*PTS`,
    "-filter:a",
    buildAtempoChain(factor),
    "-y",
    outputPath,
  ];
}

export function buildVerticalCropArgs(
  inputPath: string,
  outputPath: string,
  cropTop: number,
  cropBottom: number
): string[] {
  return [
    "-i",
    inputPath,
    "-vf",
    `crop=iw:ih-${cropTop + cropBottom}:0:${cropTop}`,
    "-y",
    outputPath,
  ];
}

export function buildSplitCropArgs(options: {
  inputPath: string;
  leftPath: string;
  rightPath: string;
  width: number;
  cropTop: number;
  cropBottom: number;
}): string[] {
  const half = Math.floor(options.width / 2);
  const trimmed = options.cropTop + options.cropBottom;
  const graph =
    `[0]crop=${half}:ih-${trimmed}:0:${options.cropTop}[left];` +
    `[0]crop=${half}:ih-${trimmed}:${half}:${options.cropTop}[right]`;
  return [
    "-i",
    options.inputPath,
    "-filter_complex",
    graph,
    "-map",
    "[left]",
    "-y",
    options.leftPath,
    "-map",
    "[right]",
    "-y",
    options.rightPath,
  ];
}

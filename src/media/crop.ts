export const ASPECT_RATIO_TOLERANCE = 0.01;

export type Dimensions = { width: number; height: number };

export type CropBox = { cropWidth: number; cropHeight: number };

/** Largest even integer not above `value` (libx264 needs even sizes). */
export function evenFloor(value: number): number {
  const n = Math.floor(value);
  return n - (n % 2);
}

/**
 * Centre-crop box that brings the input to the target aspect ratio without
 * distorting pixels. The dimension along which the input is too long is cut
 * back; the other is kept whole.
 */
export function computeCrop(
  inputWidth: number,
  inputHeight: number,
  targetWidth: number,
  targetHeight: number
): CropBox {
  const inputAr = inputWidth / inputHeight;
  const targetAr = targetWidth / targetHeight;

  if (inputAr > targetAr) {
    return {
      cropWidth: evenFloor(inputHeight * targetAr),
      cropHeight: evenFloor(inputHeight),
    };
  }
  return {
    cropWidth: evenFloor(inputWidth),
    cropHeight: evenFloor(inputWidth / targetAr),
  };
}

export function isWithinAspectTolerance(
  inputWidth: number,
  inputHeight: number,
  targetAspectRatio: number
): boolean {
  return Math.abs(inputWidth / inputHeight - targetAspectRatio) < ASPECT_RATIO_TOLERANCE;
}

export type TargetSize =
  | { kind: "fixed"; width: number; height: number }
  | { kind: "per-video"; aspectRatio: number };

/**
 * Resolve the output size requested on the command line. A fixed width or
 * height pins the whole output size; with neither, each video gets its own.
 */
export function resolveTargetDimensions(options: {
  aspectRatio: number;
  width?: number;
  height?: number;
}): TargetSize {
  const { aspectRatio, width, height } = options;
  if (width !== undefined && height !== undefined) {
    throw new Error("Specify either --width or --height, not both");
  }
  if (!(aspectRatio > 0)) {
    throw new Error(`Aspect ratio must be positive (got ${aspectRatio})`);
  }
  if (width !== undefined) {
    return { kind: "fixed", width, height: evenFloor(width / aspectRatio) };
  }
  if (height !== undefined) {
    return { kind: "fixed", width: evenFloor(height * aspectRatio), height };
  }
  return { kind: "per-video", aspectRatio };
}

/**
 * Per-video output size: keep the longer input side and derive the other.
 */
export function dimensionsForVideo(
  target: TargetSize,
  input: Dimensions
): Dimensions {
  if (target.kind === "fixed") {
    return { width: target.width, height: target.height };
  }
  if (input.width >= input.height) {
    return {
      width: evenFloor(input.width),
      height: evenFloor(input.width / target.aspectRatio),
    };
  }
  return {
    width: evenFloor(input.height * target.aspectRatio),
    height: evenFloor(input.height),
  };
}

export function buildCropScaleFilter(crop: CropBox, output: Dimensions): string {
  return `crop=${crop.cropWidth}:${crop.cropHeight},scale=${output.width}:${output.height}`;
}

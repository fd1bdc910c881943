export function parseBuckets(raw: string): number[] {
  const parts = raw.split(",").map((p) => p.trim());
  const buckets = parts.map((p) => {
    if (!/^-?\d+$/.test(p)) {
      throw new Error("Buckets must be comma-separated integers");
    }
    return Number(p);
  });
  return buckets.sort((a, b) => a - b);
}

/**
 * Largest bucket not above `frameCount`; undefined when every bucket is larger.
 * `buckets` must be sorted ascending.
 */
export function classifyFrameCount(
  frameCount: number,
  buckets: readonly number[]
): number | undefined {
  let chosen: number | undefined;
  for (const bucket of buckets) {
    if (bucket > frameCount) break;
    chosen = bucket;
  }
  return chosen;
}

export function bucketDirName(bucket: number): string {
  return `bucket_${bucket}_frames`;
}

export function isBucketDirName(name: string): boolean {
  return /^bucket_-?\d+_frames$/.test(name);
}

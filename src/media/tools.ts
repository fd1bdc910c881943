import { execCommand, type ExecFn } from "../utils/exec.js";

/**
 * Resolved binaries plus the process runner; tests swap `exec` for a fake.
 */
export type MediaTools = {
  ffmpeg: string;
  ffprobe: string;
  probeTimeoutMs: number;
  exec: ExecFn;
};

export function createMediaTools(options: {
  ffmpeg: string;
  ffprobe: string;
  probeTimeoutMs?: number;
  exec?: ExecFn;
}): MediaTools {
  return {
    ffmpeg: options.ffmpeg,
    ffprobe: options.ffprobe,
    probeTimeoutMs: options.probeTimeoutMs ?? 60000,
    exec: options.exec ?? execCommand,
  };
}

import { execCommand } from "./exec.js";
import { fileExists } from "./fs.js";

async function tryCommand(cmd: string, versionFlag: string): Promise<boolean> {
  const res = await execCommand(cmd, [versionFlag], { timeoutMs: 15000 });
  return res.exitCode === 0;
}

async function resolveBinary(
  binaryName: string,
  versionFlag: string,
  explicitPaths: Array<string | undefined>
): Promise<string | undefined> {
  for (const explicitPath of explicitPaths) {
    if (!explicitPath) continue;
    try {
      if ((await fileExists(explicitPath)) && (await tryCommand(explicitPath, versionFlag))) {
        return explicitPath;
      }
    } catch {
      // try the next candidate
    }
  }
  const candidates = [binaryName, `${binaryName}.exe`];
  for (const candidate of candidates) {
    try {
      if (await tryCommand(candidate, versionFlag)) return candidate;
    } catch {
      // continue
    }
  }
  return undefined;
}

export async function resolveYtDlpCommand(
  explicitPath?: string
): Promise<string> {
  const resolved = await resolveBinary("yt-dlp", "--version", [
    explicitPath,
    process.env.YT_DLP_PATH,
    process.env.YTDLP_PATH,
  ]);
  if (resolved) return resolved;
  throw new Error(
    "yt-dlp not found. Install it:\n" +
      "  pip install yt-dlp\n" +
      "  or visit: https://github.com/yt-dlp/yt-dlp\n" +
      "You can also set VIDPREP_YT_DLP_PATH to the full yt-dlp path."
  );
}

export async function resolveFfmpegCommand(
  explicitPath?: string
): Promise<string> {
  const resolved = await resolveBinary("ffmpeg", "-version", [
    explicitPath,
    process.env.FFMPEG_PATH,
  ]);
  if (resolved) return resolved;
  throw new Error(
    "ffmpeg not found. Install it:\n" +
      "  https://ffmpeg.org/download.html\n" +
      "If installed, ensure it is on PATH or set VIDPREP_FFMPEG_PATH."
  );
}

export async function resolveFfprobeCommand(
  explicitPath?: string
): Promise<string> {
  const resolved = await resolveBinary("ffprobe", "-version", [
    explicitPath,
    process.env.FFPROBE_PATH,
  ]);
  if (resolved) return resolved;
  throw new Error(
    "ffprobe not found. Install ffmpeg (ffprobe is bundled):\n" +
      "  https://ffmpeg.org/download.html\n" +
      "If installed, ensure it is on PATH or set VIDPREP_FFPROBE_PATH."
  );
}

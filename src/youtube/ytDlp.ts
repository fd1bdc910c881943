import type { CookieBrowser } from "../config/schema.js";
import { execCommand, type ExecFn, type ExecResult } from "../utils/exec.js";
import { fileExists } from "../utils/fs.js";
import { logWarn } from "../utils/logger.js";

export type YtDlpAuth = {
  cookiesFile?: string;
  browser?: CookieBrowser;
};

/**
 * Everything needed to invoke yt-dlp; `exec` is replaced by a fake in tests.
 */
export type YtDlpContext = {
  command: string;
  extraArgs: string[];
  auth: YtDlpAuth;
  exec: ExecFn;
};

export function createYtDlpContext(options: {
  command: string;
  extraArgs?: string[];
  auth?: YtDlpAuth;
  exec?: ExecFn;
}): YtDlpContext {
  return {
    command: options.command,
    extraArgs: options.extraArgs ?? [],
    auth: options.auth ?? {},
    exec: options.exec ?? execCommand,
  };
}

/**
 * Browser cookies win over a cookies file; a missing file is reported and ignored.
 */
export async function buildAuthArgs(auth: YtDlpAuth): Promise<string[]> {
  if (auth.browser) return ["--cookies-from-browser", auth.browser];
  if (auth.cookiesFile) {
    if (await fileExists(auth.cookiesFile)) return ["--cookies", auth.cookiesFile];
    logWarn(`Cookies file not found: ${auth.cookiesFile}`);
  }
  return [];
}

export async function runYtDlp(
  ctx: YtDlpContext,
  args: string[]
): Promise<ExecResult> {
  const auth = await buildAuthArgs(ctx.auth);
  return ctx.exec(ctx.command, [...ctx.extraArgs, ...auth, ...args]);
}

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import dotenv from "dotenv";
import YAML from "yaml";
import { configSchema, AppConfig } from "./schema.js";

type PartialConfig = Partial<Record<keyof AppConfig, unknown>>;

function loadYamlConfig(path: string): PartialConfig {
  if (!existsSync(path)) return {};
  const raw = readFileSync(path, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return {};
  return { ...parsed };
}

function pickEnv(
  env: NodeJS.ProcessEnv,
  ...names: string[]
): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value.trim().length > 0) return value;
  }
  return undefined;
}

function parseOptionalNumber(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : Number(raw);
}

function parseOptionalList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    const parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed)) return parsed.map((v) => String(v));
  }
  return trimmed.split(/\s+/).filter(Boolean);
}

function loadEnvConfig(): PartialConfig {
  dotenv.config();
  const env = process.env;
  return {
    ffmpegPath: pickEnv(env, "VIDPREP_FFMPEG_PATH", "FFMPEG_PATH"),
    ffprobePath: pickEnv(env, "VIDPREP_FFPROBE_PATH", "FFPROBE_PATH"),
    ytDlpPath: pickEnv(env, "VIDPREP_YT_DLP_PATH", "YT_DLP_PATH", "YTDLP_PATH"),
    ytDlpExtraArgs: parseOptionalList(
      pickEnv(env, "VIDPREP_YT_DLP_EXTRA_ARGS", "YT_DLP_EXTRA_ARGS")
    ),
    probeTimeoutMs: parseOptionalNumber(pickEnv(env, "VIDPREP_PROBE_TIMEOUT_MS")),
    videoCrf: parseOptionalNumber(pickEnv(env, "VIDPREP_VIDEO_CRF")),
    videoPreset: pickEnv(env, "VIDPREP_VIDEO_PRESET"),
    fpsPreset: pickEnv(env, "VIDPREP_FPS_PRESET"),
    downloadDir: pickEnv(env, "VIDPREP_DOWNLOAD_DIR"),
    logFileName: pickEnv(env, "VIDPREP_LOG_FILE_NAME"),
    captionLanguage: pickEnv(env, "VIDPREP_CAPTION_LANGUAGE"),
    captionType: pickEnv(env, "VIDPREP_CAPTION_TYPE"),
    videoFormat: pickEnv(env, "VIDPREP_VIDEO_FORMAT"),
    cookiesFile: pickEnv(env, "VIDPREP_COOKIES_FILE"),
    cookiesBrowser: pickEnv(env, "VIDPREP_COOKIES_BROWSER"),
    maxSearchResults: parseOptionalNumber(pickEnv(env, "VIDPREP_MAX_SEARCH_RESULTS")),
  };
}

function filterUndefined(obj: PartialConfig): PartialConfig {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  );
}

export type ConfigSourceSnapshots = {
  yamlConfig: PartialConfig;
  envConfig: PartialConfig;
};

export function loadConfigSourceSnapshots(
  configPath = "config.yaml"
): ConfigSourceSnapshots {
  const yamlConfig = loadYamlConfig(resolve(configPath));
  const envConfig = filterUndefined(loadEnvConfig());
  return { yamlConfig, envConfig };
}

export function loadConfig(configPath = "config.yaml"): AppConfig {
  const { yamlConfig, envConfig } = loadConfigSourceSnapshots(configPath);

  // Precedence: config.yaml (lowest) < environment; CLI flags are applied by the caller.
  const merged = { ...yamlConfig, ...envConfig };
  return configSchema.parse(merged);
}

#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError, Option } from "commander";
import {
  loadConfig,
  loadDownloadJobsFile,
  type AppConfig,
  type DownloadJobItem,
} from "../config/index.js";
import { CAPTION_TYPES, COOKIE_BROWSERS, VIDEO_FORMATS } from "../config/schema.js";
import { parseBuckets } from "../media/buckets.js";
import { createMediaTools, type MediaTools } from "../media/tools.js";
import {
  emptySummary,
  addToSummary,
  logDownloadSummary,
  runDownloads,
  type DownloadSettings,
} from "../pipeline/run.js";
import { analyzeFolder } from "../tools/analyze.js";
import { bucketizeByFrameCount } from "../tools/bucketize.js";
import { changeFolderFps } from "../tools/changeFps.js";
import { cropAndSplit } from "../tools/cropSplit.js";
import { csvToTextFiles } from "../tools/csvToTxt.js";
import { errorMessage, UsageError } from "../tools/errors.js";
import { normalizeAspectRatios } from "../tools/normalizeAspect.js";
import { speedUpVideos } from "../tools/speedUp.js";
import { writeTriggerCaptions } from "../tools/triggerCaptions.js";
import {
  resolveFfmpegCommand,
  resolveFfprobeCommand,
  resolveYtDlpCommand,
} from "../utils/deps.js";
import { logError, logInfo } from "../utils/logger.js";
import { findPackageFile } from "../utils/paths.js";
import { createYtDlpContext, type YtDlpContext } from "../youtube/ytDlp.js";

const pkg: unknown = JSON.parse(readFileSync(findPackageFile("package.json"), "utf8"));
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

function parsePositiveInteger(value: string): number {
  const n = parseInteger(value);
  if (n <= 0) throw new InvalidArgumentError("Must be a positive integer.");
  return n;
}

function parseBucketList(value: string): number[] {
  try {
    return parseBuckets(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

async function mediaTools(
  config: AppConfig,
  needs: { ffmpeg: boolean; ffprobe: boolean }
): Promise<MediaTools> {
  const ffmpeg = needs.ffmpeg
    ? await resolveFfmpegCommand(config.ffmpegPath)
    : config.ffmpegPath ?? "ffmpeg";
  const ffprobe = needs.ffprobe
    ? await resolveFfprobeCommand(config.ffprobePath)
    : config.ffprobePath ?? "ffprobe";
  return createMediaTools({ ffmpeg, ffprobe, probeTimeoutMs: config.probeTimeoutMs });
}

async function run(task: () => Promise<void>) {
  try {
    await task();
  } catch (error) {
    if (error instanceof UsageError) {
      logError(error.message);
    } else {
      logError(error instanceof Error ? error.stack ?? error.message : String(error));
    }
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("vidprep")
  .description("Batch utilities for preparing video and caption datasets")
  .version(version)
  .option("--config <path>", "YAML config file", "config.yaml");

function config(): AppConfig {
  return loadConfig(program.opts<{ config: string }>().config);
}

program
  .command("normalize")
  .description("Crop and scale every video in a folder to one aspect ratio")
  .argument("<input>", "Folder of videos")
  .argument("<output>", "Folder for normalized videos")
  .option("--aspect-ratio <ratio>", "Target aspect ratio", parseNumber, 1.78)
  .option("--width <px>", "Fixed output width", parsePositiveInteger)
  .option("--height <px>", "Fixed output height", parsePositiveInteger)
  .option("--crf <n>", "libx264 CRF", parseInteger)
  .option("--preset <name>", "libx264 preset")
  .action(
    (
      input: string,
      output: string,
      opts: { aspectRatio: number; width?: number; height?: number; crf?: number; preset?: string }
    ) =>
      run(async () => {
        const cfg = config();
        if (opts.width !== undefined && opts.height !== undefined) {
          throw new UsageError("Specify either --width or --height, not both");
        }
        const tools = await mediaTools(cfg, { ffmpeg: true, ffprobe: true });
        await normalizeAspectRatios(tools, {
          inputDir: input,
          outputDir: output,
          aspectRatio: opts.aspectRatio,
          width: opts.width,
          height: opts.height,
          crf: opts.crf ?? cfg.videoCrf,
          preset: opts.preset ?? cfg.videoPreset,
        });
      })
  );

program
  .command("bucket")
  .description("Copy MP4 files into frame-count buckets")
  .argument("<input>", "Folder of MP4 files (scanned recursively)")
  .requiredOption("-b, --buckets <list>", "Comma-separated frame counts, e.g. 30,60,120", parseBucketList)
  .option("-o, --output <dir>", "Base folder for bucket folders (default: input folder)")
  .action((input: string, opts: { buckets: number[]; output?: string }) =>
    run(async () => {
      const tools = await mediaTools(config(), { ffmpeg: false, ffprobe: true });
      await bucketizeByFrameCount(tools, {
        inputDir: input,
        buckets: opts.buckets,
        outputDir: opts.output,
      });
    })
  );

program
  .command("csv-to-txt")
  .description("Write one text file per CSV row")
  .argument("<csv>", "CSV file with a header row")
  .argument("<output>", "Folder for the text files")
  .requiredOption("--text-column <name>", "Column holding the file contents")
  .requiredOption("--filename-column <name>", "Column holding the file name")
  .action(
    (csv: string, output: string, opts: { textColumn: string; filenameColumn: string }) =>
      run(async () => {
        await csvToTextFiles({
          csvPath: csv,
          textColumn: opts.textColumn,
          filenameColumn: opts.filenameColumn,
          outputDir: output,
        });
      })
  );

program
  .command("fps")
  .description("Change the frame rate of every video in a folder")
  .requiredOption("-i, --input <dir>", "Folder of videos")
  .requiredOption("-o, --output <dir>", "Folder for converted videos")
  .option("-f, --fps <n>", "Target frame rate", parseNumber, 30)
  .addOption(
    new Option("-d, --duration <mode>", "preserve: drop/duplicate frames; change: retime every frame")
      .choices(["preserve", "change"] as const)
      .default("preserve")
  )
  .action(
    (opts: { input: string; output: string; fps: number; duration: "preserve" | "change" }) =>
      run(async () => {
        const cfg = config();
        const tools = await mediaTools(cfg, {
          ffmpeg: true,
          ffprobe: opts.duration === "change",
        });
        await changeFolderFps(tools, {
          inputDir: opts.input,
          outputDir: opts.output,
          targetFps: opts.fps,
          mode: opts.duration,
          preset: cfg.fpsPreset,
        });
      })
  );

program
  .command("trigger")
  .description("Write a caption file holding the trigger word next to every MP4")
  .argument("<folder>", "Folder of MP4 files")
  .argument("<word>", "Trigger word")
  .action((folder: string, word: string) =>
    run(async () => {
      await writeTriggerCaptions(folder, word);
    })
  );

program
  .command("analyze")
  .description("Print resolution, aspect ratio, frames and FPS of every video")
  .argument("<folder>", "Folder to scan")
  .option("-r, --recursive", "Scan subfolders too")
  .option("--no-duration", "Skip frame counting (faster)")
  .option("--debug", "List folder contents and error details")
  .action(
    (folder: string, opts: { recursive?: boolean; duration: boolean; debug?: boolean }) =>
      run(async () => {
        const tools = await mediaTools(config(), { ffmpeg: false, ffprobe: true });
        await analyzeFolder(tools, {
          folder,
          recursive: opts.recursive,
          showDuration: opts.duration,
          debug: opts.debug,
        });
      })
  );

program
  .command("speed-up")
  .description("Speed up an MP4 or every MP4 in a folder")
  .argument("<input>", "Video file or folder")
  .argument("<output>", "Output folder")
  .argument("<factor>", "Speed factor, e.g. 1.5", parseNumber)
  .action((input: string, output: string, factor: number) =>
    run(async () => {
      const tools = await mediaTools(config(), { ffmpeg: true, ffprobe: false });
      await speedUpVideos(tools, { input, outputDir: output, factor });
    })
  );

program
  .command("crop")
  .description("Trim rows off the top and bottom of a video, optionally splitting it in half")
  .argument("<input>", "Input MP4")
  .argument("<output>", "Output folder")
  .option("--top <px>", "Rows to remove at the top", parseInteger, 0)
  .option("--bottom <px>", "Rows to remove at the bottom", parseInteger, 0)
  .option("--split", "Also split into left and right halves")
  .action(
    (input: string, output: string, opts: { top: number; bottom: number; split?: boolean }) =>
      run(async () => {
        const split = Boolean(opts.split);
        const tools = await mediaTools(config(), { ffmpeg: true, ffprobe: split });
        await cropAndSplit(tools, {
          inputPath: input,
          outputDir: output,
          cropTop: opts.top,
          cropBottom: opts.bottom,
          split,
        });
      })
  );

type DownloadCliOptions = {
  playlist?: string;
  video?: string;
  search?: string;
  output?: string;
  audio?: boolean;
  language?: string;
  log?: string;
  captions: boolean;
  filterLanguage?: boolean;
  includeLivestreams?: boolean;
  cookies?: string;
  browser?: (typeof COOKIE_BROWSERS)[number];
  format?: (typeof VIDEO_FORMATS)[number];
  captionType?: (typeof CAPTION_TYPES)[number];
  maxResults?: number;
  pureSearch?: boolean;
  from?: string;
};

function settingsFor(
  cfg: AppConfig,
  opts: DownloadCliOptions,
  job: DownloadJobItem = {}
): DownloadSettings {
  return {
    outputDir: job.output ?? opts.output ?? cfg.downloadDir,
    audioOnly: job.audio ?? Boolean(opts.audio),
    language: job.language ?? opts.language ?? cfg.captionLanguage,
    logFile: job.log ?? opts.log,
    logFileName: cfg.logFileName,
    captions: job.captions ?? opts.captions,
    filterLanguage: job.filterLanguage ?? Boolean(opts.filterLanguage),
    includeLivestreams: job.includeLivestreams ?? Boolean(opts.includeLivestreams),
    videoFormat: job.format ?? opts.format ?? cfg.videoFormat,
    captionType: job.captionType ?? opts.captionType ?? cfg.captionType,
    maxResults: job.maxResults ?? opts.maxResults ?? cfg.maxSearchResults,
    pureSearch: job.pureSearch ?? Boolean(opts.pureSearch),
  };
}

function ytDlpContextFor(
  command: string,
  cfg: AppConfig,
  opts: DownloadCliOptions,
  job: DownloadJobItem = {}
): YtDlpContext {
  return createYtDlpContext({
    command,
    extraArgs: cfg.ytDlpExtraArgs,
    auth: {
      cookiesFile: job.cookies ?? opts.cookies ?? cfg.cookiesFile,
      browser: job.browser ?? opts.browser ?? cfg.cookiesBrowser,
    },
  });
}

program
  .command("download")
  .description("Download YouTube videos or audio with captions")
  .option("-p, --playlist <url>", "Playlist URL")
  .option("-v, --video <url>", "Video URL or id")
  .option("-s, --search <query>", "Search query")
  .option("-o, --output <dir>", "Output folder")
  .option("-a, --audio", "Download audio only (WAV)")
  .option("-l, --language <code>", "Caption language")
  .option("--log <path>", "Download log (default: <output folder>/download_log.jsonl)")
  .option("--no-captions", "Skip captions")
  .option("--filter-language", "Only download videos that look like the caption language")
  .option("--include-livestreams", "Do not skip livestreams and premieres")
  .option("--cookies <file>", "Cookies file for yt-dlp")
  .addOption(new Option("--browser <name>", "Read cookies from a browser").choices(COOKIE_BROWSERS))
  .addOption(new Option("--format <fmt>", "Preferred video container").choices(VIDEO_FORMATS))
  .addOption(new Option("--caption-type <type>", "Caption preference").choices(CAPTION_TYPES))
  .option("--max-results <n>", "Search results to process", parsePositiveInteger)
  .option("--pure-search", "Search the query as given, without language terms or language filtering")
  .option("--from <file>", "YAML list of download jobs")
  .action((opts: DownloadCliOptions) =>
    run(async () => {
      const cfg = config();
      const hasSource = Boolean(opts.playlist || opts.video || opts.search);
      const jobs = opts.from ? loadDownloadJobsFile(opts.from) : undefined;
      if (opts.from && !jobs) throw new UsageError(`Jobs file '${opts.from}' not found`);
      if (!hasSource && !jobs) {
        throw new UsageError(
          "Please provide a playlist URL (-p), a video URL (-v), a search query (-s) or --from <file>"
        );
      }

      const ytDlp = await resolveYtDlpCommand(cfg.ytDlpPath);
      const total = emptySummary();

      if (hasSource) {
        addToSummary(
          total,
          await runDownloads(ytDlpContextFor(ytDlp, cfg, opts), opts, settingsFor(cfg, opts))
        );
      }
      for (const [index, job] of (jobs ?? []).entries()) {
        logInfo(`Job ${index + 1}/${jobs?.length ?? 0}`);
        addToSummary(
          total,
          await runDownloads(ytDlpContextFor(ytDlp, cfg, opts, job), job, settingsFor(cfg, opts, job))
        );
      }
      logDownloadSummary(total);
    })
  );

await program.parseAsync(process.argv);

import { promises as fs } from "node:fs";
import { basename, extname, join, dirname } from "node:path";
import { MP4_ONLY } from "../media/extensions.js";
import { isDirectory, listFilesByExtension } from "../utils/fs.js";
import { logInfo, logStep } from "../utils/logger.js";
import { UsageError } from "./errors.js";

export function captionPathFor(videoPath: string): string {
  const ext = extname(videoPath);
  return join(dirname(videoPath), `${basename(videoPath, ext)}.txt`);
}

/**
 * Write `<stem>.txt` holding just the trigger word next to every `.mp4` in
 * `folder`. Existing caption files are overwritten.
 */
export async function writeTriggerCaptions(
  folder: string,
  triggerWord: string
): Promise<string[]> {
  if (!(await isDirectory(folder))) {
    throw new UsageError(`The folder '${folder}' does not exist!`);
  }
  const videos = await listFilesByExtension(folder, { extensions: MP4_ONLY });
  if (videos.length === 0) {
    logInfo(`No mp4 files found in '${folder}' folder.`);
    return [];
  }

  logInfo(`Found ${videos.length} mp4 files...`);
  const written: string[] = [];
  for (const video of videos) {
    const txt = captionPathFor(video);
    await fs.writeFile(txt, triggerWord, "utf8");
    written.push(txt);
    logStep("write", basename(txt));
  }
  logInfo(`Done! ${written.length} txt files created.`);
  return written;
}

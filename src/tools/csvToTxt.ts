import { promises as fs } from "node:fs";
import { join } from "node:path";
import { textFileNameForRow } from "../storage/naming.js";
import { parseCsvRecords } from "../utils/csv.js";
import { ensureDir, fileExists, nextFreePath } from "../utils/fs.js";
import { logError, logInfo, logStep } from "../utils/logger.js";
import { errorMessage, UsageError } from "./errors.js";

export type CsvToTxtOptions = {
  csvPath: string;
  textColumn: string;
  filenameColumn: string;
  outputDir: string;
};

export type CsvToTxtSummary = {
  rows: number;
  created: string[];
  failed: number;
};

/**
 * Write one text file per CSV row: contents from `textColumn`, file name from
 * `filenameColumn`. Existing files are never overwritten; a numeric suffix is
 * added instead.
 */
export async function csvToTextFiles(options: CsvToTxtOptions): Promise<CsvToTxtSummary> {
  let raw: string;
  try {
    raw = await fs.readFile(options.csvPath, "utf8");
  } catch (error) {
    throw new UsageError(`Cannot read CSV file '${options.csvPath}': ${errorMessage(error)}`);
  }

  const { columns, records } = parseCsvRecords(raw);
  for (const column of [options.textColumn, options.filenameColumn]) {
    if (!columns.includes(column)) {
      throw new UsageError(
        `Column '${column}' not found in CSV file. Available columns: ${columns.join(", ")}`
      );
    }
  }

  if (!(await fileExists(options.outputDir))) {
    await ensureDir(options.outputDir);
    logInfo(`Created output directory: ${options.outputDir}`);
  }

  const summary: CsvToTxtSummary = { rows: records.length, created: [], failed: 0 };

  for (const [idx, record] of records.entries()) {
    const rowNumber = idx + 1;
    const text = record[options.textColumn] ?? "";
    const fileName = textFileNameForRow(record[options.filenameColumn] ?? "", rowNumber);
    const target = await nextFreePath(join(options.outputDir, fileName));
    try {
      await fs.writeFile(target, text, "utf8");
      summary.created.push(target);
      logStep("write", target);
    } catch (error) {
      summary.failed += 1;
      logError(`Error creating file ${target}: ${errorMessage(error)}`);
    }
  }

  logInfo(
    `Completed! Created ${summary.created.length} text files in '${options.outputDir}' directory.`
  );
  return summary;
}

import { promises as fs } from "node:fs";
import type { Dirent } from "node:fs";
import { dirname, extname, join } from "node:path";

export async function ensureDir(path: string) {
  await fs.mkdir(path, { recursive: true });
}

export async function writeText(path: string, text: string) {
  await ensureDir(dirname(path));
  await fs.writeFile(path, text, "utf8");
}

export async function appendLine(path: string, line: string) {
  await ensureDir(dirname(path));
  await fs.appendFile(path, line + "\n", "utf8");
}

export async function fileExists(path: string) {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export async function readDirSafe(path: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(path, { withFileTypes: true });
  } catch {
    return [];
  }
}

/**
 * Copy a file and carry over its access/modification times.
 */
export async function copyFilePreservingTimes(src: string, dest: string) {
  await ensureDir(dirname(dest));
  await fs.copyFile(src, dest);
  const stats = await fs.stat(src);
  await fs.utimes(dest, stats.atime, stats.mtime);
}

export type ListFilesOptions = {
  extensions: ReadonlySet<string>;
  recursive?: boolean;
  skipDir?: (name: string) => boolean;
};

/**
 * List files whose lower-cased extension (with dot) is in `extensions`.
 * Results are sorted so batch output is stable between runs.
 */
export async function listFilesByExtension(
  root: string,
  options: ListFilesOptions
): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string) {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!options.recursive) continue;
        if (options.skipDir?.(entry.name)) continue;
        await walk(full);
        continue;
      }
      if (!entry.isFile()) continue;
      if (options.extensions.has(extname(entry.name).toLowerCase())) {
        found.push(full);
      }
    }
  }

  await walk(root);
  return found.sort();
}

/**
 * Return `path` if free, otherwise `<name>_<n><ext>` for the first free n >= 1.
 */
export async function nextFreePath(path: string): Promise<string> {
  if (!(await fileExists(path))) return path;
  const ext = extname(path);
  const base = ext.length > 0 ? path.slice(0, -ext.length) : path;
  for (let counter = 1; ; counter += 1) {
    const candidate = `${base}_${counter}${ext}`;
    if (!(await fileExists(candidate))) return candidate;
  }
}

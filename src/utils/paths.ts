import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const HERE = dirname(fileURLToPath(import.meta.url));

/**
 * Walk up from this module until `relativePath` exists. Works the same from
 * `src/` under tsx and from `dist/src/` after a build.
 */
export function findPackageFile(relativePath: string): string {
  let dir = HERE;
  for (;;) {
    const candidate = join(dir, relativePath);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Cannot locate ${relativePath} above ${HERE}`);
    }
    dir = parent;
  }
}

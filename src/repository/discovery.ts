/**
 * WDL File Discovery
 *
 * Recursive scan for `.wdl` files under a documentation root.
 */

import { existsSync, readdirSync } from "fs";
import { join, resolve } from "path";
import { DEFAULT_EXTERNAL_DIRS, relativeTo } from "./paths";

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  "__pycache__/",
  ".git/",
  "cached-data/",
];

export interface DiscoveryOptions {
  /** Substrings of root-relative paths to skip */
  exclude?: readonly string[];
  /** Directory names holding third-party WDL */
  externalDirs?: readonly string[];
}

function walk(dir: string, files: string[]): void {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(path, files);
    } else if (entry.isFile() && entry.name.endsWith(".wdl")) {
      files.push(path);
    }
  }
}

function scan(root: string, base: string, patterns: readonly string[]): string[] {
  if (!existsSync(base)) return [];
  const files: string[] = [];
  walk(base, files);
  return files
    .filter((file) => {
      const rel = relativeTo(root, file, []);
      return !patterns.some((pattern) => rel.includes(pattern));
    })
    .sort();
}

/**
 * Project files: every `.wdl` under `root` outside the external directories.
 */
export function findInternalWdlFiles(root: string, options: DiscoveryOptions = {}): string[] {
  const externalDirs = options.externalDirs ?? DEFAULT_EXTERNAL_DIRS;
  const absoluteRoot = resolve(root);
  const isInExternalDir = (file: string): boolean =>
    relativeTo(absoluteRoot, file, [])
      .split("/")
      .some((part) => externalDirs.includes(part));

  return scan(absoluteRoot, absoluteRoot, options.exclude ?? DEFAULT_EXCLUDE_PATTERNS).filter(
    (file) => !isInExternalDir(file)
  );
}

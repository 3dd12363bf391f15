/**
 * Path Helpers
 *
 * Root-relative paths are always `/`-separated so they can double as page
 * URLs in the generated site.
 */

import { existsSync, statSync } from "fs";
import { dirname, isAbsolute, relative, resolve } from "path";

export const DEFAULT_EXTERNAL_DIRS: readonly string[] = ["external"];

function splitPath(path: string): string[] {
  return path.split(/[\\/]+/).filter((part) => part.length > 0);
}

/**
 * Resolve `.` and `..` segments. A path passing through an external
 * directory is cut to start at it.
 *
 * @example
 * ```typescript
 * normalizeRelativePath("workflows/v1/../../external/lib.wdl"); // "external/lib.wdl"
 * normalizeRelativePath("workflows/./v1/../main.wdl"); // "workflows/main.wdl"
 * ```
 */
export function normalizeRelativePath(
  path: string,
  externalDirs: readonly string[] = DEFAULT_EXTERNAL_DIRS
): string {
  const parts = splitPath(path);
  const externalIndex = parts.findIndex((part) => externalDirs.includes(part));
  if (externalIndex !== -1) {
    return parts.slice(externalIndex).join("/");
  }

  const normalized: string[] = [];
  for (const part of parts) {
    if (part === "..") {
      normalized.pop();
    } else if (part !== ".") {
      normalized.push(part);
    }
  }
  return normalized.length > 0 ? normalized.join("/") : path;
}

function isOutside(relativePath: string): boolean {
  return (
    relativePath === ".." ||
    relativePath.startsWith("../") ||
    relativePath.startsWith("..\\") ||
    isAbsolute(relativePath)
  );
}

/**
 * Root-relative path of `file`. Files outside the root keep their path from
 * the external directory onwards, or their last two segments.
 */
export function relativeTo(
  root: string,
  file: string,
  externalDirs: readonly string[] = DEFAULT_EXTERNAL_DIRS
): string {
  const rel = relative(resolve(root), resolve(file));
  if (!isOutside(rel)) {
    return normalizeRelativePath(rel, externalDirs);
  }

  const parts = splitPath(resolve(file));
  const externalIndex = parts.findIndex((part) => externalDirs.includes(part));
  if (externalIndex !== -1) {
    return parts.slice(externalIndex).join("/");
  }
  return parts.slice(-2).join("/");
}

/**
 * A file is external when it lies outside the root or under an external directory.
 */
export function isExternalPath(
  root: string,
  file: string,
  externalDirs: readonly string[] = DEFAULT_EXTERNAL_DIRS
): boolean {
  const rel = relative(resolve(root), resolve(file));
  if (isOutside(rel)) return true;
  return splitPath(rel).some((part) => externalDirs.includes(part));
}

/**
 * Absolute path of an import relative to the importing file, when that file exists.
 */
export function resolveImportPath(uri: string, fromFile: string): string | undefined {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(uri)) return undefined;
  const candidate = resolve(dirname(fromFile), uri);
  return existsSync(candidate) && statSync(candidate).isFile() ? candidate : undefined;
}

/** `lib/tasks.wdl` → `lib/tasks.html` */
export function toHtmlPath(path: string): string {
  return path.endsWith(".wdl") ? `${path.slice(0, -".wdl".length)}.html` : `${path}.html`;
}

/** `lib/main.wdl` → `lib/main-graph.html` */
export function toGraphPagePath(path: string): string {
  const stem = path.endsWith(".wdl") ? path.slice(0, -".wdl".length) : path;
  return `${stem}-graph.html`;
}

/**
 * Link from the page at `fromPage` to the root-relative `target`.
 * Fragment-only and absolute URLs are returned unchanged.
 *
 * @example
 * ```typescript
 * relativeLink("index.html", "workflows/qc/main.html"); // "../../index.html"
 * ```
 */
export function relativeLink(target: string, fromPage: string): string {
  if (target.startsWith("#") || /^[a-z][a-z0-9+.-]*:/i.test(target)) return target;
  const depth = splitPath(fromPage).length - 1;
  return `${"../".repeat(Math.max(depth, 0))}${target}`;
}

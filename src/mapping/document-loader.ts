/**
 * Document Loader
 *
 * Reads and parses WDL files once each. Failures are returned as
 * `ParseError` values and cached like successes.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { toParseError, type ParseError } from "../errors";
import { DEFAULT_EXTERNAL_DIRS, relativeTo } from "../repository/paths";
import { from, type Result } from "awaitly";
import { silentLogger, type Logger } from "../types";
import type { DocumentNode } from "../wdl/ast";
import { parseWdl } from "../wdl/parser";

export interface LoadedDocument {
  /** Absolute path */
  filePath: string;
  source: string;
  ast: DocumentNode;
}

export interface DocumentLoaderOptions {
  rootDir: string;
  externalDirs?: readonly string[];
  logger?: Logger;
}

export class DocumentLoader {
  private readonly cache = new Map<string, Result<LoadedDocument, ParseError>>();
  private readonly rootDir: string;
  private readonly externalDirs: readonly string[];
  private readonly logger: Logger;

  constructor(options: DocumentLoaderOptions) {
    this.rootDir = resolve(options.rootDir);
    this.externalDirs = options.externalDirs ?? DEFAULT_EXTERNAL_DIRS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Root-relative path used in pages and error reports. */
  relativePath(filePath: string): string {
    return relativeTo(this.rootDir, filePath, this.externalDirs);
  }

  load(filePath: string): Result<LoadedDocument, ParseError> {
    const absolute = resolve(filePath);
    const cached = this.cache.get(absolute);
    if (cached) return cached;

    this.logger.debug(`Parsing ${absolute}`);
    const result = from(
      (): LoadedDocument => {
        const source = readFileSync(absolute, "utf-8");
        return { filePath: absolute, source, ast: parseWdl(source) };
      },
      (cause) => toParseError(cause, absolute, this.relativePath(absolute))
    );
    if (!result.ok) {
      this.logger.debug(`Failed to parse ${absolute}: ${result.error.message}`);
    }

    this.cache.set(absolute, result);
    return result;
  }
}

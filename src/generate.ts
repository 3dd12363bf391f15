/**
 * Documentation Pipeline
 *
 * generateDocumentation: discover → parse → follow external imports → write site
 * generateWorkflowGraph: one file → Markdown with its Mermaid diagram
 */

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import type { ParseError } from "./errors";
import type { WorkflowGraphOptions } from "./graph/graph-builder";
import { DocumentLoader } from "./mapping/document-loader";
import { DocumentMapper } from "./mapping/document-mapper";
import { writeSite } from "./output/site-writer";
import type { ShareUrlOptions } from "./output/share-url";
import { DEFAULT_EXCLUDE_PATTERNS, findInternalWdlFiles } from "./repository/discovery";
import { DEFAULT_EXTERNAL_DIRS, isExternalPath } from "./repository/paths";
import { err, ok, type AsyncResult, type Result } from "awaitly";
import { silentLogger, type Logger, type WdlDocument } from "./types";

// =============================================================================
// Errors
// =============================================================================

export type GenerationErrorCode =
  | "NO_FILES"
  | "NO_DOCUMENTS"
  | "NOT_WDL"
  | "NOT_FOUND"
  | "PARSE_FAILED"
  | "NO_WORKFLOW";

export interface GenerationError {
  code: GenerationErrorCode;
  message: string;
  /** Parse failures behind NO_DOCUMENTS and PARSE_FAILED */
  parseErrors?: ParseError[];
}

function failure(
  code: GenerationErrorCode,
  message: string,
  parseErrors?: ParseError[]
): GenerationError {
  return { code, message, ...(parseErrors ? { parseErrors } : {}) };
}

// =============================================================================
// Site Generation
// =============================================================================

export interface GenerateOptions {
  /** Directory scanned for `.wdl` files (default: current directory) */
  rootDir?: string;
  /** Site output directory (default: docs/wdl) */
  outputDir?: string;
  /** Substrings of root-relative paths to skip */
  exclude?: readonly string[];
  /** Directory names holding third-party WDL */
  externalDirs?: readonly string[];
  graph?: WorkflowGraphOptions;
  share?: ShareUrlOptions;
  logger?: Logger;
}

const DEFAULT_OPTIONS: Required<Omit<GenerateOptions, "graph" | "share">> = {
  rootDir: ".",
  outputDir: "docs/wdl",
  exclude: DEFAULT_EXCLUDE_PATTERNS,
  externalDirs: DEFAULT_EXTERNAL_DIRS,
  logger: silentLogger,
};

export interface GenerationSummary {
  outputDir: string;
  /** Project files found by the scan */
  filesFound: number;
  documents: number;
  externalDocuments: number;
  workflows: number;
  tasks: number;
  graphPages: number;
  /** Failures and import warnings, in discovery order */
  parseErrors: ParseError[];
}

/**
 * Build the documentation site for every WDL file under `rootDir`.
 *
 * Project files are parsed first; external files are pulled in breadth-first
 * through resolved imports, each parsed once. Files that fail to parse are
 * reported in `parseErrors` and left out of the site.
 */
export async function generateDocumentation(
  options: GenerateOptions = {}
): AsyncResult<GenerationSummary, GenerationError> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const { logger } = opts;
  const rootDir = resolve(opts.rootDir);
  const outputDir = resolve(opts.outputDir);

  const files = findInternalWdlFiles(rootDir, {
    exclude: opts.exclude,
    externalDirs: opts.externalDirs,
  });
  if (files.length === 0) {
    return err(failure("NO_FILES", `No WDL files found in ${rootDir}`));
  }
  logger.info(`Found ${files.length} WDL file(s) in ${rootDir}`);

  const loader = new DocumentLoader({ rootDir, externalDirs: opts.externalDirs, logger });
  const mapper = new DocumentMapper(loader, {
    rootDir,
    externalDirs: opts.externalDirs,
    logger,
    ...(opts.graph ? { graph: opts.graph } : {}),
  });

  const documents: WdlDocument[] = [];
  const parseErrors: ParseError[] = [];
  const visited = new Set<string>();
  const queue: string[] = [];

  const mapFile = (file: string): void => {
    visited.add(file);
    const mapped = mapper.map(file);
    if (!mapped.ok) {
      logger.warn(`Failed to parse ${mapped.error.relativePath}: ${mapped.error.message}`);
      parseErrors.push(mapped.error);
      return;
    }
    documents.push(mapped.value.document);
    parseErrors.push(...mapped.value.warnings);
    for (const entry of mapped.value.document.imports) {
      if (
        entry.resolvedPath &&
        !visited.has(entry.resolvedPath) &&
        isExternalPath(rootDir, entry.resolvedPath, opts.externalDirs)
      ) {
        queue.push(entry.resolvedPath);
      }
    }
  };

  for (const file of files) mapFile(resolve(file));

  // Imported files outside the scan (external directories, paths above the root)
  let external = 0;
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || visited.has(next)) continue;
    const before = documents.length;
    mapFile(next);
    if (documents.length > before) {
      external++;
      logger.debug(`Included imported file ${loader.relativePath(next)}`);
    }
  }

  if (documents.length === 0) {
    return err(failure("NO_DOCUMENTS", "No WDL files could be parsed", parseErrors));
  }

  logger.info(`Writing site to ${outputDir}`);
  const site = await writeSite(documents, parseErrors, {
    outputDir,
    logger,
    ...(opts.share ? { share: opts.share } : {}),
  });

  const failed = parseErrors.filter((e) => e.errorType !== "ImportWarning").length;
  if (failed > 0) logger.warn(`${failed} file(s) could not be parsed`);

  return ok({
    outputDir,
    filesFound: files.length,
    documents: documents.length,
    externalDocuments: external,
    workflows: documents.filter((doc) => doc.workflow).length,
    tasks: documents.reduce((sum, doc) => sum + doc.tasks.length, 0),
    graphPages: site.graphPages,
    parseErrors,
  });
}

// =============================================================================
// Single Workflow Graph
// =============================================================================

export interface WorkflowGraphFileOptions {
  graph?: WorkflowGraphOptions;
  logger?: Logger;
}

/** Markdown document holding a workflow diagram. */
export function workflowGraphMarkdown(workflowName: string, diagram: string): string {
  return `# Workflow: ${workflowName}\n\n\`\`\`mermaid\n${diagram}\n\`\`\`\n`;
}

/**
 * Write the diagram of the workflow in `wdlFile` to `outputFile` as Markdown,
 * creating parent directories. Returns the written path.
 */
export function generateWorkflowGraph(
  wdlFile: string,
  outputFile: string,
  options: WorkflowGraphFileOptions = {}
): Result<string, GenerationError> {
  const logger = options.logger ?? silentLogger;
  const filePath = resolve(wdlFile);

  if (!filePath.endsWith(".wdl")) {
    return err(failure("NOT_WDL", `Not a WDL file: ${wdlFile}`));
  }
  if (!existsSync(filePath)) {
    return err(failure("NOT_FOUND", `File not found: ${wdlFile}`));
  }

  const rootDir = dirname(filePath);
  const loader = new DocumentLoader({ rootDir, logger });
  const mapped = new DocumentMapper(loader, {
    rootDir,
    logger,
    ...(options.graph ? { graph: options.graph } : {}),
  }).map(filePath);
  if (!mapped.ok) {
    return err(
      failure("PARSE_FAILED", `Failed to parse ${wdlFile}: ${mapped.error.message}`, [mapped.error])
    );
  }

  const workflow = mapped.value.document.workflow;
  if (!workflow) {
    return err(failure("NO_WORKFLOW", `No workflow found in ${wdlFile}`));
  }

  const target = resolve(outputFile);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, workflowGraphMarkdown(workflow.name, workflow.mermaidGraph), "utf-8");
  logger.info(`Wrote workflow graph to ${target}`);
  return ok(target);
}

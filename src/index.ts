/**
 * wdl-atlas
 *
 * Documentation sites and dependency graphs for WDL workflow repositories.
 *
 * @example
 * ```typescript
 * import { generateDocumentation } from "wdl-atlas";
 *
 * const result = await generateDocumentation({ rootDir: "pipelines", outputDir: "docs/wdl" });
 * if (!result.ok) console.error(result.error.message);
 * ```
 */

// Pipeline
export {
  generateDocumentation,
  generateWorkflowGraph,
  workflowGraphMarkdown,
  type GenerateOptions,
  type GenerationError,
  type GenerationErrorCode,
  type GenerationSummary,
  type WorkflowGraphFileOptions,
} from "./generate";
export { runCli, VERSION, type CliIO } from "./cli";

// Graph core
export { getSubExpressions, extractIdentifiers, extractReferences } from "./graph/expression-scanner";
export {
  collectCalls,
  collectCallRecords,
  buildCallRecord,
  type CallCollection,
  type CollectedCall,
  type ImportScope,
} from "./graph/call-collector";
export { analyzeDependencies, resolveVariables, type DependencyMap } from "./graph/dependency-analyzer";
export { buildWorkflowGraph, containsCalls, type WorkflowGraphOptions } from "./graph/graph-builder";
export { MermaidFlowchart, escapeLabel, type FlowDirection, type NodeShape } from "./graph/diagram-emitter";
export {
  countWorkflowCallers,
  callersOf,
  workflowCallInfo,
  type CallerDescriptor,
  type IndexedDocument,
  type WorkflowCallInfo,
} from "./graph/call-index";

// Reader
export { parseWdl, parseExpression } from "./wdl/parser";
export { formatExpression, formatType } from "./wdl/format";
export type * from "./wdl/ast";

// Mapping
export { DocumentLoader, type LoadedDocument } from "./mapping/document-loader";
export { DocumentMapper, type MappedDocument } from "./mapping/document-mapper";
export { resolveCallees, createDocumentResolver, type CalleeResolver } from "./mapping/callee-resolver";
export { extractDockerImages, dockerFromTask } from "./mapping/docker-images";

// Site
export { writeSite, type SiteOptions, type SiteSummary } from "./output/site-writer";
export { toMermaidInkUrl, toMermaidLiveUrl, type ShareUrlOptions } from "./output/share-url";
export { findInternalWdlFiles, DEFAULT_EXCLUDE_PATTERNS } from "./repository/discovery";

// Model
export * from "./types";
export * from "./errors";
export type { Result, AsyncResult } from "awaitly";

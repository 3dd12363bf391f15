/**
 * WDL Documentation - Type Definitions
 *
 * The documentation model built from parsed WDL files: documents, their
 * workflow and tasks, call records and container images. Values are
 * captured as formatted expression text, never evaluated.
 */

import type { CalleeKind } from "./wdl/ast";

// =============================================================================
// Calls
// =============================================================================

export type CallType = CalleeKind;

/**
 * A call statement inside a workflow body, as shown in documentation.
 */
export interface CallRecord {
  /** Local name (alias when present) */
  name: string;
  /** Name of the task or workflow being invoked */
  calleeName: string;
  /** Set only when the local name differs from the callee name */
  alias?: string;
  callType: CallType;
  /** Callee is defined in this document rather than an import */
  isLocal: boolean;
  /**
   * `#task-<name>` for local callees, the imported page (`lib/tasks.html`)
   * for resolved imports, `#<name>` otherwise
   */
  linkTarget: string;
  /** Input name → formatted expression (`"unknown"` when it cannot be formatted) */
  inputsMapping: Record<string, string>;
}

// =============================================================================
// Declarations
// =============================================================================

export interface WdlType {
  /** Type as written, without a trailing `?` */
  name: string;
  optional: boolean;
  isStruct: boolean;
  /** Member types when `isStruct` and the struct definition is known */
  structFields?: Record<string, WdlType>;
}

export interface WdlInput {
  name: string;
  type: WdlType;
  description?: string;
  defaultValue?: string;
}

export interface WdlOutput {
  name: string;
  type: WdlType;
  description?: string;
  expression?: string;
}

// =============================================================================
// Imports
// =============================================================================

export interface WdlImport {
  /** URI as written in the import statement */
  path: string;
  namespace: string;
  /** Absolute path of the imported file when it exists */
  resolvedPath?: string;
  /** Normalized path relative to the documentation root */
  resolvedRelativePath?: string;
}

// =============================================================================
// Container Images
// =============================================================================

export interface WdlDockerImage {
  /** Runtime value: the literal image, or the formatted expression */
  image: string;
  /** Call names using this image */
  taskNames: string[];
  isParameterized: boolean;
  parameterName?: string;
  defaultValue?: string;
}

/** The image to show: the literal, the parameter default, or a placeholder. */
export function dockerImageDisplay(image: WdlDockerImage): string {
  if (!image.isParameterized) return image.image;
  if (image.defaultValue) return image.defaultValue;
  if (image.parameterName) return `Parameterized (via ${image.parameterName})`;
  return "Parameterized";
}

// =============================================================================
// Tasks and Workflows
// =============================================================================

export interface WdlCommand {
  raw: string;
  /** Leading and trailing blank lines removed, common indentation stripped */
  formatted: string;
}

interface DocumentedUnit {
  name: string;
  description?: string;
  author?: string;
  email?: string;
  inputs: WdlInput[];
  outputs: WdlOutput[];
  /** `meta` section values as text */
  meta: Record<string, string>;
}

export interface WdlTask extends DocumentedUnit {
  command?: WdlCommand;
  /** Runtime attribute → formatted expression */
  runtime: Record<string, string>;
}

export interface WdlWorkflow extends DocumentedUnit {
  /** Calls at every nesting depth, in source order */
  calls: CallRecord[];
  dockerImages: WdlDockerImage[];
  /** Mermaid flowchart source */
  mermaidGraph: string;
}

// =============================================================================
// Documents
// =============================================================================

export type DocumentType = "workflow" | "tasks" | "mixed" | "empty";

export interface WdlDocument {
  /** Absolute path */
  filePath: string;
  /** Normalized path relative to the documentation root */
  relativePath: string;
  version: string;
  workflow?: WdlWorkflow;
  tasks: WdlTask[];
  imports: WdlImport[];
  sourceCode: string;
  /** Third-party file pulled in through imports */
  isExternal: boolean;
}

export function documentTypeOf(doc: Pick<WdlDocument, "workflow" | "tasks">): DocumentType {
  if (doc.workflow && doc.tasks.length > 0) return "mixed";
  if (doc.workflow) return "workflow";
  if (doc.tasks.length > 0) return "tasks";
  return "empty";
}

/** Workflow name, or the file name without `.wdl` for task libraries. */
export function documentName(doc: Pick<WdlDocument, "workflow" | "filePath">): string {
  if (doc.workflow) return doc.workflow.name;
  const base = doc.filePath.split(/[\\/]/).pop() ?? doc.filePath;
  return base.endsWith(".wdl") ? base.slice(0, -".wdl".length) : base;
}

export function documentDescription(
  doc: Pick<WdlDocument, "workflow" | "tasks">
): string | undefined {
  return doc.workflow?.description || doc.tasks[0]?.description || undefined;
}

// =============================================================================
// Logging
// =============================================================================

export type LogFn = (message: string) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

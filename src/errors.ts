/**
 * Errors
 *
 * Thrown error classes for malformed input reaching the reader or the graph
 * core, plus the `ParseError` record collected for documents that fail to load.
 */

import type { SourcePosition } from "./wdl/ast";

// =============================================================================
// Thrown Errors
// =============================================================================

/**
 * Error thrown when WDL source does not match the grammar.
 */
export class WdlSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: SourcePosition
  ) {
    super(`${message} (line ${position.line}, column ${position.column})`);
    this.name = "WdlSyntaxError";
  }
}

/**
 * Error thrown when a workflow body element or expression has a kind the
 * graph core does not know.
 */
export class WorkflowShapeError extends Error {
  constructor(
    message: string,
    public readonly kind: string
  ) {
    super(message);
    this.name = "WorkflowShapeError";
  }
}

/**
 * Error thrown when an expression cannot be rendered back to text.
 */
export class ExpressionFormatError extends Error {
  constructor(
    message: string,
    public readonly kind: string
  ) {
    super(message);
    this.name = "ExpressionFormatError";
  }
}

/**
 * Read the `kind` tag of a value that escaped a typed switch.
 */
export function describeKind(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  return typeof value;
}

// =============================================================================
// Parse Errors
// =============================================================================

export type ParseErrorType =
  | "SyntaxError"
  | "ImportError"
  | "ImportWarning"
  | "ReadError"
  | "ValidationError";

/**
 * A document that failed to load, or loaded with warnings.
 */
export interface ParseError {
  /** Absolute path of the file */
  filePath: string;
  /** Normalized path relative to the documentation root */
  relativePath: string;
  errorType: ParseErrorType;
  message: string;
  line?: number;
  column?: number;
  /** ISO timestamp */
  timestamp: string;
}

export type ParseErrorSeverity = "error" | "warning";

const SHORT_MESSAGE_LENGTH = 200;

export function severityOf(error: ParseError): ParseErrorSeverity {
  return error.errorType.toLowerCase().includes("warning") ? "warning" : "error";
}

/** Message cut to 200 characters for index listings. */
export function shortMessage(error: ParseError): string {
  if (error.message.length <= SHORT_MESSAGE_LENGTH) return error.message;
  return `${error.message.slice(0, SHORT_MESSAGE_LENGTH)}...`;
}

/**
 * `"line 3, column 7"`, `"line 3"`, or an empty string.
 */
export function locationInfo(error: ParseError): string {
  if (error.line === undefined) return "";
  if (error.column === undefined) return `line ${error.line}`;
  return `line ${error.line}, column ${error.column}`;
}

/**
 * Build a ParseError from anything thrown while reading or parsing a file.
 */
export function toParseError(
  cause: unknown,
  filePath: string,
  relativePath: string,
  now: Date = new Date()
): ParseError {
  const base = { filePath, relativePath, timestamp: now.toISOString() };
  if (cause instanceof WdlSyntaxError) {
    return {
      ...base,
      errorType: "SyntaxError",
      message: cause.message,
      line: cause.position.line,
      column: cause.position.column,
    };
  }
  if (cause instanceof WorkflowShapeError || cause instanceof ExpressionFormatError) {
    return { ...base, errorType: "ValidationError", message: cause.message };
  }
  const message = cause instanceof Error ? cause.message : String(cause);
  return { ...base, errorType: "ReadError", message };
}

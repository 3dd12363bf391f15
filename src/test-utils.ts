/**
 * Test Utilities
 *
 * Helpers for building workflow bodies from WDL snippets and WDL file trees
 * in tests.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { resolveCallees } from "./mapping/callee-resolver";
import type { CallRecord, WdlDocument, WdlTask, WdlWorkflow } from "./types";
import type { WorkflowNode } from "./wdl/ast";
import { parseWdl } from "./wdl/parser";

export interface ParseWorkflowOptions {
  /** Callee names to treat as subworkflows; every other callee is a task */
  workflows?: string[];
  /** Callee names to leave unresolved */
  unresolved?: string[];
}

/**
 * Parse a document and return its workflow with every call resolved by
 * the last segment of its callee reference.
 *
 * @example
 * ```typescript
 * const wf = parseWorkflow(`
 *   version 1.0
 *   workflow main { call align }
 * `);
 * ```
 */
export function parseWorkflow(source: string, options: ParseWorkflowOptions = {}): WorkflowNode {
  const doc = parseWdl(source);
  if (!doc.workflow) {
    throw new Error("Source has no workflow");
  }

  const workflows = new Set(options.workflows ?? []);
  const unresolved = new Set(options.unresolved ?? []);
  const body = resolveCallees(doc.workflow.body, (calleeId) => {
    const name = calleeId[calleeId.length - 1];
    if (name === undefined || unresolved.has(name)) return undefined;
    return { kind: workflows.has(name) ? "workflow" : "task", name };
  });

  return { ...doc.workflow, body };
}

/** `version 1.0` document wrapping a workflow body. */
export function wdl(body: string, name = "main"): string {
  return `version 1.0\nworkflow ${name} {\n${body}\n}\n`;
}

/**
 * Write `files` (relative path → content) under a fresh temporary directory
 * and return its path. Call `removeTempTree` when done.
 */
export function createTempTree(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), "wdl-atlas-"));
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, ...path.split("/"));
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, "utf-8");
  }
  return root;
}

export function removeTempTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

// =============================================================================
// Documentation Model Fixtures
// =============================================================================

export function makeWorkflow(name: string, overrides: Partial<WdlWorkflow> = {}): WdlWorkflow {
  return {
    name,
    inputs: [],
    outputs: [],
    meta: {},
    calls: [],
    dockerImages: [],
    mermaidGraph: `flowchart TD\n    Start([${name}])`,
    ...overrides,
  };
}

export function makeTask(name: string, overrides: Partial<WdlTask> = {}): WdlTask {
  return { name, inputs: [], outputs: [], meta: {}, runtime: {}, ...overrides };
}

/** A call record for `calleeName` as a subworkflow (`callType: "workflow"`) by default. */
export function makeCall(calleeName: string, overrides: Partial<CallRecord> = {}): CallRecord {
  return {
    name: calleeName,
    calleeName,
    callType: "workflow",
    isLocal: false,
    linkTarget: `#${calleeName}`,
    inputsMapping: {},
    ...overrides,
  };
}

export function makeDocument(relativePath: string, overrides: Partial<WdlDocument> = {}): WdlDocument {
  return {
    filePath: `/repo/${relativePath}`,
    relativePath,
    version: "1.0",
    tasks: [],
    imports: [],
    sourceCode: "version 1.0\n",
    isExternal: false,
    ...overrides,
  };
}

/**
 * Subworkflow Call Index
 *
 * Cross-document view of which workflows invoke which: how many documents
 * call each workflow as a subworkflow, and who those callers are.
 */

import { toHtmlPath } from "../repository/paths";
import type { CallRecord } from "../types";

// =============================================================================
// Types
// =============================================================================

/** The parts of a document the index reads. */
export interface IndexedDocument {
  relativePath: string;
  workflow?: {
    name: string;
    calls: ReadonlyArray<Pick<CallRecord, "calleeName" | "callType">>;
  };
}

export interface CallerDescriptor {
  /** Calling workflow name */
  name: string;
  /** Calling document's root-relative path */
  filePath: string;
  /** Calling document's page */
  url: string;
}

export interface WorkflowCallInfo {
  count: number;
  workflows: CallerDescriptor[];
}

// =============================================================================
// Queries
// =============================================================================

function calledWorkflows(workflow: NonNullable<IndexedDocument["workflow"]>): Set<string> {
  const targets = new Set<string>();
  for (const call of workflow.calls) {
    if (call.callType === "workflow") targets.add(call.calleeName);
  }
  return targets;
}

/**
 * Number of distinct documents that call each workflow as a subworkflow.
 * Task-typed calls and calls to unknown workflows are not counted, and a
 * document never counts as its own caller: a call only counts when some
 * other document defines the called workflow. Workflows nobody calls are
 * absent from the map.
 */
export function countWorkflowCallers(
  documents: readonly IndexedDocument[]
): Map<string, number> {
  const definers = new Map<string, IndexedDocument[]>();
  for (const doc of documents) {
    if (!doc.workflow) continue;
    const existing = definers.get(doc.workflow.name);
    if (existing) existing.push(doc);
    else definers.set(doc.workflow.name, [doc]);
  }

  const counts = new Map<string, number>();
  for (const doc of documents) {
    if (!doc.workflow) continue;
    for (const target of calledWorkflows(doc.workflow)) {
      const definedElsewhere = (definers.get(target) ?? []).some((other) => other !== doc);
      if (!definedElsewhere) continue;
      counts.set(target, (counts.get(target) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Every other document whose workflow calls `target`'s workflow as a
 * subworkflow, once each, in document order.
 */
export function callersOf(
  target: IndexedDocument,
  documents: readonly IndexedDocument[]
): CallerDescriptor[] {
  const targetWorkflow = target.workflow;
  if (!targetWorkflow) return [];

  const callers: CallerDescriptor[] = [];
  for (const doc of documents) {
    if (doc === target || !doc.workflow) continue;
    const callsTarget = doc.workflow.calls.some(
      (call) => call.callType === "workflow" && call.calleeName === targetWorkflow.name
    );
    if (callsTarget) {
      callers.push({
        name: doc.workflow.name,
        filePath: doc.relativePath,
        url: toHtmlPath(doc.relativePath),
      });
    }
  }
  return callers;
}

/**
 * Caller summary for a document page; undefined when nobody calls it.
 */
export function workflowCallInfo(
  target: IndexedDocument,
  documents: readonly IndexedDocument[]
): WorkflowCallInfo | undefined {
  const workflows = callersOf(target, documents);
  if (workflows.length === 0) return undefined;
  return { count: workflows.length, workflows };
}

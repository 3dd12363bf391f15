/**
 * Call Collector
 *
 * Walks a workflow body in source order and gathers every call with a
 * resolved callee, the identifiers governing the scatter and conditional
 * blocks around it, and the references of every intermediate declaration.
 */

import { WorkflowShapeError, describeKind } from "../errors";
import { toHtmlPath } from "../repository/paths";
import type { CallRecord, WdlImport } from "../types";
import type { CallElement, WorkflowElement } from "../wdl/ast";
import { formatExpressionOr } from "../wdl/format";
import { extractReferences } from "./expression-scanner";

// =============================================================================
// Types
// =============================================================================

/** The imports visible to a workflow, used to classify and link its calls. */
export interface ImportScope {
  imports: ReadonlyArray<Pick<WdlImport, "namespace" | "resolvedRelativePath">>;
}

export const EMPTY_SCOPE: ImportScope = { imports: [] };

export interface CollectedCall {
  record: CallRecord;
  element: CallElement;
  /**
   * Identifiers referenced by the iterables and predicates of every
   * enclosing scatter and conditional
   */
  context: ReadonlySet<string>;
}

export interface CallCollection {
  calls: CollectedCall[];
  /** Declaration name → references of its initializer */
  variables: Map<string, Set<string>>;
}

/** Placeholder for an input expression that cannot be formatted. */
export const UNKNOWN_INPUT = "unknown";

// =============================================================================
// Collection
// =============================================================================

/**
 * Collect calls and declaration references from a workflow body.
 * Calls whose callee was not resolved are skipped.
 *
 * @throws WorkflowShapeError when an element kind is not a call, declaration,
 *   scatter or conditional
 */
export function collectCalls(
  body: readonly WorkflowElement[],
  scope: ImportScope = EMPTY_SCOPE
): CallCollection {
  return collectFrom(body, new Set(), scope);
}

function collectFrom(
  body: readonly WorkflowElement[],
  context: ReadonlySet<string>,
  scope: ImportScope
): CallCollection {
  const calls: CollectedCall[] = [];
  const variables = new Map<string, Set<string>>();

  for (const element of body) {
    switch (element.kind) {
      case "call": {
        const record = buildCallRecord(element, scope);
        if (record) calls.push({ record, element, context });
        break;
      }
      case "decl":
        if (element.decl.expr) {
          variables.set(element.decl.name, extractReferences(element.decl.expr));
        }
        break;
      case "scatter":
      case "conditional": {
        const inner = collectFrom(
          element.body,
          new Set([...context, ...extractReferences(element.expr)]),
          scope
        );
        calls.push(...inner.calls);
        for (const [name, references] of inner.variables) {
          variables.set(name, references);
        }
        break;
      }
      default: {
        const unknown: never = element;
        throw new WorkflowShapeError(
          `Unsupported workflow element '${describeKind(unknown)}'`,
          describeKind(unknown)
        );
      }
    }
  }

  return { calls, variables };
}

/**
 * Call records for every valid call in `body`, at any depth, in source order.
 */
export function collectCallRecords(
  body: readonly WorkflowElement[],
  scope: ImportScope = EMPTY_SCOPE
): CallRecord[] {
  return collectCalls(body, scope).calls.map((c) => c.record);
}

// =============================================================================
// Call Records
// =============================================================================

/**
 * Describe a call for documentation. Returns undefined when the callee is
 * unresolved.
 */
export function buildCallRecord(
  element: CallElement,
  scope: ImportScope = EMPTY_SCOPE
): CallRecord | undefined {
  const callee = element.callee;
  if (!callee || !callee.name) return undefined;

  const namespace = element.calleeId.length > 1 ? element.calleeId[0] : undefined;
  const imported =
    namespace === undefined
      ? undefined
      : scope.imports.find((i) => i.namespace === namespace);
  const isLocal = imported === undefined;

  let linkTarget: string;
  if (isLocal) {
    linkTarget = `#task-${callee.name}`;
  } else if (imported.resolvedRelativePath) {
    linkTarget = toHtmlPath(imported.resolvedRelativePath);
  } else {
    linkTarget = `#${callee.name}`;
  }

  const inputsMapping: Record<string, string> = {};
  for (const input of element.inputs) {
    inputsMapping[input.name] = formatExpressionOr(input.expr, UNKNOWN_INPUT);
  }

  return {
    name: element.name,
    calleeName: callee.name,
    ...(element.name !== callee.name ? { alias: element.name } : {}),
    callType: callee.kind === "workflow" ? "workflow" : "task",
    isLocal,
    linkTarget,
    inputsMapping,
  };
}

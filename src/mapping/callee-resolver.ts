/**
 * Callee Resolution
 *
 * Attaches the invoked task or workflow to every call in a workflow body.
 * Plain names resolve against the document itself, `ns.name` against the
 * document imported under `ns`.
 */

import type { CalleeRef, DocumentNode, WorkflowElement } from "../wdl/ast";

export type CalleeResolver = (calleeId: readonly string[]) => CalleeRef | undefined;

function findIn(doc: DocumentNode, name: string): CalleeRef | undefined {
  if (doc.workflow?.name === name) return { kind: "workflow", name };
  if (doc.tasks.some((task) => task.name === name)) return { kind: "task", name };
  return undefined;
}

/**
 * Resolver for calls in `doc`, given the parsed documents of its imports
 * keyed by namespace. Calls through an import that could not be read
 * (listed in `unreadableNamespaces`) are kept as tasks named by their last
 * segment.
 */
export function createDocumentResolver(
  doc: DocumentNode,
  importedByNamespace: ReadonlyMap<string, DocumentNode>,
  unreadableNamespaces: ReadonlySet<string> = new Set()
): CalleeResolver {
  return (calleeId) => {
    if (calleeId.length === 0) return undefined;
    const name = calleeId[calleeId.length - 1];

    if (calleeId.length === 1) {
      if (doc.tasks.some((task) => task.name === name)) return { kind: "task", name };
      return undefined;
    }

    const imported = importedByNamespace.get(calleeId[0]);
    if (imported) return findIn(imported, name);
    return unreadableNamespaces.has(calleeId[0]) ? { kind: "task", name } : undefined;
  };
}

/**
 * Copy of `body` with `callee` set on every call the resolver recognises
 * and cleared on the rest.
 */
export function resolveCallees(
  body: readonly WorkflowElement[],
  resolver: CalleeResolver
): WorkflowElement[] {
  return body.map((element): WorkflowElement => {
    switch (element.kind) {
      case "call": {
        const { callee: _previous, ...rest } = element;
        const callee = resolver(element.calleeId);
        return callee ? { ...rest, callee } : rest;
      }
      case "scatter":
      case "conditional":
        return { ...element, body: resolveCallees(element.body, resolver) };
      default:
        return element;
    }
  });
}

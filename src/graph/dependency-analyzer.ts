/**
 * Dependency Analyzer
 *
 * Turns collected calls into call-to-call dependencies. A call depends on
 * another when an input, an `after` clause, or an enclosing scatter or
 * conditional refers to it directly or through intermediate declarations.
 */

import type { CallCollection } from "./call-collector";
import { extractReferences } from "./expression-scanner";

/** Call name → names of the calls it depends on, in first-seen order. */
export type DependencyMap = Map<string, Set<string>>;

/**
 * Resolve every declaration to the calls it reaches, following declarations
 * that reference other declarations. A declaration already being resolved
 * contributes nothing, so cyclic declarations terminate.
 */
export function resolveVariables(
  variables: ReadonlyMap<string, ReadonlySet<string>>,
  callNames: ReadonlySet<string>
): Map<string, Set<string>> {
  const resolved = new Map<string, Set<string>>();
  const inProgress = new Set<string>();

  const resolveOne = (name: string): Set<string> => {
    const cached = resolved.get(name);
    if (cached) return cached;

    const references = variables.get(name);
    if (!references || inProgress.has(name)) return new Set();

    inProgress.add(name);
    const calls = new Set<string>();
    for (const reference of references) {
      if (callNames.has(reference)) {
        calls.add(reference);
      } else if (variables.has(reference)) {
        for (const call of resolveOne(reference)) calls.add(call);
      }
    }
    inProgress.delete(name);
    resolved.set(name, calls);
    return calls;
  };

  for (const name of variables.keys()) resolveOne(name);
  return resolved;
}

/**
 * Compute the dependency set of every collected call. Identifiers that are
 * neither calls nor declarations (workflow inputs, scatter variables) are
 * dropped, and a call never depends on itself.
 */
export function analyzeDependencies(collection: CallCollection): DependencyMap {
  const callNames = new Set(collection.calls.map((c) => c.record.name));
  const variables = resolveVariables(collection.variables, callNames);
  const dependencies: DependencyMap = new Map();

  for (const { record, element, context } of collection.calls) {
    const found = new Set<string>();
    const addReference = (reference: string): void => {
      if (callNames.has(reference)) {
        found.add(reference);
        return;
      }
      for (const call of variables.get(reference) ?? []) found.add(call);
    };

    for (const input of element.inputs) {
      for (const reference of extractReferences(input.expr)) addReference(reference);
    }
    for (const after of element.afters) addReference(after);
    for (const reference of context) addReference(reference);

    found.delete(record.name);
    dependencies.set(record.name, found);
  }

  return dependencies;
}

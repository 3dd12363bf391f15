/**
 * Expression Scanner
 *
 * Finds the identifiers an expression refers to. Call outputs are referenced
 * as `call.output`, so dependency analysis works on the leading component.
 */

import type { WdlExpression } from "../wdl/ast";

/**
 * Direct sub-expressions of an expression node, in source order.
 */
export function getSubExpressions(expr: WdlExpression): WdlExpression[] {
  switch (expr.kind) {
    case "get":
      return [expr.target];
    case "apply":
      return expr.arguments;
    case "array":
      return expr.items;
    case "map":
      return expr.entries.flatMap((e) => [e.key, e.value]);
    case "pair":
      return [expr.left, expr.right];
    case "struct":
      return expr.members.map((m) => m.value);
    case "string":
      return expr.parts.flatMap((p) => (p.kind === "placeholder" ? [p.expression] : []));
    case "binary":
      return [expr.left, expr.right];
    case "unary":
      return [expr.operand];
    case "index":
      return [expr.target, expr.index];
    case "ifThenElse":
      return [expr.condition, expr.consequent, expr.alternative];
    default:
      return [];
  }
}

/**
 * Every identifier name reachable from `expr`, as written (`align.bam`).
 * Node kinds outside the expression union contribute nothing.
 */
export function extractIdentifiers(expr: WdlExpression): Set<string> {
  const names = new Set<string>();
  const visit = (node: WdlExpression): void => {
    if (node.kind === "ident") {
      names.add(node.name);
      return;
    }
    for (const child of getSubExpressions(node)) visit(child);
  };
  visit(expr);
  return names;
}

/**
 * Identifiers reduced to their leading component: `align.bam` → `align`.
 */
export function extractReferences(expr: WdlExpression): Set<string> {
  const references = new Set<string>();
  for (const name of extractIdentifiers(expr)) {
    references.add(leadingComponent(name));
  }
  return references;
}

export function leadingComponent(name: string): string {
  const dot = name.indexOf(".");
  return dot === -1 ? name : name.slice(0, dot);
}

/**
 * Expression Formatting
 *
 * Renders syntax-tree expressions and types back to WDL text. Used for call
 * input mappings, scatter and conditional labels, and documentation tables.
 */

import { ExpressionFormatError, describeKind } from "../errors";
import type { BinaryOperator, StringPart, WdlExpression, WdlTypeNode } from "./ast";

const PRECEDENCE: Record<BinaryOperator, number> = {
  "||": 1,
  "&&": 2,
  "==": 3,
  "!=": 3,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  "+": 5,
  "-": 5,
  "*": 6,
  "/": 6,
  "%": 6,
};

const UNARY_PRECEDENCE = 7;
const ATOM_PRECEDENCE = 8;

function precedenceOf(expr: WdlExpression): number {
  switch (expr.kind) {
    case "ifThenElse":
      return 0;
    case "binary":
      return PRECEDENCE[expr.operator];
    case "unary":
      return UNARY_PRECEDENCE;
    default:
      return ATOM_PRECEDENCE;
  }
}

function wrap(expr: WdlExpression, minimum: number): string {
  const text = formatExpression(expr);
  return precedenceOf(expr) < minimum ? `(${text})` : text;
}

/**
 * Format an expression as WDL source.
 *
 * @throws ExpressionFormatError for a node kind outside the expression union
 *
 * @example
 * ```typescript
 * formatExpression(parseExpression("select_first([a, b])")); // "select_first([a, b])"
 * ```
 */
export function formatExpression(expr: WdlExpression): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "get":
      return `${wrap(expr.target, ATOM_PRECEDENCE)}.${expr.member}`;
    case "apply":
      return `${expr.function}(${expr.arguments.map(formatExpression).join(", ")})`;
    case "array":
      return `[${expr.items.map(formatExpression).join(", ")}]`;
    case "map":
      return `{${expr.entries
        .map((e) => `${formatExpression(e.key)}: ${formatExpression(e.value)}`)
        .join(", ")}}`;
    case "pair":
      return `(${formatExpression(expr.left)}, ${formatExpression(expr.right)})`;
    case "struct": {
      const members = expr.members
        .map((m) => `${m.name}: ${formatExpression(m.value)}`)
        .join(", ");
      return `${expr.typeName ?? "object"} {${members}}`;
    }
    case "string":
      return `${expr.quote}${expr.parts.map((p) => formatStringPart(p, expr.quote)).join("")}${expr.quote}`;
    case "int":
      return String(expr.value);
    case "float":
      return expr.text;
    case "boolean":
      return expr.value ? "true" : "false";
    case "null":
      return "None";
    case "binary": {
      const level = PRECEDENCE[expr.operator];
      return `${wrap(expr.left, level)} ${expr.operator} ${wrap(expr.right, level + 1)}`;
    }
    case "unary":
      return `${expr.operator}${wrap(expr.operand, UNARY_PRECEDENCE)}`;
    case "index":
      return `${wrap(expr.target, ATOM_PRECEDENCE)}[${formatExpression(expr.index)}]`;
    case "ifThenElse":
      return `if ${formatExpression(expr.condition)} then ${formatExpression(
        expr.consequent
      )} else ${formatExpression(expr.alternative)}`;
    default: {
      const unknown: never = expr;
      throw new ExpressionFormatError(
        `Cannot format expression of kind '${describeKind(unknown)}'`,
        describeKind(unknown)
      );
    }
  }
}

function formatStringPart(part: StringPart, quote: string): string {
  if (part.kind === "placeholder") {
    const options = part.options.map((o) => `${o.name}=${formatOptionValue(o.value)} `).join("");
    return `~{${options}${formatExpression(part.expression)}}`;
  }
  return part.text
    .replace(/\\/g, "\\\\")
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t")
    .split(quote)
    .join(`\\${quote}`);
}

function formatOptionValue(value: string): string {
  return value === "true" || value === "false" ? value : `"${value}"`;
}

/**
 * Format a type as written: `Array[File]+?`, `Map[String, Int]`.
 */
export function formatType(type: WdlTypeNode): string {
  const parameters =
    type.parameters.length > 0 ? `[${type.parameters.map(formatType).join(", ")}]` : "";
  return `${type.name}${parameters}${type.nonEmpty ? "+" : ""}${type.optional ? "?" : ""}`;
}

/**
 * Format an expression, substituting `fallback` when it cannot be rendered.
 * Other errors propagate.
 */
export function formatExpressionOr(expr: WdlExpression, fallback: string): string {
  try {
    return formatExpression(expr);
  } catch (error) {
    if (error instanceof ExpressionFormatError) return fallback;
    throw error;
  }
}

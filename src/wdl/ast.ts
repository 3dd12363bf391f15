/**
 * WDL Syntax Tree
 *
 * Node types produced by the WDL reader. Expressions and workflow body
 * elements are tagged unions discriminated by `kind`; consumers walk them
 * with an exhaustive `switch`.
 */

// =============================================================================
// Source Positions
// =============================================================================

export interface SourcePosition {
  /** Line number (1-indexed) */
  line: number;
  /** Column number (1-indexed) */
  column: number;
}

// =============================================================================
// Types
// =============================================================================

export interface WdlTypeNode {
  /** Base name: `File`, `Array`, `Map`, `Pair`, or a struct name */
  name: string;
  /** Type parameters for `Array`, `Map` and `Pair` */
  parameters: WdlTypeNode[];
  /** `?` suffix */
  optional: boolean;
  /** `+` suffix (non-empty arrays) */
  nonEmpty: boolean;
}

// =============================================================================
// Expressions
// =============================================================================

/**
 * An identifier reference. Member chains on identifiers (`align.bam`,
 * `ns.Struct.field`) are kept as one dotted name.
 */
export interface IdentExpression {
  kind: "ident";
  name: string;
}

/** Member access on something other than an identifier: `pairs[0].left`. */
export interface GetExpression {
  kind: "get";
  target: WdlExpression;
  member: string;
}

export interface ApplyExpression {
  kind: "apply";
  function: string;
  arguments: WdlExpression[];
}

export interface ArrayExpression {
  kind: "array";
  items: WdlExpression[];
}

export interface MapExpression {
  kind: "map";
  entries: Array<{ key: WdlExpression; value: WdlExpression }>;
}

export interface PairExpression {
  kind: "pair";
  left: WdlExpression;
  right: WdlExpression;
}

/** `object { a: 1 }` or a struct literal `Sample { id: "x" }`. */
export interface StructExpression {
  kind: "struct";
  typeName?: string;
  members: Array<{ name: string; value: WdlExpression }>;
}

/**
 * A string literal. Interpolations appear as `placeholder` parts holding the
 * parsed inner expression and the options written before it (`sep=", "`).
 */
export interface StringExpression {
  kind: "string";
  quote: '"' | "'";
  parts: StringPart[];
}

export type StringPart =
  | { kind: "text"; text: string }
  | {
      kind: "placeholder";
      expression: WdlExpression;
      options: Array<{ name: string; value: string }>;
    };

export interface IntExpression {
  kind: "int";
  value: number;
}

export interface FloatExpression {
  kind: "float";
  /** Literal text as written, so formatting round-trips `1.0` */
  text: string;
}

export interface BooleanExpression {
  kind: "boolean";
  value: boolean;
}

export interface NullExpression {
  kind: "null";
}

export type BinaryOperator =
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "+"
  | "-"
  | "*"
  | "/"
  | "%";

export interface BinaryExpression {
  kind: "binary";
  operator: BinaryOperator;
  left: WdlExpression;
  right: WdlExpression;
}

export interface UnaryExpression {
  kind: "unary";
  operator: "!" | "-" | "+";
  operand: WdlExpression;
}

export interface IndexExpression {
  kind: "index";
  target: WdlExpression;
  index: WdlExpression;
}

export interface IfThenElseExpression {
  kind: "ifThenElse";
  condition: WdlExpression;
  consequent: WdlExpression;
  alternative: WdlExpression;
}

export type WdlExpression =
  | IdentExpression
  | GetExpression
  | ApplyExpression
  | ArrayExpression
  | MapExpression
  | PairExpression
  | StructExpression
  | StringExpression
  | IntExpression
  | FloatExpression
  | BooleanExpression
  | NullExpression
  | BinaryExpression
  | UnaryExpression
  | IndexExpression
  | IfThenElseExpression;

// =============================================================================
// Declarations
// =============================================================================

export interface DeclNode {
  name: string;
  type: WdlTypeNode;
  expr?: WdlExpression;
  position: SourcePosition;
}

// =============================================================================
// Workflow Body Elements
// =============================================================================

export type CalleeKind = "task" | "workflow";

/** The definition a call invokes, once resolved against the document and its imports. */
export interface CalleeRef {
  kind: CalleeKind;
  name: string;
}

export interface CallInput {
  name: string;
  expr: WdlExpression;
}

export interface CallElement {
  kind: "call";
  /** Local name: the alias, or the last segment of the callee reference */
  name: string;
  /** Callee reference split on dots: `["lib", "align"]` */
  calleeId: string[];
  alias?: string;
  inputs: CallInput[];
  /** Call names from `after` clauses */
  afters: string[];
  /** Set by callee resolution; calls without it are skipped by the graph */
  callee?: CalleeRef;
  position: SourcePosition;
}

export interface DeclElement {
  kind: "decl";
  decl: DeclNode;
}

export interface ScatterElement {
  kind: "scatter";
  variable: string;
  expr: WdlExpression;
  body: WorkflowElement[];
  position: SourcePosition;
}

export interface ConditionalElement {
  kind: "conditional";
  expr: WdlExpression;
  body: WorkflowElement[];
  position: SourcePosition;
}

export type WorkflowElement =
  | CallElement
  | DeclElement
  | ScatterElement
  | ConditionalElement;

/**
 * Nested bodies of a scope element; empty for calls and declarations.
 */
export function getElementChildren(element: WorkflowElement): WorkflowElement[] {
  switch (element.kind) {
    case "scatter":
    case "conditional":
      return element.body;
    default:
      return [];
  }
}

// =============================================================================
// Sections
// =============================================================================

/** Values allowed in `meta` and `parameter_meta` sections. */
export type MetaValue =
  | string
  | number
  | boolean
  | null
  | MetaValue[]
  | { [key: string]: MetaValue };

export interface ImportNode {
  uri: string;
  /** `as` namespace, or the file name without `.wdl` */
  namespace: string;
  aliases: Array<{ from: string; to: string }>;
  position: SourcePosition;
}

export interface StructNode {
  name: string;
  members: DeclNode[];
}

export interface WorkflowNode {
  name: string;
  inputs: DeclNode[];
  body: WorkflowElement[];
  outputs: DeclNode[];
  meta: Record<string, MetaValue>;
  parameterMeta: Record<string, MetaValue>;
  position: SourcePosition;
}

export interface CommandNode {
  /** Raw text between the delimiters */
  text: string;
  style: "heredoc" | "brace";
}

export interface TaskNode {
  name: string;
  inputs: DeclNode[];
  /** Private declarations outside `input` and `output` */
  declarations: DeclNode[];
  command?: CommandNode;
  outputs: DeclNode[];
  runtime: Array<{ key: string; expr: WdlExpression }>;
  meta: Record<string, MetaValue>;
  parameterMeta: Record<string, MetaValue>;
  position: SourcePosition;
}

export interface DocumentNode {
  /** `version` line value; `draft-2` when absent */
  version: string;
  imports: ImportNode[];
  structs: StructNode[];
  workflow?: WorkflowNode;
  tasks: TaskNode[];
}

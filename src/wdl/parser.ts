/**
 * WDL Parser
 *
 * Recursive-descent reader for WDL documents (draft-2, 1.0, 1.1 and
 * development). Produces the syntax tree in `./ast`; it does not type-check
 * and does not resolve imports.
 */

import { WdlSyntaxError } from "../errors";
import type {
  BinaryOperator,
  CallElement,
  CallInput,
  DeclElement,
  DeclNode,
  DocumentNode,
  ImportNode,
  MetaValue,
  SourcePosition,
  StringExpression,
  StringPart,
  StructNode,
  TaskNode,
  WdlExpression,
  WdlTypeNode,
  WorkflowElement,
  WorkflowNode,
} from "./ast";
import { tokenize, type RawStringPart, type Token } from "./lexer";

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse a complete WDL document.
 *
 * @throws WdlSyntaxError when the source does not match the grammar
 *
 * @example
 * ```typescript
 * const doc = parseWdl(readFileSync("main.wdl", "utf-8"));
 * doc.workflow?.body.filter((e) => e.kind === "call");
 * ```
 */
export function parseWdl(source: string): DocumentNode {
  return new Parser(tokenize(source)).parseDocument();
}

/**
 * Parse a single expression, such as `align.bam` or `length(samples) > 0`.
 */
export function parseExpression(source: string): WdlExpression {
  const parser = new Parser(tokenize(source));
  const expression = parser.parseExpression();
  parser.expectEnd();
  return expression;
}

/** Import namespace implied by a URI: its file name without `.wdl`. */
export function defaultNamespace(uri: string): string {
  const fileName = uri.split(/[\\/]/).pop() ?? uri;
  return fileName.endsWith(".wdl") ? fileName.slice(0, -".wdl".length) : fileName;
}

// =============================================================================
// Operator Table
// =============================================================================

const BINARY_LEVELS: BinaryOperator[][] = [
  ["||"],
  ["&&"],
  ["==", "!="],
  ["<", "<=", ">", ">="],
  ["+", "-"],
  ["*", "/", "%"],
];

// =============================================================================
// Parser
// =============================================================================

class Parser {
  private index = 0;
  private version = "draft-2";

  constructor(private readonly tokens: Token[]) {}

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(ahead = 0): Token {
    const token = this.tokens[Math.min(this.index + ahead, this.tokens.length - 1)];
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "eof") this.index++;
    return token;
  }

  private isPunct(value: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.kind === "punct" && token.value === value;
  }

  private isKeyword(value: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.kind === "ident" && token.value === value;
  }

  private acceptPunct(value: string): boolean {
    if (!this.isPunct(value)) return false;
    this.next();
    return true;
  }

  private expectPunct(value: string): void {
    if (!this.acceptPunct(value)) {
      this.fail(`Expected '${value}'`);
    }
  }

  private expectKeyword(value: string): void {
    if (!this.isKeyword(value)) this.fail(`Expected '${value}'`);
    this.next();
  }

  private expectIdent(): string {
    const token = this.next();
    if (token.kind !== "ident") {
      throw new WdlSyntaxError(`Expected identifier, found ${describe(token)}`, token.position);
    }
    return token.value;
  }

  expectEnd(): void {
    if (this.peek().kind !== "eof") this.fail("Unexpected input");
  }

  private fail(message: string): never {
    const token = this.peek();
    throw new WdlSyntaxError(`${message}, found ${describe(token)}`, token.position);
  }

  // ---------------------------------------------------------------------------
  // Document
  // ---------------------------------------------------------------------------

  parseDocument(): DocumentNode {
    const doc: DocumentNode = { version: "draft-2", imports: [], structs: [], tasks: [] };

    if (this.isKeyword("version")) {
      this.next();
      const token = this.next();
      if (token.kind !== "ident" && token.kind !== "float" && token.kind !== "int") {
        throw new WdlSyntaxError("Expected version number", token.position);
      }
      doc.version = token.value;
      this.version = token.value;
    }

    while (this.peek().kind !== "eof") {
      if (this.isKeyword("import")) {
        doc.imports.push(this.parseImport());
      } else if (this.isKeyword("struct")) {
        doc.structs.push(this.parseStruct());
      } else if (this.isKeyword("workflow")) {
        if (doc.workflow) this.fail("Multiple workflows in one document");
        doc.workflow = this.parseWorkflow();
      } else if (this.isKeyword("task")) {
        doc.tasks.push(this.parseTask());
      } else {
        this.fail("Expected import, struct, workflow or task");
      }
    }

    return doc;
  }

  private parseImport(): ImportNode {
    const position = this.peek().position;
    this.expectKeyword("import");
    const uri = this.parsePlainString();
    let namespace = defaultNamespace(uri);
    const aliases: ImportNode["aliases"] = [];

    if (this.isKeyword("as")) {
      this.next();
      namespace = this.expectIdent();
    }
    while (this.isKeyword("alias")) {
      this.next();
      const from = this.expectIdent();
      this.expectKeyword("as");
      aliases.push({ from, to: this.expectIdent() });
    }

    return { uri, namespace, aliases, position };
  }

  private parseStruct(): StructNode {
    this.expectKeyword("struct");
    const name = this.expectIdent();
    this.expectPunct("{");
    const members: DeclNode[] = [];
    while (!this.acceptPunct("}")) {
      if (this.isKeyword("meta") || this.isKeyword("parameter_meta")) {
        this.next();
        this.parseMetaObject();
        continue;
      }
      members.push(this.parseDecl());
    }
    return { name, members };
  }

  // ---------------------------------------------------------------------------
  // Workflow
  // ---------------------------------------------------------------------------

  private parseWorkflow(): WorkflowNode {
    const position = this.peek().position;
    this.expectKeyword("workflow");
    const workflow: WorkflowNode = {
      name: this.expectIdent(),
      inputs: [],
      body: [],
      outputs: [],
      meta: {},
      parameterMeta: {},
      position,
    };
    this.expectPunct("{");

    while (!this.acceptPunct("}")) {
      if (this.isSection("input")) {
        this.next();
        workflow.inputs.push(...this.parseDeclBlock());
      } else if (this.isSection("output")) {
        this.next();
        workflow.outputs.push(...this.parseDeclBlock());
      } else if (this.isSection("meta")) {
        this.next();
        workflow.meta = this.parseMetaObject();
      } else if (this.isSection("parameter_meta")) {
        this.next();
        workflow.parameterMeta = this.parseMetaObject();
      } else {
        const element = this.parseWorkflowElement();
        if (this.isDraft2Input(element)) {
          workflow.inputs.push(element.decl);
        } else {
          workflow.body.push(element);
        }
      }
    }

    return workflow;
  }

  /** A section keyword is only a keyword when a block follows. */
  private isSection(name: string): boolean {
    return this.isKeyword(name) && this.isPunct("{", 1);
  }

  private isDraft2Input(element: WorkflowElement): element is DeclElement {
    return this.version === "draft-2" && element.kind === "decl" && !element.decl.expr;
  }

  private parseWorkflowElement(): WorkflowElement {
    if (this.isKeyword("call")) return this.parseCall();

    if (this.isKeyword("scatter") && this.isPunct("(", 1)) {
      const position = this.next().position;
      this.expectPunct("(");
      const variable = this.expectIdent();
      this.expectKeyword("in");
      const expr = this.parseExpression();
      this.expectPunct(")");
      return { kind: "scatter", variable, expr, body: this.parseBody(), position };
    }

    if (this.isKeyword("if") && this.isPunct("(", 1)) {
      const position = this.next().position;
      this.expectPunct("(");
      const expr = this.parseExpression();
      this.expectPunct(")");
      return { kind: "conditional", expr, body: this.parseBody(), position };
    }

    return { kind: "decl", decl: this.parseDecl() };
  }

  private parseBody(): WorkflowElement[] {
    this.expectPunct("{");
    const body: WorkflowElement[] = [];
    while (!this.acceptPunct("}")) {
      body.push(this.parseWorkflowElement());
    }
    return body;
  }

  private parseCall(): CallElement {
    const position = this.next().position;
    const calleeId = [this.expectIdent()];
    while (this.acceptPunct(".")) {
      calleeId.push(this.expectIdent());
    }

    let alias: string | undefined;
    if (this.isKeyword("as")) {
      this.next();
      alias = this.expectIdent();
    }

    const afters: string[] = [];
    while (this.isKeyword("after")) {
      this.next();
      afters.push(this.expectIdent());
    }

    const inputs: CallInput[] = [];
    if (this.acceptPunct("{")) {
      if (this.isKeyword("input") && this.isPunct(":", 1)) {
        this.next();
        this.next();
      }
      while (!this.acceptPunct("}")) {
        const name = this.expectIdent();
        const expr: WdlExpression = this.acceptPunct("=")
          ? this.parseExpression()
          : { kind: "ident", name };
        inputs.push({ name, expr });
        if (!this.isPunct("}")) this.expectPunct(",");
      }
    }

    const name = alias ?? calleeId[calleeId.length - 1];
    return {
      kind: "call",
      name,
      calleeId,
      ...(alias !== undefined ? { alias } : {}),
      inputs,
      afters,
      position,
    };
  }

  // ---------------------------------------------------------------------------
  // Task
  // ---------------------------------------------------------------------------

  private parseTask(): TaskNode {
    const position = this.peek().position;
    this.expectKeyword("task");
    const task: TaskNode = {
      name: this.expectIdent(),
      inputs: [],
      declarations: [],
      outputs: [],
      runtime: [],
      meta: {},
      parameterMeta: {},
      position,
    };
    this.expectPunct("{");

    while (!this.acceptPunct("}")) {
      const token = this.peek();
      if (token.kind === "command") {
        this.next();
        task.command = { text: token.text, style: token.style };
      } else if (this.isKeyword("command") && this.peek(1).kind === "command") {
        this.next();
      } else if (this.isSection("input")) {
        this.next();
        task.inputs.push(...this.parseDeclBlock());
      } else if (this.isSection("output")) {
        this.next();
        task.outputs.push(...this.parseDeclBlock());
      } else if (this.isSection("runtime") || this.isSection("requirements")) {
        this.next();
        task.runtime.push(...this.parseKeyValueBlock());
      } else if (this.isSection("hints")) {
        this.next();
        this.parseKeyValueBlock();
      } else if (this.isSection("meta")) {
        this.next();
        task.meta = this.parseMetaObject();
      } else if (this.isSection("parameter_meta")) {
        this.next();
        task.parameterMeta = this.parseMetaObject();
      } else {
        const decl = this.parseDecl();
        if (this.version === "draft-2" && !decl.expr) {
          task.inputs.push(decl);
        } else {
          task.declarations.push(decl);
        }
      }
    }

    return task;
  }

  private parseKeyValueBlock(): Array<{ key: string; expr: WdlExpression }> {
    this.expectPunct("{");
    const entries: Array<{ key: string; expr: WdlExpression }> = [];
    while (!this.acceptPunct("}")) {
      const key = this.expectIdent();
      this.expectPunct(":");
      entries.push({ key, expr: this.parseExpression() });
      this.acceptPunct(",");
    }
    return entries;
  }

  // ---------------------------------------------------------------------------
  // Declarations and types
  // ---------------------------------------------------------------------------

  private parseDeclBlock(): DeclNode[] {
    this.expectPunct("{");
    const decls: DeclNode[] = [];
    while (!this.acceptPunct("}")) {
      decls.push(this.parseDecl());
    }
    return decls;
  }

  private parseDecl(): DeclNode {
    const position = this.peek().position;
    const type = this.parseType();
    const name = this.expectIdent();
    if (this.acceptPunct("=")) {
      return { name, type, expr: this.parseExpression(), position };
    }
    return { name, type, position };
  }

  private parseType(): WdlTypeNode {
    const name = this.expectIdent();
    const parameters: WdlTypeNode[] = [];
    if (this.acceptPunct("[")) {
      parameters.push(this.parseType());
      while (this.acceptPunct(",")) {
        parameters.push(this.parseType());
      }
      this.expectPunct("]");
    }
    const nonEmpty = this.acceptPunct("+");
    const optional = this.acceptPunct("?");
    return { name, parameters, optional, nonEmpty };
  }

  // ---------------------------------------------------------------------------
  // Meta sections
  // ---------------------------------------------------------------------------

  private parseMetaObject(): Record<string, MetaValue> {
    this.expectPunct("{");
    const result: Record<string, MetaValue> = {};
    while (!this.acceptPunct("}")) {
      const keyToken = this.next();
      let key: string;
      if (keyToken.kind === "ident") {
        key = keyToken.value;
      } else if (keyToken.kind === "string") {
        key = joinRaw(keyToken.parts);
      } else {
        throw new WdlSyntaxError(`Expected meta key, found ${describe(keyToken)}`, keyToken.position);
      }
      this.expectPunct(":");
      result[key] = this.parseMetaValue();
      this.acceptPunct(",");
    }
    return result;
  }

  private parseMetaValue(): MetaValue {
    if (this.isPunct("{")) return this.parseMetaObject();

    if (this.acceptPunct("[")) {
      const items: MetaValue[] = [];
      while (!this.acceptPunct("]")) {
        items.push(this.parseMetaValue());
        if (!this.isPunct("]")) this.expectPunct(",");
      }
      return items;
    }

    const negative = this.acceptPunct("-");
    const token = this.next();
    switch (token.kind) {
      case "string":
        return joinRaw(token.parts);
      case "int":
      case "float":
        return Number(token.value) * (negative ? -1 : 1);
      case "ident":
        if (token.value === "true") return true;
        if (token.value === "false") return false;
        if (token.value === "null") return null;
        break;
      default:
        break;
    }
    throw new WdlSyntaxError(`Invalid meta value ${describe(token)}`, token.position);
  }

  private parsePlainString(): string {
    const token = this.next();
    if (token.kind !== "string") {
      throw new WdlSyntaxError(`Expected string, found ${describe(token)}`, token.position);
    }
    return joinRaw(token.parts);
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  parseExpression(): WdlExpression {
    if (this.isKeyword("if")) {
      this.next();
      const condition = this.parseExpression();
      this.expectKeyword("then");
      const consequent = this.parseExpression();
      this.expectKeyword("else");
      const alternative = this.parseExpression();
      return { kind: "ifThenElse", condition, consequent, alternative };
    }
    return this.parseBinary(0);
  }

  private parseBinary(level: number): WdlExpression {
    if (level >= BINARY_LEVELS.length) return this.parseUnary();

    const operators = BINARY_LEVELS[level];
    let left = this.parseBinary(level + 1);
    for (;;) {
      const token = this.peek();
      const value = token.kind === "punct" ? token.value : undefined;
      const operator = operators.find((op) => op === value);
      if (!operator) return left;
      this.next();
      const right = this.parseBinary(level + 1);
      left = { kind: "binary", operator, left, right };
    }
  }

  private parseUnary(): WdlExpression {
    for (const operator of ["!", "-", "+"] as const) {
      if (this.acceptPunct(operator)) {
        return { kind: "unary", operator, operand: this.parseUnary() };
      }
    }
    return this.parsePostfix();
  }

  private parsePostfix(): WdlExpression {
    let expr = this.parsePrimary();
    for (;;) {
      if (this.acceptPunct("[")) {
        const index = this.parseExpression();
        this.expectPunct("]");
        expr = { kind: "index", target: expr, index };
      } else if (this.isPunct(".") && this.peek(1).kind === "ident") {
        this.next();
        const member = this.expectIdent();
        expr =
          expr.kind === "ident"
            ? { kind: "ident", name: `${expr.name}.${member}` }
            : { kind: "get", target: expr, member };
      } else {
        return expr;
      }
    }
  }

  private parsePrimary(): WdlExpression {
    const token = this.next();

    switch (token.kind) {
      case "int":
        return { kind: "int", value: Number(token.value) };
      case "float":
        return { kind: "float", text: token.value };
      case "string":
        return this.toStringExpression(token.quote, token.parts);
      case "ident":
        return this.parseIdentExpression(token.value);
      case "punct":
        return this.parseBracketed(token.value, token.position);
      default:
        throw new WdlSyntaxError(`Unexpected ${describe(token)}`, token.position);
    }
  }

  private parseIdentExpression(name: string): WdlExpression {
    if (name === "true" || name === "false") return { kind: "boolean", value: name === "true" };
    if (name === "None") return { kind: "null" };

    if (this.isPunct("(")) {
      this.next();
      const args: WdlExpression[] = [];
      while (!this.acceptPunct(")")) {
        args.push(this.parseExpression());
        if (!this.isPunct(")")) this.expectPunct(",");
      }
      return { kind: "apply", function: name, arguments: args };
    }

    if (name === "object" && this.isPunct("{")) {
      return { kind: "struct", members: this.parseStructMembers() };
    }

    // Struct literal: `Sample { id: "a" }`
    if (
      this.isPunct("{") &&
      (this.isPunct("}", 1) || (this.peek(1).kind === "ident" && this.isPunct(":", 2)))
    ) {
      return { kind: "struct", typeName: name, members: this.parseStructMembers() };
    }

    return { kind: "ident", name };
  }

  private parseStructMembers(): Array<{ name: string; value: WdlExpression }> {
    this.expectPunct("{");
    const members: Array<{ name: string; value: WdlExpression }> = [];
    while (!this.acceptPunct("}")) {
      const name = this.expectIdent();
      this.expectPunct(":");
      members.push({ name, value: this.parseExpression() });
      if (!this.isPunct("}")) this.expectPunct(",");
    }
    return members;
  }

  private parseBracketed(value: string, position: SourcePosition): WdlExpression {
    if (value === "(") {
      const first = this.parseExpression();
      if (this.acceptPunct(",")) {
        const second = this.parseExpression();
        this.expectPunct(")");
        return { kind: "pair", left: first, right: second };
      }
      this.expectPunct(")");
      return first;
    }

    if (value === "[") {
      const items: WdlExpression[] = [];
      while (!this.acceptPunct("]")) {
        items.push(this.parseExpression());
        if (!this.isPunct("]")) this.expectPunct(",");
      }
      return { kind: "array", items };
    }

    if (value === "{") {
      const entries: Array<{ key: WdlExpression; value: WdlExpression }> = [];
      while (!this.acceptPunct("}")) {
        const key = this.parseExpression();
        this.expectPunct(":");
        entries.push({ key, value: this.parseExpression() });
        if (!this.isPunct("}")) this.expectPunct(",");
      }
      return { kind: "map", entries };
    }

    throw new WdlSyntaxError(`Unexpected '${value}'`, position);
  }

  // ---------------------------------------------------------------------------
  // Strings
  // ---------------------------------------------------------------------------

  private toStringExpression(quote: '"' | "'", raw: RawStringPart[]): StringExpression {
    const parts: StringPart[] = raw.map((part) => {
      if (part.kind === "text") return part;
      const inner = new Parser(tokenize(part.source, part.position));
      return inner.parsePlaceholder();
    });
    return { kind: "string", quote, parts };
  }

  /** Placeholder body: `sep=", " items` or a bare expression. */
  private parsePlaceholder(): StringPart {
    const options: Array<{ name: string; value: string }> = [];
    while (this.peek().kind === "ident" && this.isPunct("=", 1)) {
      const name = this.expectIdent();
      this.next();
      const token = this.next();
      if (token.kind === "string") {
        options.push({ name, value: joinRaw(token.parts) });
      } else if (token.kind === "ident" || token.kind === "int" || token.kind === "float") {
        options.push({ name, value: token.value });
      } else {
        throw new WdlSyntaxError(`Invalid placeholder option ${describe(token)}`, token.position);
      }
    }
    const expression = this.parseExpression();
    this.expectEnd();
    return { kind: "placeholder", expression, options };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function describe(token: Token): string {
  switch (token.kind) {
    case "eof":
      return "end of input";
    case "string":
      return "string";
    case "command":
      return "command section";
    default:
      return `'${token.value}'`;
  }
}

/** String token text with placeholders restored as written. */
function joinRaw(parts: RawStringPart[]): string {
  return parts.map((p) => (p.kind === "text" ? p.text : `~{${p.source}}`)).join("");
}

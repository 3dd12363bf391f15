/**
 * WDL Lexer
 *
 * Splits WDL source into tokens. Strings keep their interpolation
 * placeholders as raw source so the parser can read them as expressions,
 * and `command` sections are captured verbatim.
 */

import { WdlSyntaxError } from "../errors";
import type { SourcePosition } from "./ast";

// =============================================================================
// Tokens
// =============================================================================

export type RawStringPart =
  | { kind: "text"; text: string }
  | { kind: "placeholder"; source: string; position: SourcePosition };

export type Token =
  | { kind: "ident"; value: string; position: SourcePosition }
  | { kind: "int"; value: string; position: SourcePosition }
  | { kind: "float"; value: string; position: SourcePosition }
  | { kind: "punct"; value: string; position: SourcePosition }
  | {
      kind: "string";
      quote: '"' | "'";
      parts: RawStringPart[];
      position: SourcePosition;
    }
  | {
      kind: "command";
      text: string;
      style: "heredoc" | "brace";
      position: SourcePosition;
    }
  | { kind: "eof"; position: SourcePosition };

const PUNCTUATION = [
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "{",
  "}",
  "(",
  ")",
  "[",
  "]",
  ",",
  ":",
  "=",
  ".",
  "?",
  "+",
  "-",
  "*",
  "/",
  "%",
  "!",
  "<",
  ">",
];

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  '"': '"',
  "'": "'",
  "~": "~",
  $: "$",
};

// =============================================================================
// Lexer
// =============================================================================

/**
 * Tokenize `source`. `origin` offsets positions when lexing a fragment,
 * such as the inside of a string placeholder.
 */
export function tokenize(
  source: string,
  origin: SourcePosition = { line: 1, column: 1 }
): Token[] {
  return new Lexer(source, origin).run();
}

class Lexer {
  private offset = 0;
  private line: number;
  private column: number;
  private readonly tokens: Token[] = [];

  constructor(
    private readonly source: string,
    origin: SourcePosition
  ) {
    this.line = origin.line;
    this.column = origin.column;
  }

  run(): Token[] {
    for (;;) {
      this.skipTrivia();
      const position = this.position();
      if (this.offset >= this.source.length) {
        this.tokens.push({ kind: "eof", position });
        return this.tokens;
      }

      const ch = this.source[this.offset];
      if (isIdentStart(ch)) {
        const value = this.readWhile(isIdentPart);
        this.tokens.push({ kind: "ident", value, position });
        if (value === "command") this.tryReadCommand();
      } else if (isDigit(ch)) {
        this.readNumber(position);
      } else if (ch === '"' || ch === "'") {
        this.readString(ch, position);
      } else {
        this.readPunctuation(position);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Scanning helpers
  // ---------------------------------------------------------------------------

  private position(): SourcePosition {
    return { line: this.line, column: this.column };
  }

  private peekChar(ahead = 0): string {
    return this.source[this.offset + ahead] ?? "";
  }

  private advance(): string {
    const ch = this.source[this.offset];
    this.offset++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private readWhile(predicate: (ch: string) => boolean): string {
    const start = this.offset;
    while (this.offset < this.source.length && predicate(this.source[this.offset])) {
      this.advance();
    }
    return this.source.slice(start, this.offset);
  }

  private skipTrivia(): void {
    while (this.offset < this.source.length) {
      const ch = this.source[this.offset];
      if (ch === "#") {
        this.readWhile((c) => c !== "\n");
      } else if (/\s/.test(ch)) {
        this.advance();
      } else {
        return;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Token readers
  // ---------------------------------------------------------------------------

  private readNumber(position: SourcePosition): void {
    let text = this.readWhile(isDigit);
    let isFloat = false;
    if (this.peekChar() === "." && isDigit(this.peekChar(1))) {
      isFloat = true;
      text += this.advance();
      text += this.readWhile(isDigit);
    }
    if (this.peekChar() === "e" || this.peekChar() === "E") {
      const sign = this.peekChar(1);
      const hasSign = sign === "+" || sign === "-";
      if (isDigit(this.peekChar(hasSign ? 2 : 1))) {
        isFloat = true;
        text += this.advance();
        if (hasSign) text += this.advance();
        text += this.readWhile(isDigit);
      }
    }
    this.tokens.push({ kind: isFloat ? "float" : "int", value: text, position });
  }

  private readPunctuation(position: SourcePosition): void {
    const rest = this.source.slice(this.offset, this.offset + 2);
    const match = PUNCTUATION.find((p) => rest.startsWith(p));
    if (!match) {
      throw new WdlSyntaxError(`Unexpected character '${this.peekChar()}'`, position);
    }
    for (let i = 0; i < match.length; i++) this.advance();
    this.tokens.push({ kind: "punct", value: match, position });
  }

  private readString(quote: '"' | "'", position: SourcePosition): void {
    this.advance();
    const parts: RawStringPart[] = [];
    let text = "";

    for (;;) {
      if (this.offset >= this.source.length) {
        throw new WdlSyntaxError("Unterminated string", position);
      }
      const ch = this.peekChar();
      if (ch === quote) {
        this.advance();
        break;
      }
      if (ch === "\n") {
        throw new WdlSyntaxError("Unterminated string", position);
      }
      if (ch === "\\") {
        this.advance();
        const escaped = this.advance();
        text += ESCAPES[escaped] ?? `\\${escaped}`;
        continue;
      }
      if ((ch === "~" || ch === "$") && this.peekChar(1) === "{") {
        if (text) parts.push({ kind: "text", text });
        text = "";
        parts.push(this.readPlaceholder());
        continue;
      }
      text += this.advance();
    }

    if (text || parts.length === 0) parts.push({ kind: "text", text });
    this.tokens.push({ kind: "string", quote, parts, position });
  }

  /** Reads `~{ ... }`, returning the inner source. */
  private readPlaceholder(): RawStringPart {
    const start = this.position();
    this.advance();
    this.advance();
    const position = this.position();
    const begin = this.offset;
    let depth = 1;

    while (this.offset < this.source.length) {
      const ch = this.peekChar();
      if (ch === '"' || ch === "'") {
        this.skipQuoted(ch);
        continue;
      }
      if (ch === "{") depth++;
      if (ch === "}") {
        depth--;
        if (depth === 0) {
          const source = this.source.slice(begin, this.offset);
          this.advance();
          return { kind: "placeholder", source, position };
        }
      }
      this.advance();
    }
    throw new WdlSyntaxError("Unterminated placeholder", start);
  }

  private skipQuoted(quote: string): void {
    const start = this.position();
    this.advance();
    while (this.offset < this.source.length) {
      const ch = this.advance();
      if (ch === "\\") {
        this.advance();
      } else if (ch === quote) {
        return;
      }
    }
    throw new WdlSyntaxError("Unterminated string", start);
  }

  /**
   * After the `command` keyword, capture `<<< ... >>>` or `{ ... }` verbatim.
   * Leaves the keyword alone when neither follows (a meta key named command).
   */
  private tryReadCommand(): void {
    const save = { offset: this.offset, line: this.line, column: this.column };
    this.skipTrivia();
    const position = this.position();

    if (this.source.startsWith("<<<", this.offset)) {
      for (let i = 0; i < 3; i++) this.advance();
      const begin = this.offset;
      const end = this.source.indexOf(">>>", begin);
      if (end === -1) throw new WdlSyntaxError("Unterminated command section", position);
      while (this.offset < end) this.advance();
      const text = this.source.slice(begin, end);
      for (let i = 0; i < 3; i++) this.advance();
      this.tokens.push({ kind: "command", text, style: "heredoc", position });
      return;
    }

    if (this.peekChar() === "{") {
      this.advance();
      const begin = this.offset;
      let depth = 1;
      while (this.offset < this.source.length) {
        const ch = this.peekChar();
        if (ch === "{") depth++;
        if (ch === "}") {
          depth--;
          if (depth === 0) {
            const text = this.source.slice(begin, this.offset);
            this.advance();
            this.tokens.push({ kind: "command", text, style: "brace", position });
            return;
          }
        }
        this.advance();
      }
      throw new WdlSyntaxError("Unterminated command section", position);
    }

    this.offset = save.offset;
    this.line = save.line;
    this.column = save.column;
  }
}

// =============================================================================
// Character classes
// =============================================================================

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

import { describe, it, expect } from "vitest";
import { ExpressionFormatError } from "../errors";
import type { WdlExpression } from "./ast";
import { formatExpression, formatExpressionOr, formatType } from "./format";
import { parseExpression, parseWdl } from "./parser";

describe("formatExpression", () => {
  it.each([
    ["align.bam", "align.bam"],
    ["select_first([a,b])", "select_first([a, b])"],
    ["(a + b) * c", "(a + b) * c"],
    ["a - (b - c)", "a - (b - c)"],
    ["a - b - c", "a - b - c"],
    ["!(x && y)", "!(x && y)"],
    ["-n", "-n"],
    ["if ok then 1 else 2", "if ok then 1 else 2"],
    ["{'k': v}", "{'k': v}"],
    ["(l, r)", "(l, r)"],
    ["object { a: 1 }", "object {a: 1}"],
    ["pairs[0].left", "pairs[0].left"],
    ['"~{prefix}.bam"', '"~{prefix}.bam"'],
    ['"${prefix}.bam"', '"~{prefix}.bam"'],
    ['"~{sep=", " names}"', '"~{sep=", " names}"'],
    ["None", "None"],
    ["1.50", "1.50"],
  ])("should format %s as %s", (source, expected) => {
    expect(formatExpression(parseExpression(source))).toBe(expected);
  });

  it("should escape quotes and newlines in string text", () => {
    expect(formatExpression(parseExpression('"say \\"hi\\"\\n"'))).toBe('"say \\"hi\\"\\n"');
  });

  it("should throw for unknown node kinds", () => {
    const bogus: WdlExpression = JSON.parse('{"kind":"lambda"}');

    expect(() => formatExpression(bogus)).toThrow(ExpressionFormatError);
    expect(formatExpressionOr(bogus, "unknown")).toBe("unknown");
  });
});

describe("formatType", () => {
  it("should format compound types with their suffixes", () => {
    const doc = parseWdl(`
      version 1.0
      workflow w {
        input {
          Array[File]+? files
          Map[String, Pair[Int, Float]] table
        }
      }
    `);

    expect(doc.workflow?.inputs.map((i) => formatType(i.type))).toEqual([
      "Array[File]+?",
      "Map[String, Pair[Int, Float]]",
    ]);
  });
});

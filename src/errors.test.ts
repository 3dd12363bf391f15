import { describe, it, expect } from "vitest";
import {
  describeKind,
  ExpressionFormatError,
  locationInfo,
  severityOf,
  shortMessage,
  toParseError,
  WdlSyntaxError,
  WorkflowShapeError,
  type ParseError,
} from "./errors";

const NOW = new Date("2026-01-01T00:00:00.000Z");

function parseError(overrides: Partial<ParseError> = {}): ParseError {
  return {
    filePath: "/repo/main.wdl",
    relativePath: "main.wdl",
    errorType: "SyntaxError",
    message: "boom",
    timestamp: NOW.toISOString(),
    ...overrides,
  };
}

describe("toParseError", () => {
  it("should keep the position of syntax errors", () => {
    const cause = new WdlSyntaxError("Expected '}'", { line: 4, column: 9 });

    expect(toParseError(cause, "/repo/main.wdl", "main.wdl", NOW)).toEqual({
      filePath: "/repo/main.wdl",
      relativePath: "main.wdl",
      errorType: "SyntaxError",
      message: "Expected '}' (line 4, column 9)",
      line: 4,
      column: 9,
      timestamp: "2026-01-01T00:00:00.000Z",
    });
  });

  it("should classify shape and format errors as validation errors", () => {
    expect(
      toParseError(new WorkflowShapeError("Unknown element", "loop"), "/a.wdl", "a.wdl", NOW).errorType
    ).toBe("ValidationError");
    expect(
      toParseError(new ExpressionFormatError("Unknown node", "lambda"), "/a.wdl", "a.wdl", NOW).errorType
    ).toBe("ValidationError");
  });

  it("should report anything else as a read error", () => {
    expect(toParseError("EACCES", "/a.wdl", "a.wdl", NOW)).toMatchObject({
      errorType: "ReadError",
      message: "EACCES",
    });
  });
});

describe("ParseError helpers", () => {
  it("should treat warning types as warnings", () => {
    expect(severityOf(parseError({ errorType: "ImportWarning" }))).toBe("warning");
    expect(severityOf(parseError({ errorType: "ImportError" }))).toBe("error");
  });

  it("should cut long messages to 200 characters", () => {
    expect(shortMessage(parseError({ message: "x".repeat(250) }))).toBe(`${"x".repeat(200)}...`);
    expect(shortMessage(parseError({ message: "short" }))).toBe("short");
  });

  it("should describe the location when known", () => {
    expect(locationInfo(parseError({ line: 3, column: 7 }))).toBe("line 3, column 7");
    expect(locationInfo(parseError({ line: 3 }))).toBe("line 3");
    expect(locationInfo(parseError())).toBe("");
  });

  it("should read the kind tag of unknown values", () => {
    expect(describeKind({ kind: "lambda" })).toBe("lambda");
    expect(describeKind(42)).toBe("number");
  });
});

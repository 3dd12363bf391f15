/**
 * CLI tests
 *
 * Argument parsing and end-to-end runs against temporary WDL trees.
 */

import { afterEach, describe, expect, it } from "vitest";
import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parseArgs, runCli, VERSION, type CliIO } from "./cli";
import { createTempTree, removeTempTree } from "./test-utils";

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (line) => out.push(line), stderr: (line) => err.push(line) };
}

const WORKFLOW = `version 1.0
workflow main {
  call prep
}

task prep {
  command <<< true >>>
}
`;

describe("parseArgs", () => {
  it("should apply generate defaults", () => {
    expect(parseArgs(["generate"])).toEqual({
      ok: true,
      value: {
        command: "generate",
        rootDir: ".",
        outputDir: "docs/wdl",
        exclude: [],
        externalDirs: [],
        verbose: false,
      },
    });
  });

  it("should collect repeated and inline option values", () => {
    const parsed = parseArgs([
      "generate",
      "pipelines",
      "-o",
      "site",
      "-e",
      "legacy/",
      "--exclude=tmp/",
      "--external-dirs",
      "vendor",
      "-v",
    ]);

    expect(parsed).toEqual({
      ok: true,
      value: {
        command: "generate",
        rootDir: "pipelines",
        outputDir: "site",
        exclude: ["legacy/", "tmp/"],
        externalDirs: ["vendor"],
        verbose: true,
      },
    });
  });

  it("should require an output file for graph", () => {
    expect(parseArgs(["graph", "main.wdl"])).toEqual({
      ok: false,
      error: "graph requires --output <file.md>.",
    });
    expect(parseArgs(["graph", "main.wdl", "--output=main.md"])).toEqual({
      ok: true,
      value: { command: "graph", file: "main.wdl", output: "main.md", verbose: false },
    });
  });

  it.each([
    [[], "No command given."],
    [["publish"], "Unknown command: publish"],
    [["generate", "--format=json"], "Unknown option: --format=json"],
    [["generate", "-o"], "-o requires a value."],
    [["generate", "a", "b"], "Unexpected argument: b"],
  ])("should reject %j", (args, message) => {
    expect(parseArgs(args)).toEqual({ ok: false, error: message });
  });
});

describe("runCli", () => {
  let root = "";

  afterEach(() => {
    if (root) removeTempTree(root);
    root = "";
  });

  it("should print help and version", async () => {
    const io = captureIO();

    expect(await runCli(["--help"], io)).toBe(0);
    expect(await runCli(["--version"], io)).toBe(0);
    expect(io.out[0]).toContain("wdl-atlas generate [root] [options]");
    expect(io.out[1]).toBe(VERSION);
  });

  it("should exit with 2 and usage on bad arguments", async () => {
    const io = captureIO();

    expect(await runCli(["frobnicate"], io)).toBe(2);
    expect(io.err[0]).toBe("Error: Unknown command: frobnicate");
  });

  it("should generate a site", async () => {
    root = createTempTree({ "main.wdl": WORKFLOW });
    const io = captureIO();
    const site = join(root, "site");

    expect(await runCli(["generate", root, "-o", site], io)).toBe(0);
    expect(io.out).toEqual([`Documented 1 file(s) (1 workflow(s), 1 task(s)) in ${site}`]);
    expect(existsSync(join(site, "main.html"))).toBe(true);
  });

  it("should report generation failures", async () => {
    root = createTempTree({ "notes.md": "nothing" });
    const io = captureIO();

    expect(await runCli(["generate", root, "-o", join(root, "site")], io)).toBe(1);
    expect(io.err).toEqual([`Error: No WDL files found in ${root}`]);
  });

  it("should write a workflow graph", async () => {
    root = createTempTree({ "main.wdl": WORKFLOW });
    const io = captureIO();
    const output = join(root, "graph.md");

    expect(await runCli(["graph", join(root, "main.wdl"), "-o", output], io)).toBe(0);
    expect(io.out).toEqual([`Wrote ${output}`]);
    expect(readFileSync(output, "utf-8").startsWith("# Workflow: main\n")).toBe(true);
  });

  it("should log debug lines only when verbose", async () => {
    root = createTempTree({ "main.wdl": WORKFLOW });
    const quiet = captureIO();
    const verbose = captureIO();

    await runCli(["graph", join(root, "main.wdl"), "-o", join(root, "a.md")], quiet);
    await runCli(["graph", join(root, "main.wdl"), "-o", join(root, "b.md"), "-v"], verbose);

    expect(quiet.err.some((line) => line.startsWith("[debug]"))).toBe(false);
    expect(verbose.err.some((line) => line.startsWith("[debug]"))).toBe(true);
  });
});

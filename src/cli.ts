/**
 * CLI for wdl-atlas
 *
 * Usage:
 *   wdl-atlas generate [root] [-o docs/wdl] [-e pattern]... [--external-dirs dir]... [-v]
 *   wdl-atlas graph <file.wdl> -o <out.md> [-v]
 */

import type { ParseError } from "./errors";
import { generateDocumentation, generateWorkflowGraph, type GenerationError } from "./generate";
import { err, ok, type Result } from "awaitly";
import type { Logger } from "./types";

export const VERSION = "0.1.0";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

interface GenerateCommand {
  command: "generate";
  rootDir: string;
  outputDir: string;
  exclude: string[];
  externalDirs: string[];
  verbose: boolean;
}

interface GraphCommand {
  command: "graph";
  file: string;
  output: string;
  verbose: boolean;
}

type CliCommand = GenerateCommand | GraphCommand | { command: "help" } | { command: "version" };

function usage(): string {
  return `
wdl-atlas - Documentation and workflow graphs for WDL repositories

Usage:
  wdl-atlas generate [root] [options]
  wdl-atlas graph <file.wdl> --output=<file.md> [options]

Commands:
  generate              Build the HTML documentation site for every .wdl file under root
  graph                 Write one workflow's Mermaid diagram to a Markdown file

Options (generate):
  -o, --output <dir>    Output directory (default: docs/wdl)
  -e, --exclude <text>  Skip files whose root-relative path contains <text> (repeatable)
  --external-dirs <d>   Directory name holding third-party WDL (repeatable, default: external)

Options (graph):
  -o, --output <file>   Markdown file to write (required)

Common:
  -v, --verbose         Debug logging
  -h, --help            Show this help message
  --version             Print the version

Examples:
  wdl-atlas generate
  wdl-atlas generate ./pipelines -o site -e legacy/ --external-dirs vendor
  wdl-atlas graph workflows/align.wdl -o docs/align.md
`;
}

// =============================================================================
// Argument Parsing
// =============================================================================

type ValueFlag = "output" | "exclude" | "externalDirs";

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ["-o", "output"],
  ["--output", "output"],
  ["-e", "exclude"],
  ["--exclude", "exclude"],
  ["--external-dirs", "externalDirs"],
]);

export function parseArgs(args: readonly string[]): Result<CliCommand, string> {
  const positional: string[] = [];
  const values: Record<ValueFlag, string[]> = { output: [], exclude: [], externalDirs: [] };
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") return ok({ command: "help" });
    if (arg === "--version") return ok({ command: "version" });
    if (arg === "--verbose" || arg === "-v") {
      verbose = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;
    const target = VALUE_FLAGS.get(flag);
    if (target) {
      const value = flag === arg ? args[++i] : arg.slice(eq + 1);
      if (value === undefined || value.trim().length === 0) {
        return err(`${flag} requires a value.`);
      }
      values[target].push(value);
    } else if (arg.startsWith("-")) {
      return err(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [command, ...rest] = positional;
  switch (command) {
    case undefined:
      return err("No command given.");
    case "generate":
      if (rest.length > 1) return err(`Unexpected argument: ${rest[1]}`);
      return ok({
        command: "generate",
        rootDir: rest[0] ?? ".",
        outputDir: values.output[values.output.length - 1] ?? "docs/wdl",
        exclude: values.exclude,
        externalDirs: values.externalDirs,
        verbose,
      });
    case "graph": {
      const [file, extra] = rest;
      if (file === undefined) return err("graph requires a WDL file.");
      if (extra !== undefined) return err(`Unexpected argument: ${extra}`);
      const output = values.output[values.output.length - 1];
      if (output === undefined) return err("graph requires --output <file.md>.");
      return ok({ command: "graph", file, output, verbose });
    }
    default:
      return err(`Unknown command: ${command}`);
  }
}

// =============================================================================
// Commands
// =============================================================================

function createLogger(io: CliIO, verbose: boolean): Logger {
  return {
    debug: (message) => {
      if (verbose) io.stderr(`[debug] ${message}`);
    },
    info: (message) => io.stderr(message),
    warn: (message) => io.stderr(`Warning: ${message}`),
    error: (message) => io.stderr(`Error: ${message}`),
  };
}

function reportFailure(logger: Logger, error: GenerationError): void {
  logger.error(error.message);
  for (const parseError of error.parseErrors ?? []) {
    logger.error(`  ${describeParseError(parseError)}`);
  }
}

function describeParseError(error: ParseError): string {
  const location = error.line !== undefined ? `:${error.line}` : "";
  return `${error.relativePath}${location} ${error.errorType}: ${error.message}`;
}

async function runGenerate(command: GenerateCommand, io: CliIO): Promise<number> {
  const logger = createLogger(io, command.verbose);
  const result = await generateDocumentation({
    rootDir: command.rootDir,
    outputDir: command.outputDir,
    ...(command.exclude.length > 0 ? { exclude: command.exclude } : {}),
    ...(command.externalDirs.length > 0 ? { externalDirs: command.externalDirs } : {}),
    logger,
  });

  if (!result.ok) {
    reportFailure(logger, result.error);
    return 1;
  }

  const summary = result.value;
  io.stdout(
    `Documented ${summary.documents} file(s) (${summary.workflows} workflow(s), ${summary.tasks} task(s)) in ${summary.outputDir}`
  );
  if (summary.parseErrors.length > 0) {
    io.stdout(`${summary.parseErrors.length} problem(s) listed on the index page`);
  }
  return 0;
}

function runGraph(command: GraphCommand, io: CliIO): number {
  const logger = createLogger(io, command.verbose);
  const result = generateWorkflowGraph(command.file, command.output, { logger });
  if (!result.ok) {
    reportFailure(logger, result.error);
    return 1;
  }
  io.stdout(`Wrote ${result.value}`);
  return 0;
}

/**
 * Run the CLI and resolve to its exit code.
 */
export async function runCli(args: readonly string[], io: CliIO = consoleIO): Promise<number> {
  const parsed = parseArgs(args);
  if (!parsed.ok) {
    io.stderr(`Error: ${parsed.error}`);
    io.stderr(usage());
    return 2;
  }

  const command = parsed.value;
  switch (command.command) {
    case "help":
      io.stdout(usage());
      return 0;
    case "version":
      io.stdout(VERSION);
      return 0;
    case "generate":
      return runGenerate(command, io);
    case "graph":
      return runGraph(command, io);
    default: {
      const unknown: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unknown)}`);
    }
  }
}

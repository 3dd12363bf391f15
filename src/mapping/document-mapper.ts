/**
 * Document Mapper
 *
 * Maps a parsed WDL file and its imports to the documentation model:
 * resolved imports, tasks, and the workflow with its calls, container images
 * and dependency graph.
 */

import { toParseError, type ParseError } from "../errors";
import { collectCallRecords } from "../graph/call-collector";
import { buildWorkflowGraph, type WorkflowGraphOptions } from "../graph/graph-builder";
import { DEFAULT_EXTERNAL_DIRS, isExternalPath, resolveImportPath } from "../repository/paths";
import { err, from, ok, type Result } from "awaitly";
import {
  silentLogger,
  type Logger,
  type WdlCommand,
  type WdlDocument,
  type WdlImport,
  type WdlInput,
  type WdlOutput,
  type WdlTask,
  type WdlType,
  type WdlWorkflow,
} from "../types";
import type {
  CommandNode,
  DeclNode,
  DocumentNode,
  MetaValue,
  StructNode,
  TaskNode,
  WdlTypeNode,
  WorkflowNode,
} from "../wdl/ast";
import { formatExpressionOr, formatType } from "../wdl/format";
import { createDocumentResolver, resolveCallees } from "./callee-resolver";
import { extractDockerImages, type TaskLookup } from "./docker-images";
import type { DocumentLoader, LoadedDocument } from "./document-loader";

// =============================================================================
// Options
// =============================================================================

export interface DocumentMapperOptions {
  rootDir: string;
  externalDirs?: readonly string[];
  graph?: WorkflowGraphOptions;
  logger?: Logger;
}

export interface MappedDocument {
  document: WdlDocument;
  /** Import problems that did not prevent mapping */
  warnings: ParseError[];
}

interface ResolvedImports {
  imports: WdlImport[];
  byNamespace: Map<string, DocumentNode>;
  /** Namespaces of imports that could not be resolved or parsed */
  unreadable: Set<string>;
  structs: Map<string, StructNode>;
  warnings: ParseError[];
}

// =============================================================================
// Mapper
// =============================================================================

export class DocumentMapper {
  private readonly externalDirs: readonly string[];
  private readonly logger: Logger;

  constructor(
    private readonly loader: DocumentLoader,
    private readonly options: DocumentMapperOptions
  ) {
    this.externalDirs = options.externalDirs ?? DEFAULT_EXTERNAL_DIRS;
    this.logger = options.logger ?? silentLogger;
  }

  map(filePath: string): Result<MappedDocument, ParseError> {
    const loaded = this.loader.load(filePath);
    if (!loaded.ok) return err(loaded.error);

    const { ast, source } = loaded.value;
    const resolved = this.resolveImports(loaded.value);
    const structs = new Map(resolved.structs);
    for (const struct of ast.structs) structs.set(struct.name, struct);

    const document: WdlDocument = {
      filePath: loaded.value.filePath,
      relativePath: this.loader.relativePath(loaded.value.filePath),
      version: ast.version,
      tasks: ast.tasks.map((task) => mapTask(task, structs)),
      imports: resolved.imports,
      sourceCode: source,
      isExternal: isExternalPath(this.options.rootDir, loaded.value.filePath, this.externalDirs),
    };
    const { workflow } = ast;
    if (workflow) {
      const mapped = from(
        () => this.mapWorkflow(ast, workflow, resolved, structs),
        (cause) => toParseError(cause, document.filePath, document.relativePath)
      );
      if (!mapped.ok) {
        this.logger.debug(`Failed to map workflow in ${document.relativePath}: ${mapped.error.message}`);
        return err(mapped.error);
      }
      document.workflow = mapped.value;
    }

    this.logger.debug(
      `Mapped ${document.relativePath}: ${document.tasks.length} task(s)` +
        (document.workflow ? `, workflow ${document.workflow.name}` : "")
    );
    return ok({ document, warnings: resolved.warnings });
  }

  private resolveImports(loaded: LoadedDocument): ResolvedImports {
    const result: ResolvedImports = {
      imports: [],
      byNamespace: new Map(),
      unreadable: new Set(),
      structs: new Map(),
      warnings: [],
    };

    for (const node of loaded.ast.imports) {
      const resolvedPath = resolveImportPath(node.uri, loaded.filePath);
      if (!resolvedPath) {
        result.imports.push({ path: node.uri, namespace: node.namespace });
        result.unreadable.add(node.namespace);
        result.warnings.push(
          this.importWarning(loaded, `Import "${node.uri}" could not be resolved`, node.position)
        );
        continue;
      }

      const imported = this.loader.load(resolvedPath);
      if (!imported.ok) {
        // Files that fail to parse get no page, so no relative path to link
        result.imports.push({ path: node.uri, namespace: node.namespace, resolvedPath });
        result.unreadable.add(node.namespace);
        result.warnings.push(
          this.importWarning(
            loaded,
            `Import "${node.uri}" failed to parse: ${imported.error.message}`,
            node.position
          )
        );
        continue;
      }

      result.imports.push({
        path: node.uri,
        namespace: node.namespace,
        resolvedPath,
        resolvedRelativePath: this.loader.relativePath(resolvedPath),
      });
      result.byNamespace.set(node.namespace, imported.value.ast);
      for (const struct of imported.value.ast.structs) {
        const alias = node.aliases.find((a) => a.from === struct.name);
        result.structs.set(alias ? alias.to : struct.name, struct);
      }
    }

    return result;
  }

  private importWarning(
    loaded: LoadedDocument,
    message: string,
    position: { line: number; column: number }
  ): ParseError {
    this.logger.warn(`${this.loader.relativePath(loaded.filePath)}: ${message}`);
    return {
      filePath: loaded.filePath,
      relativePath: this.loader.relativePath(loaded.filePath),
      errorType: "ImportWarning",
      message,
      line: position.line,
      column: position.column,
      timestamp: new Date().toISOString(),
    };
  }

  private mapWorkflow(
    ast: DocumentNode,
    workflow: WorkflowNode,
    resolved: ResolvedImports,
    structs: ReadonlyMap<string, StructNode>
  ): WdlWorkflow {
    const body = resolveCallees(
      workflow.body,
      createDocumentResolver(ast, resolved.byNamespace, resolved.unreadable)
    );

    const lookupTask: TaskLookup = (call) => {
      const name = call.calleeId[call.calleeId.length - 1];
      const owner =
        call.calleeId.length > 1 ? resolved.byNamespace.get(call.calleeId[0]) : ast;
      return owner?.tasks.find((task) => task.name === name);
    };

    return {
      ...describeUnit(workflow.name, workflow.meta),
      inputs: workflow.inputs.map((d) => mapInput(d, workflow.parameterMeta, structs)),
      outputs: workflow.outputs.map((d) => mapOutput(d, workflow.parameterMeta, structs)),
      calls: collectCallRecords(body, { imports: resolved.imports }),
      dockerImages: extractDockerImages(body, lookupTask),
      mermaidGraph: buildWorkflowGraph(workflow.name, body, this.options.graph),
    };
  }
}

// =============================================================================
// Tasks
// =============================================================================

function mapTask(task: TaskNode, structs: ReadonlyMap<string, StructNode>): WdlTask {
  const runtime: Record<string, string> = {};
  for (const { key, expr } of task.runtime) {
    runtime[key] = formatExpressionOr(expr, "unknown");
  }

  return {
    ...describeUnit(task.name, task.meta),
    inputs: task.inputs.map((d) => mapInput(d, task.parameterMeta, structs)),
    outputs: task.outputs.map((d) => mapOutput(d, task.parameterMeta, structs)),
    ...(task.command ? { command: formatCommand(task.command) } : {}),
    runtime,
  };
}

/**
 * Strip blank first and last lines and the indentation common to every
 * non-blank line.
 */
export function formatCommand(command: CommandNode): WdlCommand {
  let lines = command.text.split("\n");
  if (lines.length > 0 && lines[0].trim() === "") lines = lines.slice(1);
  if (lines.length > 0 && lines[lines.length - 1].trim() === "") lines = lines.slice(0, -1);

  const indents = lines
    .filter((line) => line.trim() !== "")
    .map((line) => line.length - line.trimStart().length);
  const common = indents.length > 0 ? Math.min(...indents) : 0;

  return {
    raw: command.text,
    formatted: lines.map((line) => line.slice(Math.min(common, line.length))).join("\n"),
  };
}

// =============================================================================
// Shared Helpers
// =============================================================================

function metaText(value: MetaValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function describeUnit(
  name: string,
  meta: Record<string, MetaValue>
): Pick<WdlTask, "name" | "description" | "author" | "email" | "meta"> {
  const text: Record<string, string> = {};
  for (const [key, value] of Object.entries(meta)) text[key] = metaText(value);

  return {
    name,
    ...(text.description !== undefined ? { description: text.description } : {}),
    ...(text.author !== undefined ? { author: text.author } : {}),
    ...(text.email !== undefined ? { email: text.email } : {}),
    meta: text,
  };
}

/** `parameter_meta` entry: a plain string or `{ description: ... }`. */
function parameterDescription(
  parameterMeta: Record<string, MetaValue>,
  name: string
): string | undefined {
  const value = parameterMeta[name];
  if (typeof value === "string") return value;
  if (value && typeof value === "object" && !Array.isArray(value)) {
    const description = value.description;
    if (typeof description === "string") return description;
  }
  return undefined;
}

export function mapType(
  node: WdlTypeNode,
  structs: ReadonlyMap<string, StructNode>,
  seen: ReadonlySet<string> = new Set()
): WdlType {
  const struct = structs.get(node.name);
  const type: WdlType = {
    name: formatType({ ...node, optional: false }),
    optional: node.optional,
    isStruct: struct !== undefined && node.parameters.length === 0,
  };

  if (struct && type.isStruct && !seen.has(struct.name)) {
    const nested = new Set([...seen, struct.name]);
    type.structFields = {};
    for (const member of struct.members) {
      type.structFields[member.name] = mapType(member.type, structs, nested);
    }
  }
  return type;
}

function mapInput(
  decl: DeclNode,
  parameterMeta: Record<string, MetaValue>,
  structs: ReadonlyMap<string, StructNode>
): WdlInput {
  const description = parameterDescription(parameterMeta, decl.name);
  return {
    name: decl.name,
    type: mapType(decl.type, structs),
    ...(description !== undefined ? { description } : {}),
    ...(decl.expr ? { defaultValue: formatExpressionOr(decl.expr, "unknown") } : {}),
  };
}

function mapOutput(
  decl: DeclNode,
  parameterMeta: Record<string, MetaValue>,
  structs: ReadonlyMap<string, StructNode>
): WdlOutput {
  const description = parameterDescription(parameterMeta, decl.name);
  return {
    name: decl.name,
    type: mapType(decl.type, structs),
    ...(description !== undefined ? { description } : {}),
    ...(decl.expr ? { expression: formatExpressionOr(decl.expr, "unknown") } : {}),
  };
}

/**
 * Index Page
 *
 * Lists project and external documents by kind, totals, parse problems and how
 * often each workflow is used as a subworkflow.
 */

import { locationInfo, severityOf, shortMessage, type ParseError } from "../errors";
import { countWorkflowCallers } from "../graph/call-index";
import { toHtmlPath } from "../repository/paths";
import {
  documentDescription,
  documentName,
  documentTypeOf,
  type DocumentType,
  type WdlDocument,
} from "../types";
import { badge, escapeHtml, link, renderPage } from "./html";

export interface IndexSections {
  workflows: WdlDocument[];
  mixed: WdlDocument[];
  tasks: WdlDocument[];
}

export interface IndexContext {
  internal: IndexSections;
  external: IndexSections;
  totals: {
    workflows: number;
    tasks: number;
    files: number;
    external: number;
  };
  syntaxErrors: ParseError[];
  otherErrors: ParseError[];
  warnings: ParseError[];
  callerCounts: Map<string, number>;
}

function byName(a: WdlDocument, b: WdlDocument): number {
  const left = documentName(a).toLowerCase();
  const right = documentName(b).toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

function sections(documents: readonly WdlDocument[]): IndexSections {
  const ofType = (type: DocumentType): WdlDocument[] =>
    documents.filter((doc) => documentTypeOf(doc) === type).sort(byName);
  return { workflows: ofType("workflow"), mixed: ofType("mixed"), tasks: ofType("tasks") };
}

export function buildIndexContext(
  documents: readonly WdlDocument[],
  parseErrors: readonly ParseError[]
): IndexContext {
  const internalDocs = documents.filter((doc) => !doc.isExternal);
  const externalDocs = documents.filter((doc) => doc.isExternal);
  const internal = sections(internalDocs);

  return {
    internal,
    external: sections(externalDocs),
    totals: {
      workflows: internal.workflows.length + internal.mixed.length,
      tasks: internalDocs.reduce((sum, doc) => sum + doc.tasks.length, 0),
      files: internalDocs.length,
      external: externalDocs.length,
    },
    syntaxErrors: parseErrors.filter((e) => e.errorType === "SyntaxError"),
    otherErrors: parseErrors.filter(
      (e) => e.errorType !== "SyntaxError" && severityOf(e) === "error"
    ),
    warnings: parseErrors.filter((e) => severityOf(e) === "warning"),
    callerCounts: countWorkflowCallers(documents),
  };
}

// =============================================================================
// Rendering
// =============================================================================

function entry(doc: WdlDocument, callerCounts: ReadonlyMap<string, number>): string {
  const name = documentName(doc);
  const description = documentDescription(doc);
  const callers = doc.workflow ? callerCounts.get(doc.workflow.name) ?? 0 : 0;
  const badges = [
    badge(documentTypeOf(doc), documentTypeOf(doc) === "tasks" ? "task" : "workflow"),
    doc.tasks.length > 0 ? badge(`${doc.tasks.length} task${doc.tasks.length === 1 ? "" : "s"}`) : "",
    callers > 0 ? badge(`used by ${callers}`, "workflow") : "",
    doc.isExternal ? badge("external", "external") : "",
  ].filter((b) => b !== "");

  const search = [name, doc.relativePath, ...doc.tasks.map((t) => t.name)].join(" ").toLowerCase();
  return `<li class="card" data-search="${escapeHtml(search)}">
  ${link(toHtmlPath(doc.relativePath), name)} ${badges.join(" ")}
  <div class="path">${escapeHtml(doc.relativePath)}</div>
  ${description ? `<p>${escapeHtml(description)}</p>` : ""}
</li>`;
}

function list(title: string, docs: readonly WdlDocument[], callerCounts: ReadonlyMap<string, number>): string {
  if (docs.length === 0) return "";
  return `<section>
  <h2>${escapeHtml(title)} (${docs.length})</h2>
  <ul class="documents">
${docs.map((doc) => entry(doc, callerCounts)).join("\n")}
  </ul>
</section>`;
}

function problems(title: string, errors: readonly ParseError[], kind: "error" | "warning"): string {
  if (errors.length === 0) return "";
  const items = errors.map((error) => {
    const location = locationInfo(error);
    return `<li class="card ${kind}">
  <strong>${escapeHtml(error.relativePath)}</strong>${location ? ` (${escapeHtml(location)})` : ""}
  ${badge(error.errorType)}
  <div>${escapeHtml(shortMessage(error))}</div>
</li>`;
  });
  return `<section class="errors">
  <h2>${escapeHtml(title)} (${errors.length})</h2>
  <ul>
${items.join("\n")}
  </ul>
</section>`;
}

function stat(label: string, value: number): string {
  return `<div class="stat"><strong>${value}</strong>${escapeHtml(label)}</div>`;
}

export function renderIndexPage(context: IndexContext): string {
  const { internal, external, totals, callerCounts } = context;
  const body = `<h1>WDL Workflows</h1>
<div class="stats">
  ${stat("workflows", totals.workflows)}
  ${stat("tasks", totals.tasks)}
  ${stat("files", totals.files)}
  ${totals.external > 0 ? stat("external files", totals.external) : ""}
</div>
<input id="search" type="search" placeholder="Search workflows, tasks and files">
${list("Workflows", internal.workflows, callerCounts)}
${list("Workflows with Tasks", internal.mixed, callerCounts)}
${list("Task Libraries", internal.tasks, callerCounts)}
${list("External Workflows", external.workflows, callerCounts)}
${list("External Workflows with Tasks", external.mixed, callerCounts)}
${list("External Task Libraries", external.tasks, callerCounts)}
${problems("Syntax Errors", context.syntaxErrors, "error")}
${problems("Other Errors", context.otherErrors, "error")}
${problems("Warnings", context.warnings, "warning")}`;

  return renderPage({ title: "WDL Workflows", rootPath: "", body });
}

/**
 * Document Page
 *
 * One page per WDL file: its workflow (inputs, outputs, calls, images,
 * diagram and callers), its tasks, its imports and the source.
 */

import type { WorkflowCallInfo } from "../graph/call-index";
import { relativeLink, toGraphPagePath, toHtmlPath } from "../repository/paths";
import {
  dockerImageDisplay,
  documentDescription,
  documentName,
  documentTypeOf,
  type WdlDocument,
  type WdlInput,
  type WdlOutput,
  type WdlTask,
  type WdlType,
  type WdlWorkflow,
} from "../types";
import { badge, code, escapeHtml, link, mermaidBlock, renderPage, rootPathFor, table } from "./html";

export interface DocumentPageContext {
  doc: WdlDocument;
  /** Root-relative path of the page being rendered */
  pagePath: string;
  callInfo?: WorkflowCallInfo;
}

function typeText(type: WdlType): string {
  return `${type.name}${type.optional ? "?" : ""}`;
}

function typeCell(type: WdlType): string {
  if (!type.structFields) return code(typeText(type));
  const members = Object.entries(type.structFields)
    .map(([name, member]) => `<li>${code(name)}: ${code(typeText(member))}</li>`)
    .join("");
  return `${code(typeText(type))}<ul class="struct-fields">${members}</ul>`;
}

function inputsTable(inputs: readonly WdlInput[]): string {
  return table(
    ["Name", "Type", "Default", "Description"],
    inputs.map((input) => [
      code(input.name),
      typeCell(input.type),
      input.defaultValue !== undefined ? code(input.defaultValue) : "",
      escapeHtml(input.description ?? ""),
    ])
  );
}

function outputsTable(outputs: readonly WdlOutput[]): string {
  return table(
    ["Name", "Type", "Expression", "Description"],
    outputs.map((output) => [
      code(output.name),
      typeCell(output.type),
      output.expression !== undefined ? code(output.expression) : "",
      escapeHtml(output.description ?? ""),
    ])
  );
}

function heading(level: 2 | 3, text: string, count?: number): string {
  return `<h${level}>${escapeHtml(text)}${count !== undefined ? ` (${count})` : ""}</h${level}>`;
}

function callersPanel(info: WorkflowCallInfo, pagePath: string): string {
  const items = info.workflows
    .map(
      (caller) =>
        `<li>${link(relativeLink(caller.url, pagePath), caller.name)} <span class="path">${escapeHtml(caller.filePath)}</span></li>`
    )
    .join("\n");
  return `<div class="card callers">
  <strong>Used as a subworkflow by ${info.count} workflow${info.count === 1 ? "" : "s"}</strong>
  <ul>
${items}
  </ul>
</div>`;
}

function workflowSection(workflow: WdlWorkflow, doc: WdlDocument, pagePath: string): string {
  const calls = table(
    ["Call", "Runs", "Type", "Inputs"],
    workflow.calls.map((call) => [
      code(call.name),
      link(relativeLink(call.linkTarget, pagePath), call.calleeName),
      badge(call.callType, call.callType === "task" ? "task" : "workflow"),
      Object.entries(call.inputsMapping)
        .map(([name, value]) => `${code(name)} = ${code(value)}`)
        .join("<br>"),
    ])
  );

  const images = table(
    ["Image", "Calls"],
    workflow.dockerImages.map((image) => [
      code(dockerImageDisplay(image)),
      image.taskNames.map((name) => code(name)).join(", "),
    ])
  );

  const graphPage = relativeLink(toGraphPagePath(doc.relativePath), pagePath);
  const parts = [
    `<section id="workflow">`,
    heading(2, `Workflow: ${workflow.name}`),
    workflow.description ? `<p>${escapeHtml(workflow.description)}</p>` : "",
    workflow.author ? `<p>Author: ${escapeHtml(workflow.author)}</p>` : "",
    workflow.inputs.length > 0 ? heading(3, "Inputs", workflow.inputs.length) + inputsTable(workflow.inputs) : "",
    workflow.outputs.length > 0 ? heading(3, "Outputs", workflow.outputs.length) + outputsTable(workflow.outputs) : "",
    workflow.calls.length > 0 ? heading(3, "Calls", workflow.calls.length) + calls : "",
    workflow.dockerImages.length > 0 ? heading(3, "Container Images", workflow.dockerImages.length) + images : "",
    workflow.mermaidGraph
      ? `${heading(3, "Diagram")}\n<p>${link(graphPage, "Open full-page diagram")}</p>\n${mermaidBlock(workflow.mermaidGraph)}`
      : "",
    `</section>`,
  ];
  return parts.filter((part) => part !== "").join("\n");
}

function taskSection(task: WdlTask): string {
  const runtime = table(
    ["Key", "Value"],
    Object.entries(task.runtime).map(([key, value]) => [code(key), code(value)])
  );
  const parts = [
    `<section id="task-${escapeHtml(task.name)}" class="card">`,
    heading(3, `Task: ${task.name}`),
    task.description ? `<p>${escapeHtml(task.description)}</p>` : "",
    task.inputs.length > 0 ? `<h4>Inputs</h4>${inputsTable(task.inputs)}` : "",
    task.outputs.length > 0 ? `<h4>Outputs</h4>${outputsTable(task.outputs)}` : "",
    task.command ? `<h4>Command</h4>\n<pre>${escapeHtml(task.command.formatted)}</pre>` : "",
    runtime ? `<h4>Runtime</h4>${runtime}` : "",
    `</section>`,
  ];
  return parts.filter((part) => part !== "").join("\n");
}

function importsSection(doc: WdlDocument, pagePath: string): string {
  if (doc.imports.length === 0) return "";
  const rows = doc.imports.map((entry) => [
    entry.resolvedRelativePath
      ? link(relativeLink(toHtmlPath(entry.resolvedRelativePath), pagePath), entry.path)
      : code(entry.path),
    code(entry.namespace),
  ]);
  return `<section id="imports">
${heading(2, "Imports", doc.imports.length)}
${table(["Path", "Namespace"], rows)}
</section>`;
}

export function renderDocumentPage(context: DocumentPageContext): string {
  const { doc, pagePath, callInfo } = context;
  const name = documentName(doc);
  const description = documentDescription(doc);
  const type = documentTypeOf(doc);

  const body = [
    `<h1>${escapeHtml(name)}</h1>`,
    `<p>${badge(type, type === "tasks" ? "task" : "workflow")} ${badge(`WDL ${doc.version}`)}${doc.isExternal ? ` ${badge("external", "external")}` : ""}</p>`,
    `<div class="path">${escapeHtml(doc.relativePath)}</div>`,
    description && !doc.workflow ? `<p>${escapeHtml(description)}</p>` : "",
    callInfo ? callersPanel(callInfo, pagePath) : "",
    doc.workflow ? workflowSection(doc.workflow, doc, pagePath) : "",
    doc.tasks.length > 0
      ? `<section id="tasks">\n${heading(2, "Tasks", doc.tasks.length)}\n${doc.tasks.map(taskSection).join("\n")}\n</section>`
      : "",
    importsSection(doc, pagePath),
    `<section id="source">\n${heading(2, "Source")}\n<pre>${escapeHtml(doc.sourceCode)}</pre>\n</section>`,
  ].filter((part) => part !== "");

  return renderPage({
    title: name,
    rootPath: rootPathFor(pagePath),
    body: body.join("\n"),
    mermaid: Boolean(doc.workflow?.mermaidGraph),
  });
}

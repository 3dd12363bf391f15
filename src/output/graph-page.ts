/**
 * Full-page workflow diagram with share links.
 */

import { relativeLink, toHtmlPath } from "../repository/paths";
import type { WdlDocument, WdlWorkflow } from "../types";
import { escapeHtml, link, mermaidBlock, renderPage, rootPathFor } from "./html";
import { toMermaidInkUrl, toMermaidLiveUrl, type ShareUrlOptions } from "./share-url";

export interface GraphPageContext {
  doc: WdlDocument;
  workflow: WdlWorkflow;
  /** Root-relative path of the graph page */
  pagePath: string;
  share?: ShareUrlOptions;
}

export function renderGraphPage(context: GraphPageContext): string {
  const { doc, workflow, pagePath, share } = context;
  const backLink = relativeLink(toHtmlPath(doc.relativePath), pagePath);

  const body = `<h1>${escapeHtml(workflow.name)}</h1>
<p>${link(backLink, "Back to documentation")}</p>
<div class="share-links">
  ${link(toMermaidInkUrl(workflow.mermaidGraph, share), "Open as image")}
  ${link(toMermaidLiveUrl(workflow.mermaidGraph, share), "Edit in Mermaid Live")}
</div>
${mermaidBlock(workflow.mermaidGraph)}`;

  return renderPage({
    title: `${workflow.name} - Diagram`,
    rootPath: rootPathFor(pagePath),
    body,
    mermaid: true,
  });
}

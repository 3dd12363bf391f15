/**
 * HTML Building Blocks
 *
 * Pages are plain template literals. Every interpolated value that came from
 * a WDL file goes through `escapeHtml`.
 */

import { relativeLink } from "../repository/paths";

export const MERMAID_CDN_URL = "https://cdn.jsdelivr.net/npm/mermaid@11/dist/mermaid.min.js";

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export interface PageOptions {
  title: string;
  /** Prefix from the page back to the site root: `""`, `"../"`, ... */
  rootPath: string;
  body: string;
  /** Load Mermaid and render `.mermaid` blocks */
  mermaid?: boolean;
}

/**
 * Full HTML document with the shared stylesheet, script and navigation bar.
 */
export function renderPage(options: PageOptions): string {
  const { title, rootPath, body, mermaid = false } = options;
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="${rootPath}static/site.css">
${mermaid ? `  <script src="${MERMAID_CDN_URL}"></script>\n` : ""}  <script src="${rootPath}static/site.js" defer></script>
</head>
<body>
  <nav class="top-nav">
    <a href="${rootPath}index.html">Workflows</a>
    <a href="${rootPath}docker_images.html">Container Images</a>
  </nav>
  <main>
${body}
  </main>
</body>
</html>
`;
}

/** `"../"` per directory level of a root-relative page path. */
export function rootPathFor(pagePath: string): string {
  return relativeLink("", pagePath);
}

export function table(headers: readonly string[], rows: readonly string[][]): string {
  if (rows.length === 0) return "";
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
  const body = rows.map((cells) => `<tr>${cells.map((c) => `<td>${c}</td>`).join("")}</tr>`);
  return `<table>
  <thead><tr>${head}</tr></thead>
  <tbody>
    ${body.join("\n    ")}
  </tbody>
</table>`;
}

export function code(text: string): string {
  return `<code>${escapeHtml(text)}</code>`;
}

export function link(href: string, text: string): string {
  return `<a href="${escapeHtml(href)}">${escapeHtml(text)}</a>`;
}

/** Mermaid source inside a block the site script renders. */
export function mermaidBlock(diagram: string): string {
  return `<pre class="mermaid">\n${escapeHtml(diagram)}\n</pre>`;
}

export function badge(text: string, kind = ""): string {
  return `<span class="badge${kind ? ` ${kind}` : ""}">${escapeHtml(text)}</span>`;
}

/**
 * Site Writer
 *
 * Writes the documentation site for a set of mapped documents:
 *
 *   <out>/index.html
 *   <out>/docker_images.html
 *   <out>/<relative path>.html          one per document
 *   <out>/<relative stem>-graph.html    one per workflow with a diagram
 *   <out>/static/site.css, site.js
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { ParseError } from "../errors";
import { workflowCallInfo } from "../graph/call-index";
import { toGraphPagePath, toHtmlPath } from "../repository/paths";
import { silentLogger, type Logger, type WdlDocument } from "../types";
import { SITE_CSS, SITE_JS } from "./assets";
import { buildDockerInventory } from "./docker-inventory";
import { renderDockerPage } from "./docker-page";
import { renderDocumentPage } from "./document-page";
import { renderGraphPage } from "./graph-page";
import { buildIndexContext, renderIndexPage } from "./index-page";
import type { ShareUrlOptions } from "./share-url";

export interface SiteOptions {
  outputDir: string;
  share?: ShareUrlOptions;
  logger?: Logger;
}

export interface SiteSummary {
  /** Written pages, relative to the output directory */
  pages: string[];
  graphPages: number;
}

async function writePage(outputDir: string, pagePath: string, html: string): Promise<void> {
  const target = join(outputDir, ...pagePath.split("/"));
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, html, "utf-8");
}

export async function writeSite(
  documents: readonly WdlDocument[],
  parseErrors: readonly ParseError[],
  options: SiteOptions
): Promise<SiteSummary> {
  const logger = options.logger ?? silentLogger;
  const { outputDir } = options;
  const pages: string[] = [];
  let graphPages = 0;

  await writePage(outputDir, "static/site.css", SITE_CSS);
  await writePage(outputDir, "static/site.js", SITE_JS);

  for (const doc of documents) {
    const pagePath = toHtmlPath(doc.relativePath);
    const callInfo = doc.workflow ? workflowCallInfo(doc, documents) : undefined;
    await writePage(outputDir, pagePath, renderDocumentPage({ doc, pagePath, ...(callInfo ? { callInfo } : {}) }));
    pages.push(pagePath);
    logger.debug(`Generated ${pagePath}`);

    if (doc.workflow?.mermaidGraph) {
      const graphPath = toGraphPagePath(doc.relativePath);
      await writePage(
        outputDir,
        graphPath,
        renderGraphPage({
          doc,
          workflow: doc.workflow,
          pagePath: graphPath,
          ...(options.share ? { share: options.share } : {}),
        })
      );
      pages.push(graphPath);
      graphPages++;
      logger.debug(`Generated graph page ${graphPath}`);
    }
  }

  await writePage(outputDir, "index.html", renderIndexPage(buildIndexContext(documents, parseErrors)));
  pages.push("index.html");
  logger.info(`Generated index at ${join(outputDir, "index.html")}`);

  await writePage(outputDir, "docker_images.html", renderDockerPage(buildDockerInventory(documents)));
  pages.push("docker_images.html");
  logger.info(`Generated container image inventory at ${join(outputDir, "docker_images.html")}`);

  return { pages, graphPages };
}

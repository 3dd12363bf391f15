/**
 * Container image inventory page.
 */

import { badge, code, escapeHtml, link, renderPage, table } from "./html";
import type { DockerInventory, InventoryRepository, InventoryStats } from "./docker-inventory";

function repositorySection(repository: InventoryRepository): string {
  const rows = repository.images.map((image) => [
    `${code(image.tag !== undefined ? `${image.name}:${image.tag}` : image.name)}${
      image.isParameterized ? ` ${badge(`via ${image.parameterName ?? "parameter"}`)}` : ""
    }`,
    image.usages
      .map((usage) => `${link(usage.url, usage.taskName)} <span class="path">(${escapeHtml(usage.workflowName)})</span>`)
      .join("<br>"),
  ]);
  return `<div class="card" data-search="${escapeHtml(repository.name.toLowerCase())}">
  <h3>${escapeHtml(repository.name)}</h3>
  ${table(["Image", "Used by"], rows)}
</div>`;
}

function statsLine(stats: InventoryStats): string {
  return `<p>${stats.repositories} repositories, ${stats.images} images, ${stats.usages} usages</p>`;
}

export function renderDockerPage(inventory: DockerInventory): string {
  const external =
    inventory.external.length > 0
      ? `<section>
<h2>External Workflows</h2>
${statsLine(inventory.externalStats)}
${inventory.external.map(repositorySection).join("\n")}
</section>`
      : "";

  const body = `<h1>Container Images</h1>
<input id="search" type="search" placeholder="Filter repositories">
<section>
<h2>Project Workflows</h2>
${statsLine(inventory.internalStats)}
${inventory.internal.length > 0 ? inventory.internal.map(repositorySection).join("\n") : "<p>No container images found.</p>"}
</section>
${external}`;

  return renderPage({ title: "Container Images", rootPath: "", body });
}

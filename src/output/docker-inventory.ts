/**
 * Container Image Inventory
 *
 * Groups the images used by every workflow by registry repository, split into
 * project and external documents.
 */

import { toHtmlPath } from "../repository/paths";
import type { WdlDockerImage, WdlDocument } from "../types";

export const PARAMETERIZED_REPOSITORY = "Parameterized Images";
export const DOCKER_HUB_LIBRARY = "Docker Hub (library)";

export interface ImageUsage {
  /** Call name */
  taskName: string;
  workflowName: string;
  /** Page (and anchor) of the task definition */
  url: string;
  filePath: string;
  isExternal: boolean;
}

export interface InventoryImage {
  name: string;
  /** Undefined for parameterized images without a default */
  tag?: string;
  fullName: string;
  isParameterized: boolean;
  parameterName?: string;
  defaultValue?: string;
  usages: ImageUsage[];
}

export interface InventoryRepository {
  name: string;
  images: InventoryImage[];
}

export interface InventoryStats {
  repositories: number;
  images: number;
  usages: number;
}

export interface DockerInventory {
  internal: InventoryRepository[];
  external: InventoryRepository[];
  internalStats: InventoryStats;
  externalStats: InventoryStats;
}

export interface ImageLocation {
  repository: string;
  key: string;
  image: Omit<InventoryImage, "usages">;
}

/**
 * Repository, image name and tag of an image reference. Parameterized images
 * with a default are filed under the default; `quay.io/biocontainers/samtools:1.19`
 * lands in repository `quay.io/biocontainers` under key `samtools:1.19`.
 */
export function locateImage(docker: WdlDockerImage): ImageLocation {
  const parameter = docker.isParameterized
    ? {
        ...(docker.parameterName !== undefined ? { parameterName: docker.parameterName } : {}),
        ...(docker.defaultValue !== undefined ? { defaultValue: docker.defaultValue } : {}),
      }
    : {};

  if (docker.isParameterized && !docker.defaultValue) {
    const name = docker.parameterName ?? "unknown";
    return {
      repository: PARAMETERIZED_REPOSITORY,
      key: `${name}__parameterized`,
      image: { name, fullName: docker.image, isParameterized: true, ...parameter },
    };
  }

  const reference = docker.defaultValue ?? docker.image;
  const slash = reference.lastIndexOf("/");
  const repository = slash === -1 ? DOCKER_HUB_LIBRARY : reference.slice(0, slash);
  const imagePart = slash === -1 ? reference : reference.slice(slash + 1);
  const colon = imagePart.indexOf(":");
  const name = colon === -1 ? imagePart : imagePart.slice(0, colon);
  const tag = colon === -1 ? "latest" : imagePart.slice(colon + 1);
  const baseKey = `${name}:${tag}`;

  return {
    repository,
    key: docker.isParameterized ? `${baseKey}__parameterized` : baseKey,
    image: { name, tag, fullName: docker.image, isParameterized: docker.isParameterized, ...parameter },
  };
}

/** Page of the task a call runs: its own document first, then any document. */
function taskUrl(taskName: string, doc: WdlDocument, documents: readonly WdlDocument[]): string {
  const owner = [doc, ...documents].find((candidate) =>
    candidate.tasks.some((task) => task.name === taskName)
  );
  if (!owner) return toHtmlPath(doc.relativePath);
  return `${toHtmlPath(owner.relativePath)}#task-${taskName}`;
}

function sortRepositories(groups: Map<string, Map<string, InventoryImage>>): InventoryRepository[] {
  return [...groups.entries()]
    .map(([name, images]) => ({
      name,
      images: [...images.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
    }))
    .sort((a, b) => {
      const aLast = a.name === PARAMETERIZED_REPOSITORY;
      const bLast = b.name === PARAMETERIZED_REPOSITORY;
      if (aLast !== bLast) return aLast ? 1 : -1;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
}

function statsOf(repositories: readonly InventoryRepository[]): InventoryStats {
  let images = 0;
  let usages = 0;
  for (const repository of repositories) {
    images += repository.images.length;
    for (const image of repository.images) usages += image.usages.length;
  }
  return { repositories: repositories.length, images, usages };
}

export function buildDockerInventory(documents: readonly WdlDocument[]): DockerInventory {
  const internal = new Map<string, Map<string, InventoryImage>>();
  const external = new Map<string, Map<string, InventoryImage>>();

  for (const doc of documents) {
    const workflow = doc.workflow;
    if (!workflow) continue;
    const groups = doc.isExternal ? external : internal;

    for (const docker of workflow.dockerImages) {
      const location = locateImage(docker);
      let repository = groups.get(location.repository);
      if (!repository) {
        repository = new Map();
        groups.set(location.repository, repository);
      }
      let image = repository.get(location.key);
      if (!image) {
        image = { ...location.image, usages: [] };
        repository.set(location.key, image);
      }
      for (const taskName of docker.taskNames) {
        image.usages.push({
          taskName,
          workflowName: workflow.name,
          url: taskUrl(taskName, doc, documents),
          filePath: doc.relativePath,
          isExternal: doc.isExternal,
        });
      }
    }
  }

  const internalRepositories = sortRepositories(internal);
  const externalRepositories = sortRepositories(external);
  return {
    internal: internalRepositories,
    external: externalRepositories,
    internalStats: statsOf(internalRepositories),
    externalStats: statsOf(externalRepositories),
  };
}

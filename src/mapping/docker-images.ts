/**
 * Container Image Extraction
 *
 * Reads the container image each called task declares in its runtime
 * section and groups the calls by image.
 */

import { extractIdentifiers } from "../graph/expression-scanner";
import type { WdlDockerImage } from "../types";
import type { CallElement, TaskNode, WdlExpression, WorkflowElement } from "../wdl/ast";
import { formatExpression } from "../wdl/format";

/** Runtime keys that name the container image, in lookup order. */
export const DOCKER_RUNTIME_KEYS = ["docker", "container", "dockerImage"] as const;

export type TaskLookup = (call: CallElement) => TaskNode | undefined;

export interface TaskDockerInfo {
  image: string;
  isParameterized: boolean;
  parameterName?: string;
  defaultValue?: string;
  /** Grouping key: the image, the parameter default, or `parameterized:<param>` */
  imageKey: string;
}

function literalText(expr: WdlExpression): string | undefined {
  if (expr.kind !== "string") return undefined;
  if (expr.parts.some((p) => p.kind === "placeholder")) return undefined;
  return expr.parts.map((p) => (p.kind === "text" ? p.text : "")).join("");
}

function firstIdentifier(expr: WdlExpression): string | undefined {
  for (const name of extractIdentifiers(expr)) return name;
  return undefined;
}

/** Literal default of a task input or private declaration named `name`. */
function findDefaultValue(task: TaskNode, name: string): string | undefined {
  const decl = [...task.inputs, ...task.declarations].find((d) => d.name === name);
  if (!decl?.expr) return undefined;
  return literalText(decl.expr) ?? formatExpression(decl.expr).replace(/^["']|["']$/g, "");
}

/**
 * Container image declared by a task, or undefined when its runtime names none.
 *
 * @example
 * ```typescript
 * // runtime { docker: docker_image }  with  String docker_image = "ubuntu:22.04"
 * dockerFromTask(task); // { image: "docker_image", isParameterized: true, parameterName: "docker_image", defaultValue: "ubuntu:22.04", imageKey: "ubuntu:22.04" }
 * ```
 */
export function dockerFromTask(task: TaskNode): TaskDockerInfo | undefined {
  let entry: { key: string; expr: WdlExpression } | undefined;
  for (const key of DOCKER_RUNTIME_KEYS) {
    entry = task.runtime.find((r) => r.key === key);
    if (entry) break;
  }
  if (!entry) return undefined;

  const literal = literalText(entry.expr);
  if (literal !== undefined) {
    return { image: literal, isParameterized: false, imageKey: literal };
  }

  const parameterName = firstIdentifier(entry.expr);
  const defaultValue =
    entry.expr.kind === "ident" && parameterName
      ? findDefaultValue(task, parameterName)
      : undefined;
  const imageKey = defaultValue ?? `parameterized:${parameterName ?? "unknown"}`;

  return {
    image: formatExpression(entry.expr),
    isParameterized: true,
    ...(parameterName !== undefined ? { parameterName } : {}),
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    imageKey,
  };
}

/**
 * Images used by the calls of a workflow body at any depth, grouped by image
 * key in order of first use.
 */
export function extractDockerImages(
  body: readonly WorkflowElement[],
  lookupTask: TaskLookup
): WdlDockerImage[] {
  const images = new Map<string, WdlDockerImage>();

  const visit = (elements: readonly WorkflowElement[]): void => {
    for (const element of elements) {
      if (element.kind === "scatter" || element.kind === "conditional") {
        visit(element.body);
        continue;
      }
      if (element.kind !== "call" || element.callee?.kind !== "task") continue;

      const task = lookupTask(element);
      const info = task ? dockerFromTask(task) : undefined;
      if (!info) continue;

      const existing = images.get(info.imageKey);
      if (existing) {
        existing.taskNames.push(element.name);
        continue;
      }
      images.set(info.imageKey, {
        image: info.image,
        taskNames: [element.name],
        isParameterized: info.isParameterized,
        ...(info.parameterName !== undefined ? { parameterName: info.parameterName } : {}),
        ...(info.defaultValue !== undefined ? { defaultValue: info.defaultValue } : {}),
      });
    }
  };

  visit(body);
  return [...images.values()];
}

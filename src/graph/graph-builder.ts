/**
 * Workflow Graph Builder
 *
 * Builds a Mermaid flowchart for a workflow body: one node per call, a
 * subgraph for each scatter or conditional that contains calls, dependency
 * edges between calls, and edges from the start node and to the end node.
 */

import { WorkflowShapeError, describeKind } from "../errors";
import { getElementChildren, type WorkflowElement } from "../wdl/ast";
import { formatExpressionOr } from "../wdl/format";
import { collectCalls } from "./call-collector";
import { analyzeDependencies } from "./dependency-analyzer";
import { MermaidFlowchart, type FlowDirection } from "./diagram-emitter";
import type { CallRecord } from "../types";

// =============================================================================
// Options
// =============================================================================

export interface WorkflowGraphOptions {
  /** Diagram direction (default TD) */
  direction?: FlowDirection;
  /** Mermaid style for task call nodes */
  taskStyle?: string;
  /** Mermaid style for subworkflow call nodes */
  workflowStyle?: string;
}

const DEFAULT_OPTIONS: Required<WorkflowGraphOptions> = {
  direction: "TD",
  taskStyle: "fill:#a371f7,stroke:#8b5cf6,stroke-width:2px,color:#fff",
  workflowStyle: "fill:#58a6ff,stroke:#1f6feb,stroke-width:2px,color:#fff",
};

export const START_NODE = "Start";
export const END_NODE = "End([End])";
export const TASK_CLASS = "taskNode";
export const WORKFLOW_CLASS = "workflowNode";

// =============================================================================
// Render Context
// =============================================================================

interface RenderContext {
  chart: MermaidFlowchart;
  records: Map<string, CallRecord>;
  /** Call name → node id */
  nodeIds: Map<string, string>;
  /** Call names in emission order */
  order: string[];
  nodeCounter: number;
  scatterCounter: number;
  conditionalCounter: number;
}

// =============================================================================
// Main Builder
// =============================================================================

/**
 * Build the Mermaid flowchart for a workflow.
 *
 * The same body always yields the same text: node ids (`N1`, `S1`, `C1`)
 * follow source order.
 *
 * @example
 * ```typescript
 * const mermaid = buildWorkflowGraph(doc.workflow.name, doc.workflow.body);
 * ```
 */
export function buildWorkflowGraph(
  workflowName: string,
  body: readonly WorkflowElement[],
  options: WorkflowGraphOptions = {}
): string {
  const opts: Required<WorkflowGraphOptions> = { ...DEFAULT_OPTIONS, ...options };
  const collection = collectCalls(body);
  const dependencies = analyzeDependencies(collection);

  const records = new Map<string, CallRecord>();
  for (const { record } of collection.calls) {
    if (!records.has(record.name)) records.set(record.name, record);
  }

  const context: RenderContext = {
    chart: new MermaidFlowchart(opts.direction),
    records,
    nodeIds: new Map(),
    order: [],
    nodeCounter: 0,
    scatterCounter: 0,
    conditionalCounter: 0,
  };
  const { chart } = context;

  chart.node(START_NODE, workflowName, "stadium");
  const lastNodes = renderElements(body, context);

  if (context.order.length > 0) {
    addConnections(context, dependencies);
    addEndNode(context, dependencies, lastNodes);
  }

  chart.classDef(TASK_CLASS, opts.taskStyle);
  chart.classDef(WORKFLOW_CLASS, opts.workflowStyle);
  for (const name of context.order) {
    const id = context.nodeIds.get(name);
    const record = records.get(name);
    if (id && record) {
      chart.assignClass(id, record.callType === "workflow" ? WORKFLOW_CLASS : TASK_CLASS);
    }
  }

  return chart.toString();
}

// =============================================================================
// Elements
// =============================================================================

/**
 * Emit nodes and scopes for `elements`. Returns the node ids produced by the
 * last element that produced any.
 */
function renderElements(elements: readonly WorkflowElement[], context: RenderContext): string[] {
  let lastNodes: string[] = [];

  for (const element of elements) {
    switch (element.kind) {
      case "call": {
        const id = renderCall(element.name, context);
        if (id) lastNodes = [id];
        break;
      }
      case "decl":
        break;
      case "scatter":
      case "conditional": {
        if (!containsCalls(element)) {
          const inner = renderElements(element.body, context);
          if (inner.length > 0) lastNodes = inner;
          break;
        }
        const { id, label } = describeScope(element, context);
        context.chart.beginScope(id, label);
        const inner = renderElements(element.body, context);
        context.chart.endScope();
        if (inner.length > 0) lastNodes = inner;
        break;
      }
      default: {
        const unknown: never = element;
        throw new WorkflowShapeError(
          `Unsupported workflow element '${describeKind(unknown)}'`,
          describeKind(unknown)
        );
      }
    }
  }

  return lastNodes;
}

function renderCall(name: string, context: RenderContext): string | undefined {
  const existing = context.nodeIds.get(name);
  if (existing) return existing;

  const record = context.records.get(name);
  if (!record) return undefined;

  const id = `N${++context.nodeCounter}`;
  context.nodeIds.set(name, id);
  context.order.push(name);

  const label = record.alias ? `${record.name}<br/><i>${record.calleeName}</i>` : record.name;
  context.chart.node(id, label, record.callType === "workflow" ? "subroutine" : "process");
  return id;
}

/** True when a valid call appears anywhere inside `element`. */
export function containsCalls(element: WorkflowElement): boolean {
  if (element.kind === "call") return Boolean(element.callee?.name);
  return getElementChildren(element).some(containsCalls);
}

function describeScope(
  element: Extract<WorkflowElement, { kind: "scatter" | "conditional" }>,
  context: RenderContext
): { id: string; label: string } {
  if (element.kind === "scatter") {
    const collection = formatExpressionOr(element.expr, "items");
    return {
      id: `S${++context.scatterCounter}`,
      label: `scatter ${element.variable} in ${collection}`.replace(/"/g, "'"),
    };
  }
  const condition = formatExpressionOr(element.expr, "condition");
  return {
    id: `C${++context.conditionalCounter}`,
    label: `if ${condition}`.replace(/"/g, "'"),
  };
}

// =============================================================================
// Connections
// =============================================================================

function addConnections(
  context: RenderContext,
  dependencies: Map<string, Set<string>>
): void {
  const fromStart: string[] = [];

  for (const name of context.order) {
    const id = context.nodeIds.get(name);
    if (!id) continue;

    const sources: string[] = [];
    for (const dependency of dependencies.get(name) ?? []) {
      const source = context.nodeIds.get(dependency);
      if (source) sources.push(source);
    }

    if (sources.length === 0) {
      fromStart.push(id);
    } else {
      for (const source of sources) context.chart.edge(source, id);
    }
  }

  for (const id of fromStart) context.chart.edge(START_NODE, id);
}

/**
 * Calls that nothing depends on lead to the end node. When every call is
 * depended upon (a cycle), the last nodes of the walk are used instead.
 */
function addEndNode(
  context: RenderContext,
  dependencies: Map<string, Set<string>>,
  lastNodes: string[]
): void {
  const dependedUpon = new Set<string>();
  for (const deps of dependencies.values()) {
    for (const dependency of deps) dependedUpon.add(dependency);
  }

  const leaves: string[] = [];
  for (const name of context.order) {
    const id = context.nodeIds.get(name);
    if (id && !dependedUpon.has(name)) leaves.push(id);
  }

  for (const id of leaves.length > 0 ? leaves : lastNodes) {
    context.chart.edge(id, END_NODE);
  }
}

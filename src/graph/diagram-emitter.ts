/**
 * Mermaid Flowchart Emitter
 *
 * Collects nodes, nested scopes (subgraphs), edges and class assignments,
 * then writes them as Mermaid flowchart text. Edges are always written after
 * every node and scope, at the top level.
 */

export type FlowDirection = "TD" | "TB" | "LR" | "BT" | "RL";

/**
 * - `process`: rectangle `["label"]`
 * - `subroutine`: double-bordered rectangle `[["label"]]`
 * - `stadium`: rounded terminal `([label])`
 */
export type NodeShape = "process" | "subroutine" | "stadium";

const INDENT = "    ";

/** Mermaid entity for double quotes inside a quoted label. */
export function escapeLabel(label: string): string {
  return label.replace(/"/g, "#quot;");
}

function shapeFor(label: string, shape: NodeShape): string {
  switch (shape) {
    case "process":
      return `["${escapeLabel(label)}"]`;
    case "subroutine":
      return `[["${escapeLabel(label)}"]]`;
    case "stadium":
      return `([${label}])`;
  }
}

export class MermaidFlowchart {
  private readonly body: string[] = [];
  private readonly edges: string[] = [];
  private readonly classDefs: string[] = [];
  private readonly classMembers = new Map<string, string[]>();
  private depth = 0;

  constructor(private readonly direction: FlowDirection = "TD") {}

  private indent(): string {
    return INDENT.repeat(this.depth + 1);
  }

  node(id: string, label: string, shape: NodeShape): this {
    this.body.push(`${this.indent()}${id}${shapeFor(label, shape)}`);
    return this;
  }

  beginScope(id: string, label: string): this {
    this.body.push(`${this.indent()}subgraph ${id} ["${escapeLabel(label)}"]`);
    this.depth++;
    this.body.push(`${this.indent()}direction TB`);
    return this;
  }

  endScope(): this {
    if (this.depth === 0) {
      throw new Error("endScope() called without an open scope");
    }
    this.depth--;
    this.body.push(`${this.indent()}end`);
    return this;
  }

  /** `to` may carry a shape, e.g. `End([End])`. */
  edge(from: string, to: string): this {
    this.edges.push(`${INDENT}${from} --> ${to}`);
    return this;
  }

  classDef(name: string, style: string): this {
    this.classDefs.push(`${INDENT}classDef ${name} ${style}`);
    return this;
  }

  assignClass(id: string, className: string): this {
    const members = this.classMembers.get(className) ?? [];
    members.push(id);
    this.classMembers.set(className, members);
    return this;
  }

  toString(): string {
    if (this.depth !== 0) {
      throw new Error(`${this.depth} scope(s) left open`);
    }
    const lines = [`flowchart ${this.direction}`, ...this.body, ...this.edges, ...this.classDefs];
    for (const [className, ids] of this.classMembers) {
      lines.push(`${INDENT}class ${ids.join(",")} ${className}`);
    }
    return lines.join("\n");
  }
}

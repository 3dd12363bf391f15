import { describe, it, expect } from "vitest";
import { MermaidFlowchart, escapeLabel } from "./diagram-emitter";

describe("MermaidFlowchart", () => {
  it("should write nodes, then edges, then classes", () => {
    const chart = new MermaidFlowchart("LR")
      .node("A", "first", "process")
      .edge("A", "B")
      .node("B", "second", "subroutine")
      .classDef("done", "fill:#0f0")
      .assignClass("A", "done")
      .assignClass("B", "done");

    expect(chart.toString()).toBe(
      [
        "flowchart LR",
        '    A["first"]',
        '    B[["second"]]',
        "    A --> B",
        "    classDef done fill:#0f0",
        "    class A,B done",
      ].join("\n")
    );
  });

  it("should indent scope contents and keep edges at the top level", () => {
    const chart = new MermaidFlowchart()
      .beginScope("S1", "outer")
      .beginScope("S2", "inner")
      .node("N1", "work", "process")
      .edge("Start", "N1")
      .endScope()
      .endScope();

    expect(chart.toString().split("\n")).toEqual([
      "flowchart TD",
      '    subgraph S1 ["outer"]',
      "        direction TB",
      '        subgraph S2 ["inner"]',
      "            direction TB",
      '            N1["work"]',
      "        end",
      "    end",
      "    Start --> N1",
    ]);
  });

  it("should write stadium nodes without quotes", () => {
    expect(new MermaidFlowchart().node("Start", "main", "stadium").toString()).toBe(
      "flowchart TD\n    Start([main])"
    );
  });

  it("should reject unbalanced scopes", () => {
    expect(() => new MermaidFlowchart().endScope()).toThrow("without an open scope");
    expect(() => new MermaidFlowchart().beginScope("S1", "x").toString()).toThrow("left open");
  });
});

describe("escapeLabel", () => {
  it("should replace double quotes with the Mermaid entity", () => {
    expect(escapeLabel('say "hi"')).toBe("say #quot;hi#quot;");
  });
});

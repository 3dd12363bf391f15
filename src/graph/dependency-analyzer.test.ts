import { describe, it, expect } from "vitest";
import { parseWorkflow, wdl } from "../test-utils";
import { collectCalls } from "./call-collector";
import { analyzeDependencies, resolveVariables } from "./dependency-analyzer";

function dependenciesOf(body: string): Record<string, string[]> {
  const wf = parseWorkflow(wdl(body));
  const result: Record<string, string[]> = {};
  for (const [name, deps] of analyzeDependencies(collectCalls(wf.body))) {
    result[name] = [...deps];
  }
  return result;
}

describe("analyzeDependencies", () => {
  it("should find direct references to call outputs", () => {
    expect(
      dependenciesOf(`
        call align
        call sort { input: bam = align.bam }
      `)
    ).toEqual({ align: [], sort: ["align"] });
  });

  it("should drop workflow inputs and literals", () => {
    expect(
      dependenciesOf(`
        input { File reads }
        call align { input: reads = reads, threads = 4 }
      `)
    ).toEqual({ align: [] });
  });

  it("should follow declarations transitively", () => {
    expect(
      dependenciesOf(`
        call first
        String base = first.name
        String prefix = "~{base}.sorted"
        call second { input: p = prefix }
      `)
    ).toEqual({ first: [], second: ["first"] });
  });

  it("should resolve declarations declared after their use", () => {
    expect(
      dependenciesOf(`
        call second { input: p = prefix }
        String prefix = first.name
        call first
      `)
    ).toEqual({ second: ["first"], first: [] });
  });

  it("should make scope expressions dependencies of the calls inside", () => {
    expect(
      dependenciesOf(`
        call split
        scatter (chunk in split.chunks) {
          call count { input: c = chunk }
        }
      `)
    ).toEqual({ split: [], count: ["split"] });
  });

  it("should resolve declarations used by scope expressions", () => {
    expect(
      dependenciesOf(`
        call qc
        Boolean passed = qc.ok && true
        if (passed) { call report }
      `)
    ).toEqual({ qc: [], report: ["qc"] });
  });

  it("should count after clauses", () => {
    expect(
      dependenciesOf(`
        call setup
        call run after setup
      `)
    ).toEqual({ setup: [], run: ["setup"] });
  });

  it("should never make a call depend on itself", () => {
    expect(
      dependenciesOf(`
        scatter (x in step.items) { call step }
      `)
    ).toEqual({ step: [] });
  });
});

describe("resolveVariables", () => {
  it("should terminate on cyclic declarations", () => {
    const variables = new Map([
      ["x", new Set(["y", "first"])],
      ["y", new Set(["x", "second"])],
    ]);

    const resolved = resolveVariables(variables, new Set(["first", "second"]));

    expect([...(resolved.get("x") ?? [])]).toEqual(["second", "first"]);
    expect([...(resolved.get("y") ?? [])]).toEqual(["second"]);
  });
});

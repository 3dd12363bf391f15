import { describe, it, expect } from "vitest";
import type { CallType } from "../types";
import {
  callersOf,
  countWorkflowCallers,
  workflowCallInfo,
  type IndexedDocument,
} from "./call-index";

function doc(
  relativePath: string,
  workflow?: string,
  calls: Array<[string, CallType]> = []
): IndexedDocument {
  if (!workflow) return { relativePath };
  return {
    relativePath,
    workflow: {
      name: workflow,
      calls: calls.map(([calleeName, callType]) => ({ calleeName, callType })),
    },
  };
}

describe("call index", () => {
  const a = doc("workflows/a.wdl", "A");
  const b = doc("workflows/b.wdl", "B", [
    ["A", "workflow"],
    ["A", "workflow"],
  ]);
  const c = doc("pipelines/c.wdl", "C", [["A", "workflow"]]);
  const d = doc("pipelines/d.wdl", "D", [["A", "task"]]);
  const tasks = doc("tasks/common.wdl");
  const documents = [a, b, c, d, tasks];

  describe("countWorkflowCallers", () => {
    it("should count each calling document once and ignore task-typed calls", () => {
      const counts = countWorkflowCallers(documents);

      expect(counts.get("A")).toBe(2);
      expect(counts.has("B")).toBe(false);
    });

    it("should ignore calls to workflows no document defines", () => {
      const counts = countWorkflowCallers([doc("x.wdl", "X", [["Missing", "workflow"]])]);

      expect(counts.size).toBe(0);
    });

    it("should not count a workflow calling itself", () => {
      const counts = countWorkflowCallers([doc("loop.wdl", "Loop", [["Loop", "workflow"]])]);

      expect(counts.has("Loop")).toBe(false);
    });

    it("should count a caller whose workflow shares the called workflow's name", () => {
      const inner = doc("qc/main.wdl", "main");
      const wrapper = doc("wrapper/main.wdl", "main", [["main", "workflow"]]);

      expect(countWorkflowCallers([inner, wrapper]).get("main")).toBe(1);
      expect(callersOf(inner, [inner, wrapper])).toHaveLength(1);
    });
  });

  describe("callersOf", () => {
    it("should list each calling document once, in document order", () => {
      expect(callersOf(a, documents)).toEqual([
        { name: "B", filePath: "workflows/b.wdl", url: "workflows/b.html" },
        { name: "C", filePath: "pipelines/c.wdl", url: "pipelines/c.html" },
      ]);
    });

    it("should exclude the target document itself", () => {
      const self = doc("loop.wdl", "Loop", [["Loop", "workflow"]]);

      expect(callersOf(self, [self])).toEqual([]);
    });

    it("should return nothing for a document without a workflow", () => {
      expect(callersOf(tasks, documents)).toEqual([]);
    });
  });

  describe("workflowCallInfo", () => {
    it("should summarize callers", () => {
      expect(workflowCallInfo(a, documents)?.count).toBe(2);
    });

    it("should be undefined when nobody calls the workflow", () => {
      expect(workflowCallInfo(b, documents)).toBeUndefined();
    });
  });
});

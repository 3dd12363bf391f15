import { describe, it, expect } from "vitest";
import { parseWorkflow } from "../test-utils";
import type { TaskNode } from "../wdl/ast";
import { parseWdl } from "../wdl/parser";
import { dockerFromTask, extractDockerImages, type TaskLookup } from "./docker-images";

const TASKS = `
task plain {
  command <<< echo hi >>>
  runtime { docker: "ubuntu:22.04" }
}

task with_default {
  input {
    String docker_image = "biocontainers/samtools:1.19"
  }
  command <<< samtools --version >>>
  runtime { docker: docker_image }
}

task interpolated {
  input {
    String tool
  }
  command <<< ~{tool} >>>
  runtime { container: "repo/~{tool}:1.0" }
}

task no_runtime {
  command <<< true >>>
}
`;

function task(name: string): TaskNode {
  const found = parseWdl(`version 1.0\n${TASKS}`).tasks.find((t) => t.name === name);
  if (!found) throw new Error(`missing task ${name}`);
  return found;
}

describe("dockerFromTask", () => {
  it("should read a literal image", () => {
    expect(dockerFromTask(task("plain"))).toEqual({
      image: "ubuntu:22.04",
      isParameterized: false,
      imageKey: "ubuntu:22.04",
    });
  });

  it("should follow a parameter to its default", () => {
    expect(dockerFromTask(task("with_default"))).toEqual({
      image: "docker_image",
      isParameterized: true,
      parameterName: "docker_image",
      defaultValue: "biocontainers/samtools:1.19",
      imageKey: "biocontainers/samtools:1.19",
    });
  });

  it("should treat interpolated strings as parameterized", () => {
    expect(dockerFromTask(task("interpolated"))).toEqual({
      image: '"repo/~{tool}:1.0"',
      isParameterized: true,
      parameterName: "tool",
      imageKey: "parameterized:tool",
    });
  });

  it("should return undefined without a container key", () => {
    expect(dockerFromTask(task("no_runtime"))).toBeUndefined();
  });
});

describe("extractDockerImages", () => {
  const source = `version 1.0
${TASKS}
workflow main {
  call plain as first
  call plain as second
  scatter (t in ["a", "b"]) {
    call interpolated { input: tool = t }
  }
  call no_runtime
}
`;
  const doc = parseWdl(source);
  const lookupTask: TaskLookup = (call) =>
    doc.tasks.find((t) => t.name === call.calleeId[call.calleeId.length - 1]);

  it("should group calls by image in order of first use", () => {
    const workflow = parseWorkflow(source);

    expect(extractDockerImages(workflow.body, lookupTask)).toEqual([
      { image: "ubuntu:22.04", taskNames: ["first", "second"], isParameterized: false },
      {
        image: '"repo/~{tool}:1.0"',
        taskNames: ["interpolated"],
        isParameterized: true,
        parameterName: "tool",
      },
    ]);
  });

  it("should skip calls whose callee is not a task", () => {
    const workflow = parseWorkflow(source, { workflows: ["plain"], unresolved: ["interpolated"] });

    expect(extractDockerImages(workflow.body, lookupTask)).toEqual([]);
  });
});

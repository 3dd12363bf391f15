import { afterEach, describe, expect, it } from "vitest";
import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { generateDocumentation, generateWorkflowGraph, workflowGraphMarkdown } from "./generate";
import { createTempTree, removeTempTree } from "./test-utils";

const MAIN = `version 1.0
import "../external/lib/tasks.wdl" as lib

workflow main {
  call lib.index
}
`;

const PREP_TASK = `task prep {
  command <<< true >>>
}
`;

const LOCAL = `version 1.0\n${PREP_TASK}`;

const EXTERNAL_TASKS = `version 1.0
import "common.wdl"

task index {
  command <<< samtools index >>>
  runtime {
    docker: "ubuntu:22.04"
  }
}
`;

const EXTERNAL_COMMON = `version 1.0
task shared {
  command <<< true >>>
}
`;

describe("generateDocumentation", () => {
  let root = "";

  afterEach(() => {
    removeTempTree(root);
  });

  it("should document project files and the external files they import", async () => {
    root = createTempTree({
      "workflows/main.wdl": MAIN,
      "workflows/broken.wdl": "version 1.0\nworkflow {",
      "tasks/local.wdl": LOCAL,
      "external/lib/tasks.wdl": EXTERNAL_TASKS,
      "external/lib/common.wdl": EXTERNAL_COMMON,
      "external/unused.wdl": EXTERNAL_COMMON,
    });
    const outputDir = join(root, "site");

    const result = await generateDocumentation({ rootDir: root, outputDir });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      outputDir,
      filesFound: 3,
      documents: 4,
      externalDocuments: 2,
      workflows: 1,
      tasks: 3,
      graphPages: 1,
    });
    expect(result.value.parseErrors.map((e) => [e.relativePath, e.errorType])).toEqual([
      ["workflows/broken.wdl", "SyntaxError"],
    ]);

    for (const page of [
      "index.html",
      "docker_images.html",
      "static/site.css",
      "static/site.js",
      "workflows/main.html",
      "workflows/main-graph.html",
      "tasks/local.html",
      "external/lib/tasks.html",
      "external/lib/common.html",
    ]) {
      expect(existsSync(join(outputDir, page)), page).toBe(true);
    }
    expect(existsSync(join(outputDir, "external/unused.html"))).toBe(false);
    expect(existsSync(join(outputDir, "workflows/broken.html"))).toBe(false);
    expect(readFileSync(join(outputDir, "docker_images.html"), "utf-8")).toContain(
      "<h3>Docker Hub (library)</h3>"
    );
  });

  it("should fail when no WDL files are found", async () => {
    root = createTempTree({ "README.md": "# nothing here" });

    const result = await generateDocumentation({ rootDir: root, outputDir: join(root, "site") });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("NO_FILES");
  });

  it("should fail when no file parses", async () => {
    root = createTempTree({ "broken.wdl": "workflow {" });

    const result = await generateDocumentation({ rootDir: root, outputDir: join(root, "site") });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("NO_DOCUMENTS");
      expect(result.error.parseErrors).toHaveLength(1);
    }
    expect(existsSync(join(root, "site"))).toBe(false);
  });
});

describe("generateWorkflowGraph", () => {
  let root = "";

  afterEach(() => {
    removeTempTree(root);
  });

  it("should write the diagram as Markdown, creating directories", () => {
    root = createTempTree({ "wf/main.wdl": `version 1.0\nworkflow main {\n  call prep\n}\n${PREP_TASK}` });
    const output = join(root, "out", "nested", "main.md");

    const result = generateWorkflowGraph(join(root, "wf", "main.wdl"), output);

    expect(result).toEqual({ ok: true, value: output });
    expect(readFileSync(output, "utf-8")).toBe(
      [
        "# Workflow: main",
        "",
        "```mermaid",
        "flowchart TD",
        "    Start([main])",
        '    N1["prep"]',
        "    Start --> N1",
        "    N1 --> End([End])",
        "    classDef taskNode fill:#a371f7,stroke:#8b5cf6,stroke-width:2px,color:#fff",
        "    classDef workflowNode fill:#58a6ff,stroke:#1f6feb,stroke-width:2px,color:#fff",
        "    class N1 taskNode",
        "```",
        "",
      ].join("\n")
    );
  });

  it.each([
    ["notes.txt", "NOT_WDL"],
    ["missing.wdl", "NOT_FOUND"],
    ["broken.wdl", "PARSE_FAILED"],
    ["tasks.wdl", "NO_WORKFLOW"],
  ])("should reject %s with %s", (file, code) => {
    root = createTempTree({
      "notes.txt": "not wdl",
      "broken.wdl": "workflow {",
      "tasks.wdl": LOCAL,
    });

    const result = generateWorkflowGraph(join(root, file), join(root, "out.md"));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(code);
    expect(existsSync(join(root, "out.md"))).toBe(false);
  });
});

describe("workflowGraphMarkdown", () => {
  it("should wrap the diagram in a mermaid fence under a heading", () => {
    expect(workflowGraphMarkdown("qc", "flowchart TD")).toBe("# Workflow: qc\n\n```mermaid\nflowchart TD\n```\n");
  });
});

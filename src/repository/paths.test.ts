import { afterEach, describe, expect, it } from "vitest";
import { join } from "path";
import { createTempTree, removeTempTree } from "../test-utils";
import {
  isExternalPath,
  normalizeRelativePath,
  relativeLink,
  relativeTo,
  resolveImportPath,
  toGraphPagePath,
  toHtmlPath,
} from "./paths";

describe("normalizeRelativePath", () => {
  it("should resolve dot segments", () => {
    expect(normalizeRelativePath("workflows/./v1/../main.wdl")).toBe("workflows/main.wdl");
  });

  it("should cut paths at the external directory", () => {
    expect(normalizeRelativePath("workflows/v1/../../external/lib.wdl")).toBe("external/lib.wdl");
    expect(normalizeRelativePath("../../vendor/tools/x.wdl", ["vendor"])).toBe("vendor/tools/x.wdl");
  });
});

describe("relativeTo", () => {
  it("should return the root-relative path with forward slashes", () => {
    expect(relativeTo("/repo", "/repo/workflows/qc/main.wdl")).toBe("workflows/qc/main.wdl");
  });

  it("should keep files above the root from their external directory", () => {
    expect(relativeTo("/repo/pipelines", "/repo/external/lib/tasks.wdl")).toBe(
      "external/lib/tasks.wdl"
    );
  });

  it("should keep the last two segments of other files outside the root", () => {
    expect(relativeTo("/repo/pipelines", "/shared/common/tasks.wdl")).toBe("common/tasks.wdl");
  });
});

describe("isExternalPath", () => {
  it("should flag files under an external directory or outside the root", () => {
    expect(isExternalPath("/repo", "/repo/external/lib.wdl")).toBe(true);
    expect(isExternalPath("/repo", "/elsewhere/lib.wdl")).toBe(true);
    expect(isExternalPath("/repo", "/repo/workflows/main.wdl")).toBe(false);
  });

  it("should match whole directory names only", () => {
    expect(isExternalPath("/repo", "/repo/my_external/lib.wdl")).toBe(false);
  });
});

describe("resolveImportPath", () => {
  let root = "";

  afterEach(() => {
    removeTempTree(root);
  });

  it("should resolve existing files relative to the importer", () => {
    root = createTempTree({
      "workflows/main.wdl": "version 1.0",
      "tasks/common.wdl": "version 1.0",
    });
    const importer = join(root, "workflows", "main.wdl");

    expect(resolveImportPath("../tasks/common.wdl", importer)).toBe(join(root, "tasks", "common.wdl"));
    expect(resolveImportPath("../tasks/missing.wdl", importer)).toBeUndefined();
    expect(resolveImportPath("https://example.com/lib.wdl", importer)).toBeUndefined();
  });
});

describe("page paths", () => {
  it("should map documents to their pages", () => {
    expect(toHtmlPath("lib/tasks.wdl")).toBe("lib/tasks.html");
    expect(toGraphPagePath("lib/main.wdl")).toBe("lib/main-graph.html");
  });

  it("should link relative to the current page depth", () => {
    expect(relativeLink("index.html", "workflows/qc/main.html")).toBe("../../index.html");
    expect(relativeLink("lib/tasks.html", "main.html")).toBe("lib/tasks.html");
    expect(relativeLink("#task-align", "workflows/main.html")).toBe("#task-align");
    expect(relativeLink("https://mermaid.live/edit", "a/b.html")).toBe("https://mermaid.live/edit");
  });
});

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { relative } from "path";
import { createTempTree, removeTempTree } from "../test-utils";
import { findInternalWdlFiles } from "./discovery";

describe("findInternalWdlFiles", () => {
  let root = "";

  beforeEach(() => {
    root = createTempTree({
      "main.wdl": "version 1.0",
      "workflows/qc.wdl": "version 1.0",
      "workflows/align.wdl": "version 1.0",
      "workflows/README.md": "# docs",
      "external/lib/tasks.wdl": "version 1.0",
      "my_external/kept.wdl": "version 1.0",
      "cached-data/old.wdl": "version 1.0",
      ".git/hooks/x.wdl": "version 1.0",
    });
  });

  afterEach(() => {
    removeTempTree(root);
  });

  const found = (options?: Parameters<typeof findInternalWdlFiles>[1]): string[] =>
    findInternalWdlFiles(root, options).map((file) => relative(root, file).split("\\").join("/"));

  it("should list project files sorted, skipping external and excluded directories", () => {
    expect(found()).toEqual(["main.wdl", "my_external/kept.wdl", "workflows/align.wdl", "workflows/qc.wdl"]);
  });

  it("should honour custom exclude patterns and external directories", () => {
    expect(found({ exclude: ["workflows/"], externalDirs: ["my_external"] })).toEqual([
      ".git/hooks/x.wdl",
      "cached-data/old.wdl",
      "external/lib/tasks.wdl",
      "main.wdl",
    ]);
  });

  it("should return nothing for a missing root", () => {
    expect(findInternalWdlFiles(`${root}/missing`)).toEqual([]);
  });
});

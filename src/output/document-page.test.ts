import { describe, it, expect } from "vitest";
import { makeCall, makeDocument, makeTask, makeWorkflow } from "../test-utils";
import { renderDocumentPage } from "./document-page";
import { renderGraphPage } from "./graph-page";

const doc = makeDocument("workflows/qc/main.wdl", {
  imports: [
    {
      path: "../../lib/tasks.wdl",
      namespace: "lib",
      resolvedPath: "/repo/lib/tasks.wdl",
      resolvedRelativePath: "lib/tasks.wdl",
    },
  ],
  tasks: [
    makeTask("report", {
      command: { raw: "echo <done>", formatted: "echo <done>" },
      runtime: { docker: '"ubuntu:22.04"' },
    }),
  ],
  workflow: makeWorkflow("qc", {
    description: "Quality <checks>",
    calls: [
      makeCall("align", { callType: "task", linkTarget: "lib/tasks.html", inputsMapping: { bam: "x.bam" } }),
      makeCall("report", { callType: "task", isLocal: true, linkTarget: "#task-report" }),
    ],
    dockerImages: [{ image: "ubuntu:22.04", taskNames: ["report"], isParameterized: false }],
  }),
});

describe("renderDocumentPage", () => {
  const html = renderDocumentPage({
    doc,
    pagePath: "workflows/qc/main.html",
    callInfo: {
      count: 1,
      workflows: [{ name: "release", filePath: "release.wdl", url: "release.html" }],
    },
  });

  it("should resolve links relative to the page depth", () => {
    expect(html).toContain('<link rel="stylesheet" href="../../static/site.css">');
    expect(html).toContain('<a href="../../lib/tasks.html">align</a>');
    expect(html).toContain('<a href="#task-report">report</a>');
    expect(html).toContain('<a href="../../lib/tasks.html">../../lib/tasks.wdl</a>');
    expect(html).toContain('<a href="../../workflows/qc/main-graph.html">Open full-page diagram</a>');
  });

  it("should show the callers panel", () => {
    expect(html).toContain("<strong>Used as a subworkflow by 1 workflow</strong>");
    expect(html).toContain('<a href="../../release.html">release</a>');
  });

  it("should anchor tasks and escape their content", () => {
    expect(html).toContain('<section id="task-report" class="card">');
    expect(html).toContain("<pre>echo &lt;done&gt;</pre>");
    expect(html).toContain("<p>Quality &lt;checks&gt;</p>");
  });

  it("should embed the diagram for the site script", () => {
    expect(html).toContain('<pre class="mermaid">\nflowchart TD\n    Start([qc])\n</pre>');
    expect(html).toContain("mermaid.min.js");
  });

  it("should leave out the callers panel and diagram script for task libraries", () => {
    const library = renderDocumentPage({
      doc: makeDocument("lib/tasks.wdl", { tasks: [makeTask("align")] }),
      pagePath: "lib/tasks.html",
    });

    expect(library).not.toContain("Used as a subworkflow");
    expect(library).not.toContain("mermaid.min.js");
  });
});

describe("renderGraphPage", () => {
  it("should link back to the document and offer share links", () => {
    const workflow = doc.workflow ?? makeWorkflow("qc");
    const html = renderGraphPage({ doc, workflow, pagePath: "workflows/qc/main-graph.html" });

    expect(html).toContain('<a href="../../workflows/qc/main.html">Back to documentation</a>');
    expect(html).toContain('href="https://mermaid.ink/img/pako:');
    expect(html).toContain('href="https://mermaid.live/edit#pako:');
  });
});

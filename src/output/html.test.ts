import { describe, it, expect } from "vitest";
import { escapeHtml, renderPage, rootPathFor, table } from "./html";

describe("escapeHtml", () => {
  it("should escape markup and quotes", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;"
    );
  });
});

describe("rootPathFor", () => {
  it("should climb one level per directory", () => {
    expect(rootPathFor("index.html")).toBe("");
    expect(rootPathFor("workflows/qc/main.html")).toBe("../../");
  });
});

describe("table", () => {
  it("should render nothing without rows", () => {
    expect(table(["Name"], [])).toBe("");
  });

  it("should escape headers but not cells", () => {
    const html = table(["A & B"], [["<code>x</code>"]]);

    expect(html).toContain("<th>A &amp; B</th>");
    expect(html).toContain("<tr><td><code>x</code></td></tr>");
  });
});

describe("renderPage", () => {
  it("should include the diagram script only when asked", () => {
    const plain = renderPage({ title: "T", rootPath: "../", body: "" });
    const withDiagram = renderPage({ title: "T", rootPath: "../", body: "", mermaid: true });

    expect(plain).not.toContain("mermaid.min.js");
    expect(withDiagram).toContain("mermaid.min.js");
    expect(plain).toContain('<script src="../static/site.js" defer></script>');
    expect(plain).toContain('<a href="../index.html">Workflows</a>');
  });
});

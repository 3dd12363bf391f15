/**
 * Shared stylesheet and script, written once under `static/`.
 */

export const SITE_CSS = `:root {
  --bg: #0d1117;
  --panel: #161b22;
  --border: #30363d;
  --text: #e6edf3;
  --muted: #8b949e;
  --accent: #58a6ff;
  --task: #a371f7;
  --warn: #d29922;
  --error: #f85149;
}

* { box-sizing: border-box; }

body {
  margin: 0;
  background: var(--bg);
  color: var(--text);
  font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Helvetica, Arial, sans-serif;
  line-height: 1.5;
}

main { max-width: 1200px; margin: 0 auto; padding: 24px; }
a { color: var(--accent); text-decoration: none; }
a:hover { text-decoration: underline; }
code, pre { font-family: "JetBrains Mono", ui-monospace, SFMono-Regular, Menlo, monospace; font-size: 13px; }
pre { background: var(--panel); border: 1px solid var(--border); border-radius: 6px; padding: 12px; overflow-x: auto; }
pre.mermaid { background: #fff; color: #000; text-align: center; }

.top-nav { display: flex; gap: 20px; padding: 12px 24px; background: var(--panel); border-bottom: 1px solid var(--border); }
.stats { display: flex; gap: 12px; flex-wrap: wrap; margin: 16px 0; }
.stat { background: var(--panel); border: 1px solid var(--border); border-radius: 6px; padding: 8px 16px; }
.stat strong { display: block; font-size: 20px; }

.badge { display: inline-block; padding: 0 8px; border-radius: 10px; font-size: 12px; border: 1px solid var(--border); color: var(--muted); }
.badge.workflow { color: var(--accent); border-color: var(--accent); }
.badge.task { color: var(--task); border-color: var(--task); }
.badge.external { color: var(--warn); border-color: var(--warn); }

section { margin: 32px 0; }
.card { background: var(--panel); border: 1px solid var(--border); border-radius: 6px; padding: 16px; margin: 12px 0; }
.callers { border-left: 3px solid var(--accent); }
.errors .error { border-left: 3px solid var(--error); }
.errors .warning { border-left: 3px solid var(--warn); }

table { width: 100%; border-collapse: collapse; margin: 8px 0 16px; }
th, td { text-align: left; padding: 6px 10px; border-bottom: 1px solid var(--border); vertical-align: top; }
th { color: var(--muted); font-weight: 600; }

#search { width: 100%; padding: 8px 12px; background: var(--panel); color: var(--text); border: 1px solid var(--border); border-radius: 6px; }
.hidden { display: none; }
.share-links { display: flex; gap: 16px; margin: 12px 0; }
`;

export const SITE_JS = `(function () {
  "use strict";

  function filterEntries(query) {
    var needle = query.trim().toLowerCase();
    document.querySelectorAll("[data-search]").forEach(function (entry) {
      var haystack = entry.getAttribute("data-search") || "";
      entry.classList.toggle("hidden", needle !== "" && haystack.indexOf(needle) === -1);
    });
  }

  document.addEventListener("DOMContentLoaded", function () {
    var search = document.getElementById("search");
    if (search) {
      search.addEventListener("input", function () { filterEntries(search.value); });
      search.addEventListener("keydown", function (event) {
        if (event.key === "Escape") { search.value = ""; filterEntries(""); }
      });
    }

    if (window.mermaid) {
      window.mermaid.initialize({ startOnLoad: false, securityLevel: "loose", theme: "default" });
      window.mermaid.run({ querySelector: "pre.mermaid" });
    }
  });
})();
`;

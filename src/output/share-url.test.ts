import { describe, it, expect } from "vitest";
import { decodePako, encodePako, toMermaidInkUrl, toMermaidLiveUrl } from "./share-url";

const DIAGRAM = 'flowchart TD\n    Start([main])\n    N1["align"]\n    Start --> N1';

describe("encodePako", () => {
  it("should prefix a base64url payload", () => {
    const encoded = encodePako(DIAGRAM);

    expect(encoded.startsWith("pako:")).toBe(true);
    expect(encoded.slice("pako:".length)).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it("should decode back to the original text", () => {
    expect(decodePako(encodePako(DIAGRAM))).toBe(DIAGRAM);
  });
});

describe("share links", () => {
  it("should point mermaid.ink at the encoded editor state", () => {
    const url = toMermaidInkUrl(DIAGRAM);
    const prefix = "https://mermaid.ink/img/";

    expect(url.startsWith(`${prefix}pako:`)).toBe(true);
    expect(JSON.parse(decodePako(url.slice(prefix.length)))).toEqual({
      code: DIAGRAM,
      mermaid: '{"theme":"default"}',
      autoSync: true,
      updateDiagram: true,
    });
  });

  it("should open the editor with the chosen theme", () => {
    const url = toMermaidLiveUrl(DIAGRAM, { theme: "dark", liveBaseUrl: "https://editor.test" });
    const prefix = "https://editor.test/edit#";

    expect(url.startsWith(prefix)).toBe(true);
    expect(JSON.parse(decodePako(url.slice(prefix.length))).mermaid).toBe('{"theme":"dark"}');
  });
});

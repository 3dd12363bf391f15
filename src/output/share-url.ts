/**
 * Diagram Share Links
 *
 * Links that open a Mermaid diagram on mermaid.ink (rendered image) or in the
 * mermaid.live editor. Both take the payload deflated with pako and encoded
 * as base64url behind a `pako:` prefix.
 */

import pako from "pako";

export type MermaidTheme = "default" | "neutral" | "dark" | "forest";

export interface ShareUrlOptions {
  /** Base URL for the image service (default: https://mermaid.ink) */
  inkBaseUrl?: string;
  /** Base URL for the editor (default: https://mermaid.live) */
  liveBaseUrl?: string;
  theme?: MermaidTheme;
}

const DEFAULT_OPTIONS: Required<ShareUrlOptions> = {
  inkBaseUrl: "https://mermaid.ink",
  liveBaseUrl: "https://mermaid.live",
  theme: "default",
};

function base64UrlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes)
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/, "");
}

function base64UrlDecode(encoded: string): Uint8Array {
  let base64 = encoded.replace(/-/g, "+").replace(/_/g, "/");
  const padding = 4 - (base64.length % 4);
  if (padding !== 4) base64 += "=".repeat(padding);
  return Buffer.from(base64, "base64");
}

/**
 * `pako:`-prefixed deflate + base64url encoding of `text`.
 */
export function encodePako(text: string): string {
  return `pako:${base64UrlEncode(pako.deflate(new TextEncoder().encode(text)))}`;
}

/** Inverse of {@link encodePako}. */
export function decodePako(encoded: string): string {
  const payload = encoded.startsWith("pako:") ? encoded.slice("pako:".length) : encoded;
  return new TextDecoder().decode(pako.inflate(base64UrlDecode(payload)));
}

/** The editor state mermaid.live reads from its URL. */
function editorState(diagram: string, theme: MermaidTheme): string {
  return JSON.stringify({
    code: diagram,
    mermaid: JSON.stringify({ theme }),
    autoSync: true,
    updateDiagram: true,
  });
}

/** Rendered-image link: `https://mermaid.ink/img/pako:...` */
export function toMermaidInkUrl(diagram: string, options: ShareUrlOptions = {}): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  return `${opts.inkBaseUrl}/img/${encodePako(editorState(diagram, opts.theme))}`;
}

/** Editor link: `https://mermaid.live/edit#pako:...` */
export function toMermaidLiveUrl(diagram: string, options: ShareUrlOptions = {}): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  return `${opts.liveBaseUrl}/edit#${encodePako(editorState(diagram, opts.theme))}`;
}

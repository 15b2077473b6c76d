/**
 * Asset reference extraction
 *
 * Pattern matching only, no HTML/CSS parsing: a miss on malformed markup
 * yields nothing for that occurrence.
 */

export const IMAGE_EXTENSIONS = [
  ".svg",
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".webp",
  ".ico",
  ".bmp",
  ".avif",
] as const;
export const FONT_EXTENSIONS = [".woff", ".woff2"] as const;
export const PDF_EXTENSIONS = [".pdf"] as const;
export const VIDEO_EXTENSIONS = [".webm"] as const;

export type ReferenceKind = "image" | "pdf" | "video" | "css";

function alternation(extensions: readonly string[]): string {
  return extensions.map((ext) => ext.slice(1)).join("|");
}

function htmlPattern(extensions: readonly string[]): RegExp {
  return new RegExp(`(https?://[^"'>]+\\.(?:${alternation(extensions)}))`, "gi");
}

const PATTERNS: Record<ReferenceKind, RegExp> = {
  image: htmlPattern(IMAGE_EXTENSIONS),
  pdf: htmlPattern(PDF_EXTENSIONS),
  video: htmlPattern(VIDEO_EXTENSIONS),
  css: new RegExp(
    `url\\(["']?(https?://[^"')]+\\.(?:${alternation([...IMAGE_EXTENSIONS, ...FONT_EXTENSIONS])}))["']?\\)`,
    "gi",
  ),
};

const SRCSET_PATTERN = /srcset\s*=\s*"([^"]+)"/gi;

/**
 * Distinct absolute URLs of the given kind, in first-seen order
 */
export function extractReferences(content: string, kind: ReferenceKind): string[] {
  const urls = new Set<string>();
  for (const match of content.matchAll(PATTERNS[kind])) {
    urls.add(match[1]);
  }
  return Array.from(urls);
}

/**
 * Absolute URLs listed in srcset="..." attributes.
 * Each comma-separated candidate contributes its first token when it
 * starts with "http", whatever its extension.
 */
export function extractSrcsetUrls(content: string): string[] {
  const urls = new Set<string>();
  for (const match of content.matchAll(SRCSET_PATTERN)) {
    for (const candidate of match[1].split(",")) {
      const [url] = candidate.trim().split(/\s+/);
      if (url.startsWith("http")) urls.add(url);
    }
  }
  return Array.from(urls);
}

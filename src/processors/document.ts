/**
 * Rewrite external asset references in HTML/CSS documents
 */

import fs from "node:fs/promises";
import {
  extractReferences,
  extractSrcsetUrls,
  type ReferenceKind,
} from "../parsers/references.js";
import type { AssetResolver } from "./assets.js";

/** Invalid UTF-8 throws instead of being replaced; a BOM is kept as text. */
const UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * "root": site-root absolute ("/assets/x.png"), used for pattern matches.
 * "relative": project-root relative ("assets/x.png"), used for srcset entries.
 */
export type ReferenceStyle = "root" | "relative";

export interface ReplaceResult {
  content: string;
  changed: boolean;
}

export function toLocalReference(localPath: string, style: ReferenceStyle): string {
  return style === "root" ? `/${localPath}` : localPath;
}

/**
 * Download each URL and replace every literal occurrence of it in `content`
 * with the local reference. URLs that fail to download are left untouched.
 */
export async function replaceReferences(
  content: string,
  urls: string[],
  resolver: AssetResolver,
  style: ReferenceStyle,
): Promise<ReplaceResult> {
  const resolved = await Promise.all(
    urls.map(async (url) => ({ url, local: await resolver.resolve(url) })),
  );

  let changed = false;
  for (const { url, local } of resolved) {
    if (!local) continue;
    content = content.split(url).join(toLocalReference(local, style));
    changed = true;
  }
  return { content, changed };
}

/**
 * Localize one document in place: srcset entries first, then each kind's
 * pattern in order. Returns true when the file was written.
 */
export async function localizeDocument(
  filePath: string,
  kinds: readonly ReferenceKind[],
  resolver: AssetResolver,
): Promise<boolean> {
  const original = UTF8.decode(await fs.readFile(filePath));

  let { content, changed } = await replaceReferences(
    original,
    extractSrcsetUrls(original),
    resolver,
    "relative",
  );

  for (const kind of kinds) {
    const pass = await replaceReferences(
      content,
      extractReferences(content, kind),
      resolver,
      "root",
    );
    content = pass.content;
    changed = changed || pass.changed;
  }

  if (!changed) return false;

  await fs.writeFile(filePath, content, "utf8");
  console.log(`Updated: ${filePath}`);
  return true;
}

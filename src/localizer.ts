/**
 * Walk the project tree and localize every HTML/CSS document
 */

import type { LocalizerConfig } from "./config.js";
import type { Fetcher } from "./network/fetch.js";
import type { ReferenceKind } from "./parsers/references.js";
import { AssetResolver } from "./processors/assets.js";
import { localizeDocument } from "./processors/document.js";
import { ensureDir, walkFiles } from "./utils/filesystem.js";

export interface LocalizeSummary {
  scanned: number;
  updated: number;
  downloaded: number;
  failed: number;
}

const HTML_KINDS: readonly ReferenceKind[] = ["image", "pdf", "video"];
const CSS_KINDS: readonly ReferenceKind[] = ["css"];

/**
 * Reference kinds scanned in a file, by extension; empty for other files
 */
export function documentKindsFor(filePath: string): readonly ReferenceKind[] {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".html")) return HTML_KINDS;
  if (lower.endsWith(".css")) return CSS_KINDS;
  return [];
}

/**
 * Localize all documents under `config.rootDir`.
 * Download failures are logged and counted; filesystem errors are thrown.
 */
export async function localizeTree(
  config: LocalizerConfig,
  fetcher?: Fetcher,
): Promise<LocalizeSummary> {
  await ensureDir(config.assetsDir);
  await ensureDir(config.fontsDir);

  const resolver = new AssetResolver(config, fetcher);
  let scanned = 0;
  let updated = 0;

  for await (const filePath of walkFiles(config.rootDir)) {
    const kinds = documentKindsFor(filePath);
    if (kinds.length === 0) continue;
    scanned++;
    if (await localizeDocument(filePath, kinds, resolver)) updated++;
  }

  return {
    scanned,
    updated,
    downloaded: resolver.downloaded,
    failed: resolver.failed,
  };
}

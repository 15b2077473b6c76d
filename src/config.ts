/**
 * Run configuration
 */

import path from "node:path";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_CONCURRENCY = 1;

export interface LocalizerConfig {
  /** Directory scanned for documents; rewritten paths are relative to it. */
  rootDir: string;
  /** Destination of non-font assets. */
  assetsDir: string;
  /** Destination of .woff/.woff2 files. */
  fontsDir: string;
  /** Per-request timeout. */
  timeoutMs: number;
  /** Download slots shared by one pass over a document. */
  concurrency: number;
}

export function resolveConfig(
  rootDir: string,
  overrides: Partial<Omit<LocalizerConfig, "rootDir">> = {},
): LocalizerConfig {
  const root = path.resolve(rootDir);
  const assetsDir = overrides.assetsDir ?? path.join(root, "assets");
  return {
    rootDir: root,
    assetsDir,
    fontsDir: overrides.fontsDir ?? path.join(assetsDir, "fonts"),
    timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    concurrency: overrides.concurrency ?? DEFAULT_CONCURRENCY,
  };
}

/**
 * Filesystem utility functions
 */

import fs from "node:fs/promises";
import path from "node:path";
import { urlBasename } from "./url.js";

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Check whether a path exists without throwing
 */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Strip every character outside [A-Za-z0-9._-]
 */
export function safeFilename(s: string): string {
  return s.replace(/[^A-Za-z0-9._-]/g, "");
}

/**
 * Derive the local file name for an asset URL.
 * `%20` is dropped from the URL and from the basename before stripping.
 */
export function sanitizeAssetName(url: string): string {
  const basename = urlBasename(url.replaceAll("%20", ""));
  return safeFilename(basename.replaceAll("%20", ""));
}

/**
 * Yield every regular file below `dir`, depth first.
 * Symlinks to files are yielded; symlinked directories and broken links are not.
 */
export async function* walkFiles(dir: string): AsyncGenerator<string> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(full);
    } else if (entry.isFile()) {
      yield full;
    } else if (entry.isSymbolicLink()) {
      const target = await fs.stat(full).catch(() => null);
      if (target?.isFile()) yield full;
    }
  }
}

#!/usr/bin/env node
/**
 * asset-localizer
 *
 * A TypeScript CLI that makes a static site self-contained.
 * - Walks the project tree for .html and .css files
 * - Finds absolute http(s) URLs of images, fonts, PDFs and videos
 *   (including srcset candidates and CSS url() values)
 * - Downloads each asset once into assets/ (fonts into assets/fonts/)
 * - Rewrites the references in place to the local copies
 *
 * Usage:
 *   npm run dev -- [--root <dir>] [--concurrency 1] [--timeoutMs 10000]
 *
 * Re-running is safe: files already on disk are not fetched again.
 */

import { runCLI } from "./cli.js";

runCLI().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});

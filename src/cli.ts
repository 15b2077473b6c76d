/**
 * CLI argument parsing and validation
 */

import fs from "node:fs/promises";
import minimist from "minimist";
import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT_MS, resolveConfig } from "./config.js";
import { localizeTree } from "./localizer.js";

const USAGE =
  "Usage: asset-localizer [--root <dir>] [--concurrency 1] [--timeoutMs 10000] [--help]";

function positiveInt(value: unknown, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--${name} must be a positive integer, got ${String(value)}`);
  }
  return n;
}

/**
 * Parse CLI arguments and localize the project tree
 */
export async function runCLI(args: string[] = process.argv.slice(2)): Promise<void> {
  const argv = minimist(args, {
    boolean: ["help"],
    string: ["root"],
    alias: { h: "help" },
    default: {
      concurrency: DEFAULT_CONCURRENCY,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    },
  });

  if (argv.help) {
    console.log(USAGE);
    return;
  }

  const root = typeof argv.root === "string" && argv.root ? argv.root : process.cwd();
  const stat = await fs.stat(root).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new Error(`Root is not a directory: ${root}`);
  }

  const config = resolveConfig(root, {
    concurrency: positiveInt(argv.concurrency, "concurrency"),
    timeoutMs: positiveInt(argv.timeoutMs, "timeoutMs"),
  });

  const summary = await localizeTree(config);

  console.log(
    `Scanned ${summary.scanned} documents, updated ${summary.updated}, downloaded ${summary.downloaded}, failed ${summary.failed}.`,
  );
  console.log("✅ All external assets downloaded and references updated!");
}

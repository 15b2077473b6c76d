/**
 * Asset download
 */

import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_TIMEOUT_MS } from "../config.js";
import { pathExists, sanitizeAssetName } from "../utils/filesystem.js";

export type Fetcher = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface DownloadOptions {
  timeoutMs?: number;
  /** HTTP implementation, Node's global fetch unless given */
  fetch?: Fetcher;
}

export interface DownloadResult {
  /** Absolute path of the local file */
  path: string;
  /** False when the file was already on disk */
  fetched: boolean;
}

const defaultFetcher: Fetcher = (url, init) => fetch(url, init);

export class RequestTimeoutError extends Error {
  override name = "TimeoutError";

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
  }
}

/**
 * Errors raised by the transport (DNS, refused, reset, timeout) rather than
 * by the filesystem
 */
function isRequestError(err: unknown): err is Error {
  return (
    err instanceof TypeError ||
    (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError"))
  );
}

function describeError(err: Error): string {
  const { cause } = err;
  if (cause instanceof Error && cause.message) return `${err.message} (${cause.message})`;
  return err.message;
}

async function writeBody(body: ReadableStream<Uint8Array> | null, dest: string): Promise<void> {
  const handle = await fs.open(dest, "w");
  try {
    if (!body) return;
    const reader = body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      await handle.write(value);
    }
  } finally {
    await handle.close();
  }
}

/**
 * Download `url` into `targetDir` under its sanitized name.
 * Returns null when the asset could not be fetched.
 * An existing file with the same name short-circuits the request.
 */
export async function downloadAsset(
  url: string,
  targetDir: string,
  options: DownloadOptions = {},
): Promise<DownloadResult | null> {
  const fileName = sanitizeAssetName(url);
  if (!fileName) {
    console.warn(`Skipping ${url}: no usable file name`);
    return null;
  }

  const dest = path.join(targetDir, fileName);
  if (await pathExists(dest)) {
    console.log(`Already exists: ${fileName}`);
    return { path: dest, fetched: false };
  }

  const doFetch = options.fetch ?? defaultFetcher;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);

  try {
    let res: Response;
    try {
      res = await doFetch(url, { signal: controller.signal });
    } catch (err) {
      if (!isRequestError(err)) throw err;
      console.warn(`Request failed for ${url}: ${describeError(err)}`);
      return null;
    }

    if (res.status !== 200) {
      console.warn(`Failed to download (status code ${res.status}): ${url}`);
      await res.body?.cancel();
      return null;
    }

    try {
      await writeBody(res.body, dest);
    } catch (err) {
      await fs.rm(dest, { force: true });
      if (!isRequestError(err)) throw err;
      console.warn(`Request failed for ${url}: ${describeError(err)}`);
      return null;
    }
  } finally {
    clearTimeout(timer);
  }

  console.log(`Downloaded: ${fileName}`);
  return { path: dest, fetched: true };
}

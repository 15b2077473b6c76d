/**
 * Resolve asset URLs to downloaded local files
 */

import path from "node:path";
import pLimit, { type LimitFunction } from "p-limit";
import type { LocalizerConfig } from "../config.js";
import { downloadAsset, type Fetcher } from "../network/fetch.js";
import { FONT_EXTENSIONS } from "../parsers/references.js";
import { sanitizeAssetName } from "../utils/filesystem.js";
import { makeRelative, urlExtension } from "../utils/url.js";

const FONT_EXTS = new Set<string>(FONT_EXTENSIONS);

/**
 * Fonts go to the fonts folder, everything else to the general assets folder
 */
export function assetFolderFor(url: string, config: LocalizerConfig): string {
  return FONT_EXTS.has(urlExtension(url)) ? config.fontsDir : config.assetsDir;
}

export class AssetResolver {
  downloaded = 0;
  failed = 0;

  private readonly limit: LimitFunction;
  /** In-flight downloads keyed by destination file */
  private readonly pending = new Map<string, Promise<string | null>>();

  constructor(
    private readonly config: LocalizerConfig,
    private readonly fetcher?: Fetcher,
  ) {
    this.limit = pLimit(Math.max(1, config.concurrency));
  }

  /**
   * Local path of the asset relative to the project root (forward slashes),
   * or null when it could not be downloaded.
   * A download already running for the same file is shared; if it fails,
   * this URL is tried on its own.
   */
  async resolve(url: string): Promise<string | null> {
    const folder = assetFolderFor(url, this.config);
    const key = path.join(folder, sanitizeAssetName(url));

    const inFlight = this.pending.get(key);
    if (inFlight) {
      const shared = await inFlight;
      if (shared) return shared;
    }

    const task: Promise<string | null> = this.limit(() => this.fetchInto(url, folder)).finally(() => {
      if (this.pending.get(key) === task) this.pending.delete(key);
    });
    this.pending.set(key, task);
    return task;
  }

  private async fetchInto(url: string, folder: string): Promise<string | null> {
    const result = await downloadAsset(url, folder, {
      timeoutMs: this.config.timeoutMs,
      fetch: this.fetcher,
    });
    if (!result) {
      this.failed++;
      return null;
    }
    if (result.fetched) this.downloaded++;
    return makeRelative(this.config.rootDir, result.path);
  }
}

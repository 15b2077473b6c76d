/**
 * URL manipulation utilities
 *
 * URLs are split as raw text (no `new URL()`): matched strings may not parse,
 * and file names must not be percent-encoded.
 */

import path from "node:path";

/**
 * Path component of an absolute URL, without query or fragment.
 * Returns "" when the URL has no path.
 */
export function urlPathname(url: string): string {
  const bare = url.split("#")[0].split("?")[0];
  const schemeEnd = bare.indexOf("//");
  const hostStart = schemeEnd === -1 ? 0 : schemeEnd + 2;
  const pathStart = bare.indexOf("/", hostStart);
  return pathStart === -1 ? "" : bare.slice(pathStart);
}

/**
 * Last path segment of a URL ("" for a path ending in "/")
 */
export function urlBasename(url: string): string {
  const pathname = urlPathname(url);
  return pathname.slice(pathname.lastIndexOf("/") + 1);
}

/**
 * Lower-cased extension of the URL's last path segment, including the dot
 */
export function urlExtension(url: string): string {
  return path.posix.extname(urlBasename(url)).toLowerCase();
}

/**
 * Path of `file` relative to `root`, always with forward slashes
 */
export function makeRelative(root: string, file: string): string {
  return path.relative(root, file).replace(/\\/g, "/");
}

/**
 * Asset file naming
 */

import { posix } from "node:path";

/**
 * Candidate file name for an asset URL: the last segment of its path
 *
 * @example
 * assetBasename("https://ar5iv.org/html/1706.03762/assets/x1.png", "image") // "x1.png"
 * assetBasename("https://example.org/", "image") // "image"
 * assetBasename("https://example.org/figures/", "image") // "image"
 */
export function assetBasename(url: string, fallback: string): string {
  const { pathname } = new URL(url);
  if (pathname.endsWith("/")) return fallback;
  return posix.basename(pathname) || fallback;
}

/**
 * Split a file name into stem and extension, supplying the fallback extension
 *
 * @example
 * splitExtension("x1.png", ".bin") // ["x1", ".png"]
 * splitExtension("figure", ".bin") // ["figure", ".bin"]
 */
export function splitExtension(
  name: string,
  fallbackExtension: string,
): [string, string] {
  const ext = posix.extname(name);
  if (!ext) return [name, fallbackExtension];
  return [name.slice(0, -ext.length), ext];
}

/**
 * Find the first free name of the form stem.ext, stem-1.ext, stem-2.ext, ...
 */
export async function uniqueName(
  name: string,
  fallbackExtension: string,
  isTaken: (candidate: string) => Promise<boolean>,
): Promise<string> {
  const [stem, ext] = splitExtension(name, fallbackExtension);
  let candidate = `${stem}${ext}`;
  for (let i = 1; await isTaken(candidate); i++) {
    candidate = `${stem}-${i}${ext}`;
  }
  return candidate;
}

/**
 * Source Resolution
 * Turns the user-supplied source into a document URL and an output directory name
 */

import { posix } from "node:path";

/**
 * Resolve a bare identifier or a full URL to the document URL
 *
 * @example
 * toDocumentUrl("1706.03762", "https://ar5iv.org/html/") // "https://ar5iv.org/html/1706.03762"
 * toDocumentUrl("https://example.org/paper", "https://ar5iv.org/html/") // unchanged
 */
export function toDocumentUrl(source: string, baseUrl: string): string {
  const trimmed = source.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  const prefix = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return `${prefix}${trimmed.replace(/^\/+/, "")}`;
}

/**
 * Derive the output directory name from a document URL
 * Takes the identifier after /html/ with "/" flattened to "_",
 * then the last path segment, then "ar5iv"
 *
 * @example
 * guessBasename("https://ar5iv.org/html/1706.03762") // "1706.03762"
 * guessBasename("https://ar5iv.org/html/hep-th/9901001") // "hep-th_9901001"
 * guessBasename("https://example.org/papers/attention.html") // "attention.html"
 */
export function guessBasename(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }

  const match = pathname.match(/\/html\/(.+)$/);
  if (match) {
    const id = match[1].replace(/\/+$/, "");
    if (id) return id.replace(/\//g, "_");
  }

  return posix.basename(pathname) || "ar5iv";
}

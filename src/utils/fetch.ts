/**
 * Fetch collaborator
 * Single-attempt HTTP GET with a timeout; no retries
 */

import type { FetchedResource, Fetcher } from "../types";

export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

/**
 * Fetcher backed by Node's global fetch
 * Follows redirects and reports the final URL
 */
export class HttpFetcher implements Fetcher {
  constructor(private userAgent: string) {}

  async fetch(url: string, timeout: number): Promise<FetchedResource> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { "User-Agent": this.userAgent },
        redirect: "follow",
      });

      if (!response.ok) {
        throw new FetchError(
          `HTTP ${response.status}: ${response.statusText}`,
          url,
          response.status,
        );
      }

      const body = new Uint8Array(await response.arrayBuffer());
      return {
        body,
        url: response.url || url,
        contentType: response.headers.get("content-type"),
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Extract the charset parameter from a Content-Type header
 *
 * @example
 * parseCharset("text/html; charset=ISO-8859-1") // "iso-8859-1"
 * parseCharset("text/html") // null
 */
export function parseCharset(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = contentType.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Decode a document body using its declared charset (default utf-8)
 * Invalid byte sequences become U+FFFD; an unknown charset label falls back to utf-8
 */
export function decodeBody(
  body: Uint8Array,
  contentType: string | null,
): string {
  const charset = parseCharset(contentType) ?? "utf-8";
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: false });
  } catch {
    decoder = new TextDecoder("utf-8", { fatal: false });
  }
  return decoder.decode(body);
}

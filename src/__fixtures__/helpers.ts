/**
 * Shared test helpers: in-process fetcher, silent logger, temp directories
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Chalk } from "chalk";
import { FetchError, Logger, Tracker, loadDefaultConfig } from "../utils";
import type {
  ConversionConfig,
  ConversionContext,
  FetchedResource,
  Fetcher,
} from "../types";

export interface FakeResponse {
  body: string | Uint8Array;
  contentType?: string;
  url?: string; // Final URL, defaults to the requested one
}

/**
 * Fetcher serving canned responses; unknown URLs fail with HTTP 404
 */
export class FakeFetcher implements Fetcher {
  readonly calls: string[] = [];

  constructor(private responses: Record<string, FakeResponse | Error>) {}

  async fetch(url: string): Promise<FetchedResource> {
    this.calls.push(url);
    const response = this.responses[url];
    if (response === undefined) {
      throw new FetchError("HTTP 404: Not Found", url, 404);
    }
    if (response instanceof Error) {
      throw response;
    }
    const body =
      typeof response.body === "string"
        ? new TextEncoder().encode(response.body)
        : response.body;
    return {
      body,
      url: response.url ?? url,
      contentType: response.contentType ?? null,
    };
  }
}

/**
 * Logger that collects uncolored lines instead of printing them
 */
export function memoryLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    level: "info",
    write: (line) => lines.push(line),
    chalk: new Chalk({ level: 0 }),
  });
  return { logger, lines };
}

export async function testContext(
  fetcher: Fetcher,
  config?: ConversionConfig,
): Promise<{ ctx: ConversionContext; lines: string[] }> {
  const { logger, lines } = memoryLogger();
  return {
    ctx: {
      config: config ?? (await loadDefaultConfig()),
      tracker: new Tracker(),
      logger,
      fetcher,
    },
    lines,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "ar5iv2md-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

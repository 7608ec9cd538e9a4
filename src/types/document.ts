/**
 * Document and pipeline data types
 */

import type { Text } from "domhandler";

/**
 * A remote image that was copied into the assets directory
 * One per absolute URL per run
 */
export interface AssetReference {
  originalUrl: string; // Absolute URL the bytes were fetched from
  localPath: string; // Relative to the Markdown file, e.g. "assets/x1.png"
}

/**
 * TeX extracted from one <math> element
 * The element is replaced by `node`, whose data is `rendered`
 */
export interface TexFragment {
  readonly source: string;
  readonly isBlock: boolean;
  readonly rendered: string;
  readonly node: Text;
}

export interface MathNormalization {
  fragments: TexFragment[];
  unresolved: number; // <math> elements left in place (no TeX source)
}

export interface AnchorRestoration {
  markdown: string;
  inserted: number;
}

// ============================================================================
// Fetch collaborator
// ============================================================================

export interface FetchedResource {
  body: Uint8Array;
  url: string; // Final URL after redirects
  contentType: string | null;
}

export interface Fetcher {
  fetch(url: string, timeout: number): Promise<FetchedResource>;
}

// ============================================================================
// Run result
// ============================================================================

export type RunStatus = "converted" | "skipped" | "failed";

export interface RunResult {
  status: RunStatus;
  exitCode: number;
  outputPath?: string; // Markdown path, reported for converted and skipped runs
  message?: string;
}

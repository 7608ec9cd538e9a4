/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import { FetchError } from "./fetch";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type ImageIssueReason =
  | "download-failed"
  | "timeout"
  | "invalid-response"
  | "write-failed";
export type DocumentIssueReason = "fetch-failed" | "timeout" | "write-failed";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface ImageIssue {
  type: "image";
  path: string;
  reason: ImageIssueReason;
  details?: string;
}

export interface DocumentIssue {
  type: "document";
  path: string;
  reason: DocumentIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = ImageIssue | DocumentIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Image counts
  downloadedImages: number;
  reusedImages: number;
  failedImages: number;
  skippedImages: number;

  // Math counts
  convertedMath: number;
  unresolvedMath: number;

  // Bibliography
  restoredAnchors: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return { reason: "read-error", details: describe(error) };
}

function mapImageError(
  error: unknown,
  stage: "fetch" | "write",
): IssueInfo<ImageIssueReason> {
  if (stage === "write") {
    return { reason: "write-failed", details: describe(error) };
  }
  if (isTimeout(error)) {
    return { reason: "timeout", details: describe(error) };
  }
  // HTTP errors (4xx, 5xx)
  if (error instanceof FetchError && error.status !== undefined) {
    return { reason: "invalid-response", details: error.message };
  }
  return { reason: "download-failed", details: describe(error) };
}

function mapDocumentError(
  error: unknown,
  stage: "fetch" | "write",
): IssueInfo<DocumentIssueReason> {
  if (stage === "write") {
    return { reason: "write-failed", details: describe(error) };
  }
  if (isTimeout(error)) {
    return { reason: "timeout", details: describe(error) };
  }
  return { reason: "fetch-failed", details: describe(error) };
}

function buildIssue(
  path: string,
  error: unknown,
  type: IssueType,
  stage: "fetch" | "write",
): Issue {
  switch (type) {
    case "image":
      return { type, path, ...mapImageError(error, stage) };
    case "document":
      return { type, path, ...mapDocumentError(error, stage) };
    case "resource":
      return { type, path, ...mapResourceError(error) };
  }
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private downloadedImages = 0;
  private reusedImages = 0;
  private failedImages = 0;
  private skippedImages = 0;
  private convertedMath = 0;
  private unresolvedMath = 0;
  private restoredAnchors = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementImagesDownloaded(): void {
    this.downloadedImages++;
  }

  incrementImagesReused(): void {
    this.reusedImages++;
  }

  incrementImagesFailed(): void {
    this.failedImages++;
  }

  incrementImagesSkipped(): void {
    this.skippedImages++;
  }

  addMath(converted: number, unresolved: number): void {
    this.convertedMath += converted;
    this.unresolvedMath += unresolved;
  }

  addRestoredAnchors(count: number): void {
    this.restoredAnchors += count;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Record a failure and return the issue so callers can report it
   */
  trackError(
    path: string,
    error: unknown,
    type: IssueType,
    stage: "fetch" | "write" = "fetch",
  ): Issue {
    const issue = buildIssue(path, error, type, stage);
    this.issues.push(issue);
    return issue;
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      downloadedImages: this.downloadedImages,
      reusedImages: this.reusedImages,
      failedImages: this.failedImages,
      skippedImages: this.skippedImages,
      convertedMath: this.convertedMath,
      unresolvedMath: this.unresolvedMath,
      restoredAnchors: this.restoredAnchors,
      issues: this.issues,
      duration,
    };
  }
}

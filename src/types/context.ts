/**
 * Conversion context - shared by every stage of one run
 * Each stage reads what it needs; nothing here outlives the run
 */

import type { ConversionConfig } from "./config";
import type { Fetcher } from "./document";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  ImageIssue,
  DocumentIssue,
  ResourceIssue,
  ImageIssueReason,
  DocumentIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  config: ConversionConfig;

  // Unified tracking for stats and issues
  tracker: Tracker;

  logger: Logger;
  fetcher: Fetcher;
}

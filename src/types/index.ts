/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  SourceConfig,
  OutputConfig,
  FetchConfig,
  HtmlConfig,
  ImagesConfig,
  DelimiterPair,
  MathConfig,
  MarkdownConfig,
  BibliographyConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Document
export type {
  AssetReference,
  TexFragment,
  MathNormalization,
  AnchorRestoration,
  FetchedResource,
  Fetcher,
  RunStatus,
  RunResult,
} from "./document";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  ImageIssue,
  DocumentIssue,
  ResourceIssue,
  ImageIssueReason,
  DocumentIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Turndown
export type { TurndownNode } from "./turndown";

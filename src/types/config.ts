/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SourceConfigSchema = z.object({
  baseUrl: z.string().url(),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  filename: z.string().min(1),
  assetsDirectory: z.string().min(1),
});

export const FetchConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  userAgent: z.string(),
});

export const HtmlConfigSchema = z.object({
  removeSelectors: z.array(z.string()),
});

export const ImagesConfigSchema = z.object({
  fallbackName: z.string().min(1),
  // Appended to file names that have no extension (e.g. ".bin")
  fallbackExtension: z.string().regex(/^\.[^./]+$/),
});

export const DelimiterPairSchema = z.object({
  open: z.string().min(1),
  close: z.string().min(1),
});

export const MathConfigSchema = z.object({
  inline: DelimiterPairSchema,
  block: DelimiterPairSchema,
  // Parent classes that put a <math> without a display attribute in block mode
  displayClasses: z.array(z.string()),
  rawTexAttribute: z.string().min(1),
});

export const MarkdownConfigSchema = z.object({
  headingStyle: z.enum(["atx", "setext"]),
  codeBlockStyle: z.enum(["fenced", "indented"]),
  emphasis: z.enum(["_", "*"]),
  strong: z.enum(["__", "**"]),
  bulletMarker: z.enum(["-", "+", "*"]),
  linkStyle: z.enum(["inlined", "referenced"]),
  codeFence: z.enum(["```", "~~~"]),
});

export const BibliographyConfigSchema = z.object({
  // Compared against the trimmed, lower-cased heading line
  marker: z.string().min(1),
  idPrefix: z.string().min(1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  source: SourceConfigSchema,
  output: OutputConfigSchema,
  fetch: FetchConfigSchema,
  html: HtmlConfigSchema,
  images: ImagesConfigSchema,
  math: MathConfigSchema,
  markdown: MarkdownConfigSchema,
  bibliography: BibliographyConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  source: SourceConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  fetch: FetchConfigSchema.partial().optional(),
  html: HtmlConfigSchema.partial().optional(),
  images: ImagesConfigSchema.partial().optional(),
  math: MathConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  bibliography: BibliographyConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type HtmlConfig = z.infer<typeof HtmlConfigSchema>;
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type DelimiterPair = z.infer<typeof DelimiterPairSchema>;
export type MathConfig = z.infer<typeof MathConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type BibliographyConfig = z.infer<typeof BibliographyConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Utility exports
 */

// Source resolution
export { toDocumentUrl, guessBasename } from "./source-url";

// Asset naming
export { assetBasename, splitExtension, uniqueName } from "./unique-name";

// Filesystem utilities
export { fileExists, isNonEmptyDirectory } from "./fs";

// Network utilities
export { HttpFetcher, FetchError, decodeBody, parseCharset } from "./fetch";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  loadPartialConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export type { LoggerOptions } from "./logger";
export { Tracker } from "./tracker";

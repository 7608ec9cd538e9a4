/**
 * Pipeline modules export
 */

export { sanitize } from "./sanitizer";
export { localizeAssets } from "./localizer";
export { normalizeMath } from "./math";
export { convertToMarkdown } from "./converter";
export {
  harvestBibliographyIds,
  restoreBibliographyAnchors,
} from "./anchors";
export { stats } from "./stats";

/**
 * Custom Turndown Rules Index
 * Exports all custom rules for ar5iv content
 */

export { texFragmentRule, TEX_FRAGMENT_ATTRIBUTE } from "./tex-fragment";
export { equationTableRule } from "./equation-table";
export { imageAltText } from "./image-alt-text";

/**
 * Sanitizer Module
 * Removes page chrome (footers) before any asset or math is collected
 */

import type { CheerioAPI } from "cheerio";

/**
 * Remove every subtree matching one of the selectors
 * No matches is a no-op
 */
export function sanitize($: CheerioAPI, removeSelectors: string[]): void {
  for (const selector of removeSelectors) {
    $(selector).remove();
  }
}

/**
 * Turndown Configuration
 * Sets up Turndown with custom rules for LaTeXML/ar5iv content
 */

import TurndownService from "turndown";
import { gfm } from "@truto/turndown-plugin-gfm";
import type { MarkdownConfig, TexFragment } from "../types";
import { texFragmentRule, equationTableRule, imageAltText } from "./rules";

export function createTurndownService(
  config: MarkdownConfig,
  fragments: readonly TexFragment[],
): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: config.headingStyle,
    codeBlockStyle: config.codeBlockStyle,
    emDelimiter: config.emphasis,
    strongDelimiter: config.strong,
    bulletListMarker: config.bulletMarker,
    linkStyle: config.linkStyle,
    fence: config.codeFence,
  });

  turndownService.remove(["script", "style", "noscript"]);

  // Add GitHub Flavored Markdown support (tables, strikethrough, task lists)
  turndownService.use(gfm);

  // Later rules take precedence, so these override the GFM table rules
  turndownService.use(imageAltText());
  turndownService.use(equationTableRule());
  turndownService.use(texFragmentRule(fragments));

  return turndownService;
}

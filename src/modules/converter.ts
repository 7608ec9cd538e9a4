/**
 * Markdown Converter Module
 * Serializes the prepared DOM and runs it through Turndown
 */

import type { CheerioAPI } from "cheerio";
import { createTurndownService } from "../turndown";
import { TEX_FRAGMENT_ATTRIBUTE } from "../turndown/rules";
import type { MarkdownConfig, TexFragment } from "../types";

/**
 * Convert the document body to Markdown
 *
 * TeX fragments are swapped for placeholder spans first so Turndown
 * emits them verbatim. This consumes the DOM: it must not be used afterwards.
 * The result ends with exactly one newline.
 */
export function convertToMarkdown(
  $: CheerioAPI,
  fragments: readonly TexFragment[],
  config: MarkdownConfig,
): string {
  fragments.forEach((fragment, index) => {
    if (!fragment.node.parent) return;
    const placeholder = $("<span></span>")
      .attr(TEX_FRAGMENT_ATTRIBUTE, String(index))
      .text(fragment.rendered.trim());
    $(fragment.node).replaceWith(placeholder);
  });

  const body = $("body");
  const html = (body.length > 0 ? body.html() : $.html()) ?? "";
  const turndown = createTurndownService(config, fragments);
  const markdown = turndown.turndown(html).replace(/\s+$/, "");
  return markdown ? `${markdown}\n` : "";
}

/**
 * Turndown Rule: TeX Fragments
 *
 * The math normalizer leaves TeX as plain text. Turndown would escape it
 * (\_, \*, \[) and collapse the newlines of block math, so the converter
 * swaps each fragment for a placeholder span and this rule writes the
 * stored string back untouched.
 */

import type TurndownService from "turndown";
import type { TexFragment } from "../../types";

export const TEX_FRAGMENT_ATTRIBUTE = "data-tex-fragment";

export function texFragmentRule(fragments: readonly TexFragment[]) {
  return (service: TurndownService): void => {
    service.addRule("texFragment", {
      filter: (node) =>
        node.nodeName === "SPAN" && node.hasAttribute(TEX_FRAGMENT_ATTRIBUTE),
      replacement: (_content, node) => {
        if (!("getAttribute" in node)) return "";
        const index = Number(node.getAttribute(TEX_FRAGMENT_ATTRIBUTE));
        return fragments[index]?.rendered ?? "";
      },
    });
  };
}

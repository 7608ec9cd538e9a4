/**
 * Turndown Rule: Set Alt Text on Images
 *
 * Overrides the default image rule so alt text is always present.
 * Falls back to the file name of the (already localized) src.
 */

import type TurndownService from "turndown";
import type { TurndownNode } from "../../types";

/**
 * Get alt text for an image node
 * Uses existing alt attribute or the last path segment of src if empty
 */
function getAltText(img: TurndownNode): string {
  if (!img.getAttribute) return "image";

  const alt = (img.getAttribute("alt") || "").trim();
  if (alt) return alt;

  const src = img.getAttribute("src") || "";
  if (/^data:/i.test(src)) return "image";
  const path = src.split(/[?#]/)[0];
  return path.split("/").pop() || "image";
}

export function imageAltText() {
  return (service: TurndownService): void => {
    service.addRule("imageAltText", {
      filter: "img",
      replacement: (_content, node) => {
        if (!("getAttribute" in node)) return "";

        const img: TurndownNode = node;
        const alt = getAltText(img).replace(/[[\]]/g, "\\$&");
        const src = node.getAttribute("src") || "";
        if (!src) return "";

        const title = node.getAttribute("title");
        const titlePart = title ? ` "${title.replace(/"/g, '\\"')}"` : "";
        return `![${alt}](${src}${titlePart})`;
      },
    });
  };
}

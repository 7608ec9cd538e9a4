/**
 * Bibliography Anchors Module
 * Turndown drops id attributes, so the ids of the reference list are
 * harvested from the DOM first and written back into the Markdown
 */

import type { CheerioAPI } from "cheerio";
import type { AnchorRestoration, BibliographyConfig } from "../types";

// "- ", "* ", "+ ", "1. ", "1) " with any indentation
const BULLET_PATTERN = /^\s*(?:[-*+]|\d+[.)])\s+/;
// "[12]" as written, or "\[12\]" as escaped by Turndown
const NUMBERED_REFERENCE_PATTERN = /^\\?\[(\d+)\\?\]/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Collect bibliography ids (e.g. "bib.bib1") in document order
 */
export function harvestBibliographyIds(
  $: CheerioAPI,
  idPrefix: string,
): string[] {
  const pattern = new RegExp(`^${escapeRegExp(idPrefix)}\\d+$`);
  return $("[id]")
    .toArray()
    .map((element) => element.attribs.id ?? "")
    .filter((id) => pattern.test(id));
}

/**
 * The heading line that opens the reference list
 * Matches "References" as well as "## References"
 */
export function isReferencesMarker(line: string, marker: string): boolean {
  const text = line
    .trim()
    .replace(/^#{1,6}\s+/, "")
    .trim()
    .toLowerCase();
  return text === marker.toLowerCase();
}

export function anchorTag(id: string): string {
  return `<a id="${id}"></a>`;
}

/**
 * Insert an anchor after the bullet of every reference-list entry
 *
 * Entries that start with "[N]" get the id built from N; other entries
 * consume the harvested ids in order until they run out. Lines before
 * the marker, and non-bullet lines after it, are left as they are.
 */
export function restoreBibliographyAnchors(
  markdown: string,
  ids: readonly string[],
  config: BibliographyConfig,
): AnchorRestoration {
  const lines = markdown.split("\n");
  let inReferences = false;
  let cursor = 0;
  let inserted = 0;

  const output = lines.map((line) => {
    if (!inReferences) {
      inReferences = isReferencesMarker(line, config.marker);
      return line;
    }

    const bullet = line.match(BULLET_PATTERN);
    if (!bullet) return line;

    const prefix = bullet[0];
    const rest = line.slice(prefix.length);

    let id: string | undefined;
    const numbered = rest.match(NUMBERED_REFERENCE_PATTERN);
    if (numbered) {
      id = `${config.idPrefix}${numbered[1]}`;
    } else if (cursor < ids.length) {
      id = ids[cursor];
      cursor++;
    }

    if (id === undefined) return line;
    inserted++;
    return `${prefix}${anchorTag(id)}${rest}`;
  });

  return { markdown: output.join("\n"), inserted };
}

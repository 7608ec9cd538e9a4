/**
 * Math Normalizer Module
 * Replaces MathML markup with plain-text TeX in $...$ / $$...$$ form
 */

import type { CheerioAPI } from "cheerio";
import { Text, isTag, type AnyNode, type Element } from "domhandler";
import type { MathConfig, MathNormalization, TexFragment } from "../types";

// ============================================================================
// TeX Extraction
// ============================================================================

/**
 * One step of the extraction chain; returns undefined when it has nothing
 */
export type TexExtractor = ($: CheerioAPI, math: Element) => string | undefined;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * <annotation encoding="application/x-tex"> (any encoding containing "tex")
 */
export const fromAnnotation: TexExtractor = ($, math) => {
  const annotation = $(math)
    .find("annotation")
    .toArray()
    .find((node) => /tex/i.test(node.attribs.encoding ?? ""));
  return annotation ? nonEmpty($(annotation).text()) : undefined;
};

export const fromAttribute =
  (name: string): TexExtractor =>
  (_$, math) =>
    nonEmpty(math.attribs[name]);

/**
 * Extraction chain in priority order; the first non-empty result wins
 */
export function texExtractors(config: MathConfig): TexExtractor[] {
  return [
    fromAnnotation,
    fromAttribute("alttext"),
    fromAttribute(config.rawTexAttribute),
  ];
}

export function extractTex(
  $: CheerioAPI,
  math: Element,
  extractors: TexExtractor[],
): string | undefined {
  for (const extract of extractors) {
    const tex = extract($, math);
    if (tex) return tex;
  }
  return undefined;
}

// ============================================================================
// Display Classification
// ============================================================================

function classList(node: AnyNode | null): string[] {
  if (!node || !isTag(node)) return [];
  return (node.attribs.class ?? "").split(/\s+/).filter(Boolean);
}

/**
 * An explicit display attribute decides; without one, the parent's classes do
 */
export function isBlockMath(math: Element, displayClasses: string[]): boolean {
  const display = math.attribs.display;
  if (display !== undefined) {
    return display.trim().toLowerCase() === "block";
  }
  return classList(math.parent).some((name) => displayClasses.includes(name));
}

// ============================================================================
// Rendering
// ============================================================================

function hasLineBreak(tex: string): boolean {
  return /[\r\n]/.test(tex);
}

/**
 * Block form is also used for any source spanning several lines
 */
export function renderTex(
  source: string,
  isBlock: boolean,
  config: MathConfig,
): string {
  const tex = source.trim();
  if (isBlock || hasLineBreak(tex)) {
    return `\n${config.block.open}\n${tex}\n${config.block.close}\n`;
  }
  return `${config.inline.open}${tex}${config.inline.close}`;
}

// ============================================================================
// Main Normalizer Function
// ============================================================================

/**
 * Replace every <math> that has a TeX source with a single text node
 * Elements without one are left for the converter's default handling
 */
export function normalizeMath(
  $: CheerioAPI,
  config: MathConfig,
): MathNormalization {
  const extractors = texExtractors(config);
  const fragments: TexFragment[] = [];
  let unresolved = 0;

  // Nested <math> goes away with its outer element
  const elements = $("math")
    .toArray()
    .filter((math) => $(math).parents("math").length === 0);

  for (const math of elements) {
    const source = extractTex($, math, extractors);
    if (!source) {
      unresolved++;
      continue;
    }

    const isBlock =
      isBlockMath(math, config.displayClasses) || hasLineBreak(source);
    const rendered = renderTex(source, isBlock, config);
    const node = new Text(rendered);
    $(math).replaceWith(node);
    fragments.push({ source, isBlock, rendered, node });
  }

  return { fragments, unresolved };
}

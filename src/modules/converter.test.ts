import { describe, it, expect, beforeAll } from "vitest";
import { load } from "cheerio";
import { convertToMarkdown } from "./converter";
import { normalizeMath } from "./math";
import { loadDefaultConfig } from "../utils";
import type { ConversionConfig } from "../types";

let config: ConversionConfig;

beforeAll(async () => {
  config = await loadDefaultConfig();
});

function convert(html: string): string {
  const $ = load(html);
  const { fragments } = normalizeMath($, config.math);
  return convertToMarkdown($, fragments, config.markdown);
}

describe("convertToMarkdown", () => {
  it("emits inline TeX verbatim while escaping ordinary text", () => {
    expect(
      convert('<p>Energy <math alttext="E_k"></math> is *kinetic*_x.</p>'),
    ).toBe("Energy $E_k$ is \\*kinetic\\*\\_x.\n");
  });

  it("keeps block TeX on its own lines", () => {
    expect(
      convert(
        '<p>Before</p><div class="ltx_displaymath"><math alttext="a_1 + b"></math></div><p>After</p>',
      ),
    ).toBe("Before\n\n$$\na_1 + b\n$$\n\nAfter\n");
  });

  it("flattens equation tables instead of emitting a Markdown table", () => {
    expect(
      convert(
        '<table class="ltx_equation ltx_eqn_table"><tbody><tr><td class="ltx_eqn_cell ltx_eqn_center_padleft"></td><td class="ltx_eqn_cell ltx_align_center"><math alttext="E=mc^{2}"></math></td><td class="ltx_eqn_cell ltx_eqn_eqno"><span class="ltx_tag">(1)</span></td></tr></tbody></table>',
      ),
    ).toBe("$$\nE=mc^{2}\n$$\n\n(1)\n");
  });

  it("joins inline cells of an equation row with spaces", () => {
    expect(
      convert(
        '<table class="ltx_equationgroup"><tbody><tr><td class="ltx_eqn_cell"><math display="inline" alttext="a"></math></td><td class="ltx_eqn_cell"><math display="inline" alttext="=b"></math></td></tr></tbody></table>',
      ),
    ).toBe("$a$ $=b$\n");
  });

  it("fills in missing alt text from the file name", () => {
    expect(convert('<p><img src="assets/x1.png" alt=""></p>')).toBe(
      "![x1.png](assets/x1.png)\n",
    );
  });

  it("escapes brackets in alt text", () => {
    expect(convert('<p><img src="assets/x1.png" alt="Panel [a]"></p>')).toBe(
      "![Panel \\[a\\]](assets/x1.png)\n",
    );
  });

  it("drops scripts and styles", () => {
    expect(
      convert("<style>p { color: red; }</style><p>Text</p><script>var a = 1;</script>"),
    ).toBe("Text\n");
  });

  it("renders the reference list as bullet lines", () => {
    const markdown = convert(
      '<h2>References</h2><ul><li id="bib.bib1"><span class="ltx_tag">[1]</span><span>A. Author.</span></li></ul>',
    );
    const lines = markdown.split("\n");
    expect(lines[0]).toBe("## References");
    expect(lines[2]).toMatch(/^-\s+\\\[1\\\]A\. Author\.$/);
  });

  it("returns an empty string for an empty body", () => {
    expect(convert("")).toBe("");
  });
});

import { describe, it, expect } from "vitest";
import { load } from "cheerio";
import {
  harvestBibliographyIds,
  isReferencesMarker,
  restoreBibliographyAnchors,
} from "./anchors";

const CONFIG = { marker: "references", idPrefix: "bib.bib" };

describe("harvestBibliographyIds", () => {
  it("collects numbered bibliography ids in document order", () => {
    const $ = load(`
      <ul class="ltx_biblist">
        <li class="ltx_bibitem" id="bib.bib2">Second</li>
        <li class="ltx_bibitem" id="bib.bib10">Tenth</li>
        <li class="ltx_bibitem" id="bib.bib3">Third</li>
      </ul>
      <p id="bib.bibx">Not numbered</p>
      <section id="bib">Section</section>
    `);
    expect(harvestBibliographyIds($, "bib.bib")).toEqual([
      "bib.bib2",
      "bib.bib10",
      "bib.bib3",
    ]);
  });

  it("returns an empty list without a bibliography", () => {
    const $ = load("<p>No references</p>");
    expect(harvestBibliographyIds($, "bib.bib")).toEqual([]);
  });
});

describe("isReferencesMarker", () => {
  it("matches plain and heading forms case-insensitively", () => {
    expect(isReferencesMarker("References", "references")).toBe(true);
    expect(isReferencesMarker("  REFERENCES  ", "references")).toBe(true);
    expect(isReferencesMarker("## References", "references")).toBe(true);
  });

  it("requires the whole line to be the marker", () => {
    expect(isReferencesMarker("References and notes", "references")).toBe(false);
    expect(isReferencesMarker("- References", "references")).toBe(false);
  });
});

describe("restoreBibliographyAnchors", () => {
  it("leaves everything before the marker untouched", () => {
    const markdown = ["- [1] Not a reference yet", "Text"].join("\n");
    const result = restoreBibliographyAnchors(markdown, ["bib.bib1"], CONFIG);
    expect(result).toEqual({ markdown, inserted: 0 });
  });

  it("builds ids from manually numbered entries", () => {
    const markdown = [
      "## References",
      "",
      "-   \\[1\\]A. Author. A result.",
      "-   [12] C. Writer. Another.",
    ].join("\n");

    const result = restoreBibliographyAnchors(markdown, [], CONFIG);
    expect(result.markdown.split("\n")).toEqual([
      "## References",
      "",
      '-   <a id="bib.bib1"></a>\\[1\\]A. Author. A result.',
      '-   <a id="bib.bib12"></a>[12] C. Writer. Another.',
    ]);
    expect(result.inserted).toBe(2);
  });

  it("consumes harvested ids in order for unnumbered entries", () => {
    const markdown = [
      "References",
      "----------",
      "* First entry",
      "not a list line",
      "  1. Second entry",
      "* Third entry",
    ].join("\n");

    const result = restoreBibliographyAnchors(
      markdown,
      ["bib.bib1", "bib.bib2"],
      CONFIG,
    );
    expect(result.markdown.split("\n")).toEqual([
      "References",
      "----------",
      '* <a id="bib.bib1"></a>First entry',
      "not a list line",
      '  1. <a id="bib.bib2"></a>Second entry',
      "* Third entry",
    ]);
    expect(result.inserted).toBe(2);
  });

  it("inserts min(K, M) harvested anchors", () => {
    const entries = ["- a", "- b", "- c"];
    const ids = ["bib.bib1", "bib.bib2", "bib.bib3", "bib.bib4", "bib.bib5"];

    for (let k = 0; k <= entries.length; k++) {
      for (let m = 0; m <= ids.length; m++) {
        const markdown = ["References", ...entries.slice(0, k)].join("\n");
        const { inserted } = restoreBibliographyAnchors(
          markdown,
          ids.slice(0, m),
          CONFIG,
        );
        expect(inserted).toBe(Math.min(k, m));
      }
    }
  });

  it("checks the numbered pattern before the harvested cursor", () => {
    const markdown = ["References", "- [3] Numbered", "- Unnumbered"].join(
      "\n",
    );
    const result = restoreBibliographyAnchors(
      markdown,
      ["bib.bib1", "bib.bib2"],
      CONFIG,
    );
    expect(result.markdown.split("\n")).toEqual([
      "References",
      '- <a id="bib.bib3"></a>[3] Numbered',
      '- <a id="bib.bib1"></a>Unnumbered',
    ]);
  });

  describe("trailing newline", () => {
    it("keeps a missing trailing newline missing", () => {
      const result = restoreBibliographyAnchors(
        "References\n- a",
        ["bib.bib1"],
        CONFIG,
      );
      expect(result.markdown).toBe('References\n- <a id="bib.bib1"></a>a');
    });

    it("keeps exactly one trailing newline", () => {
      const result = restoreBibliographyAnchors(
        "References\n- a\n",
        ["bib.bib1"],
        CONFIG,
      );
      expect(result.markdown).toBe('References\n- <a id="bib.bib1"></a>a\n');
    });
  });
});

/**
 * Turndown Rule: Equation Tables
 *
 * LaTeXML lays out numbered equations as tables:
 *   <table class="ltx_equation">
 *     <tr><td class="ltx_eqn_cell"><math display="block">…</math></td>
 *         <td class="ltx_eqn_eqno"><span class="ltx_tag">(1)</span></td></tr>
 *   </table>
 * These must not become Markdown tables. Rows become paragraphs; cells
 * holding block math stay on their own lines, inline cells are joined
 * with spaces (so the equation number follows the equation).
 */

import type TurndownService from "turndown";
import type { TurndownNode } from "../../types";

const EQUATION_TABLE_CLASSES = ["ltx_equation", "ltx_equationgroup"];
const TABLE_PARTS = ["TABLE", "THEAD", "TBODY", "TFOOT", "TR", "TD", "TH"];

function isEquationTable(node: TurndownNode): boolean {
  if (node.nodeName !== "TABLE" || !node.getAttribute) return false;
  const classes = (node.getAttribute("class") || "").split(/\s+/);
  return classes.some((name) => EQUATION_TABLE_CLASSES.includes(name));
}

/**
 * Find the table a table part belongs to (the node itself for TABLE)
 */
function owningTable(node: TurndownNode): TurndownNode | null {
  let current: TurndownNode | null | undefined = node;
  while (current) {
    if (current.nodeName === "TABLE") return current;
    current = current.parentNode;
  }
  return null;
}

function isEquationTablePart(node: TurndownNode): boolean {
  if (!TABLE_PARTS.includes(node.nodeName)) return false;
  const table = owningTable(node);
  return table !== null && isEquationTable(table);
}

export function equationTableRule() {
  return (service: TurndownService): void => {
    service.addRule("equationTable", {
      filter: (node) => isEquationTablePart(node),
      replacement: (content, node) => {
        const trimmed = content.trim();
        switch (node.nodeName) {
          case "TD":
          case "TH":
            if (!trimmed) return "";
            return trimmed.includes("\n") ? `\n\n${trimmed}\n\n` : `${trimmed} `;
          case "THEAD":
          case "TBODY":
          case "TFOOT":
            return content;
          default:
            return trimmed ? `\n\n${trimmed}\n\n` : "";
        }
      },
    });
  };
}

/**
 * Responsive single-page HTML view: download buttons, one chip per seed
 * for navigation and one horizontally scrollable table per group.
 */
import { writeFile } from "node:fs/promises";
import { roundTo } from "@src/market/pivots";
import type { PivotGroup } from "@src/market/types";
import { REPORT_SUBTITLE, REPORT_TITLE } from "../constants";
import {
  ROW_COLUMNS,
  formatTimestamp,
  groupLabel,
  rowCells,
} from "./table";

export const POSITIVE_COLOR = "#1a7f37";
export const NEGATIVE_COLOR = "#cc0000";

export interface HtmlReportOptions {
  pdfUrl: string;
  csvUrl: string;
  generatedAt: Date;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function sectionId(seed: string): string {
  return `sec_${seed}`;
}

function renderGroupTable(group: PivotGroup): string {
  const thead = ROW_COLUMNS.map(c => `<th>${escapeHtml(c)}</th>`).join("");
  const body = group.rows
    .map(row => {
      const cells = rowCells(row);
      // sign of the displayed value, so "0.00%" is never red
      const color =
        roundTo(row.percentChange, 2) >= 0 ? POSITIVE_COLOR : NEGATIVE_COLOR;
      const tds = ROW_COLUMNS.map(col => {
        const value = escapeHtml(cells[col]);
        if (col === "% Chg") {
          return `<td><span style="color:${color}">${value}%</span></td>`;
        }
        return `<td>${value}</td>`;
      }).join("");
      return `<tr>${tds}</tr>`;
    })
    .join("");
  return (
    "<div class='table-wrap'><table>" +
    `<thead><tr>${thead}</tr></thead>` +
    `<tbody>${body}</tbody>` +
    "</table></div>"
  );
}

export function renderHtml(
  groups: readonly PivotGroup[],
  options: HtmlReportOptions
): string {
  const chips = groups
    .map(
      g =>
        `<a class="chip" href="#${escapeHtml(sectionId(g.seed))}">${escapeHtml(g.seed)}</a>`
    )
    .join("");
  const sections = groups
    .map(
      g =>
        `<section id='${escapeHtml(sectionId(g.seed))}'><h2>${escapeHtml(groupLabel(g.seed))}</h2>${renderGroupTable(g)}</section>`
    )
    .join("");
  const updatedAt = escapeHtml(formatTimestamp(options.generatedAt));

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(REPORT_TITLE)}</title>
<style>
  body { font-family: -apple-system, BlinkMacSystemFont, Segoe UI, Roboto, Helvetica, Arial, "Noto Sans", sans-serif; margin: 16px; }
  h1 { font-size: 1.25rem; margin: 0 0 8px; }
  h2 { font-size: 1.1rem; margin: 20px 0 10px; }
  .sub { color:#666; font-size:.85rem; margin-bottom:12px; }
  .bar { display:flex; gap:8px; flex-wrap:wrap; margin:12px 0; align-items:center; }
  .btn { text-decoration:none; padding:10px 14px; border-radius:10px; border:1px solid #ddd; }
  .chips { display:flex; gap:8px; flex-wrap:wrap; margin:4px 0 10px; }
  .chip { padding:6px 10px; border-radius:999px; border:1px solid #ddd; background:#fafafa; text-decoration:none; color:#333; }
  .table-wrap { overflow-x:auto; -webkit-overflow-scrolling:touch; border:1px solid #eee; border-radius:10px; }
  table { border-collapse:collapse; width:100%; font-size:14px; }
  th, td { white-space:nowrap; padding:10px 12px; border-bottom:1px solid #f0f0f0; }
  th { position:sticky; top:0; background:#fafafa; text-align:left; }
  @media (max-width:480px) {
    table { font-size:13px; }
    th, td { padding:8px 10px; }
  }
</style>
</head>
<body>
  <h1>${escapeHtml(REPORT_TITLE)}</h1>
  <div class="sub">${escapeHtml(REPORT_SUBTITLE)}</div>

  <div class="bar">
    <a class="btn" href="${escapeHtml(options.pdfUrl)}">📄 Download PDF</a>
    <a class="btn" href="${escapeHtml(options.csvUrl)}">⬇️ Download CSV</a>
  </div>

  <div class="chips">
    ${chips}
  </div>

  ${sections}

  <div class="sub" style="margin-top:10px;color:#888;">Updated at: ${updatedAt}</div>
</body>
</html>
`;
}

export async function writeHtml(
  path: string,
  groups: readonly PivotGroup[],
  options: HtmlReportOptions
): Promise<void> {
  await writeFile(path, renderHtml(groups, options), "utf-8");
}

/**
 * Canonical tabular view of the dataset shared by the CSV, PDF and HTML
 * writers. Numbers are rounded to 2 decimals here and nowhere earlier.
 */
import { roundTo } from "@src/market/pivots";
import type { PivotGroup, PivotRow } from "@src/market/types";

export const COLUMNS = [
  "Group",
  "Ticker",
  "Date",
  "High",
  "Low",
  "Close",
  "PrevClose",
  "% Chg",
  "Pivot P",
  "S1",
  "S2",
  "R1",
  "R2",
] as const;

export type Column = (typeof COLUMNS)[number];
export type RowColumn = Exclude<Column, "Group">;

/** Columns shown inside a group page or section, where the group is the heading. */
export const ROW_COLUMNS: readonly RowColumn[] = COLUMNS.filter(
  (c): c is RowColumn => c !== "Group"
);

export type RowCells = Record<RowColumn, string>;

export function groupLabel(seed: string): string {
  return `${seed} + Peers`;
}

export function formatNumber(value: number): string {
  return roundTo(value, 2).toFixed(2);
}

export function rowCells(row: PivotRow): RowCells {
  return {
    Ticker: row.symbol,
    Date: row.date,
    High: formatNumber(row.high),
    Low: formatNumber(row.low),
    Close: formatNumber(row.close),
    PrevClose: formatNumber(row.prevClose),
    "% Chg": formatNumber(row.percentChange),
    "Pivot P": formatNumber(row.pivot),
    S1: formatNumber(row.s1),
    S2: formatNumber(row.s2),
    R1: formatNumber(row.r1),
    R2: formatNumber(row.r2),
  };
}

/** Every row of every group as cells in `COLUMNS` order. */
export function flattenGroups(groups: readonly PivotGroup[]): string[][] {
  const lines: string[][] = [];
  for (const group of groups) {
    const label = groupLabel(group.seed);
    for (const row of group.rows) {
      const cells = rowCells(row);
      lines.push([label, ...ROW_COLUMNS.map(c => cells[c])]);
    }
  }
  return lines;
}

/** UTC "YYYY-MM-DD HH:mm" stamp used on the cover page and page footer. */
export function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())} UTC`
  );
}

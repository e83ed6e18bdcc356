import { writeFile } from "node:fs/promises";
import type { PivotGroup } from "@src/market/types";
import { COLUMNS, flattenGroups } from "./table";

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

export function renderCsv(groups: readonly PivotGroup[]): string {
  const header: string[] = [...COLUMNS];
  const lines = [header, ...flattenGroups(groups)].map(cells =>
    cells.map(escapeField).join(",")
  );
  return lines.join("\n") + "\n";
}

export async function writeCsv(
  path: string,
  groups: readonly PivotGroup[]
): Promise<void> {
  await writeFile(path, renderCsv(groups), "utf-8");
}

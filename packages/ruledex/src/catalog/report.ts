import type { PresentableRow } from "../engine/types.js";
import { TextTable } from "./text-table.js";
import { DEFAULT_LAYOUT, truncateDescription, type TruncationLayout } from "./truncate.js";

export const TABLE_COLUMNS = [
  "identifier",
  "opt-in",
  "correctable",
  "enabled in your config",
  "kind",
  "analyzer",
  "configuration",
] as const;

/** Orders by code point, which differs from `<` only past the BMP. */
export function compareIdentifiers(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

/** Stable: rows sharing an identifier keep their expansion order. */
export function sortRows(rows: readonly PresentableRow[]): PresentableRow[] {
  return [...rows].sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
}

function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}

export function rowValues(row: PresentableRow, terminalWidth: number, layout: TruncationLayout): string[] {
  return [
    row.identifier,
    yesNo(row.optIn),
    yesNo(row.correctable),
    yesNo(row.configured),
    row.kind,
    yesNo(row.analyzer),
    truncateDescription(row.configuration, terminalWidth, layout),
  ];
}

export function formatTable(
  rows: readonly PresentableRow[],
  terminalWidth: number,
  layout: TruncationLayout = DEFAULT_LAYOUT,
): string {
  const table = new TextTable(TABLE_COLUMNS);
  for (const row of sortRows(rows)) {
    table.addRow(rowValues(row, terminalWidth, layout));
  }
  return table.render();
}

export function formatJson(rows: readonly PresentableRow[]): string {
  return JSON.stringify(sortRows(rows), null, 2);
}

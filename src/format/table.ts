/**
 * Purpose: Draw arrays as a titled box table for terminal display.
 * Intent: Heavy header rule over light body rules, left-justified cells padded by one space.
 */

import type { NDArray } from "../types.js";
import { formatG } from "./number_format.js";

export const TABLE_TITLE = "Matrix Result";

const BOX = {
  head: { left: "┏", fill: "━", join: "┳", right: "┓" },
  headRow: { left: "┃", join: "┃", right: "┃" },
  headSep: { left: "┡", fill: "━", join: "╇", right: "┩" },
  row: { left: "│", join: "│", right: "│" },
  foot: { left: "└", fill: "─", join: "┴", right: "┘" },
} as const;

function rule(widths: readonly number[], edge: { left: string; fill: string; join: string; right: string }): string {
  return `${edge.left}${widths.map((w) => edge.fill.repeat(w + 2)).join(edge.join)}${edge.right}`;
}

function line(cells: readonly string[], widths: readonly number[], edge: { left: string; join: string; right: string }): string {
  const padded = cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0, " ")} `);
  return `${edge.left}${padded.join(edge.join)}${edge.right}`;
}

function center(text: string, width: number): string {
  const space = Math.max(0, width - text.length);
  const left = Math.floor(space / 2);
  return `${" ".repeat(left)}${text}${" ".repeat(space - left)}`;
}

/** Rank 0 and 1 render as a single row; rank 2 as one row per matrix row. */
export function arrayToTable(arr: NDArray, precision: number): string {
  const columns = arr.shape.length >= 2 ? (arr.shape[arr.shape.length - 1] ?? 0) : Math.max(arr.data.length, 1);
  const rowCount = columns === 0 ? 0 : arr.data.length / columns;
  const header = Array.from({ length: columns }, (_, i) => `[${i}]`);
  const rows: string[][] = [];
  for (let r = 0; r < rowCount; r++) {
    rows.push(Array.from(arr.data.subarray(r * columns, (r + 1) * columns), (x) => formatG(x, precision)));
  }

  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? "").length)));
  const out = [rule(widths, BOX.head), line(header, widths, BOX.headRow), rule(widths, BOX.headSep)];
  for (const row of rows) out.push(line(row, widths, BOX.row));
  out.push(rule(widths, BOX.foot));

  const tableWidth = out[0]?.length ?? 0;
  return [center(TABLE_TITLE, tableWidth), ...out].join("\n");
}

/**
 * Purpose: Parse whitespace-separated numeric text into an array.
 * Intent: Mirror numpy.loadtxt defaults: `#` comments, blank lines skipped, and a
 * single row or column squeezed to 1-D.
 */

import { LoaderError } from "../errors.js";
import type { NDArray } from "../types.js";

function parseNumber(token: string, line: number): number {
  const lower = token.toLowerCase();
  if (lower === "nan" || lower === "+nan" || lower === "-nan") return Number.NaN;
  if (lower === "inf" || lower === "+inf" || lower === "infinity") return Number.POSITIVE_INFINITY;
  if (lower === "-inf" || lower === "-infinity") return Number.NEGATIVE_INFINITY;
  const n = Number(token);
  if (token.length === 0 || Number.isNaN(n)) {
    throw new LoaderError("MC_LOAD_TEXT", `could not convert string to float: '${token}' (line ${line})`);
  }
  return n;
}

export function parseTextMatrix(text: string): NDArray {
  const rows: number[][] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const hash = raw.indexOf("#");
    const content = (hash >= 0 ? raw.slice(0, hash) : raw).trim();
    if (content.length === 0) return;
    const row = content.split(/\s+/).map((tok) => parseNumber(tok, i + 1));
    const width = rows[0]?.length;
    if (width !== undefined && row.length !== width) {
      throw new LoaderError(
        "MC_LOAD_TEXT",
        `the number of columns changed from ${width} to ${row.length} at row ${rows.length + 1}`
      );
    }
    rows.push(row);
  });

  if (rows.length === 0) throw new LoaderError("MC_LOAD_TEXT", "input contained no data");
  const cols = rows[0]?.length ?? 0;
  const data = Float64Array.from(rows.flat());
  if (rows.length === 1 && cols === 1) return { shape: [], data };
  if (rows.length === 1 || cols === 1) return { shape: [data.length], data };
  return { shape: [rows.length, cols], data };
}

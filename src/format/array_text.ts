/**
 * Purpose: Render arrays as bracketed text in the style of NumPy's array printing.
 * Intent: Positional notation with a shared column layout; scientific notation only
 * for magnitudes of 1e8 and above.
 */

import type { NDArray } from "../types.js";

const EXP_THRESHOLD = 1e8;

interface Cell {
  int: string;
  frac: string | null;
  exp: string;
}

function splitCell(s: string, exp = ""): Cell {
  const dot = s.indexOf(".");
  return dot < 0 ? { int: s, frac: null, exp } : { int: s.slice(0, dot), frac: s.slice(dot + 1), exp };
}

function specialCell(x: number): Cell | null {
  if (Number.isNaN(x)) return { int: "nan", frac: null, exp: "" };
  if (!Number.isFinite(x)) return { int: x > 0 ? "inf" : "-inf", frac: null, exp: "" };
  return null;
}

function positionalCells(values: readonly number[], precision: number): Cell[] {
  return values.map((x) => {
    const special = specialCell(x);
    if (special) return special;
    const fixed = x.toFixed(precision).replace(/0+$/, "");
    return splitCell(fixed.includes(".") ? fixed : `${fixed}.`);
  });
}

function scientificCells(values: readonly number[], precision: number): Cell[] {
  // Shortest mantissa per value first, then every value shares the longest fraction.
  let digits = 0;
  for (const x of values) {
    if (!Number.isFinite(x)) continue;
    const [mantissa = ""] = x.toExponential(precision).split("e");
    const frac = mantissa.split(".")[1]?.replace(/0+$/, "") ?? "";
    digits = Math.max(digits, frac.length);
  }
  return values.map((x) => {
    const special = specialCell(x);
    if (special) return special;
    const [mantissa = "0", expText = "0"] = x.toExponential(digits).split("e");
    const exp = Number(expText);
    const expDigits = String(Math.abs(exp)).padStart(2, "0");
    return splitCell(mantissa.includes(".") ? mantissa : `${mantissa}.`, `e${exp < 0 ? "-" : "+"}${expDigits}`);
  });
}

function renderCells(values: readonly number[], precision: number): string[] {
  const finite = values.filter((x) => Number.isFinite(x)).map((x) => Math.abs(x));
  const useExp = finite.length > 0 && Math.max(...finite) >= EXP_THRESHOLD;
  const cells = useExp ? scientificCells(values, precision) : positionalCells(values, precision);

  const intWidth = Math.max(...cells.map((c) => c.int.length));
  const fracWidth = Math.max(...cells.map((c) => c.frac?.length ?? -1));
  const expWidth = Math.max(...cells.map((c) => c.exp.length));
  return cells.map((c) => {
    const head = c.int.padStart(intWidth, " ");
    // Values without a fraction (nan, inf) also occupy the dot column.
    const tail = c.frac === null ? " ".repeat(fracWidth + 1) : `.${c.frac.padEnd(fracWidth, " ")}`;
    return `${head}${fracWidth < 0 ? "" : tail}${c.exp.padStart(expWidth, " ")}`;
  });
}

/** Bracketed text for `arr`; 0-d arrays render as their single element. */
export function arrayToText(arr: NDArray, precision: number): string {
  if (arr.data.length === 0) return "[]";
  const cells = renderCells(Array.from(arr.data), precision);
  if (arr.shape.length === 0) return (cells[0] ?? "").trim();

  const rank = arr.shape.length;
  const build = (depth: number, offset: number): string => {
    const dim = arr.shape[depth] ?? 0;
    let stride = 1;
    for (let axis = depth + 1; axis < rank; axis++) stride *= arr.shape[axis] ?? 1;
    const parts: string[] = [];
    for (let i = 0; i < dim; i++) {
      parts.push(depth === rank - 1 ? (cells[offset + i] ?? "") : build(depth + 1, offset + i * stride));
    }
    const separator = depth === rank - 1 ? " " : `${"\n".repeat(rank - depth - 1)}${" ".repeat(depth + 1)}`;
    return `[${parts.join(separator)}]`;
  };
  return build(0, 0);
}

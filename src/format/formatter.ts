/**
 * Purpose: Turn evaluation results into display text or NPY bytes.
 * Intent: One entry point per result kind; every text format shares the scalar rule
 * and the small-value threshold.
 */

import { FormatError } from "../errors.js";
import { map, toNested } from "../ndarray.js";
import { serializeNpy } from "../io/npy.js";
import type { NDArray, Result, Value } from "../types.js";
import { arrayToText } from "./array_text.js";
import { formatG, formatRepr } from "./number_format.js";
import { arrayToTable } from "./table.js";

export const OUTPUT_FORMATS = ["plain", "text", "csv", "json", "latex", "table", "npy"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface FormatOptions {
  format: OutputFormat;
  precision: number;
  threshold: number;
}

export const DEFAULT_FORMAT_OPTIONS: Readonly<FormatOptions> = Object.freeze({
  format: "plain",
  precision: 4,
  threshold: 1e-10,
});

export type FormattedOutput = { kind: "text"; text: string } | { kind: "binary"; bytes: Uint8Array };

export function applyThreshold(x: number, threshold: number): number {
  return Math.abs(x) < threshold ? 0 : x;
}

export function thresholdArray(arr: NDArray, threshold: number): NDArray {
  return map(arr, (x) => applyThreshold(x, threshold));
}

/** Leading axes are folded so that the result has at most two. */
function asRows(arr: NDArray): number[][] {
  if (arr.shape.length === 0) return [[arr.data[0] ?? 0]];
  const cols = arr.shape[arr.shape.length - 1] ?? 0;
  const rows: number[][] = [];
  for (let r = 0; cols > 0 && r < arr.data.length / cols; r++) {
    rows.push(Array.from(arr.data.subarray(r * cols, (r + 1) * cols)));
  }
  return rows;
}

function arrayToPlain(arr: NDArray, precision: number): string {
  if (arr.shape.length <= 1) return Array.from(arr.data, (x) => formatG(x, precision)).join("\n");
  return asRows(arr)
    .map((row) => row.map((x) => formatG(x, precision)).join("\t"))
    .join("\n");
}

function arrayToCsv(arr: NDArray): string {
  if (arr.shape.length <= 1) return Array.from(arr.data, formatRepr).join(",");
  return asRows(arr)
    .map((row) => row.map(formatRepr).join(","))
    .join("\n");
}

function arrayToLatex(arr: NDArray, precision: number): string {
  const rows = arr.shape.length <= 1 ? [Array.from(arr.data)] : asRows(arr);
  const body = rows.map((row) => `${row.map((x) => formatG(x, precision)).join(" & ")} \\\\`);
  return ["\\begin{bmatrix}", ...body, "\\end{bmatrix}"].join("\n");
}

function arrayToJson(arr: NDArray): string {
  return JSON.stringify(toNested(arr), null, 2);
}

/** Text for an already thresholded array. */
export function renderArray(arr: NDArray, format: Exclude<OutputFormat, "npy">, precision: number): string {
  switch (format) {
    case "plain":
      return arrayToPlain(arr, precision);
    case "text":
      return arrayToText(arr, precision);
    case "csv":
      return arrayToCsv(arr);
    case "json":
      return arrayToJson(arr);
    case "latex":
      return arrayToLatex(arr, precision);
    case "table":
      return arrayToTable(arr, precision);
    default: {
      const _exhaustive: never = format;
      return _exhaustive;
    }
  }
}

/** `savetxt`-style file body: one line per row, or per element for 1-D input. */
export function delimitedText(arr: NDArray, delimiter: string, precision: number): string {
  const rows = arr.shape.length === 1 ? Array.from(arr.data, (x) => [x]) : asRows(arr);
  return rows.map((row) => `${row.map((x) => formatG(x, precision)).join(delimiter)}\n`).join("");
}

export function formatValue(value: Value, format: Exclude<OutputFormat, "npy">, options: FormatOptions): string {
  if (value.kind === "scalar") return formatG(applyThreshold(value.value, options.threshold), options.precision);
  return renderArray(thresholdArray(value.value, options.threshold), format, options.precision);
}

export function valueToNpy(value: Value, threshold: number): Uint8Array {
  const arr = value.kind === "scalar" ? { shape: [], data: Float64Array.of(value.value) } : value.value;
  return serializeNpy(thresholdArray(arr, threshold));
}

export function formatResult(result: Result, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): FormattedOutput {
  const { format } = options;
  if (format === "npy") {
    if (result.kind === "tuple") {
      throw new FormatError(
        "MC_FORMAT_UNSUPPORTED",
        "A tuple result cannot be written as a single NPY stream; use --output with --components"
      );
    }
    return { kind: "binary", bytes: valueToNpy(result, options.threshold) };
  }

  if (result.kind !== "tuple") return { kind: "text", text: formatValue(result, format, options) };

  const parts: string[] = [];
  result.items.forEach((item, i) => {
    const text = formatValue(item, format, options);
    if (format === "plain") parts.push(`COMPONENT_${i}`, text);
    else parts.push(`Component ${i}:\n${text}`);
  });
  return { kind: "text", text: parts.join("\n\n") };
}

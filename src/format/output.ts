/**
 * Purpose: Write formatted results to files.
 * Intent: Return a one-line status for the caller to report; file contents follow
 * the same formatting rules as console output.
 */

import { writeFileSync } from "node:fs";
import { extname } from "node:path";
import { errorMessage, FormatError } from "../errors.js";
import type { Result, Value } from "../types.js";
import {
  delimitedText,
  formatResult,
  formatValue,
  thresholdArray,
  valueToNpy,
  type FormatOptions,
} from "./formatter.js";
import { formatRepr } from "./number_format.js";

export interface SaveOptions extends FormatOptions {
  /** Write each tuple component to its own `<base>_<i><ext>` file. */
  components: boolean;
}

function writeFile(path: string, contents: string | Uint8Array): void {
  try {
    writeFileSync(path, contents);
  } catch (err) {
    throw new FormatError("MC_FORMAT_IO", `Cannot write ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

function fileContents(value: Value, options: FormatOptions): string | Uint8Array {
  const { format, precision, threshold } = options;
  if (format === "npy") return valueToNpy(value, threshold);
  if (value.kind === "array" && (format === "text" || format === "csv")) {
    return delimitedText(thresholdArray(value.value, threshold), format === "csv" ? "," : " ", precision);
  }
  return formatValue(value, format, options);
}

function saveComponents(items: readonly Value[], path: string, options: SaveOptions): string {
  let ext = extname(path);
  const base = ext ? path.slice(0, -ext.length) : path;
  if (!ext) ext = options.format === "npy" ? ".npy" : ".txt";

  items.forEach((item, i) => {
    const target = `${base}_${i}${ext}`;
    if (item.kind === "scalar") writeFile(target, formatRepr(item.value));
    else writeFile(target, fileContents(item, options));
  });
  return `Components saved to ${base}_*${ext}`;
}

export function saveResult(result: Result, path: string, options: SaveOptions): string {
  switch (result.kind) {
    case "tuple": {
      if (options.components) return saveComponents(result.items, path, options);
      const formatted = formatResult(result, options);
      writeFile(path, formatted.kind === "text" ? formatted.text : formatted.bytes);
      return `Result saved to ${path}`;
    }
    case "scalar":
      writeFile(path, fileContents(result, options));
      return `Scalar saved to ${path}`;
    case "array":
      writeFile(path, fileContents(result, options));
      return `Array saved to ${path}`;
    default: {
      const _exhaustive: never = result;
      return _exhaustive;
    }
  }
}

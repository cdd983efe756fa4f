/**
 * Purpose: Parse matcalc command-line arguments and resolve them into a run configuration.
 * Intent: Pure functions only, so argument handling is testable without a process.
 */

import { readFileSync } from "node:fs";
import { CliUsageError } from "../errors.js";
import { DEFAULT_FORMAT_OPTIONS, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "../format/formatter.js";

// ─── Types ─────────────────────────────────────────────────────────────────────

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  prompt?: boolean;
  expression?: string;
  files: string[];
  output?: string;
  npy?: boolean;
  precision?: number;
  format?: OutputFormat;
  pretty?: boolean;
  verbose?: boolean;
  threshold?: number;
  components?: boolean;
};

export type CliConfig = {
  expression: string;
  files: string[];
  outputPath?: string;
  format: OutputFormat;
  precision: number;
  threshold: number;
  components: boolean;
  verbose: boolean;
};

// ─── Argument parsing ──────────────────────────────────────────────────────────

const BOOLEAN_FLAGS: Readonly<Record<string, "help" | "version" | "prompt" | "npy" | "pretty" | "verbose" | "components">> = {
  "-h": "help",
  "--help": "help",
  "--version": "version",
  "--prompt": "prompt",
  "-n": "npy",
  "--npy": "npy",
  "--pretty": "pretty",
  "-v": "verbose",
  "--verbose": "verbose",
  "-c": "components",
  "--components": "components",
};

const VALUE_FLAGS = new Set(["-o", "--output", "--precision", "-f", "--format", "-t", "--threshold"]);

function takeValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined) throw new CliUsageError(`argument ${flag}: expected one argument`);
  return value;
}

function parseInteger(text: string, flag: string): number {
  if (!/^[+-]?\d+$/.test(text.trim())) throw new CliUsageError(`argument ${flag}: invalid int value: '${text}'`);
  return Number(text);
}

function parseFloatArg(text: string, flag: string): number {
  const n = Number(text);
  if (text.trim().length === 0 || Number.isNaN(n)) {
    throw new CliUsageError(`argument ${flag}: invalid float value: '${text}'`);
  }
  return n;
}

function parseFormat(text: string, flag: string): OutputFormat {
  if (!isOutputFormat(text)) {
    const choices = OUTPUT_FORMATS.map((f) => `'${f}'`).join(", ");
    throw new CliUsageError(`argument ${flag}: invalid choice: '${text}' (choose from ${choices})`);
  }
  return text;
}

/** Splits `--flag=value` into its parts; other arguments pass through. */
function splitInline(arg: string): [string, string | undefined] {
  if (!arg.startsWith("--")) return [arg, undefined];
  const eq = arg.indexOf("=");
  return eq < 0 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

export function parseCliArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = { files: [] };
  let positionalOnly = false;

  for (let i = 0; i < args.length; i++) {
    const raw = args[i] ?? "";

    // A lone "-" or anything that parses as a number is positional (e.g. "-1" never names a flag).
    if (positionalOnly || !raw.startsWith("-") || raw === "-" || !Number.isNaN(Number(raw))) {
      if (result.expression === undefined) result.expression = raw;
      else result.files.push(raw);
      continue;
    }
    if (raw === "--") {
      positionalOnly = true;
      continue;
    }

    const [flag, inline] = splitInline(raw);
    const booleanKey = BOOLEAN_FLAGS[flag];
    if (booleanKey !== undefined) {
      if (inline !== undefined) throw new CliUsageError(`argument ${flag}: ignored explicit argument '${inline}'`);
      result[booleanKey] = true;
      continue;
    }

    if (!VALUE_FLAGS.has(flag)) throw new CliUsageError(`unrecognized arguments: ${raw}`);
    const value = inline ?? takeValue(args, i, flag);
    if (inline === undefined) i++;
    switch (flag) {
      case "-o":
      case "--output":
        result.output = value;
        break;
      case "--precision":
        result.precision = parseInteger(value, flag);
        break;
      case "-f":
      case "--format":
        result.format = parseFormat(value, flag);
        break;
      case "-t":
      case "--threshold":
        result.threshold = parseFloatArg(value, flag);
        break;
      default:
        throw new CliUsageError(`unrecognized arguments: ${raw}`);
    }
  }

  return result;
}

// ─── Help text ─────────────────────────────────────────────────────────────────

export function getHelpText(): string {
  return `
matcalc - linear algebra calculator for NumPy .npy arrays

USAGE:
  matcalc EXPRESSION [FILES...] [options]

ARGUMENTS:
  EXPRESSION                 Expression with placeholders like {A}, {B}, or {P} for piped input
  FILES                      NumPy .npy files named after their placeholder (A.npy, B.npy, ...)

OPTIONS:
  -h, --help                 Show this help message
  --version                  Show version information
  --prompt                   Print the full usage guide
  -o, --output PATH          Write the result to PATH instead of stdout
  -n, --npy                  Write binary NPY to stdout for piping into another matcalc
  -f, --format FORMAT        ${OUTPUT_FORMATS.join(", ")} (default: ${DEFAULT_FORMAT_OPTIONS.format})
  --pretty                   Same as --format table
  --precision N              Significant digits (default: ${DEFAULT_FORMAT_OPTIONS.precision})
  -t, --threshold X          Print magnitudes below X as 0 (default: ${DEFAULT_FORMAT_OPTIONS.threshold})
  -c, --components           With --output, save each tuple component to its own file
  -v, --verbose              Describe each step on stderr

EXAMPLES:
  matcalc "{A}@{B}" A.npy B.npy
  matcalc "inv({A})" A.npy --format json
  matcalc "{A}.T" A.npy --npy | matcalc "{PIPE}@{B}" B.npy
`.trim();
}

// ─── Version ───────────────────────────────────────────────────────────────────

export function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
    const version = typeof pkg === "object" && pkg !== null && "version" in pkg ? pkg.version : undefined;
    return `matcalc ${typeof version === "string" ? version : "0.1.0"}`;
  } catch {
    return "matcalc 0.1.0";
  }
}

// ─── Configuration ─────────────────────────────────────────────────────────────

/** `--pretty` wins over everything; `--npy` only replaces the default format. */
export function resolveFormat(args: Pick<CliArgs, "format" | "npy" | "pretty">): OutputFormat {
  if (args.pretty) return "table";
  const format = args.format ?? DEFAULT_FORMAT_OPTIONS.format;
  if (args.npy && format === "plain") return "npy";
  return format;
}

export function buildConfig(args: CliArgs & { expression: string }): CliConfig {
  const config: CliConfig = {
    expression: args.expression,
    files: args.files.slice(),
    format: resolveFormat(args),
    precision: args.precision ?? DEFAULT_FORMAT_OPTIONS.precision,
    threshold: args.threshold ?? DEFAULT_FORMAT_OPTIONS.threshold,
    components: args.components ?? false,
    verbose: args.verbose ?? false,
  };
  if (args.output !== undefined) config.outputPath = args.output;
  return config;
}

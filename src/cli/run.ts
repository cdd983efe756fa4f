/**
 * Purpose: Run one matcalc invocation: load inputs, parse, evaluate, then print or save.
 * Intent: All process access goes through `CliIO`, so runs can be driven from tests.
 */

import { errorMessage } from "../errors.js";
import { evaluate } from "../expr/eval.js";
import { parseExpression } from "../expr/parser.js";
import { formatResult } from "../format/formatter.js";
import { saveResult } from "../format/output.js";
import { loadMatrices } from "../io/loader.js";
import { generatePrompt } from "../prompt.js";
import type { NDArray } from "../types.js";
import { buildConfig, getHelpText, getVersion, parseCliArgs, type CliConfig } from "./cli_lib.js";

export interface CliIO {
  stdout(chunk: string | Uint8Array): void;
  stderr(text: string): void;
  readStdin(): Promise<NDArray | undefined>;
}

function execute(config: CliConfig, stdinData: NDArray | undefined, io: CliIO): void {
  const log = (message: string): void => {
    if (config.verbose) io.stderr(`${message}\n`);
  };
  if (stdinData) log("Data detected from stdin, available as {PIPE} placeholder");

  log(`Loading matrices from ${config.files.length} files...`);
  const env = loadMatrices(config.files, stdinData);

  log(`Parsing expression: ${config.expression}`);
  const ast = parseExpression(config.expression);

  log("Evaluating expression...");
  const result = evaluate(ast, env);

  log("Formatting result...");
  const options = { format: config.format, precision: config.precision, threshold: config.threshold };
  if (config.outputPath !== undefined) {
    log(saveResult(result, config.outputPath, { ...options, components: config.components }));
    return;
  }
  const output = formatResult(result, options);
  if (output.kind === "binary") io.stdout(output.bytes);
  else if (output.text.length > 0) io.stdout(`${output.text}\n`);
}

/** Returns the process exit code. */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  let verbose = argv.includes("-v") || argv.includes("--verbose");
  try {
    const args = parseCliArgs(argv);
    verbose = args.verbose ?? false;
    if (args.help) {
      io.stdout(`${getHelpText()}\n`);
      return 0;
    }
    if (args.version) {
      io.stdout(`${getVersion()}\n`);
      return 0;
    }
    if (args.prompt) {
      io.stdout(generatePrompt());
      return 0;
    }
    const { expression } = args;
    if (expression === undefined) {
      io.stderr(`${getHelpText()}\n`);
      return 1;
    }

    const stdinData = await io.readStdin();
    if (args.files.length === 0 && !stdinData) {
      io.stderr(`${getHelpText()}\n`);
      return 1;
    }
    execute(buildConfig({ ...args, expression }), stdinData, io);
    return 0;
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}\n`);
    if (verbose && err instanceof Error && err.stack) io.stderr(`${err.stack}\n`);
    return 1;
  }
}

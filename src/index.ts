import { evaluate } from "./expr/eval.js";
import { parseExpression } from "./expr/parser.js";
import type { MatrixEnvironment, Result } from "./types.js";

export type {
  ArrayResult,
  MatrixEnvironment,
  NDArray,
  Result,
  ResultKind,
  ScalarResult,
  TupleResult,
  Value,
} from "./types.js";
export { arrayResult, PIPE_KEY, scalar, tuple } from "./types.js";
export {
  CliUsageError,
  EvaluationError,
  ExpressionSyntaxError,
  FormatError,
  LoaderError,
  MatcalcError,
  type EvaluationErrorCode,
  type FormatErrorCode,
  type LoaderErrorCode,
  type MatcalcErrorCode,
  type SyntaxErrorCode,
} from "./errors.js";
export { fromNested, identity, ndarray, shapeString, toNested, type NestedNumbers } from "./ndarray.js";
export { exprToString, type BinaryOp, type Expr, type ExprKind, type UnaryOp } from "./expr/ast.js";
export { tokenize } from "./expr/tokenizer.js";
export { parse, parseExpression } from "./expr/parser.js";
export { evaluate, resolvePlaceholder } from "./expr/eval.js";
export {
  describeArity,
  FUNCTION_NAMES,
  FUNCTION_SIGNATURES,
  functionsInCategory,
  isFunctionName,
  signatureOf,
  type FunctionCategory,
  type FunctionName,
  type FunctionSignature,
} from "./stdlib/signatures.js";
export { createStd, std, type StdTable } from "./stdlib/std.js";
export type { StdFunction, StdRuntimeContext } from "./stdlib/std_shared.js";
export {
  DEFAULT_FORMAT_OPTIONS,
  formatResult,
  OUTPUT_FORMATS,
  type FormatOptions,
  type FormattedOutput,
  type OutputFormat,
} from "./format/formatter.js";
export { formatG } from "./format/number_format.js";
export { saveResult, type SaveOptions } from "./format/output.js";
export { loadMatrices } from "./io/loader.js";
export { parseNpy, serializeNpy } from "./io/npy.js";
export { readStdin } from "./io/stdin.js";
export { parseTextMatrix } from "./io/text.js";

/** Parses and evaluates `src` in one step. */
export function evaluateExpression(src: string, env: MatrixEnvironment): Result {
  return evaluate(parseExpression(src), env);
}

/**
 * Purpose: Define the error taxonomy shared by every matcalc stage.
 * Intent: Give callers a stable `code` to branch on instead of matching message text.
 */

export type SyntaxErrorCode =
  | "MC_SYNTAX_UNEXPECTED_TOKEN"
  | "MC_SYNTAX_UNEXPECTED_END"
  | "MC_SYNTAX_EXPECTED_TOKEN"
  | "MC_SYNTAX_UNKNOWN_PROPERTY"
  | "MC_SYNTAX_TRAILING_TOKEN";

export type EvaluationErrorCode =
  | "MC_EVAL_UNKNOWN_PLACEHOLDER"
  | "MC_EVAL_UNKNOWN_FUNCTION"
  | "MC_EVAL_UNKNOWN_OPERATOR"
  | "MC_EVAL_ARITY"
  | "MC_EVAL_POWER_NOT_SCALAR"
  | "MC_EVAL_SHAPE"
  | "MC_EVAL_TYPE"
  | "MC_EVAL_NUMERIC";

export type LoaderErrorCode =
  | "MC_LOAD_RESERVED_NAME"
  | "MC_LOAD_NOT_FOUND"
  | "MC_LOAD_BAD_EXTENSION"
  | "MC_LOAD_BAD_NAME"
  | "MC_LOAD_NPY"
  | "MC_LOAD_TEXT"
  | "MC_LOAD_STDIN";

export type FormatErrorCode = "MC_FORMAT_UNSUPPORTED" | "MC_FORMAT_IO";

export type CliErrorCode = "MC_CLI_USAGE";

export type MatcalcErrorCode = SyntaxErrorCode | EvaluationErrorCode | LoaderErrorCode | FormatErrorCode | CliErrorCode;

export class MatcalcError extends Error {
  readonly code: MatcalcErrorCode;

  constructor(code: MatcalcErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MatcalcError";
    this.code = code;
  }
}

/**
 * Raised by the parser. `token` is the offending token (`null` at end of input) and
 * `expected` names the missing token when the grammar knows which one it wanted.
 */
export class ExpressionSyntaxError extends MatcalcError {
  override readonly code: SyntaxErrorCode;
  readonly token: string | null;
  readonly expected: string | null;

  constructor(code: SyntaxErrorCode, message: string, token: string | null, expected: string | null = null) {
    super(code, message);
    this.name = "ExpressionSyntaxError";
    this.code = code;
    this.token = token;
    this.expected = expected;
  }
}

export class EvaluationError extends MatcalcError {
  override readonly code: EvaluationErrorCode;

  constructor(code: EvaluationErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "EvaluationError";
    this.code = code;
  }
}

export class LoaderError extends MatcalcError {
  override readonly code: LoaderErrorCode;

  constructor(code: LoaderErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "LoaderError";
    this.code = code;
  }
}

export class FormatError extends MatcalcError {
  override readonly code: FormatErrorCode;

  constructor(code: FormatErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "FormatError";
    this.code = code;
  }
}

export class CliUsageError extends MatcalcError {
  override readonly code: CliErrorCode;

  constructor(message: string) {
    super("MC_CLI_USAGE", message);
    this.name = "CliUsageError";
    this.code = "MC_CLI_USAGE";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

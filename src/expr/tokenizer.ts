/**
 * Purpose: Split a matcalc expression into a flat token sequence.
 * Intent: Rewrite placeholder syntax to bare letters and isolate structural characters;
 * classification of tokens is left to the parser.
 */

const PIPE_PLACEHOLDER = /\{PIPE\}/g;
const LETTER_PLACEHOLDER = /\{([A-Z])\}/g;
const STRUCTURAL = /[+\-*@^(),]/g;
// A '.' belongs to a numeric literal when a digit follows and no identifier character precedes it.
const STRUCTURAL_DOT = /(?<=[A-Za-z_])\.|\.(?!\d)/g;

export function tokenize(expression: string): string[] {
  const rewritten = expression
    .replace(PIPE_PLACEHOLDER, "{P}")
    .replace(LETTER_PLACEHOLDER, "$1")
    .replace(STRUCTURAL, " $& ")
    .replace(STRUCTURAL_DOT, " . ");
  return rewritten.split(/\s+/).filter((tok) => tok.length > 0);
}

const NUMERIC_LITERAL = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE]\d+)?$/;

export function isNumericLiteral(token: string): boolean {
  return NUMERIC_LITERAL.test(token);
}

export function isPlaceholderToken(token: string): boolean {
  return /^[A-Z]$/.test(token);
}

/**
 * Purpose: Parse matcalc token sequences into AST nodes.
 * Intent: Recursive descent over an immutable cursor; each grammar rule maps a parser state
 * to the node it recognised and the state after it, or throws a syntax error.
 */

import { ExpressionSyntaxError } from "../errors.js";
import { isFunctionName } from "../stdlib/signatures.js";
import type { BinaryOp, Expr } from "./ast.js";
import { isNumericLiteral, isPlaceholderToken, tokenize } from "./tokenizer.js";

export interface ParserState {
  readonly tokens: readonly string[];
  readonly pos: number;
}

interface Parsed {
  node: Expr;
  state: ParserState;
}

function initialState(tokens: readonly string[]): ParserState {
  return { tokens, pos: 0 };
}

function peek(state: ParserState): string | undefined {
  return state.tokens[state.pos];
}

function advance(state: ParserState): ParserState {
  return { tokens: state.tokens, pos: state.pos + 1 };
}

function tokenToString(tok: string | undefined): string {
  return tok === undefined ? "end of expression" : `'${tok}'`;
}

function expectToken(state: ParserState, expected: string, message: string): ParserState {
  const tok = peek(state);
  if (tok !== expected) {
    throw new ExpressionSyntaxError("MC_SYNTAX_EXPECTED_TOKEN", `${message}, got ${tokenToString(tok)}`, tok ?? null, expected);
  }
  return advance(state);
}

/** Parses a full token sequence; tokens left over after the expression are an error. */
export function parse(tokens: readonly string[]): Expr {
  const { node, state } = parseSum(initialState(tokens));
  const tail = peek(state);
  if (tail !== undefined) {
    throw new ExpressionSyntaxError("MC_SYNTAX_TRAILING_TOKEN", `Unexpected trailing token: ${tail}`, tail);
  }
  return node;
}

export function parseExpression(src: string): Expr {
  return parse(tokenize(src));
}

function parseLeftAssoc(state: ParserState, ops: readonly BinaryOp[], lower: (s: ParserState) => Parsed): Parsed {
  let { node: left, state: cur } = lower(state);
  while (true) {
    const tok = peek(cur);
    const op = ops.find((o) => o === tok);
    if (!op) return { node: left, state: cur };
    const right = lower(advance(cur));
    left = { kind: "binary", op, left, right: right.node };
    cur = right.state;
  }
}

// expression := term (('+'|'-') term)*
function parseSum(state: ParserState): Parsed {
  return parseLeftAssoc(state, ["+", "-"], parseTerm);
}

// term := power (('*'|'@') power)*
function parseTerm(state: ParserState): Parsed {
  return parseLeftAssoc(state, ["*", "@"], parsePower);
}

// power := factor ('^' factor)?
function parsePower(state: ParserState): Parsed {
  const base = parseFactor(state);
  if (peek(base.state) !== "^") return base;
  const exponent = parseFactor(advance(base.state));
  return {
    node: { kind: "binary", op: "^", left: base.node, right: exponent.node },
    state: exponent.state,
  };
}

function parseFactor(state: ParserState): Parsed {
  const tok = peek(state);
  if (tok === undefined) {
    throw new ExpressionSyntaxError("MC_SYNTAX_UNEXPECTED_END", "Unexpected end of expression", null);
  }

  if (tok === "(") {
    const inner = parseSum(advance(state));
    return { node: inner.node, state: expectToken(inner.state, ")", "Expected ')'") };
  }

  if (isFunctionName(tok)) return parseCall(tok, advance(state));

  if (isPlaceholderToken(tok)) return parsePlaceholder(tok, advance(state));

  if (isNumericLiteral(tok)) {
    return { node: { kind: "constant", value: Number(tok) }, state: advance(state) };
  }

  if (tok === "-") {
    const operand = parseFactor(advance(state));
    return { node: { kind: "unary", op: "negate", operand: operand.node }, state: operand.state };
  }

  throw new ExpressionSyntaxError("MC_SYNTAX_UNEXPECTED_TOKEN", `Unexpected token: ${tok}`, tok);
}

// placeholder ('.' 'T')?
function parsePlaceholder(name: string, state: ParserState): Parsed {
  const node: Expr = { kind: "placeholder", name };
  if (peek(state) !== ".") return { node, state };

  const afterDot = advance(state);
  const prop = peek(afterDot);
  if (prop === undefined) {
    throw new ExpressionSyntaxError("MC_SYNTAX_UNEXPECTED_END", "Unexpected end of expression after '.'", null, "T");
  }
  if (prop !== "T") {
    throw new ExpressionSyntaxError("MC_SYNTAX_UNKNOWN_PROPERTY", `Unknown property: ${prop}`, prop);
  }
  return { node: { kind: "unary", op: "transpose", operand: node }, state: advance(afterDot) };
}

// functionCall := identifier '(' (expression (',' expression)*)? ')'
function parseCall(name: string, state: ParserState): Parsed {
  let cur = expectToken(state, "(", `Expected '(' after function ${name}`);
  const args: Expr[] = [];

  if (peek(cur) !== ")") {
    while (true) {
      const arg = parseSum(cur);
      args.push(arg.node);
      cur = arg.state;
      if (peek(cur) !== ",") break;
      cur = advance(cur);
    }
  }

  cur = expectToken(cur, ")", "Expected ')'");
  return { node: { kind: "call", name, args }, state: cur };
}

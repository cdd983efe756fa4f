/**
 * Purpose: Evaluate matcalc expression trees against a matrix environment.
 * Intent: Strict post-order evaluation with table dispatch for operators and functions;
 * the first failure aborts the whole evaluation.
 */

import { EvaluationError, MatcalcError, errorMessage } from "../errors.js";
import { describeArity, FUNCTION_SIGNATURES, isFunctionName } from "../stdlib/signatures.js";
import { std as defaultStd, type StdTable } from "../stdlib/std.js";
import { arrayResult, PIPE_KEY, scalar, type MatrixEnvironment, type Result, type Value } from "../types.js";
import type { BinaryOp, Expr, UnaryOp } from "./ast.js";
import { asValue, elementwise, matmul, negate, power, transposeValue } from "./eval_ops.js";

export interface EvalContext {
  env: MatrixEnvironment;
  std: StdTable;
}

const binaryOps: Readonly<Record<BinaryOp, (a: Value, b: Value) => Value>> = {
  "+": (a, b) => elementwise("+", a, b, (x, y) => x + y),
  "-": (a, b) => elementwise("-", a, b, (x, y) => x - y),
  "*": (a, b) => elementwise("*", a, b, (x, y) => x * y),
  "@": matmul,
  "^": power,
};

const unaryOps: Readonly<Record<UnaryOp, (v: Value) => Value>> = {
  transpose: transposeValue,
  negate,
};

function hasOwn(env: MatrixEnvironment, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(env, name);
}

export function resolvePlaceholder(name: string, env: MatrixEnvironment): Value {
  // 'P' is the letter form of {PIPE}; it falls back to a matrix named P when nothing is piped.
  const key = name === "P" && hasOwn(env, PIPE_KEY) ? PIPE_KEY : name;
  const value = hasOwn(env, key) ? env[key] : undefined;
  if (!value) throw new EvaluationError("MC_EVAL_UNKNOWN_PLACEHOLDER", `Unknown placeholder: ${name}`);
  return arrayResult(value);
}

function callFunction(name: string, args: readonly Value[], ctx: EvalContext): Result {
  if (!isFunctionName(name)) throw new EvaluationError("MC_EVAL_UNKNOWN_FUNCTION", `Unknown function: ${name}`);
  const [min, max] = FUNCTION_SIGNATURES[name].arity;
  if (args.length < min || args.length > max) {
    throw new EvaluationError("MC_EVAL_ARITY", `${name}() takes ${describeArity(name)} (got ${args.length})`);
  }
  const fn = ctx.std[name];
  try {
    return fn(args);
  } catch (err) {
    if (err instanceof MatcalcError) throw err;
    throw new EvaluationError("MC_EVAL_NUMERIC", `${name}: ${errorMessage(err)}`, { cause: err });
  }
}

function evalExpr(expr: Expr, ctx: EvalContext): Result {
  switch (expr.kind) {
    case "constant":
      return scalar(expr.value);
    case "placeholder":
      return resolvePlaceholder(expr.name, ctx.env);
    case "unary": {
      if (!Object.prototype.hasOwnProperty.call(unaryOps, expr.op)) {
        throw new EvaluationError("MC_EVAL_UNKNOWN_OPERATOR", `Unknown unary operator: ${expr.op}`);
      }
      return unaryOps[expr.op](asValue(evalExpr(expr.operand, ctx), `Unary '${expr.op}'`));
    }
    case "binary": {
      if (!Object.prototype.hasOwnProperty.call(binaryOps, expr.op)) {
        throw new EvaluationError("MC_EVAL_UNKNOWN_OPERATOR", `Unknown binary operator: ${expr.op}`);
      }
      const label = `Binary '${expr.op}'`;
      const left = asValue(evalExpr(expr.left, ctx), label);
      const right = asValue(evalExpr(expr.right, ctx), label);
      return binaryOps[expr.op](left, right);
    }
    case "call": {
      const args = expr.args.map((a, i) => asValue(evalExpr(a, ctx), `${expr.name}() argument ${i + 1}`));
      return callFunction(expr.name, args, ctx);
    }
    default: {
      const _exhaustive: never = expr;
      return _exhaustive;
    }
  }
}

/** Evaluates `expr` against `env`; `std` replaces the function table (tests inject a seeded `rand`). */
export function evaluate(expr: Expr, env: MatrixEnvironment, std: StdTable = defaultStd): Result {
  return evalExpr(expr, { env, std });
}

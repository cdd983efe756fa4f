/**
 * Purpose: Implement matrix-to-scalar functions for the matcalc std table.
 * Intent: Reductions over all elements accept scalars as one-element arrays; matrix
 * properties (det, trace, cond) require 2-D input.
 */

import { EvaluationError } from "../errors.js";
import { shapeString } from "../ndarray.js";
import { singularValues } from "../linalg/decompose.js";
import { det } from "../linalg/solve.js";
import type { FunctionNameIn } from "./signatures.js";
import { argAt, arrayArg, elementsOf, makeModule, matrixArg, type StdFunction } from "./std_shared.js";
import { scalar, type NDArray, type Value } from "../types.js";

function sumOf(xs: Float64Array): number {
  let s = 0;
  for (const x of xs) s += x;
  return s;
}

function trace(arr: NDArray): number {
  const [rows = 0, cols = 0] = arr.shape;
  let s = 0;
  for (let i = 0; i < Math.min(rows, cols); i++) s += arr.data[i * cols + i] ?? 0;
  return s;
}

function rank(v: Value): number {
  if (v.kind === "scalar" || v.value.shape.length < 2) {
    return elementsOf(v).some((x) => x !== 0) ? 1 : 0;
  }
  const arr = v.value;
  if (arr.shape.length > 2) {
    throw new EvaluationError("MC_EVAL_SHAPE", `rank: expected at most 2 dimensions, got shape ${shapeString(arr.shape)}`);
  }
  const s = singularValues(arr, "rank");
  if (s.length === 0) return 0;
  const [rows = 0, cols = 0] = arr.shape;
  const tol = Math.max(...s) * Math.max(rows, cols) * Number.EPSILON;
  return s.filter((x) => x > tol).length;
}

function cond(arr: NDArray): number {
  const s = singularValues(arr, "cond");
  const largest = s[0];
  const smallest = s[s.length - 1];
  if (largest === undefined || smallest === undefined) {
    throw new EvaluationError("MC_EVAL_SHAPE", "cond: empty matrix");
  }
  return smallest === 0 ? Infinity : largest / smallest;
}

export function createReduceModule(): Readonly<Record<FunctionNameIn<"reduction">, StdFunction>> {
  const traceFn = (args: readonly Value[]) => scalar(trace(matrixArg(args, 0, "trace")));

  return makeModule({
    det: (args: readonly Value[]) => scalar(det(arrayArg(args, 0, "det"))),
    trace: traceFn,
    tr: traceFn,
    norm: (args: readonly Value[]) => {
      const xs = elementsOf(argAt(args, 0, "norm"));
      let s = 0;
      for (const x of xs) s += x * x;
      return scalar(Math.sqrt(s));
    },
    rank: (args: readonly Value[]) => scalar(rank(argAt(args, 0, "rank"))),
    cond: (args: readonly Value[]) => scalar(cond(matrixArg(args, 0, "cond"))),
    sum: (args: readonly Value[]) => scalar(sumOf(elementsOf(argAt(args, 0, "sum")))),
    prod: (args: readonly Value[]) => {
      let p = 1;
      for (const x of elementsOf(argAt(args, 0, "prod"))) p *= x;
      return scalar(p);
    },
    mean: (args: readonly Value[]) => {
      const xs = elementsOf(argAt(args, 0, "mean"));
      return scalar(sumOf(xs) / xs.length);
    },
    std: (args: readonly Value[]) => {
      const xs = elementsOf(argAt(args, 0, "std"));
      const mu = sumOf(xs) / xs.length;
      let sq = 0;
      for (const x of xs) sq += (x - mu) * (x - mu);
      return scalar(Math.sqrt(sq / xs.length));
    },
  });
}

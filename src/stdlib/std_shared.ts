/**
 * Purpose: Provide shared utilities for matcalc std module construction.
 * Intent: Keep argument checks and module shape conventions consistent across modules.
 */

import { EvaluationError } from "../errors.js";
import { shapeString } from "../ndarray.js";
import type { NDArray, Result, Value } from "../types.js";

export type StdFunction = (args: readonly Value[]) => Result;

export interface StdRuntimeContext {
  /** Source of uniform [0, 1) samples for `rand`; defaults to Math.random. */
  random?: () => number;
}

export function makeModule<T extends Record<string, StdFunction>>(entries: T): Readonly<T> {
  const obj: T = Object.assign(Object.create(null), entries);
  return Object.freeze(obj);
}

export function argAt(args: readonly Value[], index: number, fn: string): Value {
  const v = args[index];
  if (v === undefined) throw new EvaluationError("MC_EVAL_ARITY", `${fn}: missing argument ${index + 1}`);
  return v;
}

export function arrayArg(args: readonly Value[], index: number, fn: string): NDArray {
  const v = argAt(args, index, fn);
  if (v.kind !== "array") {
    throw new EvaluationError("MC_EVAL_TYPE", `${fn}: argument ${index + 1} must be an array, got a scalar`);
  }
  return v.value;
}

export function matrixArg(args: readonly Value[], index: number, fn: string): NDArray {
  const arr = arrayArg(args, index, fn);
  if (arr.shape.length !== 2) {
    throw new EvaluationError("MC_EVAL_SHAPE", `${fn}: expected a 2-D array, got shape ${shapeString(arr.shape)}`);
  }
  return arr;
}

/** Scalar argument truncated toward zero. */
export function integerArg(args: readonly Value[], index: number, fn: string): number {
  const v = argAt(args, index, fn);
  if (v.kind !== "scalar") {
    throw new EvaluationError("MC_EVAL_TYPE", `${fn}: argument ${index + 1} must be a scalar`);
  }
  const n = Math.trunc(v.value);
  if (!Number.isFinite(n)) throw new EvaluationError("MC_EVAL_TYPE", `${fn}: argument ${index + 1} must be finite`);
  return n;
}

export function dimensionArgs(args: readonly Value[], fn: string): number[] {
  const dims = args.map((_, i) => integerArg(args, i, fn));
  if (dims.some((d) => d < 0)) throw new EvaluationError("MC_EVAL_SHAPE", `${fn}: negative dimensions are not allowed`);
  return dims;
}

export function elementsOf(v: Value): Float64Array {
  return v.kind === "scalar" ? Float64Array.of(v.value) : v.value.data;
}

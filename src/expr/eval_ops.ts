/**
 * Purpose: Implement the arithmetic operators used by matcalc expression evaluation.
 * Intent: Elementwise ops broadcast like NumPy; '@' follows matmul promotion rules for
 * 1-D operands; every shape mismatch is reported with both shapes.
 */

import { EvaluationError } from "../errors.js";
import { map, shapeString, sizeOf, transpose } from "../ndarray.js";
import { toMatrix } from "../linalg/bridge.js";
import { matrixPower } from "../linalg/solve.js";
import { arrayResult, scalar, type NDArray, type Result, type Value } from "../types.js";

export function asValue(r: Result, label: string): Value {
  if (r.kind === "tuple") {
    throw new EvaluationError("MC_EVAL_TYPE", `${label} expects a scalar or array, got a tuple`);
  }
  return r;
}

function asArray(v: Value): NDArray {
  return v.kind === "array" ? v.value : { shape: [], data: Float64Array.of(v.value) };
}

export function broadcastShapes(a: readonly number[], b: readonly number[], label: string): number[] {
  const rank = Math.max(a.length, b.length);
  const out = new Array<number>(rank);
  for (let i = 1; i <= rank; i++) {
    const da = a[a.length - i] ?? 1;
    const db = b[b.length - i] ?? 1;
    if (da !== db && da !== 1 && db !== 1) {
      throw new EvaluationError(
        "MC_EVAL_SHAPE",
        `${label}: operands could not be broadcast together with shapes ${shapeString(a)} ${shapeString(b)}`
      );
    }
    out[rank - i] = da === 1 ? db : da;
  }
  return out;
}

/** Row-major strides for `shape` aligned to `rank` axes, zero on broadcast axes. */
function broadcastStrides(shape: readonly number[], rank: number): number[] {
  const strides = new Array<number>(rank).fill(0);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    const dim = shape[i] ?? 1;
    strides[rank - shape.length + i] = dim === 1 ? 0 : stride;
    stride *= dim;
  }
  return strides;
}

export function elementwise(
  op: string,
  a: Value,
  b: Value,
  fn: (x: number, y: number) => number
): Value {
  if (a.kind === "scalar" && b.kind === "scalar") return scalar(fn(a.value, b.value));

  const left = asArray(a);
  const right = asArray(b);
  const shape = broadcastShapes(left.shape, right.shape, `Binary '${op}'`);
  const rank = shape.length;
  const ls = broadcastStrides(left.shape, rank);
  const rs = broadcastStrides(right.shape, rank);
  const out = new Float64Array(sizeOf(shape));
  const index = new Array<number>(rank).fill(0);

  for (let k = 0; k < out.length; k++) {
    let li = 0;
    let ri = 0;
    for (let axis = 0; axis < rank; axis++) {
      li += (index[axis] ?? 0) * (ls[axis] ?? 0);
      ri += (index[axis] ?? 0) * (rs[axis] ?? 0);
    }
    out[k] = fn(left.data[li] ?? 0, right.data[ri] ?? 0);
    for (let axis = rank - 1; axis >= 0; axis--) {
      const next = (index[axis] ?? 0) + 1;
      if (next < (shape[axis] ?? 0)) {
        index[axis] = next;
        break;
      }
      index[axis] = 0;
    }
  }
  return arrayResult({ shape, data: out });
}

export function mapValue(v: Value, fn: (x: number) => number): Value {
  return v.kind === "scalar" ? scalar(fn(v.value)) : arrayResult(map(v.value, fn));
}

export function negate(v: Value): Value {
  return mapValue(v, (x) => -x);
}

export function transposeValue(v: Value): Value {
  return v.kind === "scalar" ? v : arrayResult(transpose(v.value));
}

/** Matrix product with NumPy matmul promotion for 1-D operands. */
export function matmul(a: Value, b: Value): Value {
  if (a.kind === "scalar" || b.kind === "scalar") {
    throw new EvaluationError("MC_EVAL_SHAPE", "Binary '@': scalar operands are not allowed, use '*'");
  }
  const left = a.value;
  const right = b.value;
  if (left.shape.length > 2 || right.shape.length > 2 || left.shape.length === 0 || right.shape.length === 0) {
    throw new EvaluationError(
      "MC_EVAL_SHAPE",
      `Binary '@': expected 1-D or 2-D operands, got shapes ${shapeString(left.shape)} ${shapeString(right.shape)}`
    );
  }

  const leftIsVector = left.shape.length === 1;
  const rightIsVector = right.shape.length === 1;
  const l = leftIsVector ? { shape: [1, left.data.length], data: left.data } : left;
  const r = rightIsVector ? { shape: [right.data.length, 1], data: right.data } : right;
  const inner = l.shape[1] ?? 0;
  if (inner !== (r.shape[0] ?? 0)) {
    throw new EvaluationError(
      "MC_EVAL_SHAPE",
      `Binary '@': shapes ${shapeString(left.shape)} and ${shapeString(right.shape)} not aligned`
    );
  }

  const product = toMatrix(l, "Binary '@'").mmul(toMatrix(r, "Binary '@'"));
  const data = Float64Array.from(product.to1DArray());
  if (leftIsVector && rightIsVector) return scalar(data[0] ?? 0);
  if (leftIsVector || rightIsVector) return arrayResult({ shape: [data.length], data });
  return arrayResult({ shape: [product.rows, product.columns], data });
}

/** `base ^ exponent`: integer matrix power, exponent truncated toward zero. */
export function power(base: Value, exponent: Value): Value {
  if (exponent.kind !== "scalar") {
    throw new EvaluationError("MC_EVAL_POWER_NOT_SCALAR", "Power must be a scalar");
  }
  const n = Math.trunc(exponent.value);
  if (!Number.isFinite(n)) throw new EvaluationError("MC_EVAL_TYPE", "Power must be a finite number");
  if (base.kind === "scalar") return scalar(base.value ** n);
  return arrayResult(matrixPower(base.value, n, "Binary '^'"));
}

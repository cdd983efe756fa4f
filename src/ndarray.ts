/**
 * Purpose: Construct, reshape and inspect dense float64 arrays.
 * Intent: Keep every array row-major with a shape that matches its data length.
 */

import type { NDArray } from "./types.js";

export type NestedNumbers = number | NestedNumbers[];

export function sizeOf(shape: readonly number[]): number {
  let n = 1;
  for (const d of shape) n *= d;
  return n;
}

export function assertShape(shape: readonly number[], label: string): void {
  for (const d of shape) {
    if (!Number.isInteger(d) || d < 0) throw new Error(`${label}: invalid dimension ${d}`);
  }
}

export function ndarray(data: Float64Array | readonly number[], shape: readonly number[]): NDArray {
  assertShape(shape, "ndarray");
  const buf = data instanceof Float64Array ? data : Float64Array.from(data);
  if (buf.length !== sizeOf(shape)) {
    throw new Error(`ndarray: ${buf.length} values do not fill shape (${shape.join(", ")})`);
  }
  return { shape: shape.slice(), data: buf };
}

export function filled(shape: readonly number[], value: number): NDArray {
  assertShape(shape, "filled");
  return { shape: shape.slice(), data: new Float64Array(sizeOf(shape)).fill(value) };
}

export function identity(n: number): NDArray {
  const out = filled([n, n], 0);
  for (let i = 0; i < n; i++) out.data[i * n + i] = 1;
  return out;
}

function inferShape(value: NestedNumbers): number[] {
  if (typeof value === "number") return [];
  if (value.length === 0) return [0];
  const first = value[0];
  if (first === undefined) return [0];
  return [value.length, ...inferShape(first)];
}

/** Builds an array from nested JS arrays; every sub-array must be the same length. */
export function fromNested(value: NestedNumbers): NDArray {
  const shape = inferShape(value);
  const out: number[] = [];
  const visit = (v: NestedNumbers, depth: number): void => {
    if (depth === shape.length) {
      if (typeof v !== "number") throw new Error("fromNested: ragged nested array");
      out.push(v);
      return;
    }
    if (typeof v === "number" || v.length !== shape[depth]) throw new Error("fromNested: ragged nested array");
    for (const item of v) visit(item, depth + 1);
  };
  visit(value, 0);
  return ndarray(out, shape);
}

export function toNested(arr: NDArray): NestedNumbers {
  if (arr.shape.length === 0) return arr.data[0] ?? 0;
  const build = (depth: number, offset: number): NestedNumbers[] => {
    const dim = arr.shape[depth] ?? 0;
    const stride = sizeOf(arr.shape.slice(depth + 1));
    const out: NestedNumbers[] = new Array(dim);
    for (let i = 0; i < dim; i++) {
      out[i] = depth === arr.shape.length - 1 ? (arr.data[offset + i] ?? 0) : build(depth + 1, offset + i * stride);
    }
    return out;
  };
  return build(0, 0);
}

export function map(arr: NDArray, fn: (x: number) => number): NDArray {
  const out = new Float64Array(arr.data.length);
  for (let i = 0; i < out.length; i++) out[i] = fn(arr.data[i] ?? 0);
  return { shape: arr.shape.slice(), data: out };
}

/** Swaps the last two axes; rank 0 and 1 arrays come back unchanged. */
export function transpose(arr: NDArray): NDArray {
  const rank = arr.shape.length;
  if (rank < 2) return { shape: arr.shape.slice(), data: arr.data.slice() };
  const rows = arr.shape[rank - 2] ?? 0;
  const cols = arr.shape[rank - 1] ?? 0;
  const block = rows * cols;
  const batches = block === 0 ? 0 : arr.data.length / block;
  const out = new Float64Array(arr.data.length);
  for (let b = 0; b < batches; b++) {
    const base = b * block;
    for (let i = 0; i < rows; i++) {
      for (let j = 0; j < cols; j++) out[base + j * rows + i] = arr.data[base + i * cols + j] ?? 0;
    }
  }
  const shape = arr.shape.slice();
  shape[rank - 2] = cols;
  shape[rank - 1] = rows;
  return { shape, data: out };
}

export function shapeString(shape: readonly number[]): string {
  return shape.length === 1 ? `(${shape[0]},)` : `(${shape.join(", ")})`;
}

import { fromNested, toNested, type NestedNumbers } from "../src/ndarray.js";
import type { NDArray, Result, Value } from "../src/types.js";

export function m(value: NestedNumbers): NDArray {
  return fromNested(value);
}

export function arrayOf(result: Result): NDArray {
  if (result.kind !== "array") throw new Error(`expected an array result, got ${result.kind}`);
  return result.value;
}

export function scalarOf(result: Result): number {
  if (result.kind !== "scalar") throw new Error(`expected a scalar result, got ${result.kind}`);
  return result.value;
}

export function itemsOf(result: Result): readonly Value[] {
  if (result.kind !== "tuple") throw new Error(`expected a tuple result, got ${result.kind}`);
  return result.items;
}

export function nested(result: Result | NDArray): NestedNumbers {
  return toNested("kind" in result ? arrayOf(result) : result);
}

/** Asserts elementwise closeness of two arrays with equal shapes. */
export function expectClose(actual: NDArray, expected: NDArray, digits = 9): void {
  if (actual.shape.join(",") !== expected.shape.join(",")) {
    throw new Error(`shape mismatch: (${actual.shape.join(", ")}) vs (${expected.shape.join(", ")})`);
  }
  const tol = 10 ** -digits;
  expected.data.forEach((x, i) => {
    const y = actual.data[i] ?? Number.NaN;
    if (!(Math.abs(x - y) <= tol)) throw new Error(`element ${i}: expected ${x}, got ${y}`);
  });
}

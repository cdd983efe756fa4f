/**
 * Purpose: Convert between matcalc arrays and ml-matrix matrices.
 * Intent: Keep the numeric library behind one seam; shape checks happen here so the
 * library only ever sees well-formed 2-D input.
 */

import { Matrix } from "ml-matrix";
import { EvaluationError } from "../errors.js";
import { shapeString } from "../ndarray.js";
import type { NDArray } from "../types.js";

export function toMatrix(arr: NDArray, label: string): Matrix {
  if (arr.shape.length !== 2) {
    throw new EvaluationError(
      "MC_EVAL_SHAPE",
      `${label}: expected a 2-D array, got shape ${shapeString(arr.shape)}`
    );
  }
  const [rows = 0, cols = 0] = arr.shape;
  return Matrix.from1DArray(rows, cols, Array.from(arr.data));
}

/** 1-D arrays become a single column. */
export function toColumnMatrix(arr: NDArray, label: string): Matrix {
  if (arr.shape.length === 1) return Matrix.columnVector(Array.from(arr.data));
  return toMatrix(arr, label);
}

export function fromMatrix(m: Matrix): NDArray {
  const data = new Float64Array(m.rows * m.columns);
  for (let i = 0; i < m.rows; i++) {
    for (let j = 0; j < m.columns; j++) data[i * m.columns + j] = m.get(i, j);
  }
  return { shape: [m.rows, m.columns], data };
}

export function fromVector(values: ArrayLike<number>): NDArray {
  return { shape: [values.length], data: Float64Array.from(values) };
}

export function requireSquare(arr: NDArray, label: string): Matrix {
  const m = toMatrix(arr, label);
  if (!m.isSquare()) {
    throw new EvaluationError(
      "MC_EVAL_SHAPE",
      `${label}: expected a square matrix, got shape ${shapeString(arr.shape)}`
    );
  }
  return m;
}

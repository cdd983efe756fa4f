/**
 * Purpose: Inverses, determinants, matrix powers and linear solves on top of ml-matrix.
 * Intent: Detect singular and mis-shaped input before the library sees it, so failures
 * carry a matcalc error code.
 */

import { determinant, LuDecomposition, Matrix, pseudoInverse } from "ml-matrix";
import { EvaluationError } from "../errors.js";
import { shapeString } from "../ndarray.js";
import type { NDArray } from "../types.js";
import { fromMatrix, requireSquare, toColumnMatrix, toMatrix } from "./bridge.js";

function invertMatrix(m: Matrix, label: string): Matrix {
  const dec = new LuDecomposition(m);
  if (dec.isSingular()) throw new EvaluationError("MC_EVAL_NUMERIC", `${label}: Singular matrix`);
  return dec.solve(Matrix.eye(m.rows));
}

export function inv(arr: NDArray): NDArray {
  return fromMatrix(invertMatrix(requireSquare(arr, "inv"), "inv"));
}

export function pinv(arr: NDArray): NDArray {
  return fromMatrix(pseudoInverse(toMatrix(arr, "pinv")));
}

export function det(arr: NDArray): number {
  const m = requireSquare(arr, "det");
  if (m.rows === 0) return 1;
  return determinant(m);
}

/** A^n for integer n; n = 0 is the identity and negative n inverts first. */
export function matrixPower(arr: NDArray, n: number, label = "matrix_power"): NDArray {
  if (!Number.isInteger(n)) throw new EvaluationError("MC_EVAL_TYPE", `${label}: exponent must be an integer`);
  const m = requireSquare(arr, label);
  if (n === 0) return fromMatrix(Matrix.eye(m.rows));

  let base = n < 0 ? invertMatrix(m, label) : m;
  let remaining = Math.abs(n);
  let acc: Matrix | null = null;
  while (remaining > 0) {
    if (remaining % 2 === 1) acc = acc ? acc.mmul(base) : base.clone();
    remaining = Math.floor(remaining / 2);
    if (remaining > 0) base = base.mmul(base);
  }
  return fromMatrix(acc ?? Matrix.eye(m.rows));
}

function rightHandSide(a: Matrix, b: NDArray, label: string): Matrix {
  if (b.shape.length !== 1 && b.shape.length !== 2) {
    throw new EvaluationError("MC_EVAL_SHAPE", `${label}: right-hand side must be 1-D or 2-D, got shape ${shapeString(b.shape)}`);
  }
  const rhs = toColumnMatrix(b, label);
  if (rhs.rows !== a.rows) {
    throw new EvaluationError(
      "MC_EVAL_SHAPE",
      `${label}: shapes (${a.rows}, ${a.columns}) and ${shapeString(b.shape)} not aligned`
    );
  }
  return rhs;
}

function solutionShape(x: Matrix, b: NDArray): NDArray {
  const out = fromMatrix(x);
  return b.shape.length === 1 ? { shape: [x.rows], data: out.data } : out;
}

export function solve(a: NDArray, b: NDArray): NDArray {
  const m = requireSquare(a, "solve");
  const rhs = rightHandSide(m, b, "solve");
  const dec = new LuDecomposition(m);
  if (dec.isSingular()) throw new EvaluationError("MC_EVAL_NUMERIC", "solve: Singular matrix");
  return solutionShape(dec.solve(rhs), b);
}

/** Minimum-norm least-squares solution; residuals, rank and singular values are not returned. */
export function lstsq(a: NDArray, b: NDArray): NDArray {
  const m = toMatrix(a, "lstsq");
  const rhs = rightHandSide(m, b, "lstsq");
  return solutionShape(pseudoInverse(m).mmul(rhs), b);
}

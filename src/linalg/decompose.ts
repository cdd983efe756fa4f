/**
 * Purpose: Matrix decompositions on top of ml-matrix.
 * Intent: Return factors in the layouts callers expect from a LAPACK-style library:
 * full SVD bases, unit eigenvectors, reduced QR, and A = P L U.
 */

import {
  CholeskyDecomposition,
  EigenvalueDecomposition,
  LuDecomposition,
  Matrix,
  QrDecomposition,
  SingularValueDecomposition,
} from "ml-matrix";
import { EvaluationError } from "../errors.js";
import { shapeString } from "../ndarray.js";
import type { NDArray } from "../types.js";
import { fromMatrix, fromVector, requireSquare, toMatrix } from "./bridge.js";

const ORTHO_EPS = 1e-10;

export interface SvdFactors {
  u: NDArray;
  s: NDArray;
  vh: NDArray;
}

function column(m: Matrix, j: number): number[] {
  const out = new Array<number>(m.rows);
  for (let i = 0; i < m.rows; i++) out[i] = m.get(i, j);
  return out;
}

function dot(a: readonly number[], b: readonly number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += (a[i] ?? 0) * (b[i] ?? 0);
  return s;
}

/**
 * Extends the first `keep` orthonormal columns of `basis` to a full n x n orthonormal
 * basis by Gram-Schmidt against the standard unit vectors.
 */
export function completeOrthonormalBasis(basis: Matrix, keep: number): Matrix {
  const n = basis.rows;
  const cols: number[][] = [];
  for (let j = 0; j < keep; j++) cols.push(column(basis, j));

  for (let e = 0; e < n && cols.length < n; e++) {
    const v = new Array<number>(n).fill(0);
    v[e] = 1;
    // Two passes keep the result orthogonal to working precision.
    for (let pass = 0; pass < 2; pass++) {
      for (const q of cols) {
        const c = dot(v, q);
        for (let i = 0; i < n; i++) v[i] = (v[i] ?? 0) - c * (q[i] ?? 0);
      }
    }
    const norm = Math.sqrt(dot(v, v));
    if (norm < ORTHO_EPS) continue;
    cols.push(v.map((x) => x / norm));
  }

  const out = new Matrix(n, n);
  cols.forEach((col, j) => col.forEach((x, i) => out.set(i, j, x)));
  return out;
}

export function singularValues(arr: NDArray, label: string): number[] {
  const m = toMatrix(arr, label);
  const dec = new SingularValueDecomposition(m, {
    computeLeftSingularVectors: false,
    computeRightSingularVectors: false,
    autoTranspose: true,
  });
  return dec.diagonal.slice(0, Math.min(m.rows, m.columns));
}

export function svd(arr: NDArray): SvdFactors {
  const m = toMatrix(arr, "svd");
  const k = Math.min(m.rows, m.columns);
  const dec = new SingularValueDecomposition(m, {
    computeLeftSingularVectors: true,
    computeRightSingularVectors: true,
    autoTranspose: true,
  });
  const u = completeOrthonormalBasis(dec.leftSingularVectors, k);
  const v = completeOrthonormalBasis(dec.rightSingularVectors, k);
  return {
    u: fromMatrix(u),
    s: fromVector(dec.diagonal.slice(0, k)),
    vh: fromMatrix(v.transpose()),
  };
}

export function eig(arr: NDArray): { w: NDArray; v: NDArray } {
  const m = requireSquare(arr, "eig");
  const dec = new EigenvalueDecomposition(m);
  if (dec.imaginaryEigenvalues.some((x) => x !== 0)) {
    throw new EvaluationError("MC_EVAL_NUMERIC", "eig: complex eigenvalues are not supported");
  }
  const vectors = dec.eigenvectorMatrix;
  for (let j = 0; j < vectors.columns; j++) {
    const col = column(vectors, j);
    const norm = Math.sqrt(dot(col, col));
    if (norm === 0) continue;
    for (let i = 0; i < vectors.rows; i++) vectors.set(i, j, (col[i] ?? 0) / norm);
  }
  return { w: fromVector(dec.realEigenvalues), v: fromMatrix(vectors) };
}

/** Reduced QR: Q is m x k and R is k x n with k = min(m, n). */
export function qr(arr: NDArray): { q: NDArray; r: NDArray } {
  const m = toMatrix(arr, "qr");
  if (m.rows >= m.columns) {
    const dec = new QrDecomposition(m);
    return { q: fromMatrix(dec.orthogonalMatrix), r: fromMatrix(dec.upperTriangularMatrix) };
  }
  // Wide input: factor the leading square block, then R = Q^T A.
  const lead = m.subMatrix(0, m.rows - 1, 0, m.rows - 1);
  const q = new QrDecomposition(lead).orthogonalMatrix;
  return { q: fromMatrix(q), r: fromMatrix(q.transpose().mmul(m)) };
}

/** Partial-pivot LU with A = P L U, for square or tall input. */
export function lu(arr: NDArray): { p: NDArray; l: NDArray; u: NDArray } {
  const m = toMatrix(arr, "lu");
  if (m.rows < m.columns) {
    throw new EvaluationError(
      "MC_EVAL_SHAPE",
      `lu: expected at least as many rows as columns, got shape ${shapeString(arr.shape)}`
    );
  }
  const dec = new LuDecomposition(m);
  const piv = dec.pivotPermutationVector;
  const p = new Matrix(m.rows, m.rows);
  piv.forEach((row, i) => p.set(row, i, 1));
  return {
    p: fromMatrix(p),
    l: fromMatrix(dec.lowerTriangularMatrix),
    u: fromMatrix(dec.upperTriangularMatrix),
  };
}

export function cholesky(arr: NDArray): NDArray {
  const m = requireSquare(arr, "cholesky");
  if (!m.isSymmetric()) {
    throw new EvaluationError("MC_EVAL_NUMERIC", "cholesky: Matrix is not symmetric");
  }
  const dec = new CholeskyDecomposition(m);
  if (!dec.isPositiveDefinite()) {
    throw new EvaluationError("MC_EVAL_NUMERIC", "cholesky: Matrix is not positive definite");
  }
  return fromMatrix(dec.lowerTriangularMatrix);
}

/**
 * Purpose: Declare the fixed registry of callable function names.
 * Intent: One table shared by the parser (name recognition) and the evaluator (arity, dispatch),
 * grouped by result shape so callers know up front whether a call yields a tuple.
 */

export type FunctionCategory = "matrix" | "reduction" | "decomposition" | "construct";

export type ReturnShape = "array" | "scalar" | "tuple";

export interface FunctionSignature {
  readonly category: FunctionCategory;
  readonly returns: ReturnShape;
  /** Inclusive `[min, max]` argument count. */
  readonly arity: readonly [number, number];
  readonly summary: string;
}

export const FUNCTION_SIGNATURES = {
  inv: { category: "matrix", returns: "array", arity: [1, 1], summary: "Matrix inverse" },
  pinv: { category: "matrix", returns: "array", arity: [1, 1], summary: "Moore-Penrose pseudo-inverse" },
  matrix_power: { category: "matrix", returns: "array", arity: [2, 2], summary: "Integer matrix power" },
  exp: { category: "matrix", returns: "array", arity: [1, 1], summary: "Elementwise exponential" },
  sin: { category: "matrix", returns: "array", arity: [1, 1], summary: "Elementwise sine" },
  cos: { category: "matrix", returns: "array", arity: [1, 1], summary: "Elementwise cosine" },

  det: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Determinant" },
  trace: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Sum of the main diagonal" },
  tr: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Alias of trace" },
  norm: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Frobenius (or vector 2-) norm" },
  rank: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Numerical rank" },
  cond: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "2-norm condition number" },
  sum: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Sum of all elements" },
  prod: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Product of all elements" },
  mean: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Mean of all elements" },
  std: { category: "reduction", returns: "scalar", arity: [1, 1], summary: "Population standard deviation" },

  svd: { category: "decomposition", returns: "tuple", arity: [1, 1], summary: "Full SVD as (U, S, Vh)" },
  eig: { category: "decomposition", returns: "tuple", arity: [1, 1], summary: "Eigenvalues and unit eigenvectors (w, v)" },
  qr: { category: "decomposition", returns: "tuple", arity: [1, 1], summary: "Reduced QR as (Q, R)" },
  lu: { category: "decomposition", returns: "tuple", arity: [1, 1], summary: "Pivoted LU as (P, L, U)" },
  cholesky: { category: "decomposition", returns: "array", arity: [1, 1], summary: "Lower Cholesky factor" },

  solve: { category: "construct", returns: "array", arity: [2, 2], summary: "Solve A x = b" },
  lstsq: { category: "construct", returns: "array", arity: [2, 2], summary: "Least-squares solution of A x = b" },
  eye: { category: "construct", returns: "array", arity: [1, 1], summary: "n x n identity" },
  diag: { category: "construct", returns: "array", arity: [1, 1], summary: "Diagonal matrix from a vector, or a matrix diagonal" },
  rand: { category: "construct", returns: "array", arity: [1, 2], summary: "Uniform [0, 1) samples" },
  zeros: { category: "construct", returns: "array", arity: [1, 2], summary: "Array of zeros" },
  ones: { category: "construct", returns: "array", arity: [1, 2], summary: "Array of ones" },
} as const satisfies Record<string, FunctionSignature>;

export type FunctionName = keyof typeof FUNCTION_SIGNATURES;

export const FUNCTION_NAMES: readonly FunctionName[] = Object.freeze(
  Object.keys(FUNCTION_SIGNATURES).filter(isFunctionName)
);

export function isFunctionName(name: string): name is FunctionName {
  return Object.prototype.hasOwnProperty.call(FUNCTION_SIGNATURES, name);
}

export function signatureOf(name: FunctionName): FunctionSignature {
  return FUNCTION_SIGNATURES[name];
}

export function functionsInCategory(category: FunctionCategory): FunctionName[] {
  return FUNCTION_NAMES.filter((name) => FUNCTION_SIGNATURES[name].category === category);
}

/** Names whose registry entry sits in category `C`. */
export type FunctionNameIn<C extends FunctionCategory> = {
  [K in FunctionName]: (typeof FUNCTION_SIGNATURES)[K]["category"] extends C ? K : never;
}[FunctionName];

export function describeArity(name: FunctionName): string {
  const [min, max] = FUNCTION_SIGNATURES[name].arity;
  if (min === max) return `exactly ${min} argument${min === 1 ? "" : "s"}`;
  return `${min} or ${max} arguments`;
}

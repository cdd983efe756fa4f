/**
 * Purpose: Declare shared matcalc value and environment types.
 * Intent: Keep the contract between loader, evaluator and formatter explicit and stable.
 */

/** Dense row-major float64 array. `data.length` always equals the product of `shape`. */
export interface NDArray {
  readonly shape: readonly number[];
  readonly data: Float64Array;
}

export interface ScalarResult {
  kind: "scalar";
  value: number;
}

export interface ArrayResult {
  kind: "array";
  value: NDArray;
}

/** Operand of every operator and library function. */
export type Value = ScalarResult | ArrayResult;

/** Produced only by decompositions; components are never tuples themselves. */
export interface TupleResult {
  kind: "tuple";
  items: readonly Value[];
}

export type Result = Value | TupleResult;

export type ResultKind = Result["kind"];

/**
 * Placeholder name to array. Keys are single uppercase letters plus the reserved
 * `PIPE` key for piped input.
 */
export type MatrixEnvironment = Readonly<Record<string, NDArray>>;

export const PIPE_KEY = "PIPE";

export function scalar(value: number): ScalarResult {
  return { kind: "scalar", value };
}

export function arrayResult(value: NDArray): ArrayResult {
  return { kind: "array", value };
}

export function tuple(items: readonly Value[]): TupleResult {
  return { kind: "tuple", items };
}

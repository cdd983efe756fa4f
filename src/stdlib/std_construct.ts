/**
 * Purpose: Implement solvers and array constructors for the matcalc std table.
 * Intent: Dimension arguments are truncated to integers; `rand` draws from an injectable source.
 */

import { EvaluationError } from "../errors.js";
import { filled, identity, shapeString } from "../ndarray.js";
import { lstsq, solve } from "../linalg/solve.js";
import type { FunctionNameIn } from "./signatures.js";
import {
  arrayArg,
  dimensionArgs,
  integerArg,
  makeModule,
  type StdFunction,
  type StdRuntimeContext,
} from "./std_shared.js";
import { arrayResult, type NDArray, type Value } from "../types.js";

function diag(arr: NDArray): NDArray {
  if (arr.shape.length === 1) {
    const n = arr.data.length;
    const out = filled([n, n], 0);
    for (let i = 0; i < n; i++) out.data[i * n + i] = arr.data[i] ?? 0;
    return out;
  }
  if (arr.shape.length === 2) {
    const [rows = 0, cols = 0] = arr.shape;
    const n = Math.min(rows, cols);
    const data = new Float64Array(n);
    for (let i = 0; i < n; i++) data[i] = arr.data[i * cols + i] ?? 0;
    return { shape: [n], data };
  }
  throw new EvaluationError("MC_EVAL_SHAPE", `diag: input must be 1-D or 2-D, got shape ${shapeString(arr.shape)}`);
}

export function createConstructModule(context?: StdRuntimeContext): Readonly<Record<FunctionNameIn<"construct">, StdFunction>> {
  const random = context?.random ?? Math.random;

  return makeModule({
    solve: (args: readonly Value[]) => arrayResult(solve(arrayArg(args, 0, "solve"), arrayArg(args, 1, "solve"))),
    lstsq: (args: readonly Value[]) => arrayResult(lstsq(arrayArg(args, 0, "lstsq"), arrayArg(args, 1, "lstsq"))),
    eye: (args: readonly Value[]) => {
      const n = integerArg(args, 0, "eye");
      if (n < 0) throw new EvaluationError("MC_EVAL_SHAPE", "eye: negative dimensions are not allowed");
      return arrayResult(identity(n));
    },
    diag: (args: readonly Value[]) => arrayResult(diag(arrayArg(args, 0, "diag"))),
    rand: (args: readonly Value[]) => {
      const out = filled(dimensionArgs(args, "rand"), 0);
      for (let i = 0; i < out.data.length; i++) out.data[i] = random();
      return arrayResult(out);
    },
    zeros: (args: readonly Value[]) => arrayResult(filled(dimensionArgs(args, "zeros"), 0)),
    ones: (args: readonly Value[]) => arrayResult(filled(dimensionArgs(args, "ones"), 1)),
  });
}

/**
 * Purpose: Implement matrix-to-matrix functions for the matcalc std table.
 * Intent: Elementwise functions keep scalars scalar; linear-algebra ones require arrays.
 */

import { mapValue } from "../expr/eval_ops.js";
import { inv, matrixPower, pinv } from "../linalg/solve.js";
import type { FunctionNameIn } from "./signatures.js";
import { argAt, arrayArg, integerArg, makeModule, type StdFunction } from "./std_shared.js";
import { arrayResult, type Value } from "../types.js";

export function createMatrixModule(): Readonly<Record<FunctionNameIn<"matrix">, StdFunction>> {
  return makeModule({
    inv: (args: readonly Value[]) => arrayResult(inv(arrayArg(args, 0, "inv"))),
    pinv: (args: readonly Value[]) => arrayResult(pinv(arrayArg(args, 0, "pinv"))),
    matrix_power: (args: readonly Value[]) =>
      arrayResult(matrixPower(arrayArg(args, 0, "matrix_power"), integerArg(args, 1, "matrix_power"))),
    exp: (args: readonly Value[]) => mapValue(argAt(args, 0, "exp"), Math.exp),
    sin: (args: readonly Value[]) => mapValue(argAt(args, 0, "sin"), Math.sin),
    cos: (args: readonly Value[]) => mapValue(argAt(args, 0, "cos"), Math.cos),
  });
}

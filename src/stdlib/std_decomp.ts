/**
 * Purpose: Implement the decomposition functions for the matcalc std table.
 * Intent: Multi-factor decompositions return tuples in a fixed component order.
 */

import { cholesky, eig, lu, qr, svd } from "../linalg/decompose.js";
import type { FunctionNameIn } from "./signatures.js";
import { arrayArg, makeModule, type StdFunction } from "./std_shared.js";
import { arrayResult, tuple, type Value } from "../types.js";

export function createDecompositionModule(): Readonly<Record<FunctionNameIn<"decomposition">, StdFunction>> {
  return makeModule({
    svd: (args: readonly Value[]) => {
      const { u, s, vh } = svd(arrayArg(args, 0, "svd"));
      return tuple([arrayResult(u), arrayResult(s), arrayResult(vh)]);
    },
    eig: (args: readonly Value[]) => {
      const { w, v } = eig(arrayArg(args, 0, "eig"));
      return tuple([arrayResult(w), arrayResult(v)]);
    },
    qr: (args: readonly Value[]) => {
      const { q, r } = qr(arrayArg(args, 0, "qr"));
      return tuple([arrayResult(q), arrayResult(r)]);
    },
    lu: (args: readonly Value[]) => {
      const { p, l, u } = lu(arrayArg(args, 0, "lu"));
      return tuple([arrayResult(p), arrayResult(l), arrayResult(u)]);
    },
    // A single factor, so not a tuple.
    cholesky: (args: readonly Value[]) => arrayResult(cholesky(arrayArg(args, 0, "cholesky"))),
  });
}

/**
 * Purpose: Assemble the matcalc function table from its category modules.
 * Intent: The table is keyed by the registry's name union, so a registered name
 * without an implementation does not compile.
 */

import type { FunctionName } from "./signatures.js";
import { createConstructModule } from "./std_construct.js";
import { createDecompositionModule } from "./std_decomp.js";
import { createMatrixModule } from "./std_matrix.js";
import { createReduceModule } from "./std_reduce.js";
import type { StdFunction, StdRuntimeContext } from "./std_shared.js";

export type StdTable = Readonly<Record<FunctionName, StdFunction>>;

export function createStd(context?: StdRuntimeContext): StdTable {
  const table: Record<FunctionName, StdFunction> = {
    ...createMatrixModule(),
    ...createReduceModule(),
    ...createDecompositionModule(),
    ...createConstructModule(context),
  };
  return Object.freeze(table);
}

export const std = createStd();

/**
 * Purpose: Bind .npy files and piped input to expression placeholders.
 * Intent: Validate every path before reading any file, so a bad argument list fails
 * without partial work.
 */

import { existsSync, readFileSync } from "node:fs";
import { basename, extname } from "node:path";
import { errorMessage, LoaderError, MatcalcError } from "../errors.js";
import { PIPE_KEY, type MatrixEnvironment, type NDArray } from "../types.js";
import { parseNpy } from "./npy.js";

export const RESERVED_PIPE_FILE = "pipe.npy";

/** Placeholder letter a file binds to: the basename without `.npy`. */
export function placeholderForPath(path: string): string {
  if (!existsSync(path)) throw new LoaderError("MC_LOAD_NOT_FOUND", `File not found: ${path}`);
  if (!path.endsWith(".npy")) throw new LoaderError("MC_LOAD_BAD_EXTENSION", `File must be a .npy file: ${path}`);
  const name = basename(path, extname(path));
  if (!/^[A-Z]$/.test(name)) {
    throw new LoaderError(
      "MC_LOAD_BAD_NAME",
      `File name must be a single uppercase letter followed by .npy (e.g., A.npy): ${path}`
    );
  }
  return name;
}

export function readNpyFile(path: string): NDArray {
  try {
    return parseNpy(readFileSync(path));
  } catch (err) {
    const code = err instanceof MatcalcError ? "MC_LOAD_NPY" : "MC_LOAD_NOT_FOUND";
    throw new LoaderError(code, `Error loading ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

export function loadMatrices(paths: readonly string[], stdinData?: NDArray): MatrixEnvironment {
  for (const path of paths) {
    if (basename(path) === RESERVED_PIPE_FILE) {
      throw new LoaderError(
        "MC_LOAD_RESERVED_NAME",
        "'pipe.npy' is a reserved filename for piping operations. Use {PIPE} placeholder to access data from stdin."
      );
    }
  }

  const env: Record<string, NDArray> = Object.create(null);
  if (stdinData) env[PIPE_KEY] = stdinData;
  for (const path of paths) {
    env[placeholderForPath(path)] = readNpyFile(path);
  }
  return Object.freeze(env);
}

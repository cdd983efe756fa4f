/**
 * Purpose: Read piped input as an array.
 * Intent: Binary NPY is detected by its magic string; anything else is parsed as text.
 */

import { errorMessage, LoaderError } from "../errors.js";
import type { NDArray } from "../types.js";
import { hasNpyMagic, parseNpy } from "./npy.js";
import { parseTextMatrix } from "./text.js";

export function decodePipedInput(bytes: Uint8Array): NDArray | undefined {
  if (bytes.length === 0) return undefined;
  if (hasNpyMagic(bytes)) return parseNpy(bytes);
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new LoaderError("MC_LOAD_STDIN", `Failed to parse input as NPY or text: ${errorMessage(err)}`, { cause: err });
  }
  if (text.trim().length === 0) return undefined;
  return parseTextMatrix(text);
}

async function readAll(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

/** `undefined` when stdin is a terminal or carries no data. */
export async function readStdin(stream: NodeJS.ReadStream = process.stdin): Promise<NDArray | undefined> {
  if (stream.isTTY) return undefined;
  return decodePipedInput(await readAll(stream));
}

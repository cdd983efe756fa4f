/**
 * Purpose: Read and write the NumPy .npy binary array format.
 * Intent: Accept every numeric dtype and both memory orders on read; always write
 * little-endian float64 in C order, format version 1.0.
 */

import { LoaderError } from "../errors.js";
import { shapeString, sizeOf } from "../ndarray.js";
import type { NDArray } from "../types.js";

export const NPY_MAGIC = Uint8Array.of(0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59); // \x93NUMPY

const HEADER_ALIGN = 64;

type DtypeKind = "f" | "i" | "u" | "b";

interface NpyHeader {
  kind: DtypeKind;
  itemSize: number;
  littleEndian: boolean;
  fortranOrder: boolean;
  shape: number[];
}

export function hasNpyMagic(bytes: Uint8Array): boolean {
  if (bytes.length < NPY_MAGIC.length) return false;
  return NPY_MAGIC.every((b, i) => bytes[i] === b);
}

function isDtypeKind(text: string): text is DtypeKind {
  return text === "f" || text === "i" || text === "u" || text === "b";
}

function fail(message: string): never {
  throw new LoaderError("MC_LOAD_NPY", message);
}

function parseHeader(text: string): NpyHeader {
  const descr = /'descr'\s*:\s*'([<>|=]?)([fiub])(\d+)'/.exec(text);
  if (!descr) fail(`Unsupported or missing dtype in NPY header: ${text.trim()}`);
  const [, order = "", kind = "", sizeText = ""] = descr;
  if (!isDtypeKind(kind)) fail(`Unsupported NPY dtype kind: ${kind}`);
  const itemSize = Number(sizeText);

  const supported: Record<DtypeKind, number[]> = { f: [4, 8], i: [1, 2, 4, 8], u: [1, 2, 4, 8], b: [1] };
  if (!supported[kind].includes(itemSize)) fail(`Unsupported NPY dtype: ${kind}${itemSize}`);

  const fortran = /'fortran_order'\s*:\s*(True|False)/.exec(text);
  if (!fortran) fail("Missing fortran_order in NPY header");

  const shapeMatch = /'shape'\s*:\s*\(([^)]*)\)/.exec(text);
  if (!shapeMatch) fail("Missing shape in NPY header");
  const shape = (shapeMatch[1] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => {
      const n = Number(s.replace(/L$/, ""));
      if (!Number.isInteger(n) || n < 0) fail(`Invalid NPY shape entry: ${s}`);
      return n;
    });

  return { kind, itemSize, littleEndian: order !== ">", fortranOrder: fortran[1] === "True", shape };
}

function readElement(view: DataView, offset: number, header: NpyHeader): number {
  const le = header.littleEndian;
  switch (header.kind) {
    case "f":
      return header.itemSize === 4 ? view.getFloat32(offset, le) : view.getFloat64(offset, le);
    case "b":
      return view.getUint8(offset) !== 0 ? 1 : 0;
    case "i":
      if (header.itemSize === 1) return view.getInt8(offset);
      if (header.itemSize === 2) return view.getInt16(offset, le);
      if (header.itemSize === 4) return view.getInt32(offset, le);
      return Number(view.getBigInt64(offset, le));
    case "u":
      if (header.itemSize === 1) return view.getUint8(offset);
      if (header.itemSize === 2) return view.getUint16(offset, le);
      if (header.itemSize === 4) return view.getUint32(offset, le);
      return Number(view.getBigUint64(offset, le));
    default: {
      const _exhaustive: never = header.kind;
      return _exhaustive;
    }
  }
}

/** Reorders column-major data into row-major order. */
function fortranToC(data: Float64Array, shape: readonly number[]): Float64Array {
  if (shape.length < 2) return data;
  const out = new Float64Array(data.length);
  const rank = shape.length;
  const index = new Array<number>(rank).fill(0);
  for (let c = 0; c < data.length; c++) {
    // `index` walks C order; compute the matching column-major offset.
    let f = 0;
    let stride = 1;
    for (let axis = 0; axis < rank; axis++) {
      f += (index[axis] ?? 0) * stride;
      stride *= shape[axis] ?? 1;
    }
    out[c] = data[f] ?? 0;
    for (let axis = rank - 1; axis >= 0; axis--) {
      const next = (index[axis] ?? 0) + 1;
      if (next < (shape[axis] ?? 0)) {
        index[axis] = next;
        break;
      }
      index[axis] = 0;
    }
  }
  return out;
}

export function parseNpy(bytes: Uint8Array): NDArray {
  if (!hasNpyMagic(bytes)) fail("Not an NPY file (bad magic string)");
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const major = view.getUint8(6);
  if (major < 1 || major > 3) fail(`Unsupported NPY format version ${major}.${view.getUint8(7)}`);

  const lenSize = major === 1 ? 2 : 4;
  if (bytes.length < 8 + lenSize) fail("Truncated NPY header");
  const headerLen = major === 1 ? view.getUint16(8, true) : view.getUint32(8, true);
  const headerStart = 8 + lenSize;
  const dataStart = headerStart + headerLen;
  if (bytes.length < dataStart) fail("Truncated NPY header");

  const decoder = new TextDecoder(major === 3 ? "utf-8" : "latin1");
  const header = parseHeader(decoder.decode(bytes.subarray(headerStart, dataStart)));
  const count = sizeOf(header.shape);
  if (bytes.length < dataStart + count * header.itemSize) {
    fail(`NPY data truncated: expected ${count} elements of ${header.itemSize} bytes`);
  }

  const data = new Float64Array(count);
  for (let i = 0; i < count; i++) data[i] = readElement(view, dataStart + i * header.itemSize, header);
  return {
    shape: header.shape,
    data: header.fortranOrder ? fortranToC(data, header.shape) : data,
  };
}

export function serializeNpy(arr: NDArray): Uint8Array {
  let header = `{'descr': '<f8', 'fortran_order': False, 'shape': ${shapeString(arr.shape)}, }`;
  // magic(6) + version(2) + length(2) + header + '\n' must be a multiple of HEADER_ALIGN.
  const unpadded = 10 + header.length + 1;
  header += " ".repeat((HEADER_ALIGN - (unpadded % HEADER_ALIGN)) % HEADER_ALIGN) + "\n";

  const out = new Uint8Array(10 + header.length + arr.data.length * 8);
  out.set(NPY_MAGIC, 0);
  out[6] = 1;
  out[7] = 0;
  const view = new DataView(out.buffer);
  view.setUint16(8, header.length, true);
  for (let i = 0; i < header.length; i++) out[10 + i] = header.charCodeAt(i);
  const dataStart = 10 + header.length;
  arr.data.forEach((x, i) => view.setFloat64(dataStart + i * 8, x, true));
  return out;
}

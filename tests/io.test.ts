import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { LoaderError } from "../src/errors.js";
import { loadMatrices } from "../src/io/loader.js";
import { hasNpyMagic, parseNpy, serializeNpy } from "../src/io/npy.js";
import { decodePipedInput } from "../src/io/stdin.js";
import { parseTextMatrix } from "../src/io/text.js";
import { toNested } from "../src/ndarray.js";
import { m } from "./helpers.js";

/** Hand-built NPY file with an arbitrary header and payload. */
function npyBytes(header: string, payload: Uint8Array, major = 1): Uint8Array {
  const lenSize = major === 1 ? 2 : 4;
  const headerBytes = new TextEncoder().encode(`${header}\n`);
  const out = new Uint8Array(8 + lenSize + headerBytes.length + payload.length);
  out.set([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59, major, 0], 0);
  const view = new DataView(out.buffer);
  if (major === 1) view.setUint16(8, headerBytes.length, true);
  else view.setUint32(8, headerBytes.length, true);
  out.set(headerBytes, 8 + lenSize);
  out.set(payload, 8 + lenSize + headerBytes.length);
  return out;
}

function loaderError(fn: () => unknown): LoaderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LoaderError) return err;
    throw err;
  }
  throw new Error("expected a loader error");
}

describe("npy", () => {
  it("writes a 64-byte aligned v1.0 header", () => {
    const bytes = serializeNpy(m([[1, 2], [3, 4]]));
    expect(bytes.length).toBe(160);
    expect(hasNpyMagic(bytes)).toBe(true);
    expect(bytes[6]).toBe(1);
    const header = new TextDecoder("latin1").decode(bytes.subarray(10, 128));
    expect(header.startsWith("{'descr': '<f8', 'fortran_order': False, 'shape': (2, 2), }")).toBe(true);
    expect(header.endsWith(" \n")).toBe(true);
  });

  it("reads back what it writes", () => {
    const arr = m([[1.5, -2], [0, 1e-300]]);
    const back = parseNpy(serializeNpy(arr));
    expect(back.shape).toEqual([2, 2]);
    expect(Array.from(back.data)).toEqual([1.5, -2, 0, 1e-300]);
    expect(parseNpy(serializeNpy(m([1, 2, 3]))).shape).toEqual([3]);
    expect(toNested(parseNpy(serializeNpy(m(4))))).toBe(4);
  });

  it("reads Fortran-ordered integer data", () => {
    const payload = new Uint8Array(6 * 4);
    const view = new DataView(payload.buffer);
    [1, 4, 2, 5, 3, 6].forEach((x, i) => view.setInt32(i * 4, x, true));
    const arr = parseNpy(npyBytes("{'descr': '<i4', 'fortran_order': True, 'shape': (2, 3), }", payload));
    expect(toNested(arr)).toEqual([[1, 2, 3], [4, 5, 6]]);
  });

  it("reads big-endian floats from a v2.0 file", () => {
    const payload = new Uint8Array(2 * 4);
    const view = new DataView(payload.buffer);
    view.setFloat32(0, 0.5, false);
    view.setFloat32(4, -8, false);
    const arr = parseNpy(npyBytes("{'descr': '>f4', 'fortran_order': False, 'shape': (2,), }", payload, 2));
    expect(toNested(arr)).toEqual([0.5, -8]);
  });

  it("reads booleans and unsigned bytes", () => {
    const bools = parseNpy(npyBytes("{'descr': '|b1', 'fortran_order': False, 'shape': (3,), }", Uint8Array.of(1, 0, 2)));
    expect(toNested(bools)).toEqual([1, 0, 1]);
    const bytes = parseNpy(npyBytes("{'descr': '|u1', 'fortran_order': False, 'shape': (2,), }", Uint8Array.of(255, 7)));
    expect(toNested(bytes)).toEqual([255, 7]);
  });

  it("rejects unsupported dtypes and truncated data", () => {
    const complex = npyBytes("{'descr': '<c16', 'fortran_order': False, 'shape': (1,), }", new Uint8Array(16));
    expect(loaderError(() => parseNpy(complex)).code).toBe("MC_LOAD_NPY");
    const short = npyBytes("{'descr': '<f8', 'fortran_order': False, 'shape': (2,), }", new Uint8Array(8));
    expect(loaderError(() => parseNpy(short)).message).toBe("NPY data truncated: expected 2 elements of 8 bytes");
    expect(loaderError(() => parseNpy(Uint8Array.of(1, 2, 3))).message).toBe("Not an NPY file (bad magic string)");
  });
});

describe("text input", () => {
  it("parses rows of whitespace-separated numbers", () => {
    expect(toNested(parseTextMatrix("1 2\n3 4\n"))).toEqual([[1, 2], [3, 4]]);
    expect(toNested(parseTextMatrix("1\t2.5   3"))).toEqual([1, 2.5, 3]);
  });

  it("squeezes a single column and a single value", () => {
    expect(parseTextMatrix("1\n2\n3\n").shape).toEqual([3]);
    expect(parseTextMatrix("# header\n5  # five\n\n").shape).toEqual([]);
  });

  it("rejects ragged rows and non-numbers", () => {
    expect(loaderError(() => parseTextMatrix("1 2\n3\n")).message).toBe(
      "the number of columns changed from 2 to 1 at row 2"
    );
    expect(loaderError(() => parseTextMatrix("1 x\n")).message).toBe("could not convert string to float: 'x' (line 1)");
    expect(loaderError(() => parseTextMatrix("# nothing\n")).code).toBe("MC_LOAD_TEXT");
  });
});

describe("piped input", () => {
  it("detects NPY bytes", () => {
    const arr = decodePipedInput(serializeNpy(m([[1, 2], [3, 4]])));
    expect(arr && toNested(arr)).toEqual([[1, 2], [3, 4]]);
  });

  it("falls back to text", () => {
    const arr = decodePipedInput(new TextEncoder().encode("1 2 3\n"));
    expect(arr && toNested(arr)).toEqual([1, 2, 3]);
  });

  it("treats empty input as absent", () => {
    expect(decodePipedInput(new Uint8Array(0))).toBeUndefined();
    expect(decodePipedInput(new TextEncoder().encode(" \n"))).toBeUndefined();
  });
});

describe("loadMatrices", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "matcalc-load-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("binds files to their placeholder letters", () => {
    const a = join(dir, "A.npy");
    const b = join(dir, "B.npy");
    writeFileSync(a, serializeNpy(m([[1, 2], [3, 4]])));
    writeFileSync(b, serializeNpy(m([5, 6])));
    const env = loadMatrices([a, b]);
    expect(Object.keys(env).sort()).toEqual(["A", "B"]);
    expect(env.B && toNested(env.B)).toEqual([5, 6]);
  });

  it("binds piped data to PIPE", () => {
    const env = loadMatrices([], m([1]));
    expect(Object.keys(env)).toEqual(["PIPE"]);
  });

  it("reserves pipe.npy", () => {
    const err = loaderError(() => loadMatrices([join(dir, "pipe.npy")]));
    expect(err.code).toBe("MC_LOAD_RESERVED_NAME");
  });

  it("validates paths", () => {
    const missing = join(dir, "A.npy");
    expect(loaderError(() => loadMatrices([missing])).message).toBe(`File not found: ${missing}`);

    const text = join(dir, "A.txt");
    writeFileSync(text, "1 2");
    expect(loaderError(() => loadMatrices([text])).code).toBe("MC_LOAD_BAD_EXTENSION");

    const lower = join(dir, "ab.npy");
    writeFileSync(lower, serializeNpy(m([1])));
    expect(loaderError(() => loadMatrices([lower])).code).toBe("MC_LOAD_BAD_NAME");
  });

  it("wraps unreadable NPY files", () => {
    const bad = join(dir, "C.npy");
    writeFileSync(bad, "not numpy");
    const err = loaderError(() => loadMatrices([bad]));
    expect(err.code).toBe("MC_LOAD_NPY");
    expect(err.message).toBe(`Error loading ${bad}: Not an NPY file (bad magic string)`);
  });
});

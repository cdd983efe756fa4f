import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { FormatError } from "../src/errors.js";
import { arrayToText } from "../src/format/array_text.js";
import { formatResult, type FormatOptions, type OutputFormat } from "../src/format/formatter.js";
import { formatG, formatRepr } from "../src/format/number_format.js";
import { saveResult } from "../src/format/output.js";
import { arrayToTable } from "../src/format/table.js";
import { parseNpy } from "../src/io/npy.js";
import { toNested } from "../src/ndarray.js";
import { arrayResult, scalar, tuple, type Result } from "../src/types.js";
import { m } from "./helpers.js";

const M = m([
  [1, 2],
  [3, 4],
]);

function text(result: Result, format: OutputFormat, extra: Partial<FormatOptions> = {}): string {
  const out = formatResult(result, { format, precision: 4, threshold: 1e-10, ...extra });
  if (out.kind !== "text") throw new Error("expected text output");
  return out.text;
}

describe("formatG", () => {
  it("keeps the requested significant digits", () => {
    expect(formatG(3.14159, 4)).toBe("3.142");
    expect(formatG(1234, 4)).toBe("1234");
    expect(formatG(2.5, 4)).toBe("2.5");
    expect(formatG(1 / 3, 2)).toBe("0.33");
    expect(formatG(-2, 4)).toBe("-2");
    expect(formatG(0, 4)).toBe("0");
  });

  it("switches to exponent form outside [1e-4, 10^precision)", () => {
    expect(formatG(100000, 4)).toBe("1e+05");
    expect(formatG(0.0001, 4)).toBe("0.0001");
    expect(formatG(0.00001, 4)).toBe("1e-05");
    expect(formatG(123456789, 3)).toBe("1.23e+08");
  });

  it("spells non-finite values", () => {
    expect(formatG(Number.NaN, 4)).toBe("nan");
    expect(formatG(Infinity, 4)).toBe("inf");
    expect(formatG(-Infinity, 4)).toBe("-inf");
  });
});

describe("formatRepr", () => {
  it("prints the shortest round-trip form", () => {
    expect(formatRepr(1)).toBe("1.0");
    expect(formatRepr(100)).toBe("100.0");
    expect(formatRepr(0.1)).toBe("0.1");
    expect(formatRepr(123.456)).toBe("123.456");
    expect(formatRepr(-0.5)).toBe("-0.5");
    expect(formatRepr(0.0001)).toBe("0.0001");
    expect(formatRepr(1.5e-5)).toBe("1.5e-05");
    expect(formatRepr(1e16)).toBe("1e+16");
  });
});

describe("array text", () => {
  it("aligns integer-valued entries", () => {
    expect(arrayToText(M, 4)).toBe("[[1. 2.]\n [3. 4.]]");
  });

  it("pads fractions and signs to a shared width", () => {
    expect(arrayToText(m([0.5, 1]), 4)).toBe("[0.5 1. ]");
    expect(arrayToText(m([-1.5, 2]), 4)).toBe("[-1.5  2. ]");
    expect(arrayToText(m([1 / 3]), 4)).toBe("[0.3333]");
  });

  it("uses exponent form for large magnitudes", () => {
    expect(arrayToText(m([1e8, 1]), 4)).toBe("[1.e+08 1.e+00]");
  });

  it("separates blocks of higher-rank arrays with a blank line", () => {
    expect(arrayToText(m([[[1]], [[2]]]), 4)).toBe("[[[1.]]\n\n [[2.]]]");
  });
});

describe("table", () => {
  it("draws a titled box", () => {
    expect(arrayToTable(M, 4)).toBe(
      [
        "Matrix Result",
        "┏━━━━━┳━━━━━┓",
        "┃ [0] ┃ [1] ┃",
        "┡━━━━━╇━━━━━┩",
        "│ 1   │ 2   │",
        "│ 3   │ 4   │",
        "└─────┴─────┘",
      ].join("\n")
    );
  });

  it("centres the title over wide tables", () => {
    const wide = arrayToTable(m([1000000, 2, 3]), 4);
    const [title, top] = wide.split("\n");
    expect(top).toBe("┏━━━━━━━┳━━━━━┳━━━━━┓");
    expect(title).toBe("    Matrix Result    ");
  });
});

describe("formatResult", () => {
  it("renders scalars with %g in every text format", () => {
    for (const format of ["plain", "text", "csv", "json", "latex", "table"] as const) {
      expect(text(scalar(-2), format)).toBe("-2");
    }
  });

  it("renders plain arrays", () => {
    expect(text(arrayResult(M), "plain")).toBe("1\t2\n3\t4");
    expect(text(arrayResult(m([1.5, 2])), "plain")).toBe("1.5\n2");
  });

  it("zeroes values under the threshold", () => {
    expect(text(arrayResult(m([1e-12, 1])), "plain")).toBe("0\n1");
    expect(text(scalar(0.001), "plain", { threshold: 0.01 })).toBe("0");
  });

  it("renders csv with float repr", () => {
    expect(text(arrayResult(M), "csv")).toBe("1.0,2.0\n3.0,4.0");
    expect(text(arrayResult(m([0.1, 2])), "csv")).toBe("0.1,2.0");
  });

  it("renders json and latex", () => {
    expect(text(arrayResult(M), "json")).toBe("[\n  [\n    1,\n    2\n  ],\n  [\n    3,\n    4\n  ]\n]");
    expect(text(arrayResult(M), "latex")).toBe("\\begin{bmatrix}\n1 & 2 \\\\\n3 & 4 \\\\\n\\end{bmatrix}");
  });

  it("labels tuple components", () => {
    const parts = tuple([scalar(1), arrayResult(m([1, 2]))]);
    expect(text(parts, "plain")).toBe("COMPONENT_0\n\n1\n\nCOMPONENT_1\n\n1\n2");
    expect(text(parts, "text")).toBe("Component 0:\n1\n\nComponent 1:\n[1. 2.]");
  });

  it("writes NPY bytes", () => {
    const out = formatResult(arrayResult(M), { format: "npy", precision: 4, threshold: 1e-10 });
    if (out.kind !== "binary") throw new Error("expected binary output");
    expect(toNested(parseNpy(out.bytes))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("refuses to write a tuple as one NPY stream", () => {
    expect(() => formatResult(tuple([arrayResult(M)]), { format: "npy", precision: 4, threshold: 1e-10 })).toThrow(
      FormatError
    );
  });
});

describe("saveResult", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "matcalc-save-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const options = { precision: 4, threshold: 1e-10, components: false };

  it("writes delimited text for csv", () => {
    const path = join(dir, "out.csv");
    expect(saveResult(arrayResult(M), path, { ...options, format: "csv" })).toBe(`Array saved to ${path}`);
    expect(readFileSync(path, "utf8")).toBe("1,2\n3,4\n");
  });

  it("writes one value per line for 1-D text", () => {
    const path = join(dir, "out.txt");
    saveResult(arrayResult(m([0.5, 2])), path, { ...options, format: "text" });
    expect(readFileSync(path, "utf8")).toBe("0.5\n2\n");
  });

  it("writes scalars", () => {
    const path = join(dir, "det.txt");
    expect(saveResult(scalar(-2), path, { ...options, format: "plain" })).toBe(`Scalar saved to ${path}`);
    expect(readFileSync(path, "utf8")).toBe("-2");
  });

  it("saves tuple components to numbered files", () => {
    const path = join(dir, "svd.npy");
    const result = tuple([arrayResult(M), arrayResult(m([1, 2]))]);
    expect(saveResult(result, path, { ...options, format: "npy", components: true })).toBe(
      `Components saved to ${join(dir, "svd")}_*.npy`
    );
    expect(readdirSync(dir).sort()).toEqual(["svd_0.npy", "svd_1.npy"]);
    expect(toNested(parseNpy(readFileSync(join(dir, "svd_1.npy"))))).toEqual([1, 2]);
  });

  it("defaults the component extension by format", () => {
    saveResult(tuple([arrayResult(m([1]))]), join(dir, "parts"), { ...options, format: "plain", components: true });
    expect(readdirSync(dir)).toEqual(["parts_0.txt"]);
    expect(readFileSync(join(dir, "parts_0.txt"), "utf8")).toBe("1");
  });

  it("writes a whole tuple as text without --components", () => {
    const path = join(dir, "eig.txt");
    expect(saveResult(tuple([arrayResult(m([1]))]), path, { ...options, format: "plain" })).toBe(
      `Result saved to ${path}`
    );
    expect(readFileSync(path, "utf8")).toBe("COMPONENT_0\n\n1");
  });
});

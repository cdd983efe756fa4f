import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { buildConfig, getHelpText, getVersion, parseCliArgs, resolveFormat } from "../src/cli/cli_lib.js";
import { run, type CliIO } from "../src/cli/run.js";
import { CliUsageError } from "../src/errors.js";
import { parseNpy, serializeNpy } from "../src/io/npy.js";
import { toNested } from "../src/ndarray.js";
import type { NDArray } from "../src/types.js";
import { m } from "./helpers.js";

function usageError(args: string[]): CliUsageError {
  try {
    parseCliArgs(args);
  } catch (err) {
    if (err instanceof CliUsageError) return err;
    throw err;
  }
  throw new Error("expected a usage error");
}

interface Captured {
  io: CliIO;
  stdout: (string | Uint8Array)[];
  stderr: string[];
}

function capture(stdin?: NDArray): Captured {
  const stdout: (string | Uint8Array)[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    io: {
      stdout: (chunk) => {
        stdout.push(chunk);
      },
      stderr: (text) => {
        stderr.push(text);
      },
      readStdin: async () => stdin,
    },
  };
}

describe("parseCliArgs", () => {
  it("collects the expression, files and options", () => {
    expect(parseCliArgs(["{A}@{B}", "A.npy", "B.npy", "-f", "json", "--precision", "6"])).toEqual({
      expression: "{A}@{B}",
      files: ["A.npy", "B.npy"],
      format: "json",
      precision: 6,
    });
  });

  it("accepts --flag=value and short flags", () => {
    expect(parseCliArgs(["{A}", "A.npy", "--format=csv", "-t", "1e-6", "-o", "out.csv", "-c", "-v", "-n"])).toEqual({
      expression: "{A}",
      files: ["A.npy"],
      format: "csv",
      threshold: 1e-6,
      output: "out.csv",
      components: true,
      verbose: true,
      npy: true,
    });
  });

  it("treats everything after -- as positional", () => {
    expect(parseCliArgs(["--", "-{A}", "A.npy"])).toEqual({ expression: "-{A}", files: ["A.npy"] });
  });

  it("reports bad values", () => {
    expect(usageError(["-f", "xml"]).message).toBe(
      "argument -f: invalid choice: 'xml' (choose from 'plain', 'text', 'csv', 'json', 'latex', 'table', 'npy')"
    );
    expect(usageError(["--precision", "abc"]).message).toBe("argument --precision: invalid int value: 'abc'");
    expect(usageError(["-t", "small"]).message).toBe("argument -t: invalid float value: 'small'");
    expect(usageError(["{A}", "-t"]).message).toBe("argument -t: expected one argument");
    expect(usageError(["--bogus"]).message).toBe("unrecognized arguments: --bogus");
    expect(usageError(["--bogus"]).code).toBe("MC_CLI_USAGE");
  });
});

describe("buildConfig", () => {
  it("fills in defaults", () => {
    expect(buildConfig({ expression: "{A}", files: [] })).toEqual({
      expression: "{A}",
      files: [],
      format: "plain",
      precision: 4,
      threshold: 1e-10,
      components: false,
      verbose: false,
    });
  });

  it("resolves the output format", () => {
    expect(resolveFormat({ npy: true })).toBe("npy");
    expect(resolveFormat({ npy: true, format: "csv" })).toBe("csv");
    expect(resolveFormat({ pretty: true, format: "json" })).toBe("table");
    expect(resolveFormat({})).toBe("plain");
  });

  it("keeps the output path", () => {
    expect(buildConfig({ expression: "{A}", files: ["A.npy"], output: "r.npy" }).outputPath).toBe("r.npy");
  });
});

describe("help and version", () => {
  it("reads the version from package.json", () => {
    expect(getVersion()).toBe("matcalc 0.1.0");
  });

  it("documents usage", () => {
    expect(getHelpText().split("\n")[0]).toBe("matcalc - linear algebra calculator for NumPy .npy arrays");
  });
});

describe("run", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "matcalc-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints the version", async () => {
    const out = capture();
    expect(await run(["--version"], out.io)).toBe(0);
    expect(out.stdout).toEqual(["matcalc 0.1.0\n"]);
  });

  it("prints the usage guide", async () => {
    const out = capture();
    expect(await run(["--prompt"], out.io)).toBe(0);
    expect(String(out.stdout[0]).startsWith("# matcalc")).toBe(true);
  });

  it("evaluates against piped data", async () => {
    const out = capture(m([1, 2]));
    expect(await run(["{P}+1"], out.io)).toBe(0);
    expect(out.stdout).toEqual(["2\n3\n"]);
  });

  it("evaluates against files", async () => {
    const a = join(dir, "A.npy");
    writeFileSync(a, serializeNpy(m([[1, 2], [3, 4]])));
    const out = capture();
    expect(await run(["{A}.T", a, "-f", "csv"], out.io)).toBe(0);
    expect(out.stdout).toEqual(["1.0,3.0\n2.0,4.0\n"]);
  });

  it("streams NPY bytes with --npy", async () => {
    const out = capture(m([[1, 0], [0, 1]]));
    expect(await run(["{PIPE}*3", "--npy"], out.io)).toBe(0);
    const [bytes] = out.stdout;
    if (!(bytes instanceof Uint8Array)) throw new Error("expected bytes");
    expect(toNested(parseNpy(bytes))).toEqual([[3, 0], [0, 3]]);
  });

  it("narrates steps on stderr with --verbose", async () => {
    const out = capture(m([1]));
    expect(await run(["{P}", "-v"], out.io)).toBe(0);
    expect(out.stderr).toEqual([
      "Data detected from stdin, available as {PIPE} placeholder\n",
      "Loading matrices from 0 files...\n",
      "Parsing expression: {P}\n",
      "Evaluating expression...\n",
      "Formatting result...\n",
    ]);
    expect(out.stdout).toEqual(["1\n"]);
  });

  it("shows help and fails without inputs", async () => {
    const out = capture();
    expect(await run(["det({A})"], out.io)).toBe(1);
    expect(out.stderr).toEqual([`${getHelpText()}\n`]);
  });

  it("reports errors with a single line", async () => {
    const out = capture(m([1]));
    expect(await run(["{P}+"], out.io)).toBe(1);
    expect(out.stderr).toEqual(["Error: Unexpected end of expression\n"]);
  });

  it("reports usage errors", async () => {
    const out = capture();
    expect(await run(["{A}", "--format", "xml"], out.io)).toBe(1);
    expect(out.stderr[0]?.startsWith("Error: argument --format: invalid choice: 'xml'")).toBe(true);
  });
});

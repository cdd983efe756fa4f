/**
 * Purpose: Render numbers the way printf-style `%g` and shortest float repr do.
 * Intent: Keep scalar, plain, latex and table output identical across formats.
 */

function nonFinite(x: number): string | null {
  if (Number.isNaN(x)) return "nan";
  if (x === Number.POSITIVE_INFINITY) return "inf";
  if (x === Number.NEGATIVE_INFINITY) return "-inf";
  return null;
}

function stripFractionZeros(s: string): string {
  if (!s.includes(".")) return s;
  return s.replace(/0+$/, "").replace(/\.$/, "");
}

function exponentSuffix(exp: number): string {
  const sign = exp < 0 ? "-" : "+";
  return `e${sign}${String(Math.abs(exp)).padStart(2, "0")}`;
}

/** `%.{precision}g`: `precision` significant digits, trailing zeros removed. */
export function formatG(x: number, precision: number): string {
  const special = nonFinite(x);
  if (special !== null) return special;
  const p = Math.max(1, Math.trunc(precision));
  const sign = x < 0 || Object.is(x, -0) ? "-" : "";
  const abs = Math.abs(x);

  const [mantissa = "0", expText = "0"] = abs.toExponential(p - 1).split("e");
  const exp = Number(expText);
  if (exp < -4 || exp >= p) return `${sign}${stripFractionZeros(mantissa)}${exponentSuffix(exp)}`;
  return `${sign}${stripFractionZeros(abs.toFixed(p - 1 - exp))}`;
}

/** Shortest round-trip repr: `1.0`, `0.1`, `1e+16`, `1.5e-05`. */
export function formatRepr(x: number): string {
  const special = nonFinite(x);
  if (special !== null) return special;
  const sign = x < 0 || Object.is(x, -0) ? "-" : "";
  const [mantissa = "0", expText = "0"] = Math.abs(x).toExponential().split("e");
  const exp = Number(expText);
  const digits = mantissa.replace(".", "");

  if (exp < -4 || exp >= 16) {
    const body = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    return `${sign}${body}${exponentSuffix(exp)}`;
  }
  if (exp < 0) return `${sign}0.${"0".repeat(-exp - 1)}${digits}`;
  if (digits.length <= exp + 1) return `${sign}${digits}${"0".repeat(exp + 1 - digits.length)}.0`;
  return `${sign}${digits.slice(0, exp + 1)}.${digits.slice(exp + 1)}`;
}

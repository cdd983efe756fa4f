/**
 * Purpose: Declare the matcalc expression AST.
 * Intent: A closed set of immutable node variants, discriminated by `kind`.
 */

export type BinaryOp = "+" | "-" | "*" | "@" | "^";

export type UnaryOp = "transpose" | "negate";

export interface PlaceholderExpr {
  readonly kind: "placeholder";
  readonly name: string;
}

export interface BinaryExpr {
  readonly kind: "binary";
  readonly op: BinaryOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface UnaryExpr {
  readonly kind: "unary";
  readonly op: UnaryOp;
  readonly operand: Expr;
}

export interface CallExpr {
  readonly kind: "call";
  readonly name: string;
  readonly args: readonly Expr[];
}

export interface ConstantExpr {
  readonly kind: "constant";
  readonly value: number;
}

export type Expr = PlaceholderExpr | BinaryExpr | UnaryExpr | CallExpr | ConstantExpr;

export type ExprKind = Expr["kind"];

/** Compact, stable rendering used in verbose output and error messages. */
export function exprToString(expr: Expr): string {
  switch (expr.kind) {
    case "placeholder":
      return `{${expr.name}}`;
    case "constant":
      return String(expr.value);
    case "unary":
      return expr.op === "transpose" ? `${exprToString(expr.operand)}.T` : `-(${exprToString(expr.operand)})`;
    case "binary":
      return `(${exprToString(expr.left)} ${expr.op} ${exprToString(expr.right)})`;
    case "call":
      return `${expr.name}(${expr.args.map(exprToString).join(", ")})`;
    default: {
      const _exhaustive: never = expr;
      return String(_exhaustive);
    }
  }
}

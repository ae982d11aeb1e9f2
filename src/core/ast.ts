// src/core/ast.ts
// AST for calx: a closed set of expression nodes plus prototypes and functions.
// Nodes are immutable and form a strict tree; each child has one parent.

import type { Span } from "./span";

export type Expr =
  | { readonly tag: "Number"; readonly value: number; readonly span?: Span }
  | { readonly tag: "Variable"; readonly name: string; readonly span?: Span }
  | { readonly tag: "Binary"; readonly op: string; readonly left: Expr; readonly right: Expr; readonly span?: Span }
  | { readonly tag: "Call"; readonly callee: string; readonly args: readonly Expr[]; readonly span?: Span };

export type ExprTag = Expr["tag"];

/** Function signature: a name and its parameter names. */
export type Prototype = {
  readonly name: string;
  readonly params: readonly string[];
  readonly span?: Span;
};

/** A `def` (with body) or an `extern` (without). */
export type FunctionDef = {
  readonly prototype: Prototype;
  readonly body?: Expr;
};

/** Name given to the zero-argument function wrapping a top-level expression. */
export const ANON_FN_NAME = "";

export const num = (value: number, span?: Span): Expr => ({ tag: "Number", value, span });
export const variable = (name: string, span?: Span): Expr => ({ tag: "Variable", name, span });
export const binary = (op: string, left: Expr, right: Expr, span?: Span): Expr =>
  ({ tag: "Binary", op, left, right, span });
export const call = (callee: string, args: readonly Expr[], span?: Span): Expr =>
  ({ tag: "Call", callee, args, span });

export const prototype = (name: string, params: readonly string[], span?: Span): Prototype =>
  ({ name, params, span });

export const functionDef = (proto: Prototype, body?: Expr): FunctionDef =>
  body === undefined ? { prototype: proto } : { prototype: proto, body };

export function isAnonymous(proto: Prototype): boolean {
  return proto.name === ANON_FN_NAME;
}

/**
 * Fully parenthesized infix rendering: `(1 + (2 * 3))`, `foo(1, x)`.
 */
export function exprToString(e: Expr): string {
  switch (e.tag) {
    case "Number":
      return String(e.value);
    case "Variable":
      return e.name;
    case "Binary":
      return `(${exprToString(e.left)} ${e.op} ${exprToString(e.right)})`;
    case "Call":
      return `${e.callee}(${e.args.map(exprToString).join(", ")})`;
  }
}

export function prototypeToString(p: Prototype): string {
  return `${p.name}(${p.params.join(" ")})`;
}

export function functionToString(fn: FunctionDef): string {
  if (!fn.body) return `extern ${prototypeToString(fn.prototype)}`;
  if (isAnonymous(fn.prototype)) return exprToString(fn.body);
  return `def ${prototypeToString(fn.prototype)} ${exprToString(fn.body)}`;
}

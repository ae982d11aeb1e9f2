// src/core/parser/precedence.ts
// Binary operator precedence table (higher binds tighter)

import type { Token } from "../lexer/token";

export const DEFAULT_PRECEDENCE: Readonly<Record<string, number>> = {
  "<": 10,
  "+": 20,
  "-": 20,
  "*": 40,
};

export class PrecedenceTable {
  private readonly table = new Map<string, number>();

  constructor(entries: Readonly<Record<string, number>> = DEFAULT_PRECEDENCE) {
    for (const [op, prec] of Object.entries(entries)) {
      this.set(op, prec);
    }
  }

  set(op: string, precedence: number): void {
    if (op.length !== 1) {
      throw new Error(`Binary operators are single characters, got '${op}'`);
    }
    this.table.set(op, precedence);
  }

  has(op: string): boolean {
    return this.of(op) > 0;
  }

  /** Precedence of a single operator character, -1 when it is not a binary operator. */
  of(op: string): number {
    const prec = this.table.get(op);
    return prec !== undefined && prec > 0 ? prec : -1;
  }

  /** Precedence of a token; anything but a registered operator character is -1. */
  get(tok: Token): number {
    return tok.tag === "Char" ? this.of(tok.ch) : -1;
  }

  entries(): Array<[string, number]> {
    return [...this.table.entries()].filter(([, prec]) => prec > 0);
  }
}

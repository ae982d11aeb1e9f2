// src/core/lexer/token.ts
// Token model for the calx tokenizer

import type { Span } from "../span";

export type Token =
  | { tag: "Eof"; span: Span }
  | { tag: "Def"; span: Span }
  | { tag: "Extern"; span: Span }
  | { tag: "Identifier"; name: string; span: Span }
  | { tag: "Number"; value: number; text: string; span: Span }
  | { tag: "Char"; ch: string; span: Span };

export type TokenTag = Token["tag"];

export const KEYWORDS: ReadonlyMap<string, "Def" | "Extern"> = new Map([
  ["def", "Def"],
  ["extern", "Extern"],
]);

export function isCharToken(tok: Token, ch: string): boolean {
  return tok.tag === "Char" && tok.ch === ch;
}

/** Short human-readable form used in diagnostics and the REPL. */
export function describeToken(tok: Token): string {
  switch (tok.tag) {
    case "Eof":
      return "end of input";
    case "Def":
      return "'def'";
    case "Extern":
      return "'extern'";
    case "Identifier":
      return `identifier '${tok.name}'`;
    case "Number":
      return `number '${tok.text}'`;
    case "Char":
      return `'${tok.ch}'`;
  }
}

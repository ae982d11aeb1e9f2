// src/core/lexer/lexer.ts
// Pull-based tokenizer with one character of pushback

import type { Span } from "../span";
import type { CharSource } from "./source";
import { StringSource } from "./source";
import type { Token } from "./token";
import { KEYWORDS } from "./token";

// The C isspace set.
const isSpace = (c: string | null) =>
  c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\v" || c === "\f";
const isAlpha = (c: string | null) => c !== null && /^[A-Za-z]$/.test(c);
const isAlnum = (c: string | null) => c !== null && /^[A-Za-z0-9]$/.test(c);
const isDigit = (c: string | null) => c !== null && c >= "0" && c <= "9";

type Mark = { line: number; col: number; offset: number };

/**
 * Decimal text to float64 the way `strtod` reads it: the longest leading
 * `digits[.digits]` prefix is converted, anything after it is ignored, and
 * text without a digit converts to 0.
 */
export function parseNumber(text: string): number {
  const m = /^\d*(?:\.\d*)?/.exec(text);
  const prefix = m ? m[0] : "";
  return /\d/.test(prefix) ? Number(prefix) : 0;
}

export class Lexer {
  // Starts as a space so the first call reads from the source.
  private lastChar: string | null = " ";
  private line = 1;
  private col = 0;
  private offset = -1;

  constructor(
    private readonly source: CharSource,
    readonly file = "<input>"
  ) {}

  static fromString(text: string, file?: string): Lexer {
    return new Lexer(new StringSource(text), file);
  }

  /**
   * Produce the next token. Never fails; after end of input every call
   * returns another `Eof`.
   */
  next(): Token {
    for (;;) {
      while (isSpace(this.peek())) this.readChar();

      const c = this.peek();
      const start = this.mark();

      if (c === null) {
        return { tag: "Eof", span: this.span(start, start) };
      }

      if (isAlpha(c)) {
        let text = c;
        let end = start;
        this.readChar();
        for (let d = this.peek(); d !== null && isAlnum(d); d = this.peek()) {
          text += d;
          end = this.mark();
          this.readChar();
        }
        const keyword = KEYWORDS.get(text);
        const span = this.span(start, end);
        if (keyword) return { tag: keyword, span };
        return { tag: "Identifier", name: text, span };
      }

      if (isDigit(c) || c === ".") {
        let text = c;
        let end = start;
        this.readChar();
        for (let d = this.peek(); d !== null && (isDigit(d) || d === "."); d = this.peek()) {
          text += d;
          end = this.mark();
          this.readChar();
        }
        return { tag: "Number", value: parseNumber(text), text, span: this.span(start, end) };
      }

      if (c === "#") {
        do {
          this.readChar();
        } while (this.peek() !== null && this.peek() !== "\n" && this.peek() !== "\r");
        continue;
      }

      this.readChar();
      return { tag: "Char", ch: c, span: this.span(start, start) };
    }
  }

  private peek(): string | null {
    return this.lastChar;
  }

  private readChar(): void {
    if (this.lastChar === "\n") {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    this.offset++;
    this.lastChar = this.source.read();
  }

  private mark(): Mark {
    return { line: this.line, col: this.col, offset: this.offset };
  }

  private span(start: Mark, end: Mark): Span {
    return {
      file: this.file,
      startLine: start.line,
      startCol: start.col,
      endLine: end.line,
      endCol: end.col,
      offset: start.offset,
    };
  }
}

/** Every token of `text`, ending with a single `Eof`. */
export function tokenize(text: string, file?: string): Token[] {
  const lexer = Lexer.fromString(text, file);
  const toks: Token[] = [];
  for (;;) {
    const tok = lexer.next();
    toks.push(tok);
    if (tok.tag === "Eof") return toks;
  }
}

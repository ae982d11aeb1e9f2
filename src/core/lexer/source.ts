// src/core/lexer/source.ts

/**
 * Character stream consumed one character at a time.
 * `read` returns `null` once input is exhausted and keeps returning it.
 */
export interface CharSource {
  read(): string | null;
}

export class StringSource implements CharSource {
  private index = 0;

  constructor(private readonly text: string) {}

  read(): string | null {
    if (this.index >= this.text.length) return null;
    return this.text[this.index++];
  }
}

// src/core/span.ts
// Source positions shared by tokens, AST nodes and diagnostics

export type Span = {
  /** Source file or input identifier */
  file: string;
  /** 1-based */
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
  /** 0-based character offset of the first character */
  offset: number;
};

export function formatSpan(span: Span): string {
  return `${span.file}:${span.startLine}:${span.startCol}`;
}

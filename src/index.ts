// src/index.ts
// calx - Public API
//
// Tokenizer, parser, IR emitter and compilation session for embedding and tests.

import { CompilationSession } from "./core/session/session";
import type { RunOptions, RunResult } from "./core/session/types";
import type { CompilerConfig } from "./core/config/config";
import { DEFAULT_COMPILER_CONFIG } from "./core/config/config";

// ═══════════════════════════════════════════════════════════════════════════════
// FRONT END
// ═══════════════════════════════════════════════════════════════════════════════

export type { Span } from "./core/span";
export { formatSpan } from "./core/span";
export type { Token, TokenTag } from "./core/lexer/token";
export { KEYWORDS, describeToken, isCharToken } from "./core/lexer/token";
export type { CharSource } from "./core/lexer/source";
export { StringSource } from "./core/lexer/source";
export { Lexer, tokenize, parseNumber } from "./core/lexer/lexer";
export type { Expr, ExprTag, Prototype, FunctionDef } from "./core/ast";
export {
  ANON_FN_NAME,
  num,
  variable,
  binary,
  call,
  prototype,
  functionDef,
  isAnonymous,
  exprToString,
  prototypeToString,
  functionToString,
} from "./core/ast";
export { PrecedenceTable, DEFAULT_PRECEDENCE } from "./core/parser/precedence";
export { Parser } from "./core/parser/parser";

// ═══════════════════════════════════════════════════════════════════════════════
// IR & CODEGEN
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/ir";
export * from "./core/codegen";

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION, CONFIG, OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/session";
export * from "./core/config";
export * from "./outcome";

/**
 * Compile `source` in a fresh session and return the per-unit reports
 * together with the session (for its module).
 */
export function compile(
  source: string,
  options: RunOptions & { config?: CompilerConfig } = {}
): RunResult & { session: CompilationSession } {
  const session = new CompilationSession(options.config ?? DEFAULT_COMPILER_CONFIG);
  return { ...session.run(source, options), session };
}

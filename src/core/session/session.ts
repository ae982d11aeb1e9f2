// src/core/session/session.ts
// A compilation session: owns the operator table, the IR module and the
// emitter, and drives parse → emit one top-level unit at a time.

import type { FunctionDef } from "../ast";
import { functionDef } from "../ast";
import { Emitter } from "../codegen/emitter";
import type { CompilerConfig } from "../config/config";
import { DEFAULT_COMPILER_CONFIG } from "../config/config";
import { IRBuilder } from "../ir/builder";
import { IRModule } from "../ir/module";
import { printModule } from "../ir/print";
import { Lexer } from "../lexer/lexer";
import type { CharSource } from "../lexer/source";
import { isCharToken } from "../lexer/token";
import { Parser } from "../parser/parser";
import { PrecedenceTable } from "../parser/precedence";
import type { Outcome } from "../../outcome/outcome";
import { isDone, isFail } from "../../outcome/outcome";
import { mapOutcome } from "../../outcome/matchers";
import { nestedTooDeeply } from "../../outcome/constructors";
import { isFailureReason } from "../../outcome/failure";
import type { RunOptions, RunResult, UnitKind, UnitReport } from "./types";

export const SUCCESS_MESSAGES: Record<UnitKind, string> = {
  definition: "Parsed a function definition.",
  extern: "Parsed an extern.",
  expression: "Parsed a top-level expression.",
};

export class CompilationSession {
  readonly module: IRModule;
  readonly precedence: PrecedenceTable;
  readonly emitter: Emitter;

  constructor(readonly config: CompilerConfig = DEFAULT_COMPILER_CONFIG) {
    this.module = new IRModule(config.moduleName);
    this.precedence = new PrecedenceTable(config.operators);
    this.emitter = new Emitter(this.module, new IRBuilder(), { verify: config.verify });
  }

  /** A parser over `source` that shares this session's operator table. */
  parser(source: string | CharSource, file = "<input>"): Parser {
    const lexer = typeof source === "string" ? Lexer.fromString(source, file) : new Lexer(source, file);
    return new Parser(lexer, this.precedence);
  }

  /**
   * Compile every top-level unit in `source`. Malformed units are reported
   * and skipped; the loop only stops at end of input.
   */
  run(source: string, options: RunOptions = {}): RunResult {
    const parser = this.parser(source, options.file);
    const reports: UnitReport[] = [];

    for (;;) {
      const tok = parser.current;
      if (tok.tag === "Eof") return { reports };

      if (isCharToken(tok, ";")) {
        parser.advance();
        continue;
      }

      const report = this.handleUnit(parser);
      if (
        options.partial &&
        isFail(report.outcome) &&
        isFailureReason(report.outcome.failure, "incomplete-input")
      ) {
        return { reports, pending: source.slice(tok.span.offset) };
      }
      reports.push(report);
    }
  }

  /** Compile one unit starting at the parser's current token. */
  handleUnit(parser: Parser): UnitReport {
    switch (parser.current.tag) {
      case "Def":
        return this.handleDefinition(parser);
      case "Extern":
        return this.handleExtern(parser);
      default:
        return this.handleTopLevelExpression(parser);
    }
  }

  handleDefinition(parser: Parser): UnitReport {
    const span = parser.current.span;
    return this.compileUnit("definition", span, parser, () => parser.parseDefinition());
  }

  handleExtern(parser: Parser): UnitReport {
    const span = parser.current.span;
    return this.compileUnit("extern", span, parser, () => mapOutcome(parser.parseExtern(), p => functionDef(p)));
  }

  handleTopLevelExpression(parser: Parser): UnitReport {
    const span = parser.current.span;
    return this.compileUnit("expression", span, parser, () => parser.parseTopLevelExpression());
  }

  printModule(): string {
    return printModule(this.module);
  }

  private compileUnit(
    kind: UnitKind,
    span: UnitReport["span"],
    parser: Parser,
    parse: () => Outcome<FunctionDef>
  ): UnitReport {
    let parsed: Outcome<FunctionDef>;
    try {
      parsed = parse();
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
      // Nesting ran past the call stack: drop the rest of the unit.
      skipUnit(parser);
      return { kind, outcome: nestedTooDeeply(span), span };
    }
    if (!isDone(parsed)) {
      // Skip the offending token so the next unit can start.
      parser.advance();
      return { kind, outcome: parsed, span };
    }
    const outcome = kind === "extern"
      ? this.emitter.emitPrototype(parsed.value.prototype)
      : this.emitter.emitFunction(parsed.value);
    return { kind, outcome, span, ast: parsed.value };
  }
}

/** Advance to the next `def`, `extern`, `;` or end of input. */
function skipUnit(parser: Parser): void {
  for (let tok = parser.current; tok.tag !== "Eof"; tok = parser.advance()) {
    if (tok.tag === "Def" || tok.tag === "Extern" || isCharToken(tok, ";")) return;
  }
}

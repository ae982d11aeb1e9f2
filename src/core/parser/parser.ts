// src/core/parser/parser.ts
// Recursive-descent parser with precedence climbing for binary operators.
//
//   primary    := number | identifier | identifier '(' args ')' | '(' expression ')'
//   expression := primary (op primary)*
//   prototype  := identifier '(' identifier* ')'
//   definition := 'def' prototype expression
//   extern     := 'extern' prototype
//   toplevel   := expression

import type { Expr, FunctionDef, Prototype } from "../ast";
import { ANON_FN_NAME, binary, call, functionDef, num, prototype, variable } from "../ast";
import type { Lexer } from "../lexer/lexer";
import type { Token } from "../lexer/token";
import { describeToken, isCharToken } from "../lexer/token";
import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { diagnosed, done } from "../../outcome/constructors";
import type { DiagnosticCode } from "../../outcome/codes";
import { PrecedenceTable } from "./precedence";

export class Parser {
  private cur: Token;

  constructor(
    private readonly lexer: Lexer,
    readonly precedence: PrecedenceTable = new PrecedenceTable()
  ) {
    this.cur = lexer.next();
  }

  /** The lookahead token. */
  get current(): Token {
    return this.cur;
  }

  advance(): Token {
    this.cur = this.lexer.next();
    return this.cur;
  }

  // ─────────────────────────────────────────────────────────────────
  // Expressions
  // ─────────────────────────────────────────────────────────────────

  parseExpression(): Outcome<Expr> {
    const lhs = this.parsePrimary();
    if (isFail(lhs)) return lhs;
    return this.parseBinOpRHS(0, lhs.value);
  }

  parsePrimary(): Outcome<Expr> {
    const tok = this.cur;
    switch (tok.tag) {
      case "Identifier":
        return this.parseIdentifierExpr(tok.name);
      case "Number":
        this.advance();
        return done(num(tok.value, tok.span));
      case "Char":
        if (tok.ch === "(") return this.parseParenExpr();
        return this.syntaxError("E0001");
      default:
        return this.syntaxError("E0001");
    }
  }

  /**
   * Precedence climbing. Folds `op primary` pairs onto `lhs` while the next
   * operator binds at least as tightly as `minPrec`; a tighter operator after
   * the right operand is absorbed into the right side first.
   */
  private parseBinOpRHS(minPrec: number, lhs: Expr): Outcome<Expr> {
    for (;;) {
      const tokPrec = this.precedence.get(this.cur);
      if (tokPrec < minPrec) return done(lhs);

      const opTok = this.cur;
      if (opTok.tag !== "Char") return done(lhs);
      this.advance();

      const primary = this.parsePrimary();
      if (isFail(primary)) return primary;
      let rhs = primary.value;

      const nextPrec = this.precedence.get(this.cur);
      if (tokPrec < nextPrec) {
        const absorbed = this.parseBinOpRHS(tokPrec + 1, rhs);
        if (isFail(absorbed)) return absorbed;
        rhs = absorbed.value;
      }

      lhs = binary(opTok.ch, lhs, rhs, opTok.span);
    }
  }

  private parseParenExpr(): Outcome<Expr> {
    this.advance(); // (
    const inner = this.parseExpression();
    if (isFail(inner)) return inner;
    if (!isCharToken(this.cur, ")")) return this.syntaxError("E0002");
    this.advance(); // )
    return inner;
  }

  private parseIdentifierExpr(name: string): Outcome<Expr> {
    const span = this.cur.span;
    this.advance(); // identifier

    if (!isCharToken(this.cur, "(")) return done(variable(name, span));
    this.advance(); // (

    const args: Expr[] = [];
    if (!isCharToken(this.cur, ")")) {
      for (;;) {
        const arg = this.parseExpression();
        if (isFail(arg)) return arg;
        args.push(arg.value);

        if (isCharToken(this.cur, ")")) break;
        if (!isCharToken(this.cur, ",")) return this.syntaxError("E0003");
        this.advance(); // ,
      }
    }
    this.advance(); // )
    return done(call(name, args, span));
  }

  // ─────────────────────────────────────────────────────────────────
  // Top-level units
  // ─────────────────────────────────────────────────────────────────

  parsePrototype(): Outcome<Prototype> {
    const nameTok = this.cur;
    if (nameTok.tag !== "Identifier") return this.syntaxError("E0004");
    this.advance();

    if (!isCharToken(this.cur, "(")) return this.syntaxError("E0005");

    const params: string[] = [];
    for (let tok = this.advance(); tok.tag === "Identifier"; tok = this.advance()) {
      if (params.includes(tok.name)) {
        return this.syntaxError("E0007", { name: tok.name, fn: nameTok.name });
      }
      params.push(tok.name);
    }

    if (!isCharToken(this.cur, ")")) return this.syntaxError("E0006");
    this.advance(); // )

    return done(prototype(nameTok.name, params, nameTok.span));
  }

  parseDefinition(): Outcome<FunctionDef> {
    this.advance(); // def
    const proto = this.parsePrototype();
    if (isFail(proto)) return proto;
    const body = this.parseExpression();
    if (isFail(body)) return body;
    return done(functionDef(proto.value, body.value));
  }

  parseExtern(): Outcome<Prototype> {
    this.advance(); // extern
    return this.parsePrototype();
  }

  parseTopLevelExpression(): Outcome<FunctionDef> {
    const span = this.cur.span;
    const body = this.parseExpression();
    if (isFail(body)) return body;
    return done(functionDef(prototype(ANON_FN_NAME, [], span), body.value));
  }

  private syntaxError(code: DiagnosticCode, params?: Record<string, string | number>) {
    const tok = this.cur;
    return diagnosed(
      tok.tag === "Eof" ? "incomplete-input" : "syntax-error",
      code,
      params,
      tok.span,
      { token: describeToken(tok) }
    );
  }
}

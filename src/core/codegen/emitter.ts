// src/core/codegen/emitter.ts
// Lowers AST nodes into IR values and functions registered in a module.

import type { Expr, FunctionDef, Prototype } from "../ast";
import { isAnonymous } from "../ast";
import type { Span } from "../span";
import { IRBuilder } from "../ir/builder";
import { IRFunction, type IRModule } from "../ir/module";
import type { IRValue } from "../ir/types";
import { isConstant } from "../ir/types";
import { verifyFunction } from "../ir/verify";
import type { Fail, Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { diagnosed, done, internalError, nestedTooDeeply } from "../../outcome/constructors";
import { traverse } from "../../outcome/matchers";
import { Scope } from "./scope";

export type EmitterOptions = {
  /** Run the IR verifier on every completed function body */
  verify: boolean;
};

export const DEFAULT_EMITTER_OPTIONS: EmitterOptions = { verify: true };

const displayName = (proto: Prototype) => (isAnonymous(proto) ? "<top-level>" : proto.name);

export class Emitter {
  /** Parameters of the function currently being emitted. */
  readonly scope = new Scope();

  constructor(
    readonly module: IRModule,
    readonly builder: IRBuilder = new IRBuilder(),
    private readonly options: EmitterOptions = DEFAULT_EMITTER_OPTIONS
  ) {}

  emitExpr(expr: Expr): Outcome<IRValue> {
    switch (expr.tag) {
      case "Number":
        return done(this.builder.constFP(expr.value));

      case "Variable": {
        const value = this.scope.lookup(expr.name);
        if (!value) {
          return diagnosed("unknown-variable", "E0101", { name: expr.name }, expr.span);
        }
        return done(value);
      }

      case "Binary": {
        const left = this.emitExpr(expr.left);
        if (isFail(left)) return left;
        const right = this.emitExpr(expr.right);
        if (isFail(right)) return right;
        const l = left.value;
        const r = right.value;

        if (!(isConstant(l) && isConstant(r)) && !this.builder.insertBlock) {
          return this.noInsertPoint(expr.span);
        }
        switch (expr.op) {
          case "+":
            return done(this.builder.createFAdd(l, r, "addtmp"));
          case "-":
            return done(this.builder.createFSub(l, r, "subtmp"));
          case "*":
            return done(this.builder.createFMul(l, r, "multmp"));
          case "<": {
            const cmp = this.builder.createFCmpULT(l, r, "cmptmp");
            return done(this.builder.createUIToFP(cmp, "booltmp"));
          }
          default:
            return diagnosed("unknown-operator", "E0104", { op: expr.op }, expr.span);
        }
      }

      case "Call": {
        const callee = this.module.getFunction(expr.callee);
        if (!callee) {
          return diagnosed("unknown-function", "E0102", { name: expr.callee }, expr.span);
        }
        if (callee.arity !== expr.args.length) {
          return diagnosed(
            "arity-mismatch",
            "E0103",
            { name: expr.callee, expected: callee.arity, actual: expr.args.length },
            expr.span
          );
        }
        const args = traverse(expr.args, arg => this.emitExpr(arg));
        if (isFail(args)) return args;
        if (!this.builder.insertBlock) return this.noInsertPoint(expr.span);
        return done(this.builder.createCall(callee, args.value, "calltmp"));
      }
    }
  }

  /**
   * Declare `double name(double, ...)`. A same-arity declaration already in
   * the module is returned as is.
   */
  emitPrototype(proto: Prototype): Outcome<IRFunction> {
    const existing = isAnonymous(proto) ? undefined : this.module.getFunction(proto.name);
    if (existing) {
      if (existing.arity !== proto.params.length) {
        return diagnosed(
          "arity-mismatch",
          "E0106",
          { name: proto.name, expected: existing.arity, actual: proto.params.length },
          proto.span
        );
      }
      return done(existing);
    }
    return done(this.module.addFunction(new IRFunction(proto.name, proto.params)));
  }

  /**
   * declare → entry block → bind parameters → body → ret → verify.
   * A failure after the declaration step leaves the module as it was before.
   */
  emitFunction(def: FunctionDef): Outcome<IRFunction> {
    const { prototype: proto, body: bodyExpr } = def;
    const preexisting = !isAnonymous(proto) && this.module.getFunction(proto.name) !== undefined;

    const declared = this.emitPrototype(proto);
    if (isFail(declared) || !bodyExpr) return declared;
    const fn = declared.value;

    if (!fn.isDeclaration()) {
      return diagnosed("redefinition", "E0105", { name: proto.name }, proto.span);
    }

    const previousNames = preexisting ? fn.args.map(arg => arg.name) : undefined;
    fn.setArgNames(proto.params);
    this.builder.setInsertPoint(fn.appendBlock("entry"));
    this.scope.clear();
    for (const arg of fn.args) {
      this.scope.bind(arg.name, arg);
    }

    const body = this.emitBody(bodyExpr, proto);
    if (isFail(body)) return this.abandon(fn, previousNames, body);
    this.builder.createRet(body.value);

    if (this.options.verify) {
      const problems = verifyFunction(fn);
      if (problems.length > 0) {
        return this.abandon(
          fn,
          previousNames,
          diagnosed(
            "verification-failed",
            "E0107",
            { name: displayName(proto), detail: problems.join("; ") },
            proto.span,
            { problems }
          )
        );
      }
    }

    this.finish();
    return done(fn);
  }

  /** Emit a body; nesting deeper than the call stack fails instead of throwing. */
  private emitBody(body: Expr, proto: Prototype): Outcome<IRValue> {
    try {
      return this.emitExpr(body);
    } catch (error) {
      if (error instanceof RangeError) return nestedTooDeeply(proto.span);
      throw error;
    }
  }

  /**
   * Undo a failed definition: a function declared before returns to that
   * declaration (parameter names included), one created here is erased.
   */
  private abandon(fn: IRFunction, previousNames: string[] | undefined, failure: Fail): Fail {
    if (previousNames) {
      fn.dropBody();
      fn.setArgNames(previousNames);
    } else {
      fn.eraseFromParent();
    }
    this.finish();
    return failure;
  }

  private finish(): void {
    this.builder.clearInsertPoint();
    this.scope.clear();
  }

  private noInsertPoint(span: Span | undefined): Fail {
    return internalError("instructions can only be emitted inside a function body", span);
  }
}

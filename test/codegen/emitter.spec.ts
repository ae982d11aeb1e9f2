// test/codegen/emitter.spec.ts
// Lowering expressions, prototypes and function definitions into a module

import { describe, it, expect, beforeEach } from "vitest";
import type { FunctionDef, Prototype } from "../../src/core/ast";
import { binary, call, num, variable } from "../../src/core/ast";
import { Emitter } from "../../src/core/codegen/emitter";
import { IRModule } from "../../src/core/ir/module";
import { printFunction } from "../../src/core/ir/print";
import { constFP } from "../../src/core/ir/types";
import { Lexer } from "../../src/core/lexer/lexer";
import { Parser } from "../../src/core/parser/parser";
import { PrecedenceTable } from "../../src/core/parser/precedence";
import type { Outcome } from "../../src/outcome/outcome";
import { isDone } from "../../src/outcome/outcome";

function value<A>(o: Outcome<A>): A {
  if (!isDone(o)) throw new Error(`expected success, got: ${o.failure.message}`);
  return o.value;
}

function failureOf<A>(o: Outcome<A>) {
  if (isDone(o)) throw new Error("expected a failure");
  return o.failure;
}

const parser = (src: string, table?: PrecedenceTable) => new Parser(Lexer.fromString(src), table);
const def = (src: string, table?: PrecedenceTable): FunctionDef => value(parser(src, table).parseDefinition());
const ext = (src: string): Prototype => value(parser(src).parseExtern());
const top = (src: string): FunctionDef => value(parser(src).parseTopLevelExpression());

describe("Emitter", () => {
  let module: IRModule;
  let emitter: Emitter;

  beforeEach(() => {
    module = new IRModule("test");
    emitter = new Emitter(module);
  });

  describe("definitions", () => {
    it("emits a function body", () => {
      const fn = value(emitter.emitFunction(def("def add(a b) a + b")));
      expect(printFunction(fn)).toBe(
        [
          "define double @add(double %a, double %b) {",
          "entry:",
          "  %addtmp = fadd double %a, %b",
          "  ret double %addtmp",
          "}",
        ].join("\n")
      );
      expect(module.getFunction("add")).toBe(fn);
    });

    it("lowers '<' to an unordered compare and a conversion", () => {
      const fn = value(emitter.emitFunction(def("def lt(a b) a < b")));
      expect(printFunction(fn)).toBe(
        [
          "define double @lt(double %a, double %b) {",
          "entry:",
          "  %cmptmp = fcmp ult double %a, %b",
          "  %booltmp = uitofp i1 %cmptmp to double",
          "  ret double %booltmp",
          "}",
        ].join("\n")
      );
    });

    it("evaluates call arguments and operands left to right", () => {
      value(emitter.emitPrototype(ext("extern g(x)")));
      value(emitter.emitPrototype(ext("extern h(x)")));
      const fn = value(emitter.emitFunction(def("def f(x) g(x) - h(x)")));
      expect(printFunction(fn)).toBe(
        [
          "define double @f(double %x) {",
          "entry:",
          "  %calltmp = call double @g(double %x)",
          "  %calltmp1 = call double @h(double %x)",
          "  %subtmp = fsub double %calltmp, %calltmp1",
          "  ret double %subtmp",
          "}",
        ].join("\n")
      );
    });

    it("folds a constant top-level expression", () => {
      const fn = value(emitter.emitFunction(top("4 + 5")));
      expect(printFunction(fn)).toBe(["define double @0() {", "entry:", "  ret double 9.000000e+00", "}"].join("\n"));
    });

    it("clears the scope after each function", () => {
      value(emitter.emitFunction(def("def sq(x) x * x")));
      expect(emitter.scope.size).toBe(0);
      expect(emitter.builder.insertBlock).toBeUndefined();
    });

    it("does not see parameters of an earlier function", () => {
      value(emitter.emitFunction(def("def id(x) x")));
      const f = failureOf(emitter.emitFunction(def("def g(y) x")));
      expect(f.reason).toBe("unknown-variable");
      expect(module.getFunction("g")).toBeUndefined();
    });
  });

  describe("failures", () => {
    it("rejects an unbound variable and leaves nothing behind", () => {
      const f = failureOf(emitter.emitFunction(top("x + 1")));
      expect(f.reason).toBe("unknown-variable");
      expect(f.diagnostics[0].code).toBe("E0101");
      expect(f.message).toBe("Unknown variable name 'x'");
      expect(module.functions).toHaveLength(0);
    });

    it("rejects an unknown function", () => {
      const f = failureOf(emitter.emitFunction(top("bar(1)")));
      expect(f.diagnostics[0].code).toBe("E0102");
      expect(f.message).toBe("Unknown function referenced 'bar'");
    });

    it("checks call arity", () => {
      value(emitter.emitPrototype(ext("extern foo(a b)")));
      const f = failureOf(emitter.emitFunction(top("foo(1)")));
      expect(f.reason).toBe("arity-mismatch");
      expect(f.diagnostics[0].code).toBe("E0103");
      expect(f.message).toBe("Incorrect # arguments passed to 'foo': expected 2, got 1");

      const fn = value(emitter.emitFunction(top("foo(1, 2)")));
      expect(printFunction(fn)).toBe(
        [
          "define double @0() {",
          "entry:",
          "  %calltmp = call double @foo(double 1.000000e+00, double 2.000000e+00)",
          "  ret double %calltmp",
          "}",
        ].join("\n")
      );
    });

    it("rejects an operator with no lowering", () => {
      const table = new PrecedenceTable({ "+": 20, "%": 40 });
      const f = failureOf(emitter.emitFunction(def("def f(x) x % 2", table)));
      expect(f.reason).toBe("unknown-operator");
      expect(f.message).toBe("invalid binary operator '%'");
      expect(module.getFunction("f")).toBeUndefined();
    });

    it("rejects a redefinition and keeps the first body", () => {
      const first = value(emitter.emitFunction(def("def f(x) x")));
      const f = failureOf(emitter.emitFunction(def("def f(y) y * 2")));
      expect(f.reason).toBe("redefinition");
      expect(f.diagnostics[0].code).toBe("E0105");
      expect(f.message).toBe("Function cannot be redefined: 'f'");
      expect(module.getFunction("f")).toBe(first);
      expect(printFunction(first)).toBe(
        ["define double @f(double %x) {", "entry:", "  ret double %x", "}"].join("\n")
      );
    });
  });

  describe("prototypes", () => {
    it("declares an extern", () => {
      const fn = value(emitter.emitPrototype(ext("extern sin(x)")));
      expect(printFunction(fn)).toBe("declare double @sin(double)");
    });

    it("tolerates a compatible redeclaration", () => {
      const first = value(emitter.emitPrototype(ext("extern foo(a)")));
      const second = value(emitter.emitPrototype(ext("extern foo(b)")));
      expect(second).toBe(first);
      expect(module.functions).toHaveLength(1);
    });

    it("rejects a redeclaration with a different arity", () => {
      value(emitter.emitPrototype(ext("extern foo(a)")));
      const f = failureOf(emitter.emitPrototype(ext("extern foo(a b)")));
      expect(f.reason).toBe("arity-mismatch");
      expect(f.diagnostics[0].code).toBe("E0106");
      expect(f.message).toBe("Function 'foo' redeclared with 2 parameters, previously 1");
    });

    it("renames parameters when defining a declared function", () => {
      value(emitter.emitPrototype(ext("extern g(a)")));
      const fn = value(emitter.emitFunction(def("def g(x) x * 2")));
      expect(printFunction(fn)).toBe(
        [
          "define double @g(double %x) {",
          "entry:",
          "  %multmp = fmul double %x, 2.000000e+00",
          "  ret double %multmp",
          "}",
        ].join("\n")
      );
    });

    it("keeps the declaration and its parameter names when a later body fails", () => {
      const declared = value(emitter.emitPrototype(ext("extern h(a)")));
      failureOf(emitter.emitFunction(def("def h(b) b + y")));
      expect(module.getFunction("h")).toBe(declared);
      expect(declared.isDeclaration()).toBe(true);
      expect(declared.args.map(arg => arg.name)).toEqual(["a"]);

      const fn = value(emitter.emitFunction(def("def h(c) c")));
      expect(printFunction(fn)).toBe(
        ["define double @h(double %c) {", "entry:", "  ret double %c", "}"].join("\n")
      );
    });

    it("fails instead of throwing when a body is nested past the call stack", () => {
      const deep = def(`def f(x) x${"+x".repeat(100000)}`);
      const f = failureOf(emitter.emitFunction(deep));
      expect(f.reason).toBe("internal-error");
      expect(f.message).toBe("Internal error: expression nested too deeply");
      expect(module.getFunction("f")).toBeUndefined();
      expect(emitter.scope.size).toBe(0);
      expect(emitter.builder.insertBlock).toBeUndefined();
    });
  });

  describe("emitExpr outside a function", () => {
    it("folds constant arithmetic", () => {
      expect(value(emitter.emitExpr(binary("+", num(1), num(2))))).toEqual(constFP(3));
    });

    it("fails on variables", () => {
      expect(failureOf(emitter.emitExpr(variable("x"))).reason).toBe("unknown-variable");
    });

    it("reports an internal error for a call", () => {
      value(emitter.emitPrototype(ext("extern sin(x)")));
      const f = failureOf(emitter.emitExpr(call("sin", [num(1)])));
      expect(f.reason).toBe("internal-error");
      expect(f.diagnostics[0].code).toBe("E0900");
      expect(f.recoverable).toBe(false);
    });
  });
});

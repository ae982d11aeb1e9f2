// src/core/ir/verify.ts
// Structural and type checks over a finished function

import type { IRFunction } from "./module";
import type { Instruction, IRType, IRValue } from "./types";
import { operandsOf } from "./types";

/**
 * Problems found in `fn`; an empty list means the function is well formed.
 */
export function verifyFunction(fn: IRFunction): string[] {
  const problems: string[] = [];
  const defined = new Set<IRValue>(fn.args);

  fn.blocks.forEach(block => {
    const where = `block '${block.name}'`;
    if (block.instructions.length === 0) {
      problems.push(`${where} is empty`);
      return;
    }
    if (!block.terminator) {
      problems.push(`${where} does not end in a terminator`);
    }

    block.instructions.forEach((inst, i) => {
      if (inst.op === "ret" && i !== block.instructions.length - 1) {
        problems.push(`${where} has a terminator before its end`);
      }
      for (const operand of operandsOf(inst)) {
        const issue = checkOperand(fn, defined, operand);
        if (issue) problems.push(`${describe(inst)}: ${issue}`);
      }
      problems.push(...checkTypes(fn, inst));
      defined.add(inst);
    });
  });

  return problems;
}

function checkOperand(fn: IRFunction, defined: Set<IRValue>, v: IRValue): string | undefined {
  switch (v.kind) {
    case "ConstFP":
    case "ConstInt":
      return undefined;
    case "Argument":
      return v.parent === fn ? undefined : `argument '%${v.name}' belongs to another function`;
    case "Instruction":
      if (v.type === "void") return "operand has no value";
      return defined.has(v) ? undefined : `operand '%${v.name}' is used before it is defined`;
  }
}

function checkTypes(fn: IRFunction, inst: Instruction): string[] {
  const problems: string[] = [];
  const expect = (v: IRValue, type: IRType, what: string) => {
    if (v.type !== type) problems.push(`${describe(inst)}: ${what} has type ${v.type}, expected ${type}`);
  };

  switch (inst.op) {
    case "fadd":
    case "fsub":
    case "fmul":
    case "fcmp":
      expect(inst.lhs, "double", "left operand");
      expect(inst.rhs, "double", "right operand");
      break;
    case "uitofp":
      expect(inst.operand, "i1", "operand");
      break;
    case "call":
      if (inst.callee.parent !== fn.parent) {
        problems.push(`${describe(inst)}: callee '@${inst.callee.name}' is not in this module`);
      }
      if (inst.args.length !== inst.callee.arity) {
        problems.push(`${describe(inst)}: expected ${inst.callee.arity} arguments, got ${inst.args.length}`);
      }
      inst.args.forEach((arg, i) => expect(arg, "double", `argument ${i}`));
      break;
    case "ret":
      expect(inst.value, fn.returnType, "return value");
      break;
  }
  return problems;
}

function describe(inst: Instruction): string {
  return inst.name ? `'%${inst.name}' (${inst.op})` : inst.op;
}

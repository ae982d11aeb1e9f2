// src/core/ir/builder.ts
// Instruction builder with constant folding

import type { BasicBlock, IRFunction } from "./module";
import type { BinaryOpcode, ConstFP, Instruction, IRValue } from "./types";
import { constBool, constFP } from "./types";

export class IRBuilder {
  private block: BasicBlock | undefined;

  get insertBlock(): BasicBlock | undefined {
    return this.block;
  }

  setInsertPoint(block: BasicBlock): void {
    this.block = block;
  }

  clearInsertPoint(): void {
    this.block = undefined;
  }

  constFP(value: number): ConstFP {
    return constFP(value);
  }

  createFAdd(lhs: IRValue, rhs: IRValue, name = ""): IRValue {
    return this.arith("fadd", lhs, rhs, name);
  }

  createFSub(lhs: IRValue, rhs: IRValue, name = ""): IRValue {
    return this.arith("fsub", lhs, rhs, name);
  }

  createFMul(lhs: IRValue, rhs: IRValue, name = ""): IRValue {
    return this.arith("fmul", lhs, rhs, name);
  }

  /** Unordered-or-less-than: true when either side is NaN. */
  createFCmpULT(lhs: IRValue, rhs: IRValue, name = ""): IRValue {
    if (lhs.kind === "ConstFP" && rhs.kind === "ConstFP") {
      const a = lhs.value;
      const b = rhs.value;
      return constBool(Number.isNaN(a) || Number.isNaN(b) || a < b);
    }
    return this.insert(fn => ({
      kind: "Instruction",
      op: "fcmp",
      predicate: "ult",
      type: "i1",
      name: fn.uniqueName(name),
      lhs,
      rhs,
    }));
  }

  createUIToFP(operand: IRValue, name = ""): IRValue {
    if (operand.kind === "ConstInt") {
      return constFP(operand.value ? 1 : 0);
    }
    return this.insert(fn => ({
      kind: "Instruction",
      op: "uitofp",
      type: "double",
      name: fn.uniqueName(name),
      operand,
    }));
  }

  createCall(callee: IRFunction, args: readonly IRValue[], name = ""): IRValue {
    return this.insert(fn => ({
      kind: "Instruction",
      op: "call",
      type: "double",
      name: fn.uniqueName(name),
      callee,
      args: [...args],
    }));
  }

  createRet(value: IRValue): IRValue {
    return this.insert(() => ({ kind: "Instruction", op: "ret", type: "void", name: "", value }));
  }

  private arith(op: BinaryOpcode, lhs: IRValue, rhs: IRValue, name: string): IRValue {
    if (lhs.kind === "ConstFP" && rhs.kind === "ConstFP") {
      return constFP(fold(op, lhs.value, rhs.value));
    }
    return this.insert(fn => ({
      kind: "Instruction",
      op,
      type: "double",
      name: fn.uniqueName(name),
      lhs,
      rhs,
    }));
  }

  private insert(make: (fn: IRFunction) => Instruction): Instruction {
    const block = this.block;
    if (!block) {
      throw new Error("IRBuilder: no insertion point set");
    }
    const inst = make(block.parent);
    block.instructions.push(inst);
    return inst;
  }
}

function fold(op: BinaryOpcode, a: number, b: number): number {
  switch (op) {
    case "fadd":
      return a + b;
    case "fsub":
      return a - b;
    case "fmul":
      return a * b;
  }
}

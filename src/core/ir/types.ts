// src/core/ir/types.ts
// Value model of the SSA IR: one numeric type (double) plus i1 for comparisons.

import type { IRFunction } from "./module";

export type IRType = "double" | "i1" | "void";

export type ConstFP = { readonly kind: "ConstFP"; readonly type: "double"; readonly value: number };
export type ConstInt = { readonly kind: "ConstInt"; readonly type: "i1"; readonly value: boolean };

export type Argument = {
  readonly kind: "Argument";
  readonly type: "double";
  name: string;
  readonly index: number;
  readonly parent: IRFunction;
};

export type BinaryOpcode = "fadd" | "fsub" | "fmul";

export type Instruction =
  | { readonly kind: "Instruction"; readonly op: BinaryOpcode; readonly type: "double"; readonly name: string; readonly lhs: IRValue; readonly rhs: IRValue }
  | { readonly kind: "Instruction"; readonly op: "fcmp"; readonly predicate: "ult"; readonly type: "i1"; readonly name: string; readonly lhs: IRValue; readonly rhs: IRValue }
  | { readonly kind: "Instruction"; readonly op: "uitofp"; readonly type: "double"; readonly name: string; readonly operand: IRValue }
  | { readonly kind: "Instruction"; readonly op: "call"; readonly type: "double"; readonly name: string; readonly callee: IRFunction; readonly args: readonly IRValue[] }
  | { readonly kind: "Instruction"; readonly op: "ret"; readonly type: "void"; readonly name: string; readonly value: IRValue };

export type Opcode = Instruction["op"];

export type Constant = ConstFP | ConstInt;
export type IRValue = Constant | Argument | Instruction;

export const constFP = (value: number): ConstFP => ({ kind: "ConstFP", type: "double", value });
export const constBool = (value: boolean): ConstInt => ({ kind: "ConstInt", type: "i1", value });

export function isConstant(v: IRValue): v is Constant {
  return v.kind === "ConstFP" || v.kind === "ConstInt";
}

/** Values read by an instruction, in operand order. */
export function operandsOf(inst: Instruction): readonly IRValue[] {
  switch (inst.op) {
    case "fadd":
    case "fsub":
    case "fmul":
    case "fcmp":
      return [inst.lhs, inst.rhs];
    case "uitofp":
      return [inst.operand];
    case "call":
      return inst.args;
    case "ret":
      return [inst.value];
  }
}

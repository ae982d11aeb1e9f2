// src/core/ir/index.ts

export type {
  IRType,
  ConstFP,
  ConstInt,
  Constant,
  Argument,
  Instruction,
  Opcode,
  BinaryOpcode,
  IRValue,
} from "./types";
export { constFP, constBool, isConstant, operandsOf } from "./types";
export { BasicBlock, IRFunction, IRModule } from "./module";
export { IRBuilder } from "./builder";
export { verifyFunction } from "./verify";
export { formatDouble, functionSymbol, printFunction, printModule } from "./print";

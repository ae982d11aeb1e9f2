// src/core/ir/print.ts
// Textual form of the IR: one function per block of text, SSA values as %names

import type { IRFunction, IRModule } from "./module";
import type { Instruction, IRValue } from "./types";

/**
 * Doubles print in `%e` form when that reads back exactly (`4.000000e+00`),
 * otherwise as the 64-bit pattern in hex (`0x3FB999999999999A`).
 */
export function formatDouble(value: number): string {
  if (Number.isFinite(value)) {
    const exp = value.toExponential(6).replace(/e([+-])(\d)$/, "e$10$2");
    if (Object.is(Number(exp), value)) return exp;
  }
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return `0x${view.getBigUint64(0).toString(16).toUpperCase().padStart(16, "0")}`;
}

export function functionSymbol(fn: IRFunction): string {
  if (!fn.isAnonymous()) return `@${fn.name}`;
  const idx = fn.parent ? fn.parent.anonymousIndex(fn) : 0;
  return `@${idx}`;
}

/** Numbers unnamed values (`%0`, `%1`, ...) in definition order. */
class SlotTracker {
  private readonly slots = new Map<IRValue, number>();

  constructor(fn: IRFunction) {
    let next = 0;
    for (const arg of fn.args) {
      if (arg.name === "") this.slots.set(arg, next++);
    }
    for (const block of fn.blocks) {
      for (const inst of block.instructions) {
        if (inst.name === "" && inst.type !== "void") this.slots.set(inst, next++);
      }
    }
  }

  ref(v: IRValue): string {
    switch (v.kind) {
      case "ConstFP":
        return formatDouble(v.value);
      case "ConstInt":
        return v.value ? "true" : "false";
      case "Argument":
      case "Instruction":
        return v.name !== "" ? `%${v.name}` : `%${this.slots.get(v) ?? "?"}`;
    }
  }
}

function printInstruction(inst: Instruction, slots: SlotTracker): string {
  const typed = (v: IRValue) => `${v.type} ${slots.ref(v)}`;
  const lhs = inst.type === "void" ? "" : `${slots.ref(inst)} = `;
  switch (inst.op) {
    case "fadd":
    case "fsub":
    case "fmul":
      return `${lhs}${inst.op} double ${slots.ref(inst.lhs)}, ${slots.ref(inst.rhs)}`;
    case "fcmp":
      return `${lhs}fcmp ${inst.predicate} double ${slots.ref(inst.lhs)}, ${slots.ref(inst.rhs)}`;
    case "uitofp":
      return `${lhs}uitofp ${typed(inst.operand)} to double`;
    case "call":
      return `${lhs}call double ${functionSymbol(inst.callee)}(${inst.args.map(typed).join(", ")})`;
    case "ret":
      return `ret ${typed(inst.value)}`;
  }
}

export function printFunction(fn: IRFunction): string {
  if (fn.isDeclaration()) {
    return `declare double ${functionSymbol(fn)}(${fn.args.map(() => "double").join(", ")})`;
  }

  const slots = new SlotTracker(fn);
  const params = fn.args.map(arg => `double ${slots.ref(arg)}`).join(", ");
  const lines = [`define double ${functionSymbol(fn)}(${params}) {`];
  fn.blocks.forEach((block, i) => {
    if (i > 0) lines.push("");
    lines.push(`${block.name}:`);
    for (const inst of block.instructions) {
      lines.push(`  ${printInstruction(inst, slots)}`);
    }
  });
  lines.push("}");
  return lines.join("\n");
}

export function printModule(mod: IRModule): string {
  const header = [`; ModuleID = '${mod.name}'`, `source_filename = "${mod.name}"`].join("\n");
  const bodies = mod.functions.map(printFunction);
  return [header, ...bodies].join("\n\n") + "\n";
}

// src/core/ir/module.ts
// Module, function and basic block containers of the IR

import type { Argument, Instruction } from "./types";

export class BasicBlock {
  readonly instructions: Instruction[] = [];

  constructor(
    readonly name: string,
    readonly parent: IRFunction
  ) {}

  get terminator(): Instruction | undefined {
    const last = this.instructions[this.instructions.length - 1];
    return last?.op === "ret" ? last : undefined;
  }
}

/**
 * A function of signature `double name(double, ...)`. Without blocks it is a
 * declaration. Value and block names are unique within the function.
 */
export class IRFunction {
  readonly returnType = "double" as const;
  readonly args: Argument[];
  readonly blocks: BasicBlock[] = [];
  parent: IRModule | undefined;

  private usedNames = new Set<string>();
  private lastUnique = 0;

  constructor(
    readonly name: string,
    paramNames: readonly string[]
  ) {
    this.args = paramNames.map((name, index) => ({
      kind: "Argument" as const,
      type: "double" as const,
      name,
      index,
      parent: this,
    }));
    this.resetNames();
  }

  get arity(): number {
    return this.args.length;
  }

  isAnonymous(): boolean {
    return this.name === "";
  }

  isDeclaration(): boolean {
    return this.blocks.length === 0;
  }

  appendBlock(name: string): BasicBlock {
    const block = new BasicBlock(this.uniqueName(name), this);
    this.blocks.push(block);
    return block;
  }

  /**
   * Reserve `base` in this function's namespace, suffixing a counter on
   * collision (`addtmp`, `addtmp1`, ...). Empty names stay unnamed.
   */
  uniqueName(base: string): string {
    if (base === "") return "";
    let candidate = base;
    while (this.usedNames.has(candidate)) {
      candidate = `${base}${++this.lastUnique}`;
    }
    this.usedNames.add(candidate);
    return candidate;
  }

  /** Rename parameters; only meaningful while the function has no body. */
  setArgNames(names: readonly string[]): void {
    if (names.length !== this.args.length) {
      throw new Error(`setArgNames: expected ${this.args.length} names, got ${names.length}`);
    }
    names.forEach((name, i) => {
      this.args[i].name = name;
    });
    this.resetNames();
  }

  /** Turn a definition back into a declaration. */
  dropBody(): void {
    this.blocks.length = 0;
    this.resetNames();
  }

  eraseFromParent(): void {
    this.parent?.removeFunction(this);
  }

  private resetNames(): void {
    this.usedNames = new Set(this.args.map(a => a.name).filter(n => n !== ""));
    this.lastUnique = 0;
  }
}

/**
 * Ordered collection of functions. Named functions are unique; anonymous
 * ones are never returned by `getFunction`.
 */
export class IRModule {
  private readonly fns: IRFunction[] = [];

  constructor(readonly name = "calx") {}

  get functions(): readonly IRFunction[] {
    return this.fns;
  }

  getFunction(name: string): IRFunction | undefined {
    if (name === "") return undefined;
    return this.fns.find(fn => fn.name === name);
  }

  addFunction(fn: IRFunction): IRFunction {
    if (fn.parent) {
      throw new Error(`Function '${fn.name}' already belongs to module '${fn.parent.name}'`);
    }
    if (this.getFunction(fn.name)) {
      throw new Error(`Function '${fn.name}' already exists in module '${this.name}'`);
    }
    this.fns.push(fn);
    fn.parent = this;
    return fn;
  }

  removeFunction(fn: IRFunction): void {
    const idx = this.fns.indexOf(fn);
    if (idx >= 0) {
      this.fns.splice(idx, 1);
      fn.parent = undefined;
    }
  }

  /** Position of an anonymous function among the module's anonymous functions. */
  anonymousIndex(fn: IRFunction): number {
    return this.fns.filter(f => f.isAnonymous()).indexOf(fn);
  }
}

// src/core/codegen/scope.ts
// Names visible while emitting one function body (its parameters).

import type { IRValue } from "../ir/types";

export class Scope {
  private readonly values = new Map<string, IRValue>();

  bind(name: string, value: IRValue): void {
    this.values.set(name, value);
  }

  lookup(name: string): IRValue | undefined {
    return this.values.get(name);
  }

  clear(): void {
    this.values.clear();
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }
}

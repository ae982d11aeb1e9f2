// test/codegen/scope.spec.ts

import { describe, it, expect } from "vitest";
import { Scope } from "../../src/core/codegen/scope";
import { constFP } from "../../src/core/ir/types";

describe("Scope", () => {
  it("binds and looks up names", () => {
    const scope = new Scope();
    const one = constFP(1);
    scope.bind("x", one);
    expect(scope.lookup("x")).toBe(one);
    expect(scope.lookup("y")).toBeUndefined();
  });

  it("lets a later binding replace an earlier one", () => {
    const scope = new Scope();
    scope.bind("x", constFP(1));
    scope.bind("x", constFP(2));
    expect(scope.lookup("x")).toEqual(constFP(2));
    expect(scope.size).toBe(1);
  });

  it("lists and clears its names", () => {
    const scope = new Scope();
    scope.bind("a", constFP(1));
    scope.bind("b", constFP(2));
    expect(scope.names()).toEqual(["a", "b"]);
    scope.clear();
    expect(scope.size).toBe(0);
    expect(scope.lookup("a")).toBeUndefined();
  });
});

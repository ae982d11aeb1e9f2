// test/parser/precedence.spec.ts

import { describe, it, expect } from "vitest";
import { DEFAULT_PRECEDENCE, PrecedenceTable } from "../../src/core/parser/precedence";
import { tokenize } from "../../src/core/lexer/lexer";

describe("PrecedenceTable", () => {
  it("starts with the default operators", () => {
    const table = new PrecedenceTable();
    expect(table.of("<")).toBe(10);
    expect(table.of("+")).toBe(20);
    expect(table.of("-")).toBe(20);
    expect(table.of("*")).toBe(40);
    expect(DEFAULT_PRECEDENCE).toEqual({ "<": 10, "+": 20, "-": 20, "*": 40 });
  });

  it("returns -1 for anything that is not a registered operator", () => {
    const table = new PrecedenceTable();
    const [ident, number, percent, eof] = tokenize("x 1 %");
    expect(table.get(ident)).toBe(-1);
    expect(table.get(number)).toBe(-1);
    expect(table.get(percent)).toBe(-1);
    expect(table.get(eof)).toBe(-1);
  });

  it("looks up character tokens", () => {
    const [star] = tokenize("*");
    expect(new PrecedenceTable().get(star)).toBe(40);
  });

  it("treats non-positive entries as absent", () => {
    const table = new PrecedenceTable({ "+": 20, "-": 0 });
    expect(table.has("+")).toBe(true);
    expect(table.has("-")).toBe(false);
    expect(table.of("-")).toBe(-1);
    expect(table.entries()).toEqual([["+", 20]]);
  });

  it("accepts new operators", () => {
    const table = new PrecedenceTable();
    table.set("%", 40);
    expect(table.of("%")).toBe(40);
  });

  it("rejects operators longer than one character", () => {
    expect(() => new PrecedenceTable().set("<=", 10)).toThrow(
      "Binary operators are single characters, got '<='"
    );
  });
});

// test/repl/repl.spec.ts
// Line handling of the REPL, driven without a terminal

import { describe, it, expect, beforeEach } from "vitest";
import { Repl, REPL_HELP, runBatch, type ReplIO } from "../../src/repl/repl";
import { CompilationSession } from "../../src/core/session/session";
import { DEFAULT_REPL_CONFIG, type ReplConfig } from "../../src/core/config/config";

function captureIO(): ReplIO & { outLines: string[]; errLines: string[] } {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return {
    outLines,
    errLines,
    out: text => outLines.push(text),
    err: text => errLines.push(text),
  };
}

const quiet: ReplConfig = { ...DEFAULT_REPL_CONFIG, printIR: false, dumpModuleOnExit: false };

describe("Repl", () => {
  let io: ReturnType<typeof captureIO>;
  let repl: Repl;

  beforeEach(() => {
    io = captureIO();
    repl = new Repl(new CompilationSession(), quiet, io);
  });

  it("reports each unit on a line", () => {
    repl.handleLine("def sq(x) x*x");
    repl.handleLine("extern sin(x)");
    repl.handleLine("sq(3)");
    expect(io.outLines).toEqual([
      "Parsed a function definition.",
      "Parsed an extern.",
      "Parsed a top-level expression.",
    ]);
    expect(io.errLines).toEqual([]);
  });

  it("prints IR when configured", () => {
    const r = new Repl(new CompilationSession(), { ...quiet, printIR: true }, io);
    r.handleLine("def id(x) x");
    expect(io.outLines).toEqual([
      "Parsed a function definition.\ndefine double @id(double %x) {\nentry:\n  ret double %x\n}",
    ]);
  });

  it("continues a unit over several lines", () => {
    repl.handleLine("def f(x)");
    expect(io.outLines).toEqual([]);
    expect(repl.hasPending).toBe(true);
    expect(repl.prompt).toBe("...> ");

    repl.handleLine("x + 1");
    expect(io.outLines).toEqual(["Parsed a function definition."]);
    expect(repl.hasPending).toBe(false);
    expect(repl.prompt).toBe("ready> ");
  });

  it("prints diagnostics on the error stream", () => {
    repl.handleLine("y");
    expect(io.errLines).toEqual(["repl:1:1: error[E0101]: Unknown variable name 'y'"]);
  });

  it("ignores blank lines", () => {
    expect(repl.handleLine("   ")).toEqual({ shouldExit: false });
    expect(io.outLines).toEqual([]);
    expect(io.errLines).toEqual([]);
  });

  it("flushes an unfinished unit at end of input", () => {
    repl.handleLine("def g(x)");
    repl.end();
    expect(io.errLines).toEqual(["repl:1:9: error[E0001]: unknown token when expecting an expression"]);
    expect(repl.hasPending).toBe(false);
  });

  it("prints the module at end of input when configured", () => {
    const r = new Repl(new CompilationSession(), { ...quiet, dumpModuleOnExit: true }, io);
    r.handleLine("extern cos(x)");
    r.end();
    expect(io.outLines).toEqual([
      "Parsed an extern.",
      "; ModuleID = 'calx'\nsource_filename = \"calx\"\n\ndeclare double @cos(double)\n",
    ]);
  });

  it("runs commands while a unit is still open", () => {
    repl.handleLine("def f(x)");
    expect(repl.handleLine(":ast 2 * 3")).toEqual({ shouldExit: false });
    expect(io.outLines).toEqual(["(2 * 3)"]);
    expect(repl.hasPending).toBe(true);

    repl.handleLine("x * 2");
    expect(io.outLines).toEqual(["(2 * 3)", "Parsed a function definition."]);
    expect(io.errLines).toEqual([]);
  });

  it(":quit exits while a unit is still open", () => {
    repl.handleLine("def f(x)");
    expect(repl.handleLine(":quit")).toEqual({ shouldExit: true });
    expect(io.errLines).toEqual([]);
  });

  describe("commands", () => {
    it(":quit and :q exit", () => {
      expect(repl.handleLine(":quit")).toEqual({ shouldExit: true });
      expect(repl.handleLine(":q")).toEqual({ shouldExit: true });
    });

    it(":help prints the help text", () => {
      repl.handleLine(":help");
      expect(io.outLines).toEqual([REPL_HELP]);
    });

    it(":ast shows how an expression parses", () => {
      repl.handleLine(":ast 1 + 2 * 3");
      expect(io.outLines).toEqual(["(1 + (2 * 3))"]);
    });

    it(":ast reports syntax errors", () => {
      repl.handleLine(":ast (1");
      expect(io.errLines).toEqual(["repl:1:3: error[E0002]: expected ')'"]);
    });

    it(":ast reports nesting past the call stack", () => {
      const depth = 100000;
      repl.handleLine(`:ast ${"(".repeat(depth)}1${")".repeat(depth)}`);
      expect(io.errLines).toEqual(["error[E0900]: Internal error: expression nested too deeply"]);
    });

    it(":ops lists operators by precedence", () => {
      repl.handleLine(":ops");
      expect(io.outLines).toEqual(["*  40\n+  20\n-  20\n<  10"]);
    });

    it(":module prints the module so far", () => {
      repl.handleLine("extern sin(x)");
      repl.handleLine(":m");
      expect(io.outLines[1]).toBe("; ModuleID = 'calx'\nsource_filename = \"calx\"\n\ndeclare double @sin(double)\n");
    });

    it("rejects unknown commands", () => {
      repl.handleLine(":frobnicate");
      expect(io.errLines).toEqual(["Unknown command: :frobnicate (try :help)"]);
    });
  });
});

describe("runBatch", () => {
  it("returns true when every unit compiles", () => {
    const io = captureIO();
    const ok = runBatch(new CompilationSession(), "def sq(x) x*x\nsq(2)", quiet, io, "demo.calx");
    expect(ok).toBe(true);
    expect(io.outLines).toEqual(["Parsed a function definition.", "Parsed a top-level expression."]);
  });

  it("returns false and reports failures with the file name", () => {
    const io = captureIO();
    const ok = runBatch(new CompilationSession(), "sq(2)\n1", quiet, io, "demo.calx");
    expect(ok).toBe(false);
    expect(io.errLines).toEqual(["demo.calx:1:1: error[E0102]: Unknown function referenced 'sq'"]);
    expect(io.outLines).toEqual(["Parsed a top-level expression."]);
  });

  it("prints the module last when configured", () => {
    const io = captureIO();
    runBatch(new CompilationSession(), "extern sin(x)", { ...quiet, dumpModuleOnExit: true }, io);
    expect(io.outLines[io.outLines.length - 1]).toBe(
      "; ModuleID = 'calx'\nsource_filename = \"calx\"\n\ndeclare double @sin(double)\n"
    );
  });
});

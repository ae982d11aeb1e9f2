// src/repl/repl.ts
// Interactive read-compile-print loop over a compilation session.
// Line handling lives here so it can run without a terminal; bin/calx.ts
// only wires it to readline.

import type { ReplConfig } from "../core/config/config";
import type { Expr } from "../core/ast";
import { exprToString } from "../core/ast";
import type { CompilationSession } from "../core/session/session";
import { renderReport } from "../core/session/report";
import type { UnitReport } from "../core/session/types";
import { formatDiagnostic } from "../outcome/diagnostic";
import { allDiagnostics } from "../outcome/failure";
import type { Outcome } from "../outcome/outcome";
import { isDone } from "../outcome/outcome";
import { nestedTooDeeply } from "../outcome/constructors";

export interface ReplIO {
  /** Results: success lines and IR */
  out(text: string): void;
  /** Diagnostics */
  err(text: string): void;
}

export type LineResult = { shouldExit: boolean };

export const REPL_HELP = `
Enter a definition, an extern or an expression:
  def add(a b) a + b
  extern sin(x)
  add(1, 2) * 3
A unit may continue over several lines.

Commands:
  :help, :h        Show this help
  :quit, :q        Exit
  :module, :m      Print the module built so far
  :ast <expr>      Show how an expression parses
  :ops             Show the operator precedence table
`.trim();

function printReport(io: ReplIO, report: UnitReport, withIR: boolean): void {
  if (isDone(report.outcome)) {
    io.out(renderReport(report, withIR));
  } else {
    io.err(renderReport(report));
  }
}

/**
 * Compile a whole input (file or `--eval` text). Returns false when any unit failed.
 */
export function runBatch(
  session: CompilationSession,
  source: string,
  config: ReplConfig,
  io: ReplIO,
  file = "<input>"
): boolean {
  const { reports } = session.run(source, { file });
  for (const report of reports) {
    printReport(io, report, config.printIR);
  }
  if (config.dumpModuleOnExit) {
    io.out(session.printModule());
  }
  return reports.every(r => isDone(r.outcome));
}

export class Repl {
  private pending = "";

  constructor(
    readonly session: CompilationSession,
    private readonly config: ReplConfig,
    private readonly io: ReplIO,
    private readonly file = "repl"
  ) {}

  /** Prompt for the next line: the continuation prompt while a unit is open. */
  get prompt(): string {
    return this.pending ? this.config.continuationPrompt : this.config.prompt;
  }

  get hasPending(): boolean {
    return this.pending !== "";
  }

  handleLine(line: string): LineResult {
    const trimmed = line.trim();

    // Commands work at either prompt and leave an open unit untouched.
    if (trimmed.startsWith(":")) return this.command(trimmed);
    if (!this.pending && trimmed === "") return { shouldExit: false };

    const source = this.pending ? `${this.pending}\n${line}` : line;
    const { reports, pending } = this.session.run(source, { file: this.file, partial: true });
    for (const report of reports) {
      printReport(this.io, report, this.config.printIR);
    }
    this.pending = pending ?? "";
    return { shouldExit: false };
  }

  /** Input closed: flush an unfinished unit, then print the module. */
  end(): void {
    if (this.pending) {
      const { reports } = this.session.run(this.pending, { file: this.file });
      this.pending = "";
      for (const report of reports) {
        printReport(this.io, report, this.config.printIR);
      }
    }
    if (this.config.dumpModuleOnExit) {
      this.io.out(this.session.printModule());
    }
  }

  private command(input: string): LineResult {
    const [cmd = ""] = input.split(/\s+/);
    const arg = input.slice(cmd.length).trim();

    switch (cmd) {
      case ":help":
      case ":h":
        this.io.out(REPL_HELP);
        break;
      case ":quit":
      case ":q":
        return { shouldExit: true };
      case ":module":
      case ":m":
        this.io.out(this.session.printModule());
        break;
      case ":ast":
        this.showAst(arg);
        break;
      case ":ops":
        this.io.out(
          this.session.precedence
            .entries()
            .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
            .map(([op, prec]) => `${op}  ${prec}`)
            .join("\n")
        );
        break;
      default:
        this.io.err(`Unknown command: ${cmd} (try :help)`);
    }
    return { shouldExit: false };
  }

  private showAst(text: string): void {
    const parser = this.session.parser(text, this.file);
    let expr: Outcome<Expr>;
    let rendered = "";
    try {
      expr = parser.parseExpression();
      if (isDone(expr)) rendered = exprToString(expr.value);
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
      expr = nestedTooDeeply();
    }
    if (isDone(expr)) {
      this.io.out(rendered);
      return;
    }
    for (const diag of allDiagnostics(expr.failure)) {
      this.io.err(formatDiagnostic(diag));
    }
  }
}

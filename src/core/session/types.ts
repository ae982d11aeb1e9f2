// src/core/session/types.ts

import type { FunctionDef } from "../ast";
import type { IRFunction } from "../ir/module";
import type { Span } from "../span";
import type { Outcome } from "../../outcome/outcome";

/** One `def`, one `extern`, or one bare expression. */
export type UnitKind = "definition" | "extern" | "expression";

export type UnitReport = {
  kind: UnitKind;
  /** The emitted function, or why parsing or emission failed */
  outcome: Outcome<IRFunction>;
  /** Position of the unit's first token */
  span: Span;
  /** Parsed form, present when parsing succeeded */
  ast?: FunctionDef;
};

export type RunOptions = {
  /** Name used in spans and diagnostics */
  file?: string;
  /**
   * Treat input as possibly cut short: a unit that fails only because input
   * ended is left out of the reports and returned as `pending`.
   */
  partial?: boolean;
};

export type RunResult = {
  reports: UnitReport[];
  /** Source text of an unfinished trailing unit (partial runs only) */
  pending?: string;
};

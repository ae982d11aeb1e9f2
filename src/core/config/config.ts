// src/core/config/config.ts
// Configuration for the calx compiler and REPL

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_PRECEDENCE } from "../parser/precedence";

// =========================================================================
// Configuration Types
// =========================================================================

export type CompilerConfig = {
  /** Name printed in the module header */
  moduleName: string;
  /** Run the IR verifier after each function body */
  verify: boolean;
  /** Binary operator precedences, single character to positive integer */
  operators: Record<string, number>;
};

export type ReplConfig = {
  /** Prompt shown before each top-level unit */
  prompt: string;
  /** Prompt shown while a unit continues on the next line */
  continuationPrompt: string;
  /** Print the IR of each emitted function */
  printIR: boolean;
  /** Print the whole module when input ends */
  dumpModuleOnExit: boolean;
};

export type CalxConfig = {
  compiler: CompilerConfig;
  repl: ReplConfig;
};

export type PartialCalxConfig = {
  compiler?: Partial<CompilerConfig>;
  repl?: Partial<ReplConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  moduleName: "calx",
  verify: true,
  operators: { ...DEFAULT_PRECEDENCE },
};

export const DEFAULT_REPL_CONFIG: ReplConfig = {
  prompt: "ready> ",
  continuationPrompt: "...> ",
  printIR: true,
  dumpModuleOnExit: true,
};

export const DEFAULT_CONFIG: CalxConfig = {
  compiler: DEFAULT_COMPILER_CONFIG,
  repl: DEFAULT_REPL_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["calx.config.json", ".calxrc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  const v = raw.toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

/**
 * Parse an operator list such as `"<:10,+:20,-:20,*:40"`.
 * Entries without a colon or with a non-numeric precedence are skipped.
 */
export function parseOperatorList(raw: string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const entry of raw.split(",")) {
    const idx = entry.lastIndexOf(":");
    if (idx <= 0) continue;
    const op = entry.slice(0, idx).trim();
    const prec = Number(entry.slice(idx + 1).trim());
    if (op && Number.isFinite(prec)) out[op] = prec;
  }
  return out;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = "CALX"): PartialCalxConfig {
  const compiler: Partial<CompilerConfig> = {};
  const repl: Partial<ReplConfig> = {};

  const moduleName = env[`${prefix}_MODULE_NAME`];
  if (moduleName) compiler.moduleName = moduleName;
  const verify = parseBool(env[`${prefix}_VERIFY`]);
  if (verify !== undefined) compiler.verify = verify;
  const operators = env[`${prefix}_OPERATORS`];
  if (operators) compiler.operators = parseOperatorList(operators);

  const prompt = env[`${prefix}_PROMPT`];
  if (prompt) repl.prompt = prompt;
  const printIR = parseBool(env[`${prefix}_PRINT_IR`]);
  if (printIR !== undefined) repl.printIR = printIR;
  const dump = parseBool(env[`${prefix}_DUMP_MODULE`]);
  if (dump !== undefined) repl.dumpModuleOnExit = dump;

  return { compiler, repl };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialCalxConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

const str = (v: unknown) => (typeof v === "string" ? v : undefined);
const bool = (v: unknown) => (typeof v === "boolean" ? v : undefined);

/**
 * Create configuration from a plain object (e.g. parsed JSON). Both camelCase
 * and snake_case keys are accepted; values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): PartialCalxConfig {
  const c: Record<string, unknown> = isRecord(data.compiler) ? data.compiler : {};
  const r: Record<string, unknown> = isRecord(data.repl) ? data.repl : {};

  let operators: Record<string, number> | undefined;
  if (isRecord(c.operators)) {
    operators = {};
    for (const [op, prec] of Object.entries(c.operators)) {
      if (typeof prec === "number") operators[op] = prec;
    }
  }

  const compiler: Partial<CompilerConfig> = {};
  const moduleName = str(c.moduleName) ?? str(c.module_name);
  if (moduleName !== undefined) compiler.moduleName = moduleName;
  const verify = bool(c.verify);
  if (verify !== undefined) compiler.verify = verify;
  if (operators) compiler.operators = operators;

  const repl: Partial<ReplConfig> = {};
  const prompt = str(r.prompt);
  if (prompt !== undefined) repl.prompt = prompt;
  const continuationPrompt = str(r.continuationPrompt) ?? str(r.continuation_prompt);
  if (continuationPrompt !== undefined) repl.continuationPrompt = continuationPrompt;
  const printIR = bool(r.printIR) ?? bool(r.print_ir);
  if (printIR !== undefined) repl.printIR = printIR;
  const dump = bool(r.dumpModuleOnExit) ?? bool(r.dump_module_on_exit);
  if (dump !== undefined) repl.dumpModuleOnExit = dump;

  return { compiler, repl };
}

/**
 * Merge configs with later ones overriding earlier ones. An `operators`
 * table replaces the previous one as a whole.
 */
export function mergeConfigs(...configs: PartialCalxConfig[]): CalxConfig {
  let result: CalxConfig = {
    compiler: { ...DEFAULT_CONFIG.compiler, operators: { ...DEFAULT_CONFIG.compiler.operators } },
    repl: { ...DEFAULT_CONFIG.repl },
  };

  for (const cfg of configs) {
    result = {
      compiler: { ...result.compiler, ...cfg.compiler },
      repl: { ...result.repl, ...cfg.repl },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialCalxConfig;
}): CalxConfig {
  const layers: PartialCalxConfig[] = [configFromEnv(options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

/**
 * Validate configuration and return errors/warnings.
 */
export function validateConfig(config: CalxConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [op, prec] of Object.entries(config.compiler.operators)) {
    if (op.length !== 1) {
      errors.push(`Operator '${op}' must be a single character`);
    } else if (/[A-Za-z0-9.#(),;\s]/.test(op)) {
      errors.push(`Operator '${op}' cannot be used as a binary operator`);
    }
    if (!Number.isInteger(prec) || prec <= 0) {
      errors.push(`Precedence of '${op}' must be a positive integer, got ${prec}`);
    }
  }

  for (const op of Object.keys(DEFAULT_PRECEDENCE)) {
    if (!(op in config.compiler.operators)) {
      warnings.push(`Operator '${op}' is not in the precedence table and will not parse as binary`);
    }
  }

  if (!config.compiler.moduleName) {
    errors.push("moduleName must not be empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

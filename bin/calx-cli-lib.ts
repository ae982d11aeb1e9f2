// bin/calx-cli-lib.ts
// Shared CLI utilities for the calx command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { CalxConfig, PartialCalxConfig } from "../src/core/config/config";
import { loadConfig } from "../src/core/config/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  configFile?: string;
  noIR?: boolean;
  noDump?: boolean;
  noVerify?: boolean;
  mode?: "repl" | "exec";
};

export type CliConfig = {
  mode: "repl" | "exec";
  code?: string;
  file?: string;
  config: CalxConfig;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--config" || arg === "-c") {
      result.configFile = args[++i];
    } else if (arg === "--no-ir") {
      result.noIR = true;
    } else if (arg === "--no-dump") {
      result.noDump = true;
    } else if (arg === "--no-verify") {
      result.noVerify = true;
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
        result.mode = "exec";
      }
    }
    // Ignore unknown flags
  }

  if (!result.mode) {
    result.mode = "repl";
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
calx - compile calx expressions to IR

USAGE:
  calx [options]                     Start the interactive REPL
  calx [options] <file>              Compile a file and print its IR
  calx --eval <code>                 Compile code given on the command line

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Compile code and exit
  -c, --config <file>                Read configuration from a JSON file
  --no-ir                            Do not print IR after each unit
  --no-dump                          Do not print the module at the end
  --no-verify                        Skip IR verification

ENVIRONMENT:
  CALX_MODULE_NAME, CALX_VERIFY, CALX_OPERATORS ("<:10,+:20"),
  CALX_PROMPT, CALX_PRINT_IR, CALX_DUMP_MODULE

EXAMPLES:
  calx                               # Start REPL
  calx examples/demo.calx            # Compile a file
  calx --eval "def sq(x) x*x"        # Compile one definition
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `calx v${pkg.version}`;
    }
  } catch {
    // no package.json next to the sources
  }
  return "calx v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): "repl" | "exec" {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval !== undefined || args.file) {
    return "exec";
  }
  return "repl";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function cliOverrides(args: Partial<CliArgs>): PartialCalxConfig {
  const overrides: PartialCalxConfig = { compiler: {}, repl: {} };
  if (args.noVerify) overrides.compiler = { verify: false };
  if (args.noIR) overrides.repl = { ...overrides.repl, printIR: false };
  if (args.noDump) overrides.repl = { ...overrides.repl, dumpModuleOnExit: false };
  return overrides;
}

export function buildConfig(
  args: Partial<CliArgs>,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): CliConfig {
  const config: CliConfig = {
    mode: detectMode(args),
    config: loadConfig({ configFile: args.configFile, env, cwd, overrides: cliOverrides(args) }),
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }

  if (args.file) {
    config.file = args.file;
  }

  return config;
}

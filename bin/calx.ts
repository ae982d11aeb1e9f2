#!/usr/bin/env npx tsx
// bin/calx.ts
// calx CLI: interactive REPL, or batch compilation of a file / --eval text
//
// Run:  npx tsx bin/calx.ts [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import * as path from "path";
import { parseCliArgs, getHelpText, getVersion, buildConfig, type CliConfig } from "./calx-cli-lib";
import { validateConfig } from "../src/core/config/config";
import { CompilationSession } from "../src/core/session/session";
import { Repl, runBatch, type ReplIO } from "../src/repl/repl";

const consoleIO: ReplIO = {
  out: text => console.log(text),
  err: text => console.error(text),
};

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  const cli = buildConfig(cliArgs);
  const validation = validateConfig(cli.config);
  for (const warning of validation.warnings) {
    console.error(`warning: ${warning}`);
  }
  if (!validation.valid) {
    for (const error of validation.errors) {
      console.error(`config error: ${error}`);
    }
    return 2;
  }

  if (cli.mode === "exec") {
    return executeMode(cli);
  }
  return replMode(cli);
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODES
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(cli: CliConfig): number {
  const session = new CompilationSession(cli.config.compiler);

  if (cli.file) {
    const filePath = path.resolve(process.cwd(), cli.file);
    const source = fs.readFileSync(filePath, "utf8");
    return runBatch(session, source, cli.config.repl, consoleIO, cli.file) ? 0 : 1;
  }
  return runBatch(session, cli.code ?? "", cli.config.repl, consoleIO, "<eval>") ? 0 : 1;
}

function replMode(cli: CliConfig): Promise<number> {
  const session = new CompilationSession(cli.config.compiler);
  const repl = new Repl(session, cli.config.repl, consoleIO);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: repl.prompt,
    terminal: process.stdin.isTTY,
  });

  return new Promise(resolve => {
    rl.on("line", line => {
      const { shouldExit } = repl.handleLine(line);
      if (shouldExit) {
        rl.close();
        return;
      }
      rl.setPrompt(repl.prompt);
      rl.prompt();
    });

    rl.on("close", () => {
      repl.end();
      resolve(0);
    });

    rl.prompt();
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });

#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { CommanderError, type Command } from "commander";

import { cliExitCode, renderCliError, toUserFacingError } from "./cli/error-format.js";
import { buildCli, type BuildCliDeps } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  // Usage errors still print through commander's own writer; everything else is rendered here.
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }
}

function isCommanderExit(error: unknown): error is CommanderError {
  return error instanceof CommanderError;
}

function resolveDebugFlag(argv: string[]): boolean {
  let debug = false;
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debug = true;
  }
  return debug;
}

// =============================================================================
// ENTRY
// =============================================================================

export async function main(argv: string[], deps: BuildCliDeps = {}): Promise<void> {
  const program = buildCli(deps);
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Help, version and usage errors were already printed by commander.
    if (isCommanderExit(error)) {
      process.exitCode = error.exitCode;
      return;
    }

    const facing = toUserFacingError(error);
    console.error(renderCliError(facing, { debug: resolveDebugFlag(argv) }));
    process.exitCode = cliExitCode(facing);
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  void main(process.argv);
}

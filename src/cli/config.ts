import { createAppContext, type AppContext } from "../app/context.js";
import type { OperatorOutput } from "../app/orchestrator/ports.js";
import { loadConfig } from "../core/config-loader.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliContextOptions = {
  configPath?: string;
  // Keeps stdout clean for JSON output.
  json?: boolean;
};

export type CreateContext = (options: CliContextOptions) => AppContext;

// Progress lines go to stderr when stdout carries JSON.
export const stderrOutput: OperatorOutput = {
  info: (message) => console.error(message),
  warn: (message) => console.error(message),
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadConfigForCli(options: CliContextOptions): AppContext {
  const loaded = loadConfig({ configPath: options.configPath });
  return createAppContext(loaded, options.json ? { output: stderrOutput } : {});
}

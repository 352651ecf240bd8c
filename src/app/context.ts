/**
 * AppContext binds a loaded config to the real adapters behind the orchestrator ports.
 * Purpose: keep adapter construction in one place so commands and tests differ only
 * in the ports they pass.
 * Usage: const ctx = createAppContext(loadConfig({ configPath })); ...; await ctx.dispose().
 */

import type { ShardlineConfig } from "../core/config.js";
import type { LoadedConfig } from "../core/config-loader.js";
import { templateRecordPath, weightsPath } from "../core/paths.js";
import { PgDatabaseAdmin } from "../database/postgres.js";
import { ExecaCommandRunner } from "../environment/command-runner.js";
import { ExecaEngineLauncher } from "../executor/engine-launcher.js";
import { FileSessionPointerStore } from "../state/session-pointers.js";
import { FileTemplateRecordStore } from "../state/template-record.js";
import { FileWeightHistoryStore } from "../state/weight-history.js";

import { consoleOutput, systemClock, type OrchestratorPorts } from "./orchestrator/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  config: ShardlineConfig;
  // null when running on defaults
  configPath: string | null;
  ports: OrchestratorPorts;
  dispose(): Promise<void>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createDefaultPorts(config: ShardlineConfig): OrchestratorPorts {
  return {
    admin: new PgDatabaseAdmin(config.database),
    launcher: new ExecaEngineLauncher(),
    runner: new ExecaCommandRunner(),
    weights: new FileWeightHistoryStore(weightsPath(config.log_root)),
    pointers: new FileSessionPointerStore(config.log_root, consoleOutput.warn),
    templates: new FileTemplateRecordStore(templateRecordPath(config.log_root)),
    clock: systemClock,
    output: consoleOutput,
  };
}

export function createAppContext(
  loaded: Pick<LoadedConfig, "config" | "sourcePath">,
  overrides: Partial<OrchestratorPorts> = {},
): AppContext {
  const ports = { ...createDefaultPorts(loaded.config), ...overrides };
  return {
    config: loaded.config,
    configPath: loaded.sourcePath,
    ports,
    dispose: () => ports.admin.close(),
  };
}

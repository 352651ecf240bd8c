/**
 * Orchestrator ports define the boundary between the session engine and adapters.
 * Purpose: make the database server, engine process, persisted state and clock
 * explicit and replaceable for testing.
 * Usage: build real adapters in `app/context.ts`; tests pass in-memory fakes.
 */

import type { DatabaseAdmin } from "../../database/postgres.js";
import type { CommandRunner } from "../../environment/command-runner.js";
import type { EngineLauncher } from "../../executor/engine-launcher.js";
import type { SessionPointerStore } from "../../state/session-pointers.js";
import type { TemplateRecordStore } from "../../state/template-record.js";
import type { WeightHistoryStore } from "../../state/weight-history.js";

// =============================================================================
// PORTS
// =============================================================================

export interface Clock {
  now(): Date;
}

export interface OperatorOutput {
  info(message: string): void;
  warn(message: string): void;
}

export type OrchestratorPorts = {
  admin: DatabaseAdmin;
  launcher: EngineLauncher;
  runner: CommandRunner;
  weights: WeightHistoryStore;
  pointers: SessionPointerStore;
  templates: TemplateRecordStore;
  clock: Clock;
  output: OperatorOutput;
};

export const systemClock: Clock = {
  now: () => new Date(),
};

export const consoleOutput: OperatorOutput = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

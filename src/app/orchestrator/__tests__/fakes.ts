/**
 * Orchestrator test fakes.
 * Purpose: in-process stand-ins for the database server, the engine process and
 * host commands, so session tests never reach a server or spawn anything.
 * Usage: const ports = createFakePorts(); ports.launcher.script("app_test_unit_s000", {...}).
 */

import type { CommandResult, CommandRunner, CommandSpec, PipeResult } from "../../../environment/command-runner.js";
import type { CapacitySample, DatabaseAdmin } from "../../../database/postgres.js";
import type { EngineCommand } from "../../../executor/engine-command.js";
import type { EngineExit, EngineLauncher, LaunchOptions } from "../../../executor/engine-launcher.js";
import { MemorySessionPointerStore } from "../../../state/session-pointers.js";
import { MemoryTemplateRecordStore } from "../../../state/template-record.js";
import { MemoryWeightHistoryStore } from "../../../state/weight-history.js";
import type { InterruptHooks } from "../interrupts.js";
import type { Clock, OperatorOutput, OrchestratorPorts } from "../ports.js";

// =============================================================================
// DATABASE
// =============================================================================

// LIKE with backslash escapes, as the admin queries use it.
export function likeToRegExp(pattern: string): RegExp {
  let source = "";
  for (let i = 0; i < pattern.length; i += 1) {
    const ch = pattern[i] ?? "";
    if (ch === "\\" && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[i + 1] ?? "");
      i += 1;
    } else if (ch === "%") {
      source += ".*";
    } else if (ch === "_") {
      source += ".";
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class MemoryDatabaseAdmin implements DatabaseAdmin {
  readonly databases = new Set<string>();
  readonly statements: string[] = [];
  // Database names whose create or drop fails.
  readonly failOn = new Set<string>();
  capacity: CapacitySample | Error = { maxConnections: 100, activeConnections: 0 };
  closed = false;

  constructor(existing: string[] = []) {
    for (const name of existing) this.databases.add(name);
  }

  async sampleCapacity(): Promise<CapacitySample> {
    this.statements.push("sample capacity");
    if (this.capacity instanceof Error) throw this.capacity;
    return { ...this.capacity };
  }

  async databaseExists(name: string): Promise<boolean> {
    return this.databases.has(name);
  }

  async listDatabases(likePatterns: string[]): Promise<string[]> {
    const matchers = likePatterns.map(likeToRegExp);
    return [...this.databases].filter((name) => matchers.some((re) => re.test(name))).sort();
  }

  async terminateConnections(name: string): Promise<void> {
    this.statements.push(`terminate ${name}`);
  }

  async dropDatabase(name: string): Promise<void> {
    this.statements.push(`drop ${name}`);
    if (this.failOn.has(name)) throw new Error(`cannot drop ${name}`);
    this.databases.delete(name);
  }

  async createDatabase(name: string, template?: string | null): Promise<void> {
    this.statements.push(template ? `create ${name} from ${template}` : `create ${name}`);
    if (this.failOn.has(name)) throw new Error(`cannot create ${name}`);
    if (template && !this.databases.has(template)) {
      throw new Error(`template ${template} does not exist`);
    }
    this.databases.add(name);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// =============================================================================
// ENGINE
// =============================================================================

export type EngineScript = {
  lines?: string[];
  exitCode?: number;
  timedOut?: boolean;
  // Launch failure instead of an exit.
  error?: Error;
  // Advances the fake clock while "running".
  elapsedMs?: number;
  // Awaited while the shard is "running".
  during?: () => Promise<void>;
};

export function databaseOf(command: EngineCommand): string {
  const index = command.args.indexOf("-d");
  return index >= 0 ? command.args[index + 1] ?? "" : "";
}

export class FakeEngineLauncher implements EngineLauncher {
  readonly calls: EngineCommand[] = [];
  private readonly scripts = new Map<string, EngineScript>();

  constructor(private readonly clock?: ManualClock) {}

  // Keyed by the shard's database name.
  script(dbName: string, script: EngineScript): void {
    this.scripts.set(dbName, script);
  }

  async run(command: EngineCommand, options: LaunchOptions): Promise<EngineExit> {
    this.calls.push(command);
    const script = this.scripts.get(databaseOf(command)) ?? {};
    if (script.error) throw script.error;

    for (const line of script.lines ?? []) options.onLine(line);
    if (script.during) await script.during();
    if (script.elapsedMs !== undefined) this.clock?.advance(script.elapsedMs);
    return { exitCode: script.exitCode ?? 0, timedOut: script.timedOut ?? false };
  }

  databases(): string[] {
    return this.calls.map(databaseOf);
  }
}

// =============================================================================
// HOST COMMANDS
// =============================================================================

export class FakeCommandRunner implements CommandRunner {
  readonly runCalls: CommandSpec[] = [];
  readonly pipeCalls: Array<{ source: CommandSpec; sink: CommandSpec }> = [];
  // Keyed by command name; unknown commands succeed.
  readonly results = new Map<string, CommandResult>();

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.runCalls.push(spec);
    return this.resultFor(spec);
  }

  async pipe(source: CommandSpec, sink: CommandSpec): Promise<PipeResult> {
    this.pipeCalls.push({ source, sink });
    return { source: this.resultFor(source), sink: this.resultFor(sink) };
  }

  fail(command: string, exitCode = 1, stderr = ""): void {
    this.results.set(command, { exitCode, stdout: "", stderr });
  }

  private resultFor(spec: CommandSpec): CommandResult {
    return this.results.get(spec.command) ?? { exitCode: 0, stdout: "", stderr: "" };
  }
}

// =============================================================================
// CLOCK & OUTPUT
// =============================================================================

export class ManualClock implements Clock {
  private current: number;

  constructor(start: string | Date = "2026-03-01T10:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class CapturingOutput implements OperatorOutput {
  readonly infos: string[] = [];
  readonly warnings: string[] = [];

  info = (message: string): void => {
    this.infos.push(message);
  };

  warn = (message: string): void => {
    this.warnings.push(message);
  };
}

// =============================================================================
// SIGNALS
// =============================================================================

export class FakeInterrupts implements InterruptHooks {
  readonly exitCodes: number[] = [];
  private readonly handlers = new Map<NodeJS.Signals, () => void>();
  private exited: () => void = () => undefined;
  // Resolves on the first exit() call.
  readonly exitedOnce: Promise<void>;
  // Runs right before an exit is recorded.
  onExit: () => void = () => undefined;

  constructor() {
    this.exitedOnce = new Promise((resolve) => {
      this.exited = resolve;
    });
  }

  onSignal(signal: NodeJS.Signals, handler: () => void): () => void {
    this.handlers.set(signal, handler);
    return () => {
      this.handlers.delete(signal);
    };
  }

  exit(code: number): void {
    this.onExit();
    this.exitCodes.push(code);
    this.exited();
  }

  emit(signal: NodeJS.Signals): void {
    this.handlers.get(signal)?.();
  }

  listening(): NodeJS.Signals[] {
    return [...this.handlers.keys()].sort();
  }
}

// =============================================================================
// PORTS
// =============================================================================

export type FakePorts = OrchestratorPorts & {
  admin: MemoryDatabaseAdmin;
  launcher: FakeEngineLauncher;
  runner: FakeCommandRunner;
  weights: MemoryWeightHistoryStore;
  pointers: MemorySessionPointerStore;
  templates: MemoryTemplateRecordStore;
  clock: ManualClock;
  output: CapturingOutput;
};

export function createFakePorts(existingDatabases: string[] = ["app"]): FakePorts {
  const clock = new ManualClock();
  return {
    admin: new MemoryDatabaseAdmin(existingDatabases),
    launcher: new FakeEngineLauncher(clock),
    runner: new FakeCommandRunner(),
    weights: new MemoryWeightHistoryStore(),
    pointers: new MemorySessionPointerStore(),
    templates: new MemoryTemplateRecordStore(),
    clock,
    output: new CapturingOutput(),
  };
}

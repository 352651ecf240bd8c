import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import type { EngineConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { handleFailure } from "../core/failure-policy.js";
import { logSessionEvent, type EventSink } from "../core/logger.js";
import { shardArtifactPaths, type ShardArtifactPaths } from "../core/paths.js";
import { attempt } from "../core/result.js";
import { writeJsonFile, writeTextFile } from "../core/utils.js";
import type { ShardWork } from "../planner/shard-planner.js";
import { renderJunit, shardSuite } from "../reporting/junit.js";

import { buildEngineCommand, buildTagExpression, usesTemplate } from "./engine-command.js";
import type { EngineExit, EngineLauncher } from "./engine-launcher.js";
import { OutputMonitor } from "./output-monitor.js";
import { SUMMARY_SCHEMA_VERSION, type ShardSummary } from "./shard-summary.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExecutionAdapterDeps = {
  launcher: EngineLauncher;
  engine: EngineConfig;
  events: EventSink;
  tagsOverride?: string;
  now?: () => Date;
  warn?: (message: string) => void;
};

export type ShardRunRequest = {
  sessionDir: string;
  timeoutSeconds: number;
  browserWorkers: number;
  // Environment preparation; a rejection is reported as a launch failure.
  prepare?: () => Promise<unknown>;
};

export type ShardRunResult = {
  returnCode: number;
  logPath: string;
  summaryPath: string;
  summary: ShardSummary;
};

const LOG_RULE = "=".repeat(80);

// =============================================================================
// ADAPTER
// =============================================================================

export class ExecutionAdapter {
  private readonly now: () => Date;
  private readonly warn: (message: string) => void;

  constructor(private readonly deps: ExecutionAdapterDeps) {
    this.now = deps.now ?? (() => new Date());
    this.warn = deps.warn ?? ((message) => console.warn(message));
  }

  // Never throws: launch and preparation failures become return code 1 with `error`.
  async run(work: ShardWork, request: ShardRunRequest): Promise<ShardRunResult> {
    const paths = shardArtifactPaths(request.sessionDir, work.phase, work.label);
    await fse.ensureDir(path.dirname(paths.log)).catch((caught: unknown) => {
      this.warn(`Warning: failed to create ${path.dirname(paths.log)}: ${formatErrorMessage(caught)}`);
    });

    const tags = buildTagExpression(work, this.deps.tagsOverride);
    const started = this.now();
    const monitor = new OutputMonitor({
      stallThresholdMs: this.deps.engine.stall_threshold_seconds * 1000,
      now: () => this.now().getTime(),
    });

    let display = "";
    let exit: EngineExit = { exitCode: 1, timedOut: false };
    let error: string | undefined;

    const log = new ShardLog(paths.log, this.warn);
    try {
      const command = buildEngineCommand({
        work,
        engine: this.deps.engine,
        tags,
        browserWorkers: request.browserWorkers,
        update: usesTemplate(work.phase),
      });
      display = command.display;
      log.write(`Command: ${display}`);
      log.write(`Started: ${started.toISOString()}`);
      log.write(LOG_RULE);
      log.write("");

      logSessionEvent(this.deps.events, "shard_started", {
        phase: work.phase,
        shard: work.label,
        scopes: work.scopes,
        db: work.dbName,
        tags,
      });

      if (request.prepare) await request.prepare();

      exit = await this.deps.launcher.run(command, {
        timeoutMs: request.timeoutSeconds * 1000,
        onLine: (line) => {
          log.write(line);
          monitor.push(line);
        },
      });
    } catch (caught) {
      error = formatErrorMessage(caught);
      exit = { exitCode: 1, timedOut: false };
      log.write(`Error: ${error}`);
    } finally {
      log.close();
    }

    const ended = this.now();
    const elapsedSeconds = Math.max(0, (ended.getTime() - started.getTime()) / 1000);
    const summary: ShardSummary = {
      schema_version: SUMMARY_SCHEMA_VERSION,
      timestamp: ended.toISOString(),
      command: display,
      phase: work.phase,
      kind: work.kind,
      shard_label: work.label,
      database: work.dbName,
      scopes: work.scopes,
      test_tags: tags,
      timeout: request.timeoutSeconds,
      start_time: started.toISOString(),
      end_time: ended.toISOString(),
      elapsed_seconds: elapsedSeconds,
      counters: { ...monitor.counters },
      return_code: exit.exitCode,
      success: exit.exitCode === 0,
      log_file: paths.log,
      summary_file: paths.summary,
      ...(error !== undefined ? { error } : {}),
      ...(exit.timedOut ? { timed_out: true } : {}),
      ...(monitor.repetitivePattern !== null
        ? { repetitive_pattern: monitor.repetitivePattern }
        : {}),
    };

    await this.writeArtifacts(summary, paths);

    logSessionEvent(this.deps.events, "shard_finished", {
      phase: work.phase,
      shard: work.label,
      scopes: work.scopes,
      db: work.dbName,
      rc: exit.exitCode,
      elapsed: elapsedSeconds,
      ...(exit.timedOut ? { timed_out: true } : {}),
    });

    return {
      returnCode: exit.exitCode,
      logPath: paths.log,
      summaryPath: paths.summary,
      summary,
    };
  }

  private async writeArtifacts(summary: ShardSummary, paths: ShardArtifactPaths): Promise<void> {
    const written = await attempt("reporting", `Writing ${paths.summary} failed`, () =>
      writeJsonFile(paths.summary, summary),
    );
    if (!written.ok) {
      handleFailure(written.error, { events: this.deps.events, warn: this.warn });
    }

    const junit = await attempt("reporting", `Writing ${paths.junit} failed`, async () => {
      const text = (await fse.pathExists(paths.log)) ? await fse.readFile(paths.log, "utf8") : "";
      await writeTextFile(paths.junit, renderJunit(summary.shard_label, [shardSuite(summary, text)]));
    });
    if (!junit.ok) {
      handleFailure(junit.error, { events: this.deps.events, warn: this.warn });
    }
  }
}

// =============================================================================
// LOG FILE
// =============================================================================

// Synchronous appends keep the log ordered with the engine's output.
class ShardLog {
  private fd: number | null;

  constructor(
    private readonly filePath: string,
    private readonly warn: (message: string) => void,
  ) {
    this.fd = openLog(filePath, warn);
  }

  write(line: string): void {
    if (this.fd === null) return;
    try {
      fs.writeSync(this.fd, `${line}\n`);
    } catch (error) {
      this.warn(`Warning: failed to write ${this.filePath}: ${formatErrorMessage(error)}`);
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (error) {
      this.warn(`Warning: failed to close ${this.filePath}: ${formatErrorMessage(error)}`);
    }
  }
}

function openLog(filePath: string, warn: (message: string) => void): number | null {
  try {
    return fs.openSync(filePath, "w");
  } catch (error) {
    warn(`Warning: failed to open ${filePath}: ${formatErrorMessage(error)}`);
    return null;
  }
}

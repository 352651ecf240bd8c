/**
 * Session orchestrator.
 * Purpose: run the selected phases as one session (sequential or overlapped),
 * prefetch the template while early phases run, and always clean up.
 * Assumptions: a single orchestrator owns the log root and the test databases
 * named after `database.name` while it runs.
 * Usage: await new SessionOrchestrator({ config, ports }).run({ phases }).
 */

import os from "node:os";

import { phaseSettings, type ShardlineConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { handleFailure, settle, type NonFatalReporter } from "../../core/failure-policy.js";
import type { EventSink } from "../../core/logger.js";
import { PHASE_GROUPS, PHASE_PROFILES, PHASES, type Phase } from "../../core/phases.js";
import { attempt } from "../../core/result.js";
import { defaultSessionId } from "../../core/utils.js";
import type { EnvironmentManager } from "../../environment/environment-manager.js";
import { ExecutionAdapter } from "../../executor/execution-adapter.js";
import { discoveryOptionsFor } from "../../planner/discovery.js";
import { finalizeSession } from "../../reporting/aggregator.js";
import { sourceTestCounts } from "../../reporting/coverage.js";
import { pruneSessions } from "../../reporting/retention.js";
import {
  stateForReturnCode,
  type PhaseOutcome,
  type SessionSummary,
} from "../../reporting/session-summary.js";
import type { WeightHistory } from "../../state/weight-history.js";

import {
  attachInterruptHandlers,
  interruptExitCode,
  processInterrupts,
  type InterruptHooks,
} from "./interrupts.js";
import { PhasePlanner, PhaseRunner } from "./phase-runner.js";
import type { OrchestratorPorts } from "./ports.js";
import { createEnvironmentManager, createGuardrail } from "./services.js";
import { Session } from "./session.js";

// =============================================================================
// TYPES
// =============================================================================

export type SessionRunOptions = {
  // Defaults to every phase, in declared order.
  phases?: Phase[];
};

export type SessionRunResult = {
  returnCode: number;
  sessionId: string;
  sessionDir: string | null;
  summary: SessionSummary | null;
};

export type SessionOrchestratorDeps = {
  config: ShardlineConfig;
  ports: OrchestratorPorts;
  sessionId?: string;
  parallelism?: number;
  // Replaces the session's events.ndjson writer.
  events?: EventSink;
  // SIGINT/SIGTERM wiring; defaults to the process.
  interrupts?: InterruptHooks;
};

type SessionServices = {
  environment: EnvironmentManager;
  planner: PhasePlanner;
  runner: PhaseRunner;
  reporter: NonFatalReporter;
};

export function selectPhases(requested?: Phase[]): Phase[] {
  if (!requested || requested.length === 0) return [...PHASES];
  return PHASES.filter((phase) => requested.includes(phase));
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class SessionOrchestrator {
  constructor(private readonly deps: SessionOrchestratorDeps) {}

  // Never throws. The result carries the session's exit status.
  async run(options: SessionRunOptions = {}): Promise<SessionRunResult> {
    const { config, ports } = this.deps;
    const startedAt = ports.clock.now();
    const sessionId = this.deps.sessionId ?? defaultSessionId(startedAt);
    const phases = selectPhases(options.phases);

    let session: Session;
    try {
      session = new Session(
        { id: sessionId, logRoot: config.log_root, startedAt, echoEvents: config.events_stdout },
        this.deps.events,
      );
    } catch (error) {
      ports.output.warn(`Error: cannot start session ${sessionId}: ${formatErrorMessage(error)}`);
      return { returnCode: 1, sessionId, sessionDir: null, summary: null };
    }

    const services = this.createServices(session);
    let returnCode = 1;
    let summary: SessionSummary | null = null;

    const detachInterrupts = attachInterruptHandlers(
      this.deps.interrupts ?? processInterrupts,
      (signal) => this.interrupt(services, session, signal, startedAt),
      ports.output.warn,
    );

    try {
      await this.begin(session, phases, services);
      await this.cleanup(services, session, "before");

      const history = settle(
        await attempt("planning", "Loading weight history failed", () => ports.weights.load()),
        {},
        services.reporter,
      );

      const prefetch = this.prefetch(services, session, phases);
      try {
        await this.runPhases(services, session, phases, history);
      } finally {
        await prefetch;
      }

      summary = await this.finish(services, session, phases);
      returnCode = summary.return_code;
    } catch (error) {
      const message = formatErrorMessage(error);
      session.emit("session_error", { message });
      ports.output.warn(`Error: session ${sessionId} failed: ${message}`);
      returnCode = 1;
    } finally {
      detachInterrupts();
      await this.cleanup(services, session, "after");
      await this.publishPointers(session, returnCode, services.reporter);
      session.emit("session_finished", {
        rc: returnCode,
        elapsed: (ports.clock.now().getTime() - startedAt.getTime()) / 1000,
      });
      session.events.close();
    }

    return { returnCode, sessionId, sessionDir: session.dir, summary };
  }

  // =============================================================================
  // LIFECYCLE
  // =============================================================================

  // Signal path: the pool is abandoned, so drop what it created before the process exits.
  private async interrupt(
    services: SessionServices,
    session: Session,
    signal: NodeJS.Signals,
    startedAt: Date,
  ): Promise<void> {
    const { ports } = this.deps;
    const returnCode = interruptExitCode(signal);
    session.emit("session_error", { message: `interrupted by ${signal}` });
    ports.output.warn(`Interrupted by ${signal}; cleaning up session ${session.id}`);
    try {
      await this.cleanup(services, session, "after");
      await this.publishPointers(session, returnCode, services.reporter);
    } finally {
      session.emit("session_finished", {
        rc: returnCode,
        elapsed: (ports.clock.now().getTime() - startedAt.getTime()) / 1000,
      });
      session.events.close();
    }
  }

  private createServices(session: Session): SessionServices {
    const { config, ports } = this.deps;
    const reporter: NonFatalReporter = { events: session.events, warn: ports.output.warn };
    const now = () => ports.clock.now();

    const environment = createEnvironmentManager(config, ports);
    const guardrail = createGuardrail(config, ports, session.events);

    const planner = new PhasePlanner({
      config,
      guardrail,
      reporter,
      parallelism: this.deps.parallelism ?? os.availableParallelism(),
    });

    const adapter = new ExecutionAdapter({
      launcher: ports.launcher,
      engine: config.engine,
      events: session.events,
      tagsOverride: config.tags_override,
      now,
      warn: ports.output.warn,
    });

    return {
      environment,
      planner,
      reporter,
      runner: new PhaseRunner({ config, planner, environment, adapter, output: ports.output }),
    };
  }

  private async begin(session: Session, phases: Phase[], services: SessionServices): Promise<void> {
    const { config, ports } = this.deps;
    session.emit("session_started", {
      phases,
      overlap: config.phases_overlap,
      keep_going: config.keep_going,
    });
    ports.output.info(`Session ${session.id}: ${phases.join(", ")}`);

    const pruned = await attempt("cleanup", "Pruning old sessions failed", () =>
      pruneSessions(config.log_root, {
        keep: config.log_keep,
        protect: session.id,
        warn: ports.output.warn,
      }),
    );
    settle(pruned, [], services.reporter, { step: "prune_sessions" });

    const pointed = await attempt("reporting", "Writing the current-session pointer failed", () =>
      ports.pointers.setCurrent(session.pointer()),
    );
    settle(pointed, undefined, services.reporter);
  }

  private async cleanup(
    services: SessionServices,
    session: Session,
    stage: "before" | "after",
  ): Promise<void> {
    const report = await services.environment.cleanupSession(
      this.deps.config.database.name,
      services.reporter,
    );
    const removed = report.databases.length + report.filestores.length;
    if (removed > 0) {
      this.deps.ports.output.info(
        `Cleanup (${stage}): dropped ${report.databases.length} database(s), ` +
          `removed ${report.filestores.length} filestore(s)`,
      );
    }
    if (report.spared.length > 0) {
      session.emit("template_reused", { stage, databases: report.spared });
    }
  }

  // Starts template creation while earlier phases run, plus the first template phase's
  // filestore copy when its database name is already certain. Failures are logged only.
  private async prefetch(
    services: SessionServices,
    session: Session,
    phases: Phase[],
  ): Promise<void> {
    const first = phases.find((phase) => PHASE_PROFILES[phase].usesTemplate);
    if (first === undefined) return;

    const { config } = this.deps;
    const settings = phaseSettings(config, first);
    const withFilestore = config.filestore.enabled && !settings.skip_filestore;
    const templatePending = attempt("environment", "Template prefetch failed", () =>
      services.environment.ensureTemplate(session.id),
    );

    const snapshotTarget = withFilestore
      ? settle(
          await attempt("planning", `Predicting the first ${first} shard failed`, () =>
            services.planner.predictFirstDatabase(first),
          ),
          null,
          services.reporter,
        )
      : null;
    const snapshot =
      snapshotTarget === null
        ? null
        : await attempt("environment", "Filestore prefetch failed", () =>
            services.environment.snapshotFilestore(snapshotTarget),
          );
    const template = await templatePending;

    if (!template.ok) {
      handleFailure(template.error, services.reporter, { step: "template" }, "prefetch_failed");
    }
    if (snapshot && !snapshot.ok) {
      handleFailure(
        snapshot.error,
        services.reporter,
        { step: "filestore", database: snapshotTarget },
        "prefetch_failed",
      );
    }
  }

  // =============================================================================
  // PHASES
  // =============================================================================

  private async runPhases(
    services: SessionServices,
    session: Session,
    phases: Phase[],
    history: WeightHistory,
  ): Promise<void> {
    const { config } = this.deps;
    const groups = config.phases_overlap
      ? PHASE_GROUPS.map((group) => group.filter((phase) => phases.includes(phase))).filter(
          (group) => group.length > 0,
        )
      : phases.map((phase) => [phase]);

    let failed = false;
    for (const group of groups) {
      if (failed && !config.keep_going) {
        for (const phase of group) this.skip(session, phase);
        continue;
      }

      const settled = await Promise.allSettled(
        group.map((phase) => this.runPhase(services, session, phase, history)),
      );
      for (const result of settled) {
        if (result.status === "rejected") throw result.reason;
        if (result.value.returnCode !== null && result.value.returnCode !== 0) failed = true;
      }
    }
  }

  private async runPhase(
    services: SessionServices,
    session: Session,
    phase: Phase,
    history: WeightHistory,
  ): Promise<PhaseOutcome> {
    session.emit("phase_start", { phase });

    const outcome = await services.runner.run(phase, session, history);
    const state = stateForReturnCode(outcome.returnCode);
    session.record(outcome);
    session.emit("phase_finished", {
      phase,
      rc: outcome.returnCode,
      state,
      shards: outcome.summary?.shards ?? 0,
    });
    return outcome;
  }

  private skip(session: Session, phase: Phase): void {
    session.record({ phase, returnCode: null, logDir: "", summary: null });
    session.emit("phase_skipped", { phase, reason: "previous phase failed" });
    this.deps.ports.output.info(`[${phase}] skipped (previous phase failed)`);
  }

  // =============================================================================
  // FINISH
  // =============================================================================

  private async finish(
    services: SessionServices,
    session: Session,
    phases: Phase[],
  ): Promise<SessionSummary> {
    const { config, ports } = this.deps;
    const counted = await attempt("diagnostic", "Counting source tests failed", () =>
      sourceTestCounts(phases, discoveryOptionsFor(config)),
    );
    const sourceCounts = settle(counted, {}, services.reporter);

    const outcomes: PhaseOutcome[] = [];
    for (const phase of phases) {
      const outcome = session.outcomes.get(phase);
      if (outcome) outcomes.push(outcome);
    }

    const summary = await finalizeSession(
      {
        sessionId: session.id,
        sessionDir: session.dir,
        startedAt: session.startedAt,
        endedAt: ports.clock.now(),
        outcomes,
        sourceCounts,
      },
      {
        weights: { store: ports.weights, policy: config.weights },
        events: session.events,
        warn: ports.output.warn,
      },
    );

    for (const outcome of outcomes) {
      ports.output.info(phaseLine(outcome));
    }
    ports.output.info(
      `Session ${session.id}: ${summary.success ? "PASSED" : "FAILED"} (rc=${summary.return_code})`,
    );
    return summary;
  }

  private async publishPointers(
    session: Session,
    returnCode: number,
    reporter: NonFatalReporter,
  ): Promise<void> {
    const { pointers, clock } = this.deps.ports;
    const published = await attempt("reporting", "Updating session pointers failed", async () => {
      await pointers.clearCurrent();
      await pointers.setLatest(
        session.pointer({ finished_at: clock.now().toISOString(), return_code: returnCode }),
      );
    });
    settle(published, undefined, reporter);
  }
}

export function phaseLine(outcome: PhaseOutcome): string {
  if (outcome.returnCode === null) return `${outcome.phase}: SKIPPED`;
  const counters = outcome.summary?.counters;
  const detail = counters
    ? ` (${counters.tests_run} run, ${counters.failures} failed, ${counters.errors} errors)`
    : "";
  return outcome.returnCode === 0
    ? `${outcome.phase}: OK${detail}`
    : `${outcome.phase}: FAIL rc=${outcome.returnCode}${detail}`;
}

/**
 * Phase planning and execution.
 * Purpose: turn one phase into shards (discover, weigh, cap, plan) and run them
 * through a bounded pool.
 * Assumptions: one PhaseRunner per session; the adapter never throws for a shard.
 */

import { phaseSettings, type ShardlineConfig } from "../../core/config.js";
import { handleFailure, settle, type NonFatalReporter } from "../../core/failure-policy.js";
import { phaseDir } from "../../core/paths.js";
import { PHASE_PROFILES, type Phase } from "../../core/phases.js";
import { attempt } from "../../core/result.js";
import type { EnvironmentManager } from "../../environment/environment-manager.js";
import type { ExecutionAdapter, ShardRunResult } from "../../executor/execution-adapter.js";
import type { ResourceGuardrail } from "../../guardrail/guardrail.js";
import {
  discoverPhaseScopes,
  discoveryOptionsFor,
  filterScopeIds,
  type Scope,
} from "../../planner/discovery.js";
import {
  baseDatabaseName,
  planMethodSlices,
  planShards,
  resolveShardCount,
  scopeItems,
  subUnitItems,
  toShardWork,
  type ShardWork,
  type ShardWorkKind,
} from "../../planner/shard-planner.js";
import { estimateSubUnitWeights, estimateWeights } from "../../planner/weights.js";
import { aggregatePhase } from "../../reporting/aggregator.js";
import type { PhaseOutcome } from "../../reporting/session-summary.js";
import type { WeightHistory } from "../../state/weight-history.js";

import type { OperatorOutput } from "./ports.js";
import type { Session } from "./session.js";
import { runShards } from "./worker-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type PhasePlan = {
  phase: Phase;
  scopes: Scope[];
  strategy: ShardWorkKind;
  requested: number;
  granted: number;
  works: ShardWork[];
  poolSize: number;
};

export type PhasePlannerDeps = {
  config: ShardlineConfig;
  guardrail: ResourceGuardrail;
  reporter: NonFatalReporter;
  // Auto shard counts never exceed this.
  parallelism: number;
};

const MAX_AUTO_POOL = 8;

// =============================================================================
// PLANNER
// =============================================================================

export class PhasePlanner {
  constructor(private readonly deps: PhasePlannerDeps) {}

  async discover(phase: Phase): Promise<Scope[]> {
    const { config } = this.deps;
    const settings = phaseSettings(config, phase);
    const discovered = await discoverPhaseScopes(phase, discoveryOptionsFor(config));

    const allowed = new Set(
      filterScopeIds(
        discovered.map((scope) => scope.id),
        settings.include,
        settings.exclude,
      ),
    );
    return discovered.filter((scope) => allowed.has(scope.id));
  }

  // Shard 0's database when it is known before planning, i.e. the phase resolves to a
  // single scope-sharded shard. Larger counts hinge on the guardrail's later sample.
  async predictFirstDatabase(phase: Phase): Promise<string | null> {
    const { config, parallelism } = this.deps;
    const settings = phaseSettings(config, phase);
    const profile = PHASE_PROFILES[phase];
    if (settings.within_shards > 0 && profile.subUnitPattern !== null) return null;

    const scopes = await this.discover(phase);
    if (scopes.length === 0) return null;

    const requested = resolveShardCount(settings.shards, profile.autoShards, parallelism, scopes.length);
    return requested === 1 ? baseDatabaseName(config.database.name, phase) : null;
  }

  async plan(phase: Phase, history: WeightHistory): Promise<PhasePlan> {
    const scopes = await this.discover(phase);
    if (scopes.length === 0) {
      return { phase, scopes, strategy: "scopes", requested: 0, granted: 0, works: [], poolSize: 0 };
    }

    const settings = phaseSettings(this.deps.config, phase);
    const planned =
      settings.within_shards > 0 && PHASE_PROFILES[phase].subUnitPattern !== null
        ? await this.planWithinScopes(phase, scopes, settings.within_shards)
        : await this.planScopes(phase, scopes, settings.shards, history);

    return { ...planned, poolSize: await this.poolSize(phase, planned.works.length) };
  }

  private async planScopes(
    phase: Phase,
    scopes: Scope[],
    configured: number,
    history: WeightHistory,
  ): Promise<Omit<PhasePlan, "poolSize">> {
    const { config, guardrail, reporter, parallelism } = this.deps;
    const requested = resolveShardCount(
      configured,
      PHASE_PROFILES[phase].autoShards,
      parallelism,
      scopes.length,
    );
    const granted = await guardrail.capShardCount(requested, `${phase} shards`);

    const planned = await attempt("planning", `Planning ${phase} shards failed`, async () => {
      const weights = await estimateWeights(scopes, phase, history, {
        secondsPerBucket: config.weights.seconds_per_bucket,
      });
      return planShards(phase, scopeItems(scopes, weights), granted, "scopes");
    });

    // Without weights everything runs as one shard.
    const plan = settle(
      planned,
      planShards(phase, scopeItems(scopes, new Map()), 1, "scopes"),
      reporter,
      { phase },
    );

    return {
      phase,
      scopes,
      strategy: "scopes",
      requested,
      granted,
      works: toShardWork(plan, config.database.name),
    };
  }

  private async planWithinScopes(
    phase: Phase,
    scopes: Scope[],
    requested: number,
  ): Promise<Omit<PhasePlan, "poolSize">> {
    const { config, guardrail } = this.deps;
    const granted = await guardrail.capShardCount(requested, `${phase} within-scope shards`);
    const subUnits = await estimateSubUnitWeights(scopes);

    if (subUnits.length >= granted) {
      const plan = planShards(phase, subUnitItems(subUnits), granted, "sub_units");
      return {
        phase,
        scopes,
        strategy: "sub_units",
        requested,
        granted,
        works: toShardWork(plan, config.database.name),
      };
    }

    return {
      phase,
      scopes,
      strategy: "method_slice",
      requested,
      granted,
      works: planMethodSlices(
        phase,
        scopes.map((scope) => scope.id),
        granted,
        config.database.name,
      ),
    };
  }

  private async poolSize(phase: Phase, shardCount: number): Promise<number> {
    if (shardCount === 0) return 0;
    const maxProcs = this.deps.config.max_procs;
    const wanted = maxProcs > 0 ? maxProcs : Math.min(MAX_AUTO_POOL, shardCount);
    const granted = await this.deps.guardrail.capShardCount(wanted, `${phase} workers`);
    return Math.max(1, Math.min(granted, shardCount));
  }
}

// =============================================================================
// RUNNER
// =============================================================================

export type PhaseRunnerDeps = {
  config: ShardlineConfig;
  planner: PhasePlanner;
  environment: EnvironmentManager;
  adapter: ExecutionAdapter;
  output: OperatorOutput;
};

export class PhaseRunner {
  constructor(private readonly deps: PhaseRunnerDeps) {}

  // Phase return code: the first non-zero shard code in completion order, else 0.
  async run(phase: Phase, session: Session, history: WeightHistory): Promise<PhaseOutcome> {
    const { output } = this.deps;
    const logDir = phaseDir(session.dir, phase);
    const plan = await this.deps.planner.plan(phase, history);

    if (plan.works.length === 0) {
      output.info(`[${phase}] no scopes to run`);
      return { phase, returnCode: 0, logDir, summary: null };
    }

    output.info(
      `[${phase}] ${plan.scopes.length} scope(s) in ${plan.works.length} shard(s) ` +
        `(${plan.strategy}), ${plan.poolSize} in parallel`,
    );

    const settled = await runShards(plan.works, plan.poolSize, (work) =>
      this.runShard(work, session),
    );
    const returnCode = settled.map((entry) => entry.value.returnCode).find((rc) => rc !== 0) ?? 0;

    const aggregated = await attempt("reporting", `Aggregating ${phase} results failed`, () =>
      aggregatePhase(session.dir, phase, output.warn),
    );
    if (!aggregated.ok) {
      handleFailure(aggregated.error, { events: session.events, warn: output.warn }, { phase });
    }

    return { phase, returnCode, logDir, summary: aggregated.ok ? aggregated.value : null };
  }

  private async runShard(work: ShardWork, session: Session): Promise<ShardRunResult> {
    const { config, environment, adapter, output } = this.deps;
    const profile = PHASE_PROFILES[work.phase];
    const settings = phaseSettings(config, work.phase);
    const withFilestore = profile.usesTemplate && !settings.skip_filestore;

    const result = await adapter.run(work, {
      sessionDir: session.dir,
      timeoutSeconds: settings.timeout_seconds ?? profile.timeoutSeconds,
      browserWorkers: settings.workers,
      prepare: async () => {
        const template = profile.usesTemplate ? await environment.ensureTemplate(session.id) : null;
        return environment.cloneForShard(template, work.dbName, { withFilestore });
      },
    });

    const { summary } = result;
    output.info(
      `[${work.phase}] ${work.label}: rc=${result.returnCode} ` +
        `(${summary.counters.tests_run} run, ${summary.counters.failures} failed, ` +
        `${summary.counters.errors} errors, ${summary.elapsed_seconds.toFixed(1)}s)`,
    );
    return result;
  }
}

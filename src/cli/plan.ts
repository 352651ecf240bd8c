import os from "node:os";

import type { AppContext } from "../app/context.js";
import { PhasePlanner, type PhasePlan } from "../app/orchestrator/phase-runner.js";
import { createGuardrail } from "../app/orchestrator/services.js";
import { settle } from "../core/failure-policy.js";
import type { Phase } from "../core/phases.js";
import { attempt } from "../core/result.js";
import { buildTagExpression } from "../executor/engine-command.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanCommandOptions = {
  phases: Phase[];
  json?: boolean;
  parallelism?: number;
  print?: (line: string) => void;
};

export type PlannedShardView = {
  label: string;
  database: string;
  weight: number;
  scopes: string[];
  test_tags: string;
};

export type PlannedPhaseView = {
  phase: Phase;
  strategy: PhasePlan["strategy"];
  scopes: number;
  requested: number;
  granted: number;
  pool_size: number;
  shards: PlannedShardView[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

// Discovery, weights, guardrail and plan; nothing is created or launched.
export async function planCommand(ctx: AppContext, options: PlanCommandOptions): Promise<PlannedPhaseView[]> {
  const { config, ports } = ctx;
  const print = options.print ?? ((line: string) => console.log(line));
  const reporter = { warn: ports.output.warn };

  const planner = new PhasePlanner({
    config,
    guardrail: createGuardrail(config, ports),
    reporter,
    parallelism: options.parallelism ?? os.availableParallelism(),
  });
  const history = settle(
    await attempt("planning", "Loading weight history failed", () => ports.weights.load()),
    {},
    reporter,
  );

  const views: PlannedPhaseView[] = [];
  for (const phase of options.phases) {
    views.push(toView(await planner.plan(phase, history), config.tags_override));
  }

  if (options.json) {
    print(JSON.stringify(views, null, 2));
  } else {
    for (const line of formatPlan(views)) print(line);
  }
  return views;
}

export function formatPlan(views: PlannedPhaseView[]): string[] {
  const lines: string[] = [];
  for (const view of views) {
    if (view.shards.length === 0) {
      lines.push(`${view.phase}: no scopes`);
      continue;
    }
    lines.push(
      `${view.phase}: ${view.scopes} scope(s), ${view.shards.length} shard(s) (${view.strategy}), ` +
        `requested ${view.requested}, granted ${view.granted}, pool ${view.pool_size}`,
    );
    for (const shard of view.shards) {
      lines.push(`  ${shard.label}  db=${shard.database}  weight=${shard.weight}`);
      lines.push(`    ${shard.test_tags}`);
    }
  }
  return lines;
}

function toView(plan: PhasePlan, tagsOverride: string | undefined): PlannedPhaseView {
  return {
    phase: plan.phase,
    strategy: plan.strategy,
    scopes: plan.scopes.length,
    requested: plan.requested,
    granted: plan.granted,
    pool_size: plan.poolSize,
    shards: plan.works.map((work) => ({
      label: work.label,
      database: work.dbName,
      weight: work.weight,
      scopes: work.scopes,
      test_tags: buildTagExpression(work, tagsOverride),
    })),
  };
}

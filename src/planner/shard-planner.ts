/*
Purpose: balanced partitioning of weighted items into shards (LPT), plus the
shapes handed to the execution adapter.
Assumptions: weights are positive integers; item ids are unique within a plan.
Usage: planShards("unit", items, 4) -> ShardPlan; toShardWork(plan, dbName) -> ShardWork[].
*/

import type { Phase } from "../core/phases.js";
import { compareStrings, sha1Hex } from "../core/utils.js";

import type { Scope, SubUnit } from "./discovery.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanStrategy = "scopes" | "sub_units";

export type PlanItem = {
  // scope id, or "scope:SubUnit" for sub-unit items
  id: string;
  scopeId: string;
  subUnitId?: string;
  weight: number;
};

export type Shard = {
  index: number;
  weight: number;
  items: PlanItem[];
};

export type ShardPlan = {
  phase: Phase;
  strategy: PlanStrategy;
  shards: Shard[];
  totalWeight: number;
  shardCount: number;
};

export type ShardWorkKind = "scopes" | "sub_units" | "method_slice";

export type SubUnitRef = {
  scopeId: string;
  subUnitId: string;
};

export type ShardWork = {
  phase: Phase;
  kind: ShardWorkKind;
  index: number;
  label: string;
  scopes: string[];
  subUnits: SubUnitRef[];
  dbName: string;
  weight: number;
  env: Record<string, string>;
};

// =============================================================================
// ITEMS
// =============================================================================

export function scopeItems(scopes: Scope[], weights: Map<string, number>): PlanItem[] {
  return scopes.map((scope) => ({
    id: scope.id,
    scopeId: scope.id,
    weight: Math.max(1, weights.get(scope.id) ?? 1),
  }));
}

export function subUnitItems(subUnits: SubUnit[]): PlanItem[] {
  return subUnits.map((unit) => ({
    id: `${unit.scopeId}:${unit.subUnitId}`,
    scopeId: unit.scopeId,
    subUnitId: unit.subUnitId,
    weight: Math.max(1, unit.weight),
  }));
}

// =============================================================================
// LPT
// =============================================================================

function byWeightDescThenId(a: PlanItem, b: PlanItem): number {
  if (a.weight !== b.weight) return b.weight - a.weight;
  return compareStrings(a.id, b.id);
}

function sumWeights(items: PlanItem[]): number {
  return items.reduce((total, item) => total + item.weight, 0);
}

export function planShards(
  phase: Phase,
  items: PlanItem[],
  requestedShards: number,
  strategy: PlanStrategy = "scopes",
): ShardPlan {
  const totalWeight = sumWeights(items);

  if (items.length === 0) {
    return { phase, strategy, shards: [], totalWeight: 0, shardCount: 0 };
  }

  if (requestedShards <= 1 || items.length <= 1) {
    const sorted = [...items].sort((a, b) => compareStrings(a.id, b.id));
    return {
      phase,
      strategy,
      shards: [{ index: 0, weight: totalWeight, items: sorted }],
      totalWeight,
      shardCount: 1,
    };
  }

  const count = Math.min(Math.floor(requestedShards), items.length);
  const bins: Shard[] = Array.from({ length: count }, (_, index) => ({
    index,
    weight: 0,
    items: [],
  }));

  for (const item of [...items].sort(byWeightDescThenId)) {
    // Lightest bin; ties go to the lowest index.
    let target = bins[0];
    for (const bin of bins) {
      if (target === undefined || bin.weight < target.weight) target = bin;
    }
    if (target === undefined) break;
    target.items.push(item);
    target.weight += item.weight;
  }

  const shards = bins
    .filter((bin) => bin.items.length > 0)
    .map((bin, index) => ({ ...bin, index }));

  return { phase, strategy, shards, totalWeight, shardCount: shards.length };
}

// =============================================================================
// SHARD COUNT
// =============================================================================

// 0 = auto: min(parallelism, phase default); always within [1, itemCount].
export function resolveShardCount(
  requested: number,
  autoDefault: number,
  availableParallelism: number,
  itemCount: number,
): number {
  const base =
    requested > 0 ? Math.floor(requested) : Math.min(Math.max(1, availableParallelism), autoDefault);
  return Math.max(1, Math.min(base, Math.max(1, itemCount)));
}

// =============================================================================
// WORK UNITS
// =============================================================================

export function baseDatabaseName(dbRoot: string, phase: Phase): string {
  return `${dbRoot}_test_${phase}`;
}

// Single-shard phases keep the plain per-phase name; others get a stable index suffix.
export function shardDatabaseName(base: string, index: number, shardCount: number): string {
  if (shardCount <= 1) return base;
  return `${base}_s${String(index).padStart(3, "0")}`;
}

export function shardLabel(kind: ShardWorkKind, keys: string[], index: number): string {
  if (kind === "method_slice") return `ms${String(index).padStart(3, "0")}`;
  if (kind === "scopes" && keys.length === 1 && keys[0] !== undefined) return keys[0];
  return `shard-${sha1Hex([...keys].sort(compareStrings).join(","), 8)}`;
}

export function toShardWork(plan: ShardPlan, dbRoot: string): ShardWork[] {
  const base = baseDatabaseName(dbRoot, plan.phase);
  const kind: ShardWorkKind = plan.strategy === "sub_units" ? "sub_units" : "scopes";

  return plan.shards.map((shard) => {
    const scopes = [...new Set(shard.items.map((item) => item.scopeId))].sort(compareStrings);
    const subUnits: SubUnitRef[] = [];
    for (const item of shard.items) {
      if (item.subUnitId !== undefined) {
        subUnits.push({ scopeId: item.scopeId, subUnitId: item.subUnitId });
      }
    }
    const keys = kind === "sub_units" ? shard.items.map((item) => item.id) : scopes;

    return {
      phase: plan.phase,
      kind,
      index: shard.index,
      label: shardLabel(kind, keys, shard.index),
      scopes,
      subUnits,
      dbName: shardDatabaseName(base, shard.index, plan.shardCount),
      weight: shard.weight,
      env: {},
    };
  });
}

// Every slice runs all scopes; the engine-side hook picks tests by stable hash.
export function planMethodSlices(
  phase: Phase,
  scopes: string[],
  sliceCount: number,
  dbRoot: string,
): ShardWork[] {
  const count = Math.max(1, Math.floor(sliceCount));
  const sortedScopes = [...scopes].sort(compareStrings);
  const base = baseDatabaseName(dbRoot, phase);

  return Array.from({ length: count }, (_, index) => ({
    phase,
    kind: "method_slice" as const,
    index,
    label: shardLabel("method_slice", sortedScopes, index),
    scopes: sortedScopes,
    subUnits: [],
    dbName: `${base}_m${String(index).padStart(3, "0")}`,
    weight: 1,
    env: {
      SHARD_SLICE_TOTAL: String(count),
      SHARD_SLICE_INDEX: String(index),
      SHARD_SLICE_PHASE: phase,
      SHARD_SLICE_SCOPES: sortedScopes.join(","),
    },
  }));
}

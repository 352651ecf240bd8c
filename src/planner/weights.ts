import path from "node:path";

import fse from "fs-extra";

import { PHASE_PROFILES, countPatternMatches, type Phase } from "../core/phases.js";
import type { WeightHistory } from "../state/weight-history.js";

import { discoverSubUnits, type Scope, type SubUnit } from "./discovery.js";

export type WeightOptions = {
  secondsPerBucket: number;
};

export const DEFAULT_WEIGHT_OPTIONS: WeightOptions = { secondsPerBucket: 5 };

// Raw count of test definitions in the scope's phase files; unreadable files count 0.
export async function countScopeTests(scope: Scope): Promise<number> {
  const profile = PHASE_PROFILES[scope.phase];
  let total = 0;

  for (const file of scope.testFiles) {
    try {
      const source = await fse.readFile(path.join(scope.root, file), "utf8");
      total += countPatternMatches(source, profile.testPattern);
    } catch {
      continue;
    }
  }

  return total;
}

export function historyBonus(
  history: WeightHistory,
  phase: Phase,
  scopeId: string,
  options: WeightOptions = DEFAULT_WEIGHT_OPTIONS,
): number {
  const record = history[phase]?.[scopeId];
  if (!record || options.secondsPerBucket <= 0) return 0;
  return Math.max(0, Math.floor(record.avg_secs / options.secondsPerBucket));
}

export function blendWeight(
  staticCount: number,
  history: WeightHistory,
  phase: Phase,
  scopeId: string,
  options: WeightOptions = DEFAULT_WEIGHT_OPTIONS,
): number {
  return Math.max(1, staticCount) + historyBonus(history, phase, scopeId, options);
}

export async function estimateWeights(
  scopes: Scope[],
  phase: Phase,
  history: WeightHistory,
  options: WeightOptions = DEFAULT_WEIGHT_OPTIONS,
): Promise<Map<string, number>> {
  const weights = new Map<string, number>();
  for (const scope of scopes) {
    const staticCount = await countScopeTests(scope);
    weights.set(scope.id, blendWeight(staticCount, history, phase, scope.id, options));
  }
  return weights;
}

// Class-level weights across scopes, in scope order.
export async function estimateSubUnitWeights(scopes: Scope[]): Promise<SubUnit[]> {
  const perScope = await Promise.all(scopes.map((scope) => discoverSubUnits(scope)));
  return perScope.flat();
}

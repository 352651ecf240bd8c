/*
Purpose: durable per-scope timing history that feeds shard weights.
Assumptions: one writer per log root at a time (the finalizing session).
Usage: new FileWeightHistoryStore(weightsPath(logRoot)).load() / save(history).
*/

import fse from "fs-extra";
import { z } from "zod";

import type { WeightPolicyConfig } from "../core/config.js";
import { PHASES, type Phase } from "../core/phases.js";
import { readJsonFileOrNull, writeJsonFileAtomic } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

// Only avg_secs feeds planning; hand-written records may omit the rest.
const WeightRecordSchema = z.object({
  avg_secs: z.number().nonnegative(),
  count: z.number().int().nonnegative().default(0),
  last_secs: z.number().nonnegative().default(0),
});

export type WeightRecord = z.infer<typeof WeightRecordSchema>;
export type PhaseWeightHistory = Record<string, WeightRecord>;
export type WeightHistory = Partial<Record<Phase, PhaseWeightHistory>>;

export interface WeightHistoryStore {
  load(): Promise<WeightHistory>;
  save(history: WeightHistory): Promise<void>;
}

// =============================================================================
// POLICY
// =============================================================================

export function blendSample(
  previous: WeightRecord | undefined,
  seconds: number,
  policy: Pick<WeightPolicyConfig, "history_policy" | "decay_alpha">,
): WeightRecord {
  const sample = Math.max(0, seconds);
  if (!previous || previous.count === 0) {
    return { avg_secs: sample, count: 1, last_secs: sample };
  }

  const avg =
    policy.history_policy === "decay"
      ? previous.avg_secs + policy.decay_alpha * (sample - previous.avg_secs)
      : (previous.avg_secs * previous.count + sample) / (previous.count + 1);

  return { avg_secs: avg, count: previous.count + 1, last_secs: sample };
}

export type ScopeTiming = {
  phase: Phase;
  scopeId: string;
  seconds: number;
};

// Returns a new history; entries for scopes not in `timings` are kept as they are.
export function applyTimings(
  history: WeightHistory,
  timings: ScopeTiming[],
  policy: Pick<WeightPolicyConfig, "history_policy" | "decay_alpha">,
): WeightHistory {
  const next: WeightHistory = {};
  for (const phase of PHASES) {
    const existing = history[phase];
    if (existing) next[phase] = { ...existing };
  }

  for (const timing of timings) {
    const phaseHistory = next[timing.phase] ?? {};
    phaseHistory[timing.scopeId] = blendSample(phaseHistory[timing.scopeId], timing.seconds, policy);
    next[timing.phase] = phaseHistory;
  }

  return next;
}

// =============================================================================
// STORES
// =============================================================================

export function parseWeightHistory(raw: unknown): WeightHistory {
  const history: WeightHistory = {};
  const root = z.record(z.unknown()).safeParse(raw);
  if (!root.success) return history;

  for (const phase of PHASES) {
    const phaseRaw = z.record(z.unknown()).safeParse(root.data[phase]);
    if (!phaseRaw.success) continue;

    const entries: PhaseWeightHistory = {};
    for (const [scopeId, value] of Object.entries(phaseRaw.data)) {
      const record = WeightRecordSchema.safeParse(value);
      // Malformed entries are dropped; the scope falls back to its static weight.
      if (record.success) entries[scopeId] = record.data;
    }
    history[phase] = entries;
  }

  return history;
}

export class FileWeightHistoryStore implements WeightHistoryStore {
  constructor(public readonly filePath: string) {}

  async load(): Promise<WeightHistory> {
    if (!(await fse.pathExists(this.filePath))) return {};
    return parseWeightHistory(await readJsonFileOrNull(this.filePath));
  }

  async save(history: WeightHistory): Promise<void> {
    await writeJsonFileAtomic(this.filePath, history);
  }
}

export class MemoryWeightHistoryStore implements WeightHistoryStore {
  saves = 0;

  constructor(private history: WeightHistory = {}) {}

  async load(): Promise<WeightHistory> {
    return structuredClone(this.history);
  }

  async save(history: WeightHistory): Promise<void> {
    this.saves += 1;
    this.history = structuredClone(history);
  }

  snapshot(): WeightHistory {
    return structuredClone(this.history);
  }
}

import { z } from "zod";

import { PHASES, type Phase } from "../core/phases.js";
import { addCounters, emptyCounters, type TestCounters } from "../executor/output-monitor.js";
import { SUMMARY_SCHEMA_VERSION, TestCountersSchema } from "../executor/shard-summary.js";

// =============================================================================
// PHASE AGGREGATE
// =============================================================================

export const PhaseAggregateSchema = z.object({
  schema_version: z.string(),
  phase: z.enum(PHASES),
  success: z.boolean(),
  counters: TestCountersSchema,
  shards: z.number().int().nonnegative(),
});

export type PhaseAggregate = z.infer<typeof PhaseAggregateSchema>;

// =============================================================================
// PHASE STATE
// =============================================================================

export const PHASE_STATES = ["pending", "running", "ok", "failed", "skipped"] as const;
export type PhaseState = (typeof PHASE_STATES)[number];

// returnCode null means the phase never ran.
export type PhaseOutcome = {
  phase: Phase;
  returnCode: number | null;
  logDir: string;
  summary: PhaseAggregate | null;
};

export function stateForReturnCode(returnCode: number | null): PhaseState {
  if (returnCode === null) return "skipped";
  return returnCode === 0 ? "ok" : "failed";
}

// First non-null, non-zero code in declared phase order.
export function overallReturnCode(outcomes: PhaseOutcome[]): number {
  for (const outcome of sortOutcomes(outcomes)) {
    if (outcome.returnCode !== null && outcome.returnCode !== 0) return outcome.returnCode;
  }
  return 0;
}

export function sortOutcomes(outcomes: PhaseOutcome[]): PhaseOutcome[] {
  return [...outcomes].sort((a, b) => PHASES.indexOf(a.phase) - PHASES.indexOf(b.phase));
}

// =============================================================================
// SESSION SUMMARY
// =============================================================================

const PhaseKeyed = <T extends z.ZodTypeAny>(value: T) => z.record(z.enum(PHASES), value);

export const SessionSummarySchema = z.object({
  schema_version: z.string(),
  session: z.string(),
  start_time: z.string(),
  end_time: z.string(),
  elapsed_seconds: z.number().nonnegative(),
  success: z.boolean(),
  return_code: z.number().int(),
  return_codes: PhaseKeyed(z.number().int().nullable()),
  phase_states: PhaseKeyed(z.enum(PHASE_STATES)),
  results: PhaseKeyed(PhaseAggregateSchema.nullable()),
  counters_total: TestCountersSchema,
  counters_source: PhaseKeyed(z.number().int().nonnegative()),
  counters_source_total: z.number().int().nonnegative(),
});

export type SessionSummary = z.infer<typeof SessionSummarySchema>;

export type SessionSummaryInput = {
  sessionId: string;
  startedAt: Date;
  endedAt: Date;
  outcomes: PhaseOutcome[];
  sourceCounts: Partial<Record<Phase, number>>;
};

// Pure: identical inputs give an identical document.
export function buildSessionSummary(input: SessionSummaryInput): SessionSummary {
  const ordered = sortOutcomes(input.outcomes);

  const returnCodes: Partial<Record<Phase, number | null>> = {};
  const phaseStates: Partial<Record<Phase, PhaseState>> = {};
  const results: Partial<Record<Phase, PhaseAggregate | null>> = {};
  const source: Partial<Record<Phase, number>> = {};
  let countersTotal: TestCounters = emptyCounters();
  let sourceTotal = 0;

  for (const outcome of ordered) {
    returnCodes[outcome.phase] = outcome.returnCode;
    phaseStates[outcome.phase] = stateForReturnCode(outcome.returnCode);
    results[outcome.phase] = outcome.summary;
    if (outcome.summary) countersTotal = addCounters(countersTotal, outcome.summary.counters);

    const count = input.sourceCounts[outcome.phase] ?? 0;
    source[outcome.phase] = count;
    sourceTotal += count;
  }

  const returnCode = overallReturnCode(ordered);
  return {
    schema_version: SUMMARY_SCHEMA_VERSION,
    session: input.sessionId,
    start_time: input.startedAt.toISOString(),
    end_time: input.endedAt.toISOString(),
    elapsed_seconds: Math.max(0, (input.endedAt.getTime() - input.startedAt.getTime()) / 1000),
    success: returnCode === 0,
    return_code: returnCode,
    return_codes: returnCodes,
    phase_states: phaseStates,
    results,
    counters_total: countersTotal,
    counters_source: source,
    counters_source_total: sourceTotal,
  };
}

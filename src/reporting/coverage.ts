import path from "node:path";

import { z } from "zod";

import { phaseDir, sessionSummaryPath } from "../core/paths.js";
import { PHASES, type Phase } from "../core/phases.js";
import { compareStrings, readJsonFileOrNull } from "../core/utils.js";
import { discoverPhaseScopes, type DiscoveryOptions } from "../planner/discovery.js";
import { countScopeTests } from "../planner/weights.js";

import { PHASE_FAILURES_FILE, readShardSummaries } from "./aggregator.js";
import { SessionSummarySchema } from "./session-summary.js";
import type { FailureType } from "./failures.js";

// =============================================================================
// SOURCE COUNTS
// =============================================================================

// Test definitions found in each phase's test files across the discovered scopes.
export async function sourceTestCounts(
  phases: Phase[],
  options: DiscoveryOptions,
): Promise<Partial<Record<Phase, number>>> {
  const counts: Partial<Record<Phase, number>> = {};
  for (const phase of phases) {
    const scopes = await discoverPhaseScopes(phase, options);
    let total = 0;
    for (const scope of scopes) total += await countScopeTests(scope);
    counts[phase] = total;
  }
  return counts;
}

// =============================================================================
// VALIDATION
// =============================================================================

export type FailureCounts = Record<FailureType, number>;

export type ValidationReport = {
  session: string;
  source_counts: Partial<Record<Phase, number>>;
  executed_counts: Partial<Record<Phase, number>>;
  counts_ok: boolean;
  missing_scopes: Partial<Record<Phase, string[]>>;
  scopes_ok: boolean;
  failures: Partial<Record<Phase, FailureCounts>>;
  summary: string;
};

async function executedScopes(sessionDir: string, phase: Phase): Promise<Set<string>> {
  const records = await readShardSummaries(sessionDir, phase, () => undefined);
  return new Set(records.flatMap((record) => record.summary.scopes));
}

const FailuresFileSchema = z.object({
  entries: z.array(z.object({ type: z.string() })),
});

async function failureCounts(sessionDir: string, phase: Phase): Promise<FailureCounts> {
  const counts: FailureCounts = { fail: 0, error: 0, ui_fail: 0 };
  const raw = await readJsonFileOrNull(path.join(phaseDir(sessionDir, phase), PHASE_FAILURES_FILE));
  const parsed = FailuresFileSchema.safeParse(raw);
  if (!parsed.success) return counts;

  for (const { type } of parsed.data.entries) {
    if (type === "fail" || type === "error" || type === "ui_fail") counts[type] += 1;
  }
  return counts;
}

// Null when the session has no readable summary.json. Only phases the session ran are checked.
export async function validateSession(
  sessionDir: string,
  options: DiscoveryOptions,
): Promise<ValidationReport | null> {
  const summaryPath = sessionSummaryPath(sessionDir);
  const parsed = SessionSummarySchema.safeParse(await readJsonFileOrNull(summaryPath));
  if (!parsed.success) return null;

  const summary = parsed.data;
  const phases = PHASES.filter((phase) => summary.results[phase] !== undefined);
  const sourceCounts = await sourceTestCounts(phases, options);

  const executed: Partial<Record<Phase, number>> = {};
  const missing: Partial<Record<Phase, string[]>> = {};
  const failures: Partial<Record<Phase, FailureCounts>> = {};
  let countsOk = true;
  let scopesOk = true;

  for (const phase of phases) {
    const run = summary.results[phase]?.counters.tests_run ?? 0;
    executed[phase] = run;
    if (run < (sourceCounts[phase] ?? 0)) countsOk = false;

    const expected = (await discoverPhaseScopes(phase, options))
      .filter((scope) => scope.testFiles.length > 0)
      .map((scope) => scope.id);
    const ran = await executedScopes(sessionDir, phase);
    const absent = expected.filter((id) => !ran.has(id)).sort(compareStrings);
    missing[phase] = absent;
    if (absent.length > 0) scopesOk = false;

    failures[phase] = await failureCounts(sessionDir, phase);
  }

  return {
    session: summary.session,
    source_counts: sourceCounts,
    executed_counts: executed,
    counts_ok: countsOk,
    missing_scopes: missing,
    scopes_ok: scopesOk,
    failures,
    summary: path.resolve(summaryPath),
  };
}

export function validationExitCode(report: ValidationReport, strict: boolean): number {
  if (!strict) return 0;
  return report.counts_ok && report.scopes_ok ? 0 : 1;
}

export function formatValidationReport(report: ValidationReport): string[] {
  const phases = PHASES.filter((phase) => report.executed_counts[phase] !== undefined);
  const lines = [`Session: ${report.session}`, "Counts (source vs executed):"];
  for (const phase of phases) {
    const source = String(report.source_counts[phase] ?? 0).padStart(5);
    const executed = String(report.executed_counts[phase] ?? 0).padStart(5);
    lines.push(`  ${phase.padEnd(12)} ${source} → ${executed}`);
  }
  lines.push(`Counts OK: ${report.counts_ok}`);

  lines.push("Missing scopes (have tests but not executed):");
  const withMissing = phases.filter((phase) => (report.missing_scopes[phase] ?? []).length > 0);
  if (withMissing.length === 0) lines.push("  none");
  for (const phase of withMissing) {
    lines.push(`  ${phase.padEnd(12)}: ${(report.missing_scopes[phase] ?? []).join(", ")}`);
  }

  lines.push("Failures by phase (fail/error/ui_fail):");
  for (const phase of phases) {
    const counts = report.failures[phase] ?? { fail: 0, error: 0, ui_fail: 0 };
    lines.push(`  ${phase.padEnd(12)}: ${counts.fail}/${counts.error}/${counts.ui_fail}`);
  }
  lines.push(`Summary: ${report.summary}`);
  return lines;
}

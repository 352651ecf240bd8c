/*
Purpose: fold shard artifacts into phase and session reports, and feed shard timings
back into the weight history.
Assumptions: shard summaries are final once their phase has finished; finalize may run
more than once for the same session.
Usage: aggregatePhase(sessionDir, phase) after each phase; finalizeSession(...) once at the end.
*/

import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import type { WeightPolicyConfig } from "../core/config.js";
import { handleFailure } from "../core/failure-policy.js";
import type { EventSink } from "../core/logger.js";
import { phaseDir, sessionSummaryPath, weightsAppliedMarkerPath } from "../core/paths.js";
import { PHASES, type Phase } from "../core/phases.js";
import { attempt } from "../core/result.js";
import {
  compareStrings,
  readJsonFileOrNull,
  writeJsonFile,
  writeJsonFileAtomic,
  writeTextFile,
} from "../core/utils.js";
import { addCounters, emptyCounters, type TestCounters } from "../executor/output-monitor.js";
import {
  SUMMARY_SCHEMA_VERSION,
  ShardSummarySchema,
  type ShardSummary,
} from "../executor/shard-summary.js";
import {
  applyTimings,
  type ScopeTiming,
  type WeightHistoryStore,
} from "../state/weight-history.js";

import { dedupeFailures, parseFailures, type FailureEntry } from "./failures.js";
import { renderJunit, shardSuite, type JunitSuite } from "./junit.js";
import {
  buildSessionSummary,
  sortOutcomes,
  type PhaseAggregate,
  type PhaseOutcome,
  type SessionSummary,
} from "./session-summary.js";

// =============================================================================
// FILE NAMES
// =============================================================================

export const PHASE_SUMMARY_FILE = "all.summary.json";
export const PHASE_FAILURES_FILE = "all.failures.json";
export const JUNIT_FILE = "junit.xml";
export const DIGEST_FILE = "digest.json";
export const INDEX_FILE = "index.md";
export const MANIFEST_FILE = "manifest.json";

type Warn = (message: string) => void;

const defaultWarn: Warn = (message) => console.warn(message);

// =============================================================================
// SHARD SUMMARIES
// =============================================================================

export type ShardRecord = {
  file: string;
  summary: ShardSummary;
};

// Sorted by file name so every report built from them is order-stable.
export async function readShardSummaries(
  sessionDir: string,
  phase: Phase,
  warn: Warn = defaultWarn,
): Promise<ShardRecord[]> {
  const dir = phaseDir(sessionDir, phase);
  if (!(await fse.pathExists(dir))) return [];

  const files = await fg("*.summary.json", {
    cwd: dir,
    onlyFiles: true,
    ignore: [PHASE_SUMMARY_FILE],
  });

  const records: ShardRecord[] = [];
  for (const file of files.sort(compareStrings)) {
    const filePath = path.join(dir, file);
    const parsed = ShardSummarySchema.safeParse(await readJsonFileOrNull(filePath));
    if (!parsed.success) {
      warn(`Warning: skipping unreadable shard summary ${filePath}`);
      continue;
    }
    records.push({ file, summary: parsed.data });
  }
  return records;
}

export type MergedShards = {
  counters: TestCounters;
  success: boolean;
};

export function mergeShardSummaries(summaries: ShardSummary[]): MergedShards {
  return summaries.reduce<MergedShards>(
    (acc, summary) => ({
      counters: addCounters(acc.counters, summary.counters),
      success: acc.success && summary.success,
    }),
    { counters: emptyCounters(), success: true },
  );
}

async function readLogText(logFile: string): Promise<string> {
  if (!(await fse.pathExists(logFile))) return "";
  return fse.readFile(logFile, "utf8");
}

type PhaseReport = {
  records: ShardRecord[];
  failures: FailureEntry[];
  suites: JunitSuite[];
};

async function collectPhase(sessionDir: string, phase: Phase, warn: Warn): Promise<PhaseReport> {
  const records = await readShardSummaries(sessionDir, phase, warn);
  const failures: FailureEntry[] = [];
  const suites: JunitSuite[] = [];

  for (const record of records) {
    const text = await readLogText(record.summary.log_file);
    failures.push(...parseFailures(text));
    suites.push(shardSuite(record.summary, text));
  }

  return { records, failures: dedupeFailures(failures), suites };
}

// =============================================================================
// PHASE
// =============================================================================

// Null when the phase produced no shard summaries.
export async function aggregatePhase(
  sessionDir: string,
  phase: Phase,
  warn: Warn = defaultWarn,
): Promise<PhaseAggregate | null> {
  const report = await collectPhase(sessionDir, phase, warn);
  if (report.records.length === 0) return null;

  const merged = mergeShardSummaries(report.records.map((record) => record.summary));
  const aggregate: PhaseAggregate = {
    schema_version: SUMMARY_SCHEMA_VERSION,
    phase,
    success: merged.success,
    counters: merged.counters,
    shards: report.records.length,
  };

  const dir = phaseDir(sessionDir, phase);
  await writeJsonFile(path.join(dir, PHASE_SUMMARY_FILE), aggregate);
  await writeJsonFile(path.join(dir, PHASE_FAILURES_FILE), { entries: report.failures });
  await writeTextFile(path.join(dir, JUNIT_FILE), renderJunit(phase, report.suites));

  return aggregate;
}

// =============================================================================
// WEIGHT FEEDBACK
// =============================================================================

// A shard's elapsed time is split equally among its scopes; a scope spread over
// several shards (sub-units, slices) gets the sum of its parts.
export function scopeTimings(summaries: ShardSummary[]): ScopeTiming[] {
  const totals = new Map<string, ScopeTiming>();

  for (const summary of summaries) {
    if (summary.error !== undefined) continue;
    if (summary.elapsed_seconds <= 0 || summary.scopes.length === 0) continue;

    const share = summary.elapsed_seconds / summary.scopes.length;
    for (const scopeId of summary.scopes) {
      const key = `${summary.phase}\u0000${scopeId}`;
      const existing = totals.get(key);
      totals.set(
        key,
        existing
          ? { ...existing, seconds: existing.seconds + share }
          : { phase: summary.phase, scopeId, seconds: share },
      );
    }
  }

  return [...totals.values()];
}

export type WeightFeedback = {
  store: WeightHistoryStore;
  policy: Pick<WeightPolicyConfig, "history_policy" | "decay_alpha">;
};

// Returns false when this session's timings were already applied.
export async function applySessionWeights(
  sessionDir: string,
  phases: Phase[],
  feedback: WeightFeedback,
  warn: Warn = defaultWarn,
): Promise<boolean> {
  const marker = weightsAppliedMarkerPath(sessionDir);
  if (await fse.pathExists(marker)) return false;

  const summaries: ShardSummary[] = [];
  for (const phase of phases) {
    const records = await readShardSummaries(sessionDir, phase, warn);
    summaries.push(...records.map((record) => record.summary));
  }

  const timings = scopeTimings(summaries);
  if (timings.length > 0) {
    const history = await feedback.store.load();
    await feedback.store.save(applyTimings(history, timings, feedback.policy));
  }
  await writeTextFile(marker, `${timings.length}\n`);
  return true;
}

// =============================================================================
// SESSION
// =============================================================================

export type FinalizeInput = {
  sessionId: string;
  sessionDir: string;
  startedAt: Date;
  endedAt: Date;
  outcomes: PhaseOutcome[];
  sourceCounts: Partial<Record<Phase, number>>;
};

export type FinalizeDeps = {
  weights: WeightFeedback;
  events?: EventSink;
  warn?: Warn;
};

// Every artifact is written independently; a failed write is reported, never thrown.
export async function finalizeSession(
  input: FinalizeInput,
  deps: FinalizeDeps,
): Promise<SessionSummary> {
  const warn = deps.warn ?? defaultWarn;
  const reporter = { events: deps.events, warn };
  const summary = buildSessionSummary(input);
  const phases = sortOutcomes(input.outcomes).map((outcome) => outcome.phase);
  const summaryPath = sessionSummaryPath(input.sessionDir);

  const steps: Array<[string, () => Promise<unknown>]> = [
    [summaryPath, () => writeJsonFileAtomic(summaryPath, summary)],
    [
      path.join(input.sessionDir, DIGEST_FILE),
      () => writeJsonFile(path.join(input.sessionDir, DIGEST_FILE), digestFor(summary, summaryPath)),
    ],
    [
      path.join(input.sessionDir, INDEX_FILE),
      async () =>
        writeTextFile(
          path.join(input.sessionDir, INDEX_FILE),
          await renderSessionIndex(input.sessionDir, summary, phases, warn),
        ),
    ],
    [
      path.join(input.sessionDir, JUNIT_FILE),
      async () =>
        writeTextFile(
          path.join(input.sessionDir, JUNIT_FILE),
          await renderSessionJunit(input.sessionDir, input.sessionId, phases, warn),
        ),
    ],
    ["weight history", () => applySessionWeights(input.sessionDir, phases, deps.weights, warn)],
    // Last, so it lists everything above.
    [
      path.join(input.sessionDir, MANIFEST_FILE),
      () => writeManifest(input.sessionDir),
    ],
  ];

  for (const [target, step] of steps) {
    const result = await attempt("reporting", `Writing ${target} failed`, step);
    if (!result.ok) handleFailure(result.error, reporter, { session: input.sessionId });
  }

  return summary;
}

export type SessionDigest = {
  schema_version: string;
  session: string;
  success: boolean;
  counters_total: TestCounters;
  return_codes: SessionSummary["return_codes"];
  summary: string;
};

export function digestFor(summary: SessionSummary, summaryPath: string): SessionDigest {
  return {
    schema_version: SUMMARY_SCHEMA_VERSION,
    session: summary.session,
    success: summary.success,
    counters_total: summary.counters_total,
    return_codes: summary.return_codes,
    summary: path.resolve(summaryPath),
  };
}

function titleCase(phase: Phase): string {
  return phase.charAt(0).toUpperCase() + phase.slice(1);
}

export async function renderSessionIndex(
  sessionDir: string,
  summary: SessionSummary,
  phases: Phase[],
  warn: Warn = defaultWarn,
): Promise<string> {
  const lines = [
    `# Test Session ${summary.session}`,
    "",
    `Overall: ${summary.success ? "PASSED" : "FAILED"}`,
    "",
    "## Phases",
    "",
  ];

  for (const phase of phases) {
    const records = await readShardSummaries(sessionDir, phase, warn);
    if (records.length === 0) continue;

    lines.push(`### ${titleCase(phase)}`, "");
    for (const record of records) {
      const base = record.file.replace(/\.summary\.json$/, "");
      lines.push(`- ${phase}: ${base} → ${record.file} / ${base}.log`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export async function renderSessionJunit(
  sessionDir: string,
  sessionId: string,
  phases: Phase[],
  warn: Warn = defaultWarn,
): Promise<string> {
  const suites: JunitSuite[] = [];
  for (const phase of PHASES.filter((p) => phases.includes(p))) {
    suites.push(...(await collectPhase(sessionDir, phase, warn)).suites);
  }
  return renderJunit(sessionId, suites);
}

export type ManifestEntry = {
  path: string;
  size: number;
  mtime: number;
};

export async function writeManifest(sessionDir: string): Promise<ManifestEntry[]> {
  const files = await fg("**/*", { cwd: sessionDir, onlyFiles: true, dot: true });
  const entries: ManifestEntry[] = [];

  for (const file of files.sort(compareStrings)) {
    if (file === MANIFEST_FILE) continue;
    const stat = await fse.stat(path.join(sessionDir, file));
    entries.push({ path: file, size: stat.size, mtime: stat.mtimeMs / 1000 });
  }

  await writeJsonFile(path.join(sessionDir, MANIFEST_FILE), {
    schema_version: SUMMARY_SCHEMA_VERSION,
    files: entries,
  });
  return entries;
}

import path from "node:path";

import { sessionSummaryPath } from "../core/paths.js";
import { PHASES } from "../core/phases.js";
import { readJsonFileOrNull } from "../core/utils.js";
import type { SessionPointer, SessionPointerStore } from "../state/session-pointers.js";

import { SessionSummarySchema, type SessionSummary } from "./session-summary.js";

// =============================================================================
// BOTTOM LINE
// =============================================================================

export type BottomLine = {
  latest: SessionPointer | null;
  // Set while a session is in flight.
  current: SessionPointer | null;
  summary: SessionSummary | null;
  summaryPath: string | null;
};

export async function readBottomLine(pointers: SessionPointerStore): Promise<BottomLine> {
  const [latest, current] = await Promise.all([pointers.readLatest(), pointers.readCurrent()]);
  if (!latest) return { latest, current, summary: null, summaryPath: null };

  const summaryPath = sessionSummaryPath(latest.session_dir);
  const parsed = SessionSummarySchema.safeParse(await readJsonFileOrNull(summaryPath));
  return {
    latest,
    current,
    summary: parsed.success ? parsed.data : null,
    summaryPath: parsed.success ? path.resolve(summaryPath) : null,
  };
}

// Exit status for `status`: the latest session's code, 1 when there is none.
export function bottomLineExitCode(line: BottomLine): number {
  if (line.summary) return line.summary.return_code;
  return line.latest?.return_code ?? 1;
}

export function formatBottomLine(line: BottomLine): string[] {
  const lines: string[] = [];
  if (line.current) {
    lines.push(`In progress: ${line.current.session_id} (started ${line.current.started_at})`);
  }
  if (!line.latest) {
    lines.push("No finished session found.");
    return lines;
  }

  const summary = line.summary;
  if (!summary) {
    lines.push(`Session ${line.latest.session_id}: summary unavailable`);
    return lines;
  }

  const { counters_total: totals } = summary;
  lines.push(
    `Session ${summary.session}: ${summary.success ? "PASSED" : "FAILED"} (rc=${summary.return_code}, ` +
      `${summary.elapsed_seconds.toFixed(1)}s)`,
  );
  lines.push(
    `Tests: ${totals.tests_run} run, ${totals.failures} failed, ${totals.errors} errors, ` +
      `${totals.skips} skipped`,
  );
  for (const phase of PHASES) {
    const state = summary.phase_states[phase];
    if (!state) continue;
    const rc = summary.return_codes[phase];
    lines.push(`  ${phase.padEnd(12)} ${state}${rc === null || rc === undefined ? "" : ` (rc=${rc})`}`);
  }
  if (line.summaryPath) lines.push(`Summary: ${line.summaryPath}`);
  return lines;
}

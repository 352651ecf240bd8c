import { TIMEOUT_EXIT_CODE } from "../executor/engine-launcher.js";
import type { TestCounters } from "../executor/output-monitor.js";
import type { ShardSummary } from "../executor/shard-summary.js";

import { parseFailures, type FailureEntry } from "./failures.js";

export type JunitSuite = {
  name: string;
  counters: TestCounters;
  elapsedSeconds: number;
  failures: FailureEntry[];
  // Shard-level problem with no test attached (launch error, timeout).
  systemError?: string;
};

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;")
    // XML 1.0 has no representation for most control characters.
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, "");
}

function testcase(suite: string, entry: FailureEntry): string {
  const name = escapeXml(entry.test ?? entry.fingerprint);
  const tag = entry.type === "error" ? "error" : "failure";
  const message = escapeXml(entry.message.split("\n")[0] ?? "");
  const body = escapeXml(entry.traceback ?? entry.message);
  return (
    `    <testcase classname="${escapeXml(suite)}" name="${name}">\n` +
    `      <${tag} type="${entry.type}" message="${message}">${body}</${tag}>\n` +
    `    </testcase>`
  );
}

export function renderSuite(suite: JunitSuite): string {
  const { counters } = suite;
  const attrs =
    `name="${escapeXml(suite.name)}" tests="${counters.tests_run}" ` +
    `failures="${counters.failures}" errors="${counters.errors}" ` +
    `skipped="${counters.skips}" time="${suite.elapsedSeconds.toFixed(3)}"`;

  const lines = [`  <testsuite ${attrs}>`];
  for (const entry of suite.failures) lines.push(testcase(suite.name, entry));
  if (suite.systemError) {
    lines.push(`    <system-err>${escapeXml(suite.systemError)}</system-err>`);
  }
  lines.push("  </testsuite>");
  return lines.join("\n");
}

export function renderJunit(name: string, suites: JunitSuite[]): string {
  const totals = suites.reduce(
    (acc, suite) => ({
      tests: acc.tests + suite.counters.tests_run,
      failures: acc.failures + suite.counters.failures,
      errors: acc.errors + suite.counters.errors,
      skipped: acc.skipped + suite.counters.skips,
      time: acc.time + suite.elapsedSeconds,
    }),
    { tests: 0, failures: 0, errors: 0, skipped: 0, time: 0 },
  );

  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<testsuites name="${escapeXml(name)}" tests="${totals.tests}" failures="${totals.failures}" ` +
      `errors="${totals.errors}" skipped="${totals.skipped}" time="${totals.time.toFixed(3)}">`,
    ...suites.map(renderSuite),
    `</testsuites>`,
    "",
  ].join("\n");
}

// One suite per shard; failures come from re-parsing the shard's log.
export function shardSuite(summary: ShardSummary, logText: string): JunitSuite {
  const systemError =
    summary.error ??
    (summary.timed_out
      ? `Timed out after ${summary.timeout}s (exit ${TIMEOUT_EXIT_CODE})`
      : undefined);
  return {
    name: `${summary.phase}.${summary.shard_label}`,
    counters: summary.counters,
    elapsedSeconds: summary.elapsed_seconds,
    failures: parseFailures(logText),
    ...(systemError !== undefined ? { systemError } : {}),
  };
}

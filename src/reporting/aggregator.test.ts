import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { Phase } from "../core/phases.js";
import type { TestCounters } from "../executor/output-monitor.js";
import type { ShardSummary } from "../executor/shard-summary.js";
import { MemoryWeightHistoryStore } from "../state/weight-history.js";

import {
  PHASE_SUMMARY_FILE,
  aggregatePhase,
  finalizeSession,
  mergeShardSummaries,
  readShardSummaries,
  scopeTimings,
} from "./aggregator.js";
import type { PhaseAggregate } from "./session-summary.js";

// =============================================================================
// HELPERS
// =============================================================================

let sessionDir: string;
let warnings: string[];
const warn = (message: string) => warnings.push(message);

beforeEach(() => {
  sessionDir = fs.mkdtempSync(path.join(os.tmpdir(), "aggregate-"));
  warnings = [];
});

afterEach(() => {
  fs.rmSync(sessionDir, { recursive: true, force: true });
});

type ShardInput = {
  phase?: Phase;
  scopes?: string[];
  elapsed?: number;
  counters?: Partial<TestCounters>;
  returnCode?: number;
  error?: string;
  log?: string;
};

function summary(label: string, input: ShardInput = {}): ShardSummary {
  const phase = input.phase ?? "unit";
  const returnCode = input.returnCode ?? 0;
  return {
    schema_version: "1.0",
    timestamp: "2026-03-01T10:00:10.000Z",
    command: `test-engine -d app_test_${phase}`,
    phase,
    kind: "scopes",
    shard_label: label,
    database: `app_test_${phase}`,
    scopes: input.scopes ?? [label],
    test_tags: `${phase}_test`,
    timeout: 600,
    start_time: "2026-03-01T10:00:00.000Z",
    end_time: "2026-03-01T10:00:10.000Z",
    elapsed_seconds: input.elapsed ?? 10,
    counters: { tests_run: 0, failures: 0, errors: 0, skips: 0, ...input.counters },
    return_code: returnCode,
    success: returnCode === 0,
    log_file: path.join(sessionDir, phase, `${label}.log`),
    summary_file: path.join(sessionDir, phase, `${label}.summary.json`),
    ...(input.error !== undefined ? { error: input.error } : {}),
  };
}

function writeShard(label: string, input: ShardInput = {}): ShardSummary {
  const shard = summary(label, input);
  fs.mkdirSync(path.dirname(shard.summary_file), { recursive: true });
  fs.writeFileSync(shard.summary_file, JSON.stringify(shard));
  fs.writeFileSync(shard.log_file, input.log ?? "");
  return shard;
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(sessionDir, file), "utf8"));
}

function seedUnitPhase(): void {
  writeShard("mod_a", {
    elapsed: 6,
    counters: { tests_run: 3, failures: 1 },
    returnCode: 1,
    log: "FAIL: test_x (mod_a.tests.T.test_x)\nTraceback (most recent call last):\nAssertionError: no\n\nRan 3 tests in 6s\n",
  });
  writeShard("mod_b", { elapsed: 4, counters: { tests_run: 2, skips: 1 } });
}

// =============================================================================
// PHASE
// =============================================================================

describe("mergeShardSummaries", () => {
  it("does not depend on the order of its inputs", () => {
    const a = summary("mod_a", { counters: { tests_run: 3, failures: 1 }, returnCode: 1 });
    const b = summary("mod_b", { counters: { tests_run: 2, skips: 1 } });

    expect(mergeShardSummaries([a, b])).toEqual(mergeShardSummaries([b, a]));
    expect(mergeShardSummaries([a, b])).toEqual({
      counters: { tests_run: 5, failures: 1, errors: 0, skips: 1 },
      success: false,
    });
  });
});

describe("aggregatePhase", () => {
  it("sums shard counters and writes the phase reports", async () => {
    seedUnitPhase();

    const aggregate = await aggregatePhase(sessionDir, "unit", warn);

    expect(aggregate).toEqual({
      schema_version: "1.0",
      phase: "unit",
      success: false,
      counters: { tests_run: 5, failures: 1, errors: 0, skips: 1 },
      shards: 2,
    });
    expect(readJson("unit/all.summary.json")).toEqual(aggregate);
    expect(readJson("unit/all.failures.json")).toMatchObject({
      entries: [{ type: "fail", test: "test_x (mod_a.tests.T.test_x)", message: "AssertionError: no" }],
    });
    expect(fs.readFileSync(path.join(sessionDir, "unit", "junit.xml"), "utf8")).toContain(
      '<testsuites name="unit" tests="5" failures="1" errors="0" skipped="1"',
    );
  });

  it("gives the same result when run again over its own output", async () => {
    seedUnitPhase();

    const first = await aggregatePhase(sessionDir, "unit", warn);
    const second = await aggregatePhase(sessionDir, "unit", warn);

    expect(second).toEqual(first);
  });

  it("returns null for a phase without shards", async () => {
    expect(await aggregatePhase(sessionDir, "e2e", warn)).toBeNull();
  });
});

describe("readShardSummaries", () => {
  it("skips the phase summary and unreadable files", async () => {
    writeShard("mod_a");
    fs.writeFileSync(path.join(sessionDir, "unit", PHASE_SUMMARY_FILE), "{}");
    fs.writeFileSync(path.join(sessionDir, "unit", "broken.summary.json"), "{not json");

    const records = await readShardSummaries(sessionDir, "unit", warn);

    expect(records.map((record) => record.file)).toEqual(["mod_a.summary.json"]);
    expect(warnings).toEqual([
      `Warning: skipping unreadable shard summary ${path.join(sessionDir, "unit", "broken.summary.json")}`,
    ]);
  });
});

// =============================================================================
// WEIGHT FEEDBACK
// =============================================================================

describe("scopeTimings", () => {
  it("splits shard time across scopes and sums a scope across shards", () => {
    const timings = scopeTimings([
      summary("mod_a_mod_b", { scopes: ["mod_a", "mod_b"], elapsed: 10 }),
      summary("mod_c_s000", { scopes: ["mod_c"], elapsed: 3 }),
      summary("mod_c_s001", { scopes: ["mod_c"], elapsed: 4 }),
      summary("mod_d", { elapsed: 50, error: "spawn ENOENT" }),
      summary("mod_e", { elapsed: 0 }),
    ]);

    expect(timings).toEqual([
      { phase: "unit", scopeId: "mod_a", seconds: 5 },
      { phase: "unit", scopeId: "mod_b", seconds: 5 },
      { phase: "unit", scopeId: "mod_c", seconds: 7 },
    ]);
  });
});

// =============================================================================
// SESSION
// =============================================================================

describe("finalizeSession", () => {
  async function finalize(
    store: MemoryWeightHistoryStore,
    aggregate: PhaseAggregate | null,
    endedAt = new Date("2026-03-01T10:00:10.000Z"),
  ) {
    return finalizeSession(
      {
        sessionId: "test-20260301_100000",
        sessionDir,
        startedAt: new Date("2026-03-01T10:00:00.000Z"),
        endedAt,
        outcomes: [
          { phase: "unit", returnCode: 1, logDir: path.join(sessionDir, "unit"), summary: aggregate },
          { phase: "e2e", returnCode: null, logDir: path.join(sessionDir, "e2e"), summary: null },
        ],
        sourceCounts: { unit: 6, e2e: 2 },
      },
      { weights: { store, policy: { history_policy: "running_average", decay_alpha: 0.3 } }, warn },
    );
  }

  it("writes the summary, digest, index and manifest", async () => {
    seedUnitPhase();
    const aggregate = await aggregatePhase(sessionDir, "unit", warn);
    const store = new MemoryWeightHistoryStore();

    const result = await finalize(store, aggregate);

    expect(result).toMatchObject({
      session: "test-20260301_100000",
      elapsed_seconds: 10,
      success: false,
      return_code: 1,
      return_codes: { unit: 1, e2e: null },
      phase_states: { unit: "failed", e2e: "skipped" },
      counters_total: { tests_run: 5, failures: 1, errors: 0, skips: 1 },
      counters_source: { unit: 6, e2e: 2 },
      counters_source_total: 8,
    });
    expect(readJson("summary.json")).toEqual(result);
    expect(readJson("digest.json")).toEqual({
      schema_version: "1.0",
      session: "test-20260301_100000",
      success: false,
      counters_total: { tests_run: 5, failures: 1, errors: 0, skips: 1 },
      return_codes: { unit: 1, e2e: null },
      summary: path.resolve(sessionDir, "summary.json"),
    });
    expect(fs.readFileSync(path.join(sessionDir, "index.md"), "utf8")).toBe(
      [
        "# Test Session test-20260301_100000",
        "",
        "Overall: FAILED",
        "",
        "## Phases",
        "",
        "### Unit",
        "",
        "- unit: mod_a → mod_a.summary.json / mod_a.log",
        "- unit: mod_b → mod_b.summary.json / mod_b.log",
        "",
      ].join("\n"),
    );

    const manifest = readJson("manifest.json");
    expect(manifest).toMatchObject({ schema_version: "1.0" });
    const paths = manifestPaths(manifest);
    expect(paths).toEqual([...paths].sort());
    expect(paths).not.toContain("manifest.json");
    expect(paths).toContain(".weights_applied");
    expect(paths).toContain("unit/mod_a.log");

    expect(store.snapshot()).toEqual({
      unit: {
        mod_a: { avg_secs: 6, count: 1, last_secs: 6 },
        mod_b: { avg_secs: 4, count: 1, last_secs: 4 },
      },
    });
  });

  it("applies weight feedback only once per session", async () => {
    seedUnitPhase();
    const aggregate = await aggregatePhase(sessionDir, "unit", warn);
    const store = new MemoryWeightHistoryStore();

    await finalize(store, aggregate);
    await finalize(store, aggregate);

    expect(store.saves).toBe(1);
    expect(store.snapshot().unit?.mod_a?.count).toBe(1);
  });

  it("rewrites an identical summary apart from its timestamps", async () => {
    seedUnitPhase();
    const aggregate = await aggregatePhase(sessionDir, "unit", warn);
    const store = new MemoryWeightHistoryStore();
    const summaryPath = path.join(sessionDir, "summary.json");
    const masked = () =>
      fs
        .readFileSync(summaryPath, "utf8")
        .replace(/"(end_time|start_time)": "[^"]*"/g, '"$1": "<ts>"')
        .replace(/"elapsed_seconds": [0-9.]+/, '"elapsed_seconds": 0');

    await finalize(store, aggregate, new Date("2026-03-01T10:00:10.000Z"));
    const first = masked();
    await finalize(store, aggregate, new Date("2026-03-01T10:05:00.000Z"));

    expect(fs.readFileSync(summaryPath, "utf8")).toContain('"end_time": "2026-03-01T10:05:00.000Z"');
    expect(masked()).toBe(first);
  });

  it("reports a failed write and carries on", async () => {
    seedUnitPhase();
    fs.mkdirSync(path.join(sessionDir, "index.md"));

    const result = await finalize(new MemoryWeightHistoryStore(), null);

    expect(result.return_code).toBe(1);
    expect(warnings.some((message) => message.includes(`Writing ${path.join(sessionDir, "index.md")} failed`))).toBe(true);
    expect(fs.existsSync(path.join(sessionDir, "manifest.json"))).toBe(true);
  });
});

function manifestPaths(manifest: unknown): string[] {
  if (typeof manifest !== "object" || manifest === null || !("files" in manifest)) return [];
  const files = manifest.files;
  if (!Array.isArray(files)) return [];
  return files.flatMap((entry: unknown) =>
    typeof entry === "object" && entry !== null && "path" in entry && typeof entry.path === "string"
      ? [entry.path]
      : [],
  );
}

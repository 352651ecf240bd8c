import { describe, expect, it } from "vitest";

import type { ShardSummary } from "../executor/shard-summary.js";

import { escapeXml, renderJunit, renderSuite, shardSuite, type JunitSuite } from "./junit.js";

// =============================================================================
// HELPERS
// =============================================================================

const suite: JunitSuite = {
  name: "unit.mod_a",
  counters: { tests_run: 3, failures: 1, errors: 0, skips: 0 },
  elapsedSeconds: 1.5,
  failures: [{ type: "fail", test: "test_x", message: "boom\nmore", fingerprint: "f00d" }],
};

function summary(overrides: Partial<ShardSummary> = {}): ShardSummary {
  return {
    schema_version: "1.0",
    timestamp: "2026-03-01T10:00:10.000Z",
    command: "test-engine -d app_test_unit",
    phase: "unit",
    kind: "scopes",
    shard_label: "mod_a",
    database: "app_test_unit",
    scopes: ["mod_a"],
    test_tags: "unit_test/mod_a",
    timeout: 600,
    start_time: "2026-03-01T10:00:00.000Z",
    end_time: "2026-03-01T10:00:10.000Z",
    elapsed_seconds: 10,
    counters: { tests_run: 2, failures: 0, errors: 0, skips: 0 },
    return_code: 0,
    success: true,
    log_file: "unit/mod_a.log",
    summary_file: "unit/mod_a.summary.json",
    ...overrides,
  };
}

// =============================================================================
// TESTS
// =============================================================================

describe("escapeXml", () => {
  it("escapes markup and strips control characters", () => {
    expect(escapeXml(`a<b & "c" 'd'>\u0007`)).toBe("a&lt;b &amp; &quot;c&quot; &apos;d&apos;&gt;");
  });
});

describe("renderSuite", () => {
  it("renders counters and one testcase per failure", () => {
    expect(renderSuite(suite)).toBe(
      [
        '  <testsuite name="unit.mod_a" tests="3" failures="1" errors="0" skipped="0" time="1.500">',
        '    <testcase classname="unit.mod_a" name="test_x">',
        '      <failure type="fail" message="boom">boom\nmore</failure>',
        "    </testcase>",
        "  </testsuite>",
      ].join("\n"),
    );
  });
});

describe("renderJunit", () => {
  it("totals suites into the root element", () => {
    const other: JunitSuite = {
      name: "unit.mod_b",
      counters: { tests_run: 4, failures: 0, errors: 2, skips: 1 },
      elapsedSeconds: 0.25,
      failures: [],
    };

    const xml = renderJunit("unit", [suite, other]);

    expect(xml.split("\n")[1]).toBe(
      '<testsuites name="unit" tests="7" failures="1" errors="2" skipped="1" time="1.750">',
    );
    expect(xml.endsWith("</testsuites>\n")).toBe(true);
  });
});

describe("shardSuite", () => {
  it("names the suite after phase and shard and parses the log", () => {
    const result = shardSuite(summary(), "ERROR: test_boot (mod_a.tests.T.test_boot)\n");

    expect(result.name).toBe("unit.mod_a");
    expect(result.failures.map((entry) => entry.test)).toEqual(["test_boot (mod_a.tests.T.test_boot)"]);
    expect(result.systemError).toBeUndefined();
  });

  it("reports launch errors and timeouts as system errors", () => {
    expect(shardSuite(summary({ error: "spawn ENOENT" }), "").systemError).toBe("spawn ENOENT");
    expect(shardSuite(summary({ timed_out: true, return_code: 124 }), "").systemError).toBe(
      "Timed out after 600s (exit 124)",
    );
  });
});

import path from "node:path";
import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

import { defaultConfig, withPhaseSettings, type PhaseSettings } from "../../core/config.js";
import type { Phase } from "../../core/phases.js";

import { createFakePorts } from "./__tests__/fakes.js";
import { PhasePlanner } from "./phase-runner.js";
import { createGuardrail } from "./services.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURE_SCOPES = path.resolve(__dirname, "../../../test/fixtures/scope-tree");

function planner(phase: Phase, patch: Partial<PhaseSettings>): PhasePlanner {
  const config = withPhaseSettings(
    { ...defaultConfig(), scopes_dir: FIXTURE_SCOPES },
    phase,
    patch,
  );
  return new PhasePlanner({
    config,
    guardrail: createGuardrail(config, createFakePorts()),
    reporter: {},
    parallelism: 4,
  });
}

describe("PhasePlanner.predictFirstDatabase", () => {
  it("names the plain phase database when the phase runs as one shard", async () => {
    expect(await planner("integration", { shards: 1 }).predictFirstDatabase("integration")).toBe(
      "app_test_integration",
    );
    expect(
      await planner("integration", { include: ["mod_a"] }).predictFirstDatabase("integration"),
    ).toBe("app_test_integration");
  });

  it("gives no name while the shard count is still open", async () => {
    expect(await planner("integration", { shards: 2 }).predictFirstDatabase("integration")).toBeNull();
    expect(await planner("integration", {}).predictFirstDatabase("integration")).toBeNull();
  });

  it("gives no name for within-scope splitting", async () => {
    expect(
      await planner("integration", { shards: 1, within_shards: 3 }).predictFirstDatabase("integration"),
    ).toBeNull();
  });
});

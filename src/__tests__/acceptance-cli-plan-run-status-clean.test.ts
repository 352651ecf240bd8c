import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { AppContext } from "../app/context.js";
import { createFakePorts, type FakePorts } from "../app/orchestrator/__tests__/fakes.js";
import type { CliContextOptions } from "../cli/config.js";
import { defaultConfig, withPhaseSettings, type ShardlineConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { main } from "../index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURE_SCOPES = path.resolve(__dirname, "../../test/fixtures/scope-tree");

describe("acceptance: CLI plan -> phase -> status -> clean", () => {
  let tmpRoot: string;
  let ports: FakePorts;
  let config: ShardlineConfig;
  let stdout: string[];
  let stderr: string[];
  const contexts: CliContextOptions[] = [];

  const createContext = (options: CliContextOptions): AppContext => {
    contexts.push(options);
    return { config, configPath: null, ports, dispose: () => ports.admin.close() };
  };

  const cli = async (...args: string[]): Promise<number> => {
    stdout.length = 0;
    process.exitCode = 0;
    await main(["node", "shardline", ...args], { createContext });
    const code = process.exitCode ?? 0;
    process.exitCode = 0;
    return code;
  };

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "shardline-cli-acceptance-"));
    await fse.copy(FIXTURE_SCOPES, path.join(tmpRoot, "scopes"));

    ports = createFakePorts();
    config = withPhaseSettings(
      {
        ...defaultConfig(),
        scopes_dir: path.join(tmpRoot, "scopes"),
        log_root: path.join(tmpRoot, "logs"),
        filestore: { enabled: false, root: path.join(tmpRoot, "filestore") },
      },
      "unit",
      { shards: 2 },
    );
    contexts.length = 0;

    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = 0;
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  it("plans, runs a phase, reports status and cleans up", async () => {
    expect(await cli("status")).toBe(1);
    expect(stdout).toEqual(["No finished session found."]);

    expect(await cli("plan", "--phase", "unit", "--json")).toBe(0);
    expect(JSON.parse(stdout.join("\n"))).toEqual([
      {
        phase: "unit",
        strategy: "scopes",
        scopes: 2,
        requested: 2,
        granted: 2,
        pool_size: 2,
        shards: [
          {
            label: "mod_a",
            database: "app_test_unit_s000",
            weight: 2,
            scopes: ["mod_a"],
            test_tags: "unit_test/mod_a",
          },
          {
            label: "mod_b",
            database: "app_test_unit_s001",
            weight: 2,
            scopes: ["mod_b"],
            test_tags: "unit_test/mod_b",
          },
        ],
      },
    ]);

    ports.launcher.script("app_test_unit_s000", { lines: ["Ran 2 tests in 0.100s"] });
    ports.launcher.script("app_test_unit_s001", { lines: ["Ran 2 tests in 0.100s"] });
    expect(await cli("phase", "unit", "--json")).toBe(0);
    const summary: unknown = JSON.parse(stdout.join("\n"));
    expect(summary).toMatchObject({
      success: true,
      return_code: 0,
      return_codes: { unit: 0 },
      counters_total: { tests_run: 4, failures: 0, errors: 0, skips: 0 },
    });
    expect(contexts.at(-1)).toEqual({ json: true, configPath: undefined });

    expect(await cli("status")).toBe(0);
    expect(stdout[0]).toMatch(/^Session test-\d{8}_\d{6}: PASSED \(rc=0, 0\.0s\)$/);
    expect(stdout[1]).toBe("Tests: 4 run, 0 failed, 0 errors, 0 skipped");

    ports.admin.databases.add("app_test_unit_s000");
    expect(await cli("clean")).toBe(0);
    expect(stdout).toEqual(["dropped database app_test_unit_s000"]);

    expect(await cli("clean")).toBe(0);
    expect(stdout).toEqual(["Nothing to clean."]);
    expect(ports.admin.closed).toBe(true);
  });

  it("passes the global config path to every command", async () => {
    await cli("--config", "ci.yaml", "status", "--json");

    expect(contexts).toEqual([{ json: true, configPath: "ci.yaml" }]);
    expect(JSON.parse(stdout.join("\n"))).toEqual({
      latest: null,
      current: null,
      summary_path: null,
      summary: null,
    });
  });

  it("renders user-facing errors and exits non-zero", async () => {
    const failing = (): AppContext => {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config invalid.",
        message: "Config at shardline.yaml is invalid.",
        hint: "Fix the config file (or the environment override) and rerun.",
      });
    };

    process.exitCode = 0;
    await main(["node", "shardline", "status"], { createContext: failing });

    expect(process.exitCode).toBe(1);
    expect(stderr.join("\n")).toContain("Config invalid.");
    expect(stderr.join("\n")).toContain("Config at shardline.yaml is invalid.");
  });
});

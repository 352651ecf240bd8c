import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FakeCommandRunner } from "../app/orchestrator/__tests__/fakes.js";

import { FilestoreManager, SNAPSHOT_MARKER } from "./filestore.js";

let root: string;
let runner: FakeCommandRunner;
let manager: FilestoreManager;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "filestore-"));
  runner = new FakeCommandRunner();
  runner.fail("cp");
  runner.fail("rsync");
  manager = new FilestoreManager(root, runner);

  fs.mkdirSync(path.join(root, "app", "0f"), { recursive: true });
  fs.writeFileSync(path.join(root, "app", "0f", "attachment"), "payload");
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("FilestoreManager.snapshot", () => {
  it("tries hardlinks, then rsync, then copies and marks the snapshot complete", async () => {
    const result = await manager.snapshot("app", "app_test_e2e");
    const target = path.join(root, "app_test_e2e");

    expect(result).toEqual({ created: true, method: "copy", path: target });
    expect(runner.runCalls.map((call) => call.command)).toEqual(["cp", "rsync"]);
    expect(runner.runCalls[0]?.args).toEqual(["-al", path.join(root, "app"), `${target}.tmp`]);
    expect(fs.readFileSync(path.join(target, "0f", "attachment"), "utf8")).toBe("payload");
    expect(fs.existsSync(path.join(target, SNAPSHOT_MARKER))).toBe(true);
    expect(fs.existsSync(`${target}.tmp`)).toBe(false);
  });

  it("does not copy again once a snapshot is complete", async () => {
    await manager.snapshot("app", "app_test_e2e");
    runner.runCalls.length = 0;

    const again = await manager.snapshot("app", "app_test_e2e");

    expect(again).toEqual({
      created: false,
      reason: "already_complete",
      path: path.join(root, "app_test_e2e"),
    });
    expect(runner.runCalls).toEqual([]);
  });

  it("shares one copy between concurrent callers", async () => {
    const [first, second] = await Promise.all([
      manager.snapshot("app", "app_test_integration"),
      manager.snapshot("app", "app_test_integration"),
    ]);

    expect(second).toBe(first);
    expect(runner.runCalls).toHaveLength(2);
  });

  it("reports a missing source without creating anything", async () => {
    const result = await manager.snapshot("other", "other_test_e2e");

    expect(result).toEqual({
      created: false,
      reason: "source_missing",
      path: path.join(root, "other_test_e2e"),
    });
    expect(fs.existsSync(path.join(root, "other_test_e2e"))).toBe(false);
  });
});

describe("FilestoreManager.cleanup", () => {
  it("removes test entries and unlinks symlinks without following them", async () => {
    const outside = fs.mkdtempSync(path.join(os.tmpdir(), "filestore-outside-"));
    fs.writeFileSync(path.join(outside, "keep"), "x");
    fs.mkdirSync(path.join(root, "app_test_unit"));
    fs.symlinkSync(outside, path.join(root, "app_test_link"));

    const removed = await manager.cleanup("app");

    expect(removed).toEqual(["app_test_link", "app_test_unit"]);
    expect(fs.readdirSync(root)).toEqual(["app"]);
    expect(fs.existsSync(path.join(outside, "keep"))).toBe(true);
    fs.rmSync(outside, { recursive: true, force: true });
  });

  it("returns nothing when the root does not exist", async () => {
    const missing = new FilestoreManager(path.join(root, "absent"), runner);
    expect(await missing.cleanup("app")).toEqual([]);
  });
});

describe("FilestoreManager.remove", () => {
  it("removes the entry and any partial copy", async () => {
    fs.mkdirSync(path.join(root, "app_test_unit"));
    fs.mkdirSync(path.join(root, "app_test_unit.tmp"));

    await manager.remove("app_test_unit");

    expect(fs.readdirSync(root)).toEqual(["app"]);
  });
});

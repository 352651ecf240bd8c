import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, MemoryEventSink, eventWithTs, logSessionEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function tempLogPath(...segments: string[]): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  return path.join(tmpDir, ...segments);
}

function readEvents(logPath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe("JsonlLogger", () => {
  it("writes events with the session id and a timestamp", () => {
    const logPath = tempLogPath("nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { session: "test-20260301_100000" });

    logger.log({ event: "phase_start", phase: "unit", shards: 2 });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event).toMatchObject({
      event: "phase_start",
      session: "test-20260301_100000",
      phase: "unit",
      shards: 2,
    });
    expect(new Date(String(event?.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = tempLogPath("events.jsonl");
    const first = new JsonlLogger(logPath, { session: "s-1" });
    first.log({ event: "session_started" });
    first.close();

    const second = new JsonlLogger(logPath, { session: "s-1" });
    logSessionEvent(second, "session_finished", { rc: 0 });
    second.close();

    expect(readEvents(logPath).map((e) => e.event)).toEqual(["session_started", "session_finished"]);
  });

  it("ignores events logged after close", () => {
    const logPath = tempLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { session: "s-2" });
    logger.log({ event: "shard_started" });
    logger.close();
    logger.log({ event: "shard_finished" });
    logger.close();

    expect(readEvents(logPath).map((e) => e.event)).toEqual(["shard_started"]);
  });

  it("warns on write failures and keeps going", () => {
    const logPath = tempLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { session: "s-3" }, { debug: false });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ event: "phase_start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write event to ${logPath}: disk full`,
    );
  });

  it("adds the stack when debug is enabled", () => {
    const logPath = tempLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { session: "s-4" }, { debug: true });

    const writeError = new Error("disk full");
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ event: "phase_start" });
    logger.close();

    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write event to ${logPath}: disk full\n${writeError.stack ?? ""}`,
    );
  });
});

describe("MemoryEventSink", () => {
  it("keeps events in order", () => {
    const sink = new MemoryEventSink({ session: "s-5" });
    logSessionEvent(sink, "phase_start", { phase: "unit" });
    logSessionEvent(sink, "phase_finished", { phase: "unit", rc: 0 });

    expect(sink.names()).toEqual(["phase_start", "phase_finished"]);
    expect(sink.events[1]).toMatchObject({ session: "s-5", phase: "unit", rc: 0 });
  });
});

describe("eventWithTs", () => {
  it("prefers fields on the event over defaults", () => {
    const event = eventWithTs(
      { event: "sample", session: "override", ts: "2026-03-01T10:00:00.000Z", key: "value" },
      { session: "default" },
    );

    expect(event).toEqual({
      ts: "2026-03-01T10:00:00.000Z",
      event: "sample",
      session: "override",
      key: "value",
    });
  });

  it("throws when no session is known", () => {
    expect(() => eventWithTs({ event: "orphan" })).toThrow("session is required for session events");
  });
});

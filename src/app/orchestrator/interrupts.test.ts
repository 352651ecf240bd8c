import { describe, expect, it } from "vitest";

import { FakeInterrupts } from "./__tests__/fakes.js";
import { attachInterruptHandlers, interruptExitCode } from "./interrupts.js";

describe("attachInterruptHandlers", () => {
  it("runs cleanup once and exits with the signal's code", async () => {
    const hooks = new FakeInterrupts();
    const cleaned: NodeJS.Signals[] = [];
    attachInterruptHandlers(
      hooks,
      async (signal) => {
        cleaned.push(signal);
      },
      () => undefined,
    );

    hooks.emit("SIGTERM");
    hooks.emit("SIGINT");
    await hooks.exitedOnce;

    expect(cleaned).toEqual(["SIGTERM"]);
    expect(hooks.exitCodes).toEqual([143]);
    expect(hooks.listening()).toEqual([]);
  });

  it("still exits when cleanup fails", async () => {
    const hooks = new FakeInterrupts();
    const warnings: string[] = [];
    attachInterruptHandlers(
      hooks,
      async () => {
        throw new Error("server gone");
      },
      (message) => warnings.push(message),
    );

    hooks.emit("SIGINT");
    await hooks.exitedOnce;

    expect(warnings).toEqual(["Warning: cleanup after SIGINT failed: server gone"]);
    expect(hooks.exitCodes).toEqual([130]);
  });

  it("removes its handlers when detached", () => {
    const hooks = new FakeInterrupts();
    const detach = attachInterruptHandlers(hooks, async () => undefined, () => undefined);

    expect(hooks.listening()).toEqual(["SIGINT", "SIGTERM"]);
    detach();
    expect(hooks.listening()).toEqual([]);
  });
});

describe("interruptExitCode", () => {
  it("follows the shell convention", () => {
    expect(interruptExitCode("SIGINT")).toBe(130);
    expect(interruptExitCode("SIGTERM")).toBe(143);
  });
});

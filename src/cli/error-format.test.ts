import { describe, expect, it } from "vitest";

import {
  ConfigError,
  DatabaseError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { cliExitCode, renderCliError, toUserFacingError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.session,
    title: "No session",
    message: "No finished session under tmp/test-logs.",
    hint: "Run shardline run first",
    next: "shardline status",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: No session",
        "No finished session under tmp/test-logs.",
        "Hint: Run shardline run first",
        "Next: shardline status",
      ].join("\n"),
    );
  });

  it("includes code, cause and the cause's stack in debug mode", () => {
    const cause = new Error("connection refused");
    cause.stack = "Error: connection refused\nat fake:1:1";
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.database,
      title: "Database unavailable",
      message: "Could not list databases",
      cause,
    });

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Database unavailable",
        "Could not list databases",
        "Code: DATABASE_ERROR",
        "Cause: connection refused",
        "Stack:",
        "  Error: connection refused",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("titles plain errors as unexpected", () => {
    const output = renderCliError(new Error("boom"), { stream: nonTtyStream });

    expect(output).toBe(["Error: Unexpected error", "boom"].join("\n"));
  });

  it("colors labels when color is forced", () => {
    const output = renderCliError(buildUserFacingError(), { useColor: true });

    expect(output.split("\n")[2]).toBe("\u001b[33mHint:\u001b[39m Run shardline run first");
  });
});

describe("toUserFacingError", () => {
  it("wraps config and database errors with hints", () => {
    const config = toUserFacingError(new ConfigError("bad value"));
    const database = toUserFacingError(new DatabaseError("refused"));

    expect(config).toBeInstanceOf(UserFacingError);
    expect(config).toMatchObject({ code: "CONFIG_ERROR", message: "bad value" });
    expect(database).toMatchObject({ code: "DATABASE_ERROR", title: "Database unavailable" });
  });

  it("passes other errors through unchanged", () => {
    const error = new Error("boom");
    expect(toUserFacingError(error)).toBe(error);
  });
});

describe("cliExitCode", () => {
  it("uses a non-zero exit code carried by the error, else 1", () => {
    const withCode = new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Coverage gap",
      message: "missing tests",
      exitCode: 3,
    });

    expect(cliExitCode(withCode)).toBe(3);
    expect(cliExitCode(buildUserFacingError())).toBe(1);
    expect(cliExitCode(new Error("x"))).toBe(1);
  });
});

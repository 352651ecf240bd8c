import { describe, expect, it } from "vitest";

import { likeToRegExp } from "../app/orchestrator/__tests__/fakes.js";

import { likePrefix, quoteIdentifier } from "./postgres.js";

describe("quoteIdentifier", () => {
  it("wraps names and doubles embedded quotes", () => {
    expect(quoteIdentifier("app_test_unit")).toBe('"app_test_unit"');
    expect(quoteIdentifier('odd"name')).toBe('"odd""name"');
  });
});

describe("likePrefix", () => {
  it("escapes wildcards so only the literal prefix matches", () => {
    const pattern = likePrefix("app_test_");

    expect(pattern).toBe("app\\_test\\_%");
    expect(likeToRegExp(pattern).test("app_test_unit_s000")).toBe(true);
    expect(likeToRegExp(pattern).test("appXtestXunit")).toBe(false);
    expect(likeToRegExp(pattern).test("app_tests")).toBe(false);
  });
});

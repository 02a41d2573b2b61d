import { describe, expect, it } from "vitest";
import { collapseWhitespace, truncate } from "../src/utils/text";

describe("text helpers", () => {
  it("collapses whitespace runs", () => {
    expect(collapseWhitespace("  Last\n\tupdated:   2024 ")).toBe("Last updated: 2024");
  });

  it("marks a cut with an ellipsis and keeps the limit", () => {
    expect(truncate("connect ECONNREFUSED", 8)).toBe("connect…");
    expect(truncate("connect ECONNREFUSED", 8)).toHaveLength(8);
    expect(truncate("short", 8)).toBe("short");
  });
});

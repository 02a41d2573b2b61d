import { describe, expect, it } from "vitest";
import { formatVersionDate, normalizeVersionDate, parseDateText } from "../src/normalize/date";

function iso(text: string): string | null {
  return parseDateText(text)?.toISOString() ?? null;
}

describe("date parsing", () => {
  it("reads ISO dates with an optional time", () => {
    expect(iso("released 2024-01-15")).toBe("2024-01-15T00:00:00.000Z");
    expect(iso("2023-09-30 10:15")).toBe("2023-09-30T10:15:00.000Z");
  });

  it("reads HTTP dates", () => {
    expect(iso("Mon, 15 Jan 2024 08:00:00 GMT")).toBe("2024-01-15T08:00:00.000Z");
  });

  it("reads month-first and day-first dates", () => {
    expect(iso("Effective January 8, 2026")).toBe("2026-01-08T00:00:00.000Z");
    expect(iso("15-Jan-2024 10:32")).toBe("2024-01-15T10:32:00.000Z");
  });

  it("reads numeric US dates and compact dates", () => {
    expect(iso("3/7/2024")).toBe("2024-03-07T00:00:00.000Z");
    expect(iso("dump_20231101.sql.gz")).toBe("2023-11-01T00:00:00.000Z");
  });

  it("rejects impossible calendar dates", () => {
    expect(parseDateText("2024-02-30")).toBeNull();
  });

  it("returns null when there is no date", () => {
    expect(parseDateText("no date here")).toBeNull();
  });

  it("does not read a trailing number as a date", () => {
    expect(parseDateText("release 5")).toBeNull();
    expect(parseDateText("README 1")).toBeNull();
    expect(parseDateText("PathwayCommons 12")).toBeNull();
  });

  it("moves on to later shapes when an earlier one is not a calendar date", () => {
    expect(iso("build 2024-02-30, published March 4, 2024")).toBe("2024-03-04T00:00:00.000Z");
  });
});

describe("version date formatting", () => {
  it("pads month and day", () => {
    expect(formatVersionDate(new Date(Date.UTC(2024, 0, 5)))).toBe("2024.01.05");
  });

  it("normalizes any recognizable date", () => {
    expect(normalizeVersionDate("2024-01-15T23:59:00Z")).toBe("2024.01.15");
    expect(normalizeVersionDate("Last updated: March 4, 2024")).toBe("2024.03.04");
    expect(normalizeVersionDate("unknown")).toBeNull();
    expect(normalizeVersionDate("release 5")).toBeNull();
  });
});

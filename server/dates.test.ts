import { describe, it, expect } from "vitest";
import { dayKeyOf, normalizeDayKey } from "./dates.js";

describe("dayKeyOf()", () => {
  it("formats the local calendar day", () => {
    expect(dayKeyOf(new Date(2024, 0, 5, 23, 59))).toBe("2024-01-05");
    expect(dayKeyOf(new Date(2024, 11, 31, 0, 0))).toBe("2024-12-31");
  });
});

describe("normalizeDayKey()", () => {
  it("keeps canonical keys", () => {
    expect(normalizeDayKey("2024-01-05")).toBe("2024-01-05");
  });

  it("canonicalizes other stored forms", () => {
    expect(normalizeDayKey("2024-1-5")).toBe("2024-01-05");
    expect(normalizeDayKey("2024/01/05")).toBe("2024-01-05");
    expect(normalizeDayKey("2024-01-05 00:00:00")).toBe("2024-01-05");
    expect(normalizeDayKey(" 2024-01-05T08:30:00Z ")).toBe("2024-01-05");
  });

  it("rejects impossible or malformed days", () => {
    expect(normalizeDayKey("")).toBeNull();
    expect(normalizeDayKey("yesterday")).toBeNull();
    expect(normalizeDayKey("2024-13-01")).toBeNull();
    expect(normalizeDayKey("2023-02-29")).toBeNull();
    expect(normalizeDayKey("2024-00-10")).toBeNull();
  });

  it("accepts leap days", () => {
    expect(normalizeDayKey("2024-02-29")).toBe("2024-02-29");
  });
});

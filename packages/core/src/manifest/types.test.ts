import { describe, it, expect } from "vitest";
import { createRunId, sumStats } from "./types.js";

describe("manifest helpers", () => {
  it("should format run ids from the local start time", () => {
    expect(createRunId(new Date(2026, 0, 5, 9, 3, 7), "abcd")).toBe("20260105_090307_abcd");
  });

  it("should add a random suffix by default", () => {
    expect(createRunId(new Date(2026, 0, 5, 9, 3, 7))).toMatch(/^20260105_090307_[a-z0-9]{1,4}$/);
  });

  it("should sum stage counters", () => {
    expect(
      sumStats([
        { total: 3, successful: 2, skipped: 0, failed: 1 },
        { total: 3, successful: 0, skipped: 3, failed: 0 },
      ])
    ).toEqual({ total: 6, successful: 2, skipped: 3, failed: 1 });
  });
});

import { describe, it, expect } from "vitest";
import { isMarketHours } from "./market-hours.ts";

describe("isMarketHours", () => {
  it.each([
    ["2024-03-04T14:30:00Z", true], // 9:30 EST, the open
    ["2024-03-04T14:29:00Z", false],
    ["2024-03-04T21:00:00Z", true], // 16:00 EST, the close
    ["2024-03-04T21:01:00Z", false],
    ["2024-07-01T13:30:00Z", true], // 9:30 EDT
    ["2024-07-01T20:30:00Z", false],
    ["2024-03-02T15:00:00Z", false], // Saturday
    ["2024-03-03T15:00:00Z", false], // Sunday
  ])("%s → %s", (iso, open) => {
    expect(isMarketHours(new Date(iso))).toBe(open);
  });
});

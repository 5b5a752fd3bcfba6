import { describe, it, expect } from "vitest";
import { isDue } from "#core/due";

describe("isDue", () => {
  const daily = { periodicity: "daily" as const };
  const weekly = { periodicity: "weekly" as const };

  it("is due when nothing was ever checked", () => {
    expect(isDue(daily, null, new Date("2025-09-15T10:00:00Z"))).toBe(true);
  });

  it("is not due when the last check is in the current period", () => {
    expect(
      isDue(daily, new Date("2025-09-15T00:00:00Z"), new Date("2025-09-15T23:59:59Z"))
    ).toBe(false);
  });

  it("is due again once the period rolls over", () => {
    expect(
      isDue(daily, new Date("2025-09-15T00:00:00Z"), new Date("2025-09-16T00:00:00Z"))
    ).toBe(true);
  });

  it("uses the ISO week for weekly habits", () => {
    const monday = new Date("2025-09-15T00:00:00Z");
    expect(isDue(weekly, monday, new Date("2025-09-21T22:00:00Z"))).toBe(false);
    expect(isDue(weekly, monday, new Date("2025-09-22T01:00:00Z"))).toBe(true);
  });
});

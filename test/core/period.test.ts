import { describe, it, expect } from "vitest";
import {
  startOfDay,
  startOfIsoWeek,
  periodBounds,
  periodLength,
  parsePeriodicity,
  DAY_MS,
  WEEK_MS,
} from "#core/period";
import { InvalidPeriodicityError } from "../../src/errors.js";

const utc = (iso: string) => new Date(iso);

describe("startOfDay", () => {
  it("truncates to midnight UTC of the same date", () => {
    expect(startOfDay(utc("2025-09-15T14:30:45.123Z"))).toEqual(utc("2025-09-15T00:00:00Z"));
  });

  it("leaves midnight unchanged", () => {
    expect(startOfDay(utc("2025-09-15T00:00:00Z"))).toEqual(utc("2025-09-15T00:00:00Z"));
  });

  it("keeps the last millisecond of a day in that day", () => {
    expect(startOfDay(utc("2025-12-31T23:59:59.999Z"))).toEqual(utc("2025-12-31T00:00:00Z"));
  });
});

describe("startOfIsoWeek", () => {
  it("maps a Wednesday to the Monday before it", () => {
    expect(startOfIsoWeek(utc("2025-09-17T23:59:00Z"))).toEqual(utc("2025-09-15T00:00:00Z"));
  });

  it("maps a Sunday to the Monday six days earlier", () => {
    expect(startOfIsoWeek(utc("2025-09-21T08:00:00Z"))).toEqual(utc("2025-09-15T00:00:00Z"));
  });

  it("maps a Monday to itself", () => {
    expect(startOfIsoWeek(utc("2025-09-15T06:00:00Z"))).toEqual(utc("2025-09-15T00:00:00Z"));
  });

  it("crosses a year boundary", () => {
    // 2025-01-01 is a Wednesday
    expect(startOfIsoWeek(utc("2025-01-01T12:00:00Z"))).toEqual(utc("2024-12-30T00:00:00Z"));
  });

  it("always lands on a Monday at or before the instant", () => {
    const base = utc("2024-02-20T03:17:00Z").getTime();
    for (let i = 0; i < 200; i++) {
      const t = new Date(base + i * 7 * 60 * 60 * 1000);
      const start = startOfIsoWeek(t);
      expect(start.getUTCDay()).toBe(1);
      expect(start.getUTCHours()).toBe(0);
      expect(start.getTime()).toBeLessThanOrEqual(t.getTime());
      expect(t.getTime()).toBeLessThan(start.getTime() + WEEK_MS);
    }
  });
});

describe("periodBounds", () => {
  it("returns a one-day interval for daily", () => {
    const { start, end } = periodBounds("daily", utc("2025-09-15T14:00:00Z"));
    expect(start).toEqual(utc("2025-09-15T00:00:00Z"));
    expect(end).toEqual(utc("2025-09-16T00:00:00Z"));
  });

  it("returns a Monday-to-Monday interval for weekly", () => {
    const { start, end } = periodBounds("weekly", utc("2025-09-21T08:00:00Z"));
    expect(start).toEqual(utc("2025-09-15T00:00:00Z"));
    expect(end).toEqual(utc("2025-09-22T00:00:00Z"));
  });

  it("contains the instant with an exclusive end", () => {
    const base = utc("2025-03-01T00:00:00Z").getTime();
    for (let i = 0; i < 100; i++) {
      const t = new Date(base + i * 5 * 60 * 60 * 1000 + 1234);
      const { start, end } = periodBounds("daily", t);
      expect(start.getTime()).toBeLessThanOrEqual(t.getTime());
      expect(t.getTime()).toBeLessThan(end.getTime());
      expect(end.getTime() - start.getTime()).toBe(DAY_MS);
    }
  });

  it("puts the exclusive end into the next period", () => {
    const { end } = periodBounds("daily", utc("2025-09-15T10:00:00Z"));
    expect(periodBounds("daily", end).start).toEqual(end);
  });
});

describe("periodLength", () => {
  it("is one day or one week", () => {
    expect(periodLength("daily")).toBe(86_400_000);
    expect(periodLength("weekly")).toBe(604_800_000);
  });
});

describe("parsePeriodicity", () => {
  it("accepts known values regardless of case and padding", () => {
    expect(parsePeriodicity("daily")).toBe("daily");
    expect(parsePeriodicity(" Weekly ")).toBe("weekly");
  });

  it("rejects anything else", () => {
    expect(() => parsePeriodicity("monthly")).toThrow(InvalidPeriodicityError);
    expect(() => parsePeriodicity("")).toThrow(InvalidPeriodicityError);
  });
});

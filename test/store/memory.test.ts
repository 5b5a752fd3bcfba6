import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStore } from "../../src/store/memory.js";
import { DuplicateNameError } from "../../src/errors.js";

const T0 = new Date("2025-09-15T08:00:00Z");

describe("MemoryStore", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  describe("createHabit", () => {
    it("assigns sequential ids", async () => {
      const a = await store.createHabit("Read", "daily", T0);
      const b = await store.createHabit("Run", "weekly", T0);

      expect(a.id).toBe("1");
      expect(b.id).toBe("2");
      expect(b.createdAt).toEqual(T0);
    });

    it("rejects a duplicate name", async () => {
      await store.createHabit("Read", "daily", T0);
      await expect(store.createHabit("Read", "weekly", T0)).rejects.toBeInstanceOf(
        DuplicateNameError
      );
    });
  });

  describe("findHabitByName", () => {
    it("returns null for an unknown name", async () => {
      expect(await store.findHabitByName("Nope")).toBeNull();
    });

    it("matches the exact name", async () => {
      await store.createHabit("Read", "daily", T0);
      expect((await store.findHabitByName("Read"))?.periodicity).toBe("daily");
      expect(await store.findHabitByName("read")).toBeNull();
    });
  });

  describe("listHabits", () => {
    beforeEach(async () => {
      await store.createHabit("Walk", "weekly", T0);
      await store.createHabit("Read", "daily", T0);
      await store.createHabit("Floss", "daily", T0);
    });

    it("orders by periodicity then name", async () => {
      const names = (await store.listHabits()).map((h) => h.name);
      expect(names).toEqual(["Floss", "Read", "Walk"]);
    });

    it("filters by periodicity", async () => {
      const names = (await store.listHabits("weekly")).map((h) => h.name);
      expect(names).toEqual(["Walk"]);
    });
  });

  describe("checks", () => {
    const start = new Date("2025-09-15T00:00:00Z");
    const end = new Date("2025-09-16T00:00:00Z");

    it("inserts once per (habit, period start)", async () => {
      const first = await store.insertCheck("1", start, end, T0);
      const second = await store.insertCheck("1", start, end, new Date("2025-09-15T20:00:00Z"));

      expect(first.inserted).toBe(true);
      expect(second.inserted).toBe(false);
      expect(second.event.occurredAt).toEqual(T0);
      expect(await store.listChecks("1")).toHaveLength(1);
    });

    it("keeps the same period start apart for different habits", async () => {
      await store.insertCheck("1", start, end, T0);
      const other = await store.insertCheck("2", start, end, T0);

      expect(other.inserted).toBe(true);
      expect(await store.listChecks()).toHaveLength(2);
    });

    it("finds a check by period start", async () => {
      await store.insertCheck("1", start, end, T0);

      expect((await store.findCheck("1", start))?.periodEnd).toEqual(end);
      expect(await store.findCheck("1", end)).toBeNull();
    });

    it("lists checks by period start ascending", async () => {
      const day = (d: number) => new Date(Date.UTC(2025, 8, d));
      await store.insertCheck("1", day(17), day(18), day(17));
      await store.insertCheck("1", day(15), day(16), day(15));
      await store.insertCheck("1", day(16), day(17), day(16));

      const starts = (await store.listChecks("1")).map((c) => c.periodStart.getUTCDate());
      expect(starts).toEqual([15, 16, 17]);
    });
  });
});

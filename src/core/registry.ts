import type { CheckResult, Habit } from "#types";
import type { HabitStore } from "../store/port.js";
import { periodBounds } from "./period.js";

/**
 * Record a check for `habit` at `instant`.
 *
 * At most one check exists per (habit, period). A second check in the same
 * period writes nothing and returns the stored event with `created: false`.
 */
export async function recordCheck(
  store: HabitStore,
  habit: Habit,
  instant: Date
): Promise<CheckResult> {
  const { start, end } = periodBounds(habit.periodicity, instant);

  const existing = await store.findCheck(habit.id, start);
  if (existing) {
    return { event: existing, created: false };
  }

  // A concurrent insert for the same key comes back as the surviving row
  const { event, inserted } = await store.insertCheck(habit.id, start, end, instant);
  return { event, created: inserted };
}

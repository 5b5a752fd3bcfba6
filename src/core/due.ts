import type { Habit } from "#types";
import { periodBounds } from "./period.js";

/**
 * A habit is due when the period containing `now` has no check yet.
 */
export function isDue(
  habit: Pick<Habit, "periodicity">,
  lastCheckPeriodStart: Date | null,
  now: Date
): boolean {
  if (!lastCheckPeriodStart) return true;
  const { start } = periodBounds(habit.periodicity, now);
  return start.getTime() !== lastCheckPeriodStart.getTime();
}

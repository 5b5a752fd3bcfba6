import type { Periodicity, StreakSummary } from "#types";
import { periodBounds, periodLength } from "./period.js";

/**
 * Distinct period-start timestamps, ascending
 */
function distinctSorted(periodStarts: Iterable<Date>): number[] {
  const times = new Set<number>();
  for (const start of periodStarts) {
    times.add(start.getTime());
  }
  return Array.from(times).sort((a, b) => a - b);
}

/**
 * Longest run of consecutive periods.
 *
 * Input order is not trusted and duplicates count once. Two starts are
 * consecutive when they are exactly one period length apart; starts are
 * already calendar aligned so no further adjustment is needed.
 */
export function longestStreak(
  periodicity: Periodicity,
  periodStarts: Iterable<Date>
): number {
  const step = periodLength(periodicity);
  const times = distinctSorted(periodStarts);

  let longest = 0;
  let current = 0;
  let prev: number | null = null;

  for (const time of times) {
    current = prev !== null && time - prev === step ? current + 1 : 1;
    if (current > longest) {
      longest = current;
    }
    prev = time;
  }

  return longest;
}

/**
 * Length of the run ending at the most recent check, or 0 when that check
 * is older than the period before the one containing `now`.
 */
export function currentStreak(
  periodicity: Periodicity,
  periodStarts: Iterable<Date>,
  now: Date
): number {
  const step = periodLength(periodicity);
  const currentStart = periodBounds(periodicity, now).start.getTime();
  const times = distinctSorted(periodStarts).filter((t) => t <= currentStart);

  const last = times[times.length - 1];
  if (last === undefined || currentStart - last > step) {
    return 0;
  }

  let streak = 1;
  for (let i = times.length - 1; i > 0; i--) {
    const time = times[i];
    const before = times[i - 1];
    if (time === undefined || before === undefined || time - before !== step) {
      break;
    }
    streak++;
  }
  return streak;
}

export function streakSummary(
  periodicity: Periodicity,
  periodStarts: Iterable<Date>,
  now: Date
): StreakSummary {
  const starts = Array.from(periodStarts);
  return {
    longest: longestStreak(periodicity, starts),
    current: currentStreak(periodicity, starts, now),
    total: distinctSorted(starts).length,
  };
}

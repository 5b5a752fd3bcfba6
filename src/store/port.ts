import type { CheckEvent, Habit, Periodicity } from "#types";

export interface InsertCheckResult {
  event: CheckEvent;
  /** False when a row for (habitId, periodStart) already existed */
  inserted: boolean;
}

/**
 * Persistence boundary for habits and their checks.
 *
 * Implementations must keep at most one check per (habitId, periodStart),
 * including when two inserts for the same key race.
 */
export interface HabitStore {
  findHabitByName(name: string): Promise<Habit | null>;
  /** Throws DuplicateNameError when the name is taken */
  createHabit(name: string, periodicity: Periodicity, createdAt: Date): Promise<Habit>;
  /** Ordered by periodicity, then name */
  listHabits(periodicity?: Periodicity): Promise<Habit[]>;
  findCheck(habitId: string, periodStart: Date): Promise<CheckEvent | null>;
  insertCheck(
    habitId: string,
    periodStart: Date,
    periodEnd: Date,
    occurredAt: Date
  ): Promise<InsertCheckResult>;
  /** Ordered by periodStart ascending */
  listChecks(habitId?: string): Promise<CheckEvent[]>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock pinned to one instant, for tests and replays
 */
export function fixedClock(instant: Date): Clock {
  return { now: () => new Date(instant.getTime()) };
}

/** Sort order shared by the store implementations */
export function compareHabits(a: Habit, b: Habit): number {
  if (a.periodicity !== b.periodicity) {
    return a.periodicity < b.periodicity ? -1 : 1;
  }
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export function compareChecks(a: CheckEvent, b: CheckEvent): number {
  return (
    a.periodStart.getTime() - b.periodStart.getTime() ||
    Number(a.id) - Number(b.id)
  );
}

import { DuplicateNameError } from "../errors.js";
import type {
  CheckEvent,
  CheckEventRecord,
  Habit,
  HabitRecord,
  Periodicity,
  StoreState,
} from "#types";
import { compareChecks, compareHabits, type InsertCheckResult } from "./port.js";

/**
 * Store operations over a serializable state document. Both the in-memory
 * and the file-backed stores run through these so they share one set of
 * uniqueness and ordering rules.
 */

export function emptyState(): StoreState {
  return {
    version: 1,
    nextHabitId: 1,
    nextCheckId: 1,
    habits: [],
    checks: [],
  };
}

export function toHabit(record: HabitRecord): Habit {
  return { ...record, createdAt: new Date(record.createdAt) };
}

export function toCheckEvent(record: CheckEventRecord): CheckEvent {
  return {
    id: record.id,
    habitId: record.habitId,
    occurredAt: new Date(record.occurredAt),
    periodStart: new Date(record.periodStart),
    periodEnd: new Date(record.periodEnd),
  };
}

export function findHabitByName(state: StoreState, name: string): Habit | null {
  const record = state.habits.find((h) => h.name === name);
  return record ? toHabit(record) : null;
}

export function createHabit(
  state: StoreState,
  name: string,
  periodicity: Periodicity,
  createdAt: Date
): Habit {
  if (state.habits.some((h) => h.name === name)) {
    throw new DuplicateNameError(name);
  }
  const record: HabitRecord = {
    id: String(state.nextHabitId++),
    name,
    periodicity,
    createdAt: createdAt.toISOString(),
  };
  state.habits.push(record);
  return toHabit(record);
}

export function listHabits(state: StoreState, periodicity?: Periodicity): Habit[] {
  return state.habits
    .filter((h) => !periodicity || h.periodicity === periodicity)
    .map(toHabit)
    .sort(compareHabits);
}

export function findCheck(
  state: StoreState,
  habitId: string,
  periodStart: Date
): CheckEvent | null {
  const key = periodStart.toISOString();
  const record = state.checks.find(
    (c) => c.habitId === habitId && c.periodStart === key
  );
  return record ? toCheckEvent(record) : null;
}

export function insertCheck(
  state: StoreState,
  habitId: string,
  periodStart: Date,
  periodEnd: Date,
  occurredAt: Date
): InsertCheckResult {
  const existing = findCheck(state, habitId, periodStart);
  if (existing) {
    return { event: existing, inserted: false };
  }
  const record: CheckEventRecord = {
    id: String(state.nextCheckId++),
    habitId,
    occurredAt: occurredAt.toISOString(),
    periodStart: periodStart.toISOString(),
    periodEnd: periodEnd.toISOString(),
  };
  state.checks.push(record);
  return { event: toCheckEvent(record), inserted: true };
}

export function listChecks(state: StoreState, habitId?: string): CheckEvent[] {
  return state.checks
    .filter((c) => habitId === undefined || c.habitId === habitId)
    .map(toCheckEvent)
    .sort(compareChecks);
}

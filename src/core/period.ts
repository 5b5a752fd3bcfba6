import { InvalidPeriodicityError } from "../errors.js";
import { PeriodicitySchema, type Periodicity, type PeriodBounds } from "#types";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const WEEK_MS = 7 * DAY_MS;

/**
 * Truncate to 00:00:00.000 UTC of the same calendar date
 */
export function startOfDay(instant: Date): Date {
  return new Date(
    Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate())
  );
}

/**
 * Truncate to 00:00:00.000 UTC of the Monday that opens the ISO week
 * containing `instant`.
 */
export function startOfIsoWeek(instant: Date): Date {
  const day = startOfDay(instant);
  // getUTCDay: Sunday=0 .. Saturday=6; ISO weekday: Monday=1 .. Sunday=7
  const isoWeekday = day.getUTCDay() || 7;
  return new Date(day.getTime() - (isoWeekday - 1) * DAY_MS);
}

/**
 * Length of one period in milliseconds
 */
export function periodLength(periodicity: Periodicity): number {
  return periodicity === "daily" ? DAY_MS : WEEK_MS;
}

/**
 * The half-open period [start, end) containing `instant`
 */
export function periodBounds(periodicity: Periodicity, instant: Date): PeriodBounds {
  const start = periodicity === "daily" ? startOfDay(instant) : startOfIsoWeek(instant);
  return { start, end: new Date(start.getTime() + periodLength(periodicity)) };
}

/**
 * Parse user input into a periodicity ("Daily", " weekly " etc.)
 */
export function parsePeriodicity(value: string): Periodicity {
  const result = PeriodicitySchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new InvalidPeriodicityError(value);
  }
  return result.data;
}

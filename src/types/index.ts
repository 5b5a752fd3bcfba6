import { z } from "zod/v4";

// How often a habit is meant to be done
export const PeriodicitySchema = z.enum(["daily", "weekly"]);

export const HabitSchema = z.object({
  id: z.string(),
  name: z.string().min(1),
  periodicity: PeriodicitySchema,
  createdAt: z.iso.datetime(),
});

// A single check-off, keyed by (habitId, periodStart)
export const CheckEventSchema = z.object({
  id: z.string(),
  habitId: z.string(),
  occurredAt: z.iso.datetime(),
  periodStart: z.iso.datetime(),
  periodEnd: z.iso.datetime(),
});

// On-disk document written by the JSON file store
export const StoreStateSchema = z.object({
  version: z.literal(1),
  nextHabitId: z.number().int().positive(),
  nextCheckId: z.number().int().positive(),
  habits: z.array(HabitSchema),
  checks: z.array(CheckEventSchema),
});

export type Periodicity = z.infer<typeof PeriodicitySchema>;
export type HabitRecord = z.infer<typeof HabitSchema>;
export type CheckEventRecord = z.infer<typeof CheckEventSchema>;
export type StoreState = z.infer<typeof StoreStateSchema>;

/** A habit as handed to the core, instants as Dates */
export interface Habit {
  id: string;
  name: string;
  periodicity: Periodicity;
  createdAt: Date;
}

/** A recorded check-off */
export interface CheckEvent {
  id: string;
  habitId: string;
  /** When the check actually happened */
  occurredAt: Date;
  /** Canonical left boundary of the period; the idempotency key */
  periodStart: Date;
  /** Exclusive right boundary */
  periodEnd: Date;
}

/** Half-open interval [start, end) */
export interface PeriodBounds {
  start: Date;
  end: Date;
}

export interface CheckResult {
  event: CheckEvent;
  /** False when the period was already checked and nothing was written */
  created: boolean;
}

export interface StreakSummary {
  longest: number;
  current: number;
  /** Distinct periods with a check */
  total: number;
}

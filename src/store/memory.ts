import type { CheckEvent, Habit, Periodicity, StoreState } from "#types";
import type { HabitStore, InsertCheckResult } from "./port.js";
import * as ops from "./state.js";

/**
 * HabitStore kept entirely in process memory
 */
export class MemoryStore implements HabitStore {
  private state: StoreState;

  constructor(initial?: StoreState) {
    this.state = initial ?? ops.emptyState();
  }

  async findHabitByName(name: string): Promise<Habit | null> {
    return ops.findHabitByName(this.state, name);
  }

  async createHabit(
    name: string,
    periodicity: Periodicity,
    createdAt: Date
  ): Promise<Habit> {
    return ops.createHabit(this.state, name, periodicity, createdAt);
  }

  async listHabits(periodicity?: Periodicity): Promise<Habit[]> {
    return ops.listHabits(this.state, periodicity);
  }

  async findCheck(habitId: string, periodStart: Date): Promise<CheckEvent | null> {
    return ops.findCheck(this.state, habitId, periodStart);
  }

  async insertCheck(
    habitId: string,
    periodStart: Date,
    periodEnd: Date,
    occurredAt: Date
  ): Promise<InsertCheckResult> {
    return ops.insertCheck(this.state, habitId, periodStart, periodEnd, occurredAt);
  }

  async listChecks(habitId?: string): Promise<CheckEvent[]> {
    return ops.listChecks(this.state, habitId);
  }

  /** Copy of the current state document */
  snapshot(): StoreState {
    return structuredClone(this.state);
  }
}

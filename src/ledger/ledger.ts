import { NotFoundError, ValidationError } from "../errors.js";
import type { CheckEvent, CheckResult, Habit, Periodicity } from "#types";
import { parsePeriodicity, periodBounds } from "#core/period";
import { recordCheck } from "#core/registry";
import { isDue } from "#core/due";
import { longestStreak, streakSummary } from "#core/streak";
import type { Clock, HabitStore } from "../store/port.js";

export interface LedgerDeps {
  store: HabitStore;
  clock: Clock;
}

/** Streak figures for one habit */
export interface HabitStreak {
  habit: Habit;
  longest: number;
  current: number;
  total: number;
}

/** The habit holding the best longest streak */
export interface BestStreak {
  habit: Habit;
  longest: number;
}

/**
 * HabitLedger composes the period, registry, due and streak functions
 * against a store and a clock.
 */
export class HabitLedger {
  private store: HabitStore;
  private clock: Clock;

  constructor(deps: LedgerDeps) {
    this.store = deps.store;
    this.clock = deps.clock;
  }

  async addHabit(name: string, periodicity: Periodicity | string): Promise<Habit> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("Habit name must not be empty");
    }
    return this.store.createHabit(
      trimmed,
      parsePeriodicity(periodicity),
      this.clock.now()
    );
  }

  async listHabits(periodicity?: Periodicity | string): Promise<Habit[]> {
    return this.store.listHabits(
      periodicity === undefined ? undefined : parsePeriodicity(periodicity)
    );
  }

  /**
   * Look up a habit by name, throwing NotFoundError when unknown
   */
  async getHabit(name: string): Promise<Habit> {
    const habit = await this.store.findHabitByName(name.trim());
    if (!habit) {
      throw new NotFoundError(name);
    }
    return habit;
  }

  async recordCheck(name: string, at?: Date): Promise<CheckResult> {
    const habit = await this.getHabit(name);
    return recordCheck(this.store, habit, at ?? this.clock.now());
  }

  async hasChecked(name: string, at?: Date): Promise<boolean> {
    const habit = await this.getHabit(name);
    const { start } = periodBounds(habit.periodicity, at ?? this.clock.now());
    return (await this.store.findCheck(habit.id, start)) !== null;
  }

  async isDue(name: string, at?: Date): Promise<boolean> {
    const habit = await this.getHabit(name);
    return this.dueFor(habit, at ?? this.clock.now());
  }

  /**
   * Habits with no check in the period containing `now`
   */
  async listDue(periodicity?: Periodicity | string, now?: Date): Promise<Habit[]> {
    const ref = now ?? this.clock.now();
    const habits = await this.listHabits(periodicity);
    const due: Habit[] = [];
    for (const habit of habits) {
      if (await this.dueFor(habit, ref)) {
        due.push(habit);
      }
    }
    return due;
  }

  async streak(name: string): Promise<HabitStreak> {
    const habit = await this.getHabit(name);
    const starts = await this.periodStarts(habit);
    return { habit, ...streakSummary(habit.periodicity, starts, this.clock.now()) };
  }

  /**
   * The habit with the greatest longest streak; earlier habits win ties.
   * Null when nothing has been checked.
   */
  async streakAll(): Promise<BestStreak | null> {
    let best: BestStreak | null = null;
    for (const habit of await this.store.listHabits()) {
      const longest = longestStreak(habit.periodicity, await this.periodStarts(habit));
      if (longest > (best?.longest ?? 0)) {
        best = { habit, longest };
      }
    }
    return best;
  }

  async listChecks(name?: string): Promise<CheckEvent[]> {
    if (name === undefined) {
      return this.store.listChecks();
    }
    const habit = await this.getHabit(name);
    return this.store.listChecks(habit.id);
  }

  private async dueFor(habit: Habit, now: Date): Promise<boolean> {
    // Look up the current period directly; a backdated or future check may
    // be the most recent row without covering `now`
    const { start } = periodBounds(habit.periodicity, now);
    const check = await this.store.findCheck(habit.id, start);
    return isDue(habit, check?.periodStart ?? null, now);
  }

  private async periodStarts(habit: Habit): Promise<Date[]> {
    const checks = await this.store.listChecks(habit.id);
    return checks.map((c) => c.periodStart);
  }
}

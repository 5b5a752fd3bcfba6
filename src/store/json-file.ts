import { readFile, writeFile, mkdir, rename } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { StoreCorruptError } from "../errors.js";
import {
  StoreStateSchema,
  type CheckEvent,
  type Habit,
  type Periodicity,
  type StoreState,
} from "#types";
import type { HabitStore, InsertCheckResult } from "./port.js";
import * as ops from "./state.js";

/**
 * HabitStore persisted as a single JSON document.
 *
 * Each operation loads the file, applies one change and writes it back.
 * Operations on one instance run one at a time, so a uniqueness check and
 * the insert that follows it cannot interleave with another caller.
 */
export class JsonFileStore implements HabitStore {
  private file: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(file: string) {
    this.file = file;
  }

  /**
   * Load the state document; a missing file is an empty store
   */
  async loadState(): Promise<StoreState> {
    if (!existsSync(this.file)) {
      return ops.emptyState();
    }

    const content = await readFile(this.file, "utf-8");
    try {
      return StoreStateSchema.parse(JSON.parse(content));
    } catch (err) {
      throw new StoreCorruptError(this.file, err);
    }
  }

  /**
   * Write the state document via a temporary file renamed into place
   */
  async saveState(state: StoreState): Promise<void> {
    const dir = dirname(this.file);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    const tmp = `${this.file}.tmp`;
    await writeFile(tmp, JSON.stringify(state, null, 2));
    await rename(tmp, this.file);
  }

  private read<T>(fn: (state: StoreState) => T): Promise<T> {
    return this.enqueue(async () => fn(await this.loadState()));
  }

  private write<T>(
    fn: (state: StoreState) => T,
    changed: (result: T) => boolean = () => true
  ): Promise<T> {
    return this.enqueue(async () => {
      const state = await this.loadState();
      const result = fn(state);
      if (changed(result)) {
        await this.saveState(state);
      }
      return result;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  findHabitByName(name: string): Promise<Habit | null> {
    return this.read((state) => ops.findHabitByName(state, name));
  }

  createHabit(name: string, periodicity: Periodicity, createdAt: Date): Promise<Habit> {
    return this.write((state) => ops.createHabit(state, name, periodicity, createdAt));
  }

  listHabits(periodicity?: Periodicity): Promise<Habit[]> {
    return this.read((state) => ops.listHabits(state, periodicity));
  }

  findCheck(habitId: string, periodStart: Date): Promise<CheckEvent | null> {
    return this.read((state) => ops.findCheck(state, habitId, periodStart));
  }

  insertCheck(
    habitId: string,
    periodStart: Date,
    periodEnd: Date,
    occurredAt: Date
  ): Promise<InsertCheckResult> {
    return this.write(
      (state) => ops.insertCheck(state, habitId, periodStart, periodEnd, occurredAt),
      (result) => result.inserted
    );
  }

  listChecks(habitId?: string): Promise<CheckEvent[]> {
    return this.read((state) => ops.listChecks(state, habitId));
  }
}

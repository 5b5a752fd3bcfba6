/**
 * Errors raised by the ledger and its stores.
 *
 * Callers match on `code` (or `instanceof`) and decide how to present them;
 * nothing below retries or recovers.
 */
export type HabitErrorCode =
  | "NOT_FOUND"
  | "DUPLICATE_NAME"
  | "INVALID_PERIODICITY"
  | "VALIDATION"
  | "STORE_CORRUPT";

export class HabitError extends Error {
  readonly code: HabitErrorCode;

  constructor(code: HabitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends HabitError {
  constructor(readonly habitName: string) {
    super("NOT_FOUND", `Habit '${habitName}' not found`);
  }
}

export class DuplicateNameError extends HabitError {
  constructor(readonly habitName: string) {
    super("DUPLICATE_NAME", `Habit '${habitName}' already exists`);
  }
}

export class InvalidPeriodicityError extends HabitError {
  constructor(readonly value: string) {
    super("INVALID_PERIODICITY", `Invalid periodicity "${value}" (expected daily or weekly)`);
  }
}

export class ValidationError extends HabitError {
  constructor(message: string) {
    super("VALIDATION", message);
  }
}

export class StoreCorruptError extends HabitError {
  constructor(readonly file: string, cause: unknown) {
    super("STORE_CORRUPT", `Store file ${file} is unreadable`, { cause });
  }
}

export function isHabitError(err: unknown): err is HabitError {
  return err instanceof HabitError;
}

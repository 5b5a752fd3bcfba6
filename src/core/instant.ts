import { DateTime } from "luxon";
import { ValidationError } from "../errors.js";

// Widest UTC offset ISO-8601 allows, in minutes
const MAX_OFFSET_MINUTES = 18 * 60;

/**
 * Parse a user-supplied timestamp.
 *
 * `2025-09-15`, `2025-09-15 09:00` and `2025-09-15T09:00:00` are read as UTC.
 * An explicit `Z` or offset is honoured and converted to UTC.
 */
export function parseInstant(value: string): Date {
  const dt = DateTime.fromISO(value.trim().replace(" ", "T"), {
    zone: "utc",
    setZone: true,
  });
  if (!dt.isValid || Math.abs(dt.offset) > MAX_OFFSET_MINUTES) {
    throw new ValidationError(`Invalid timestamp "${value}" (expected YYYY-MM-DD[THH:MM[:SS]])`);
  }
  return dt.toJSDate();
}

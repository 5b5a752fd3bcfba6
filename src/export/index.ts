import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { CheckEvent, Habit } from "#types";

export type ExportFormat = "json" | "csv";

/**
 * ISO timestamp to the second, without zone suffix: 2025-09-15T09:00:00
 */
export function formatInstant(instant: Date): string {
  return instant.toISOString().slice(0, 19);
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csv(header: string[], rows: string[][]): string {
  return [header, ...rows].map((row) => row.map(csvField).join(",")).join("\r\n") + "\r\n";
}

export function habitsToJson(habits: Habit[]): string {
  return JSON.stringify(
    habits.map((h) => ({
      id: h.id,
      name: h.name,
      periodicity: h.periodicity,
      created_at: formatInstant(h.createdAt),
    })),
    null,
    2
  );
}

export function habitsToCsv(habits: Habit[]): string {
  return csv(
    ["id", "name", "periodicity", "created_at"],
    habits.map((h) => [h.id, h.name, h.periodicity, formatInstant(h.createdAt)])
  );
}

export function checksToJson(checks: CheckEvent[]): string {
  return JSON.stringify(
    checks.map((c) => ({
      id: c.id,
      habit_id: c.habitId,
      ts: formatInstant(c.occurredAt),
      period_start: formatInstant(c.periodStart),
      period_end: formatInstant(c.periodEnd),
    })),
    null,
    2
  );
}

export function checksToCsv(checks: CheckEvent[]): string {
  return csv(
    ["id", "habit_id", "ts", "period_start", "period_end"],
    checks.map((c) => [
      c.id,
      c.habitId,
      formatInstant(c.occurredAt),
      formatInstant(c.periodStart),
      formatInstant(c.periodEnd),
    ])
  );
}

/**
 * Write export content, creating parent directories as needed
 */
export async function writeExport(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
  return path;
}

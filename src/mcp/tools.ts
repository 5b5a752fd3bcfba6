/**
 * Tool implementations for MCP server.
 *
 * Extracted to enable direct testing without MCP protocol overhead.
 */

import { isHabitError } from "../errors.js";
import type { HabitLedger } from "../ledger/index.js";
import { parseInstant } from "#core/instant";
import { formatInstant } from "../export/index.js";
import type { Habit } from "#types";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ToolContext {
  ledger: HabitLedger;
}

function json(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function habitSummary(habit: Habit) {
  return {
    name: habit.name,
    periodicity: habit.periodicity,
    createdAt: formatInstant(habit.createdAt),
  };
}

/**
 * Domain errors become tool errors; anything else propagates
 */
async function guard(fn: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await fn();
  } catch (err) {
    if (isHabitError(err)) {
      return {
        content: [{ type: "text", text: err.message }],
        isError: true,
      };
    }
    throw err;
  }
}

/**
 * List habits, optionally filtered by periodicity
 */
export function listHabits(ctx: ToolContext, periodicity?: string): Promise<ToolResult> {
  return guard(async () => {
    const habits = await ctx.ledger.listHabits(periodicity);
    return json(habits.map(habitSummary));
  });
}

/**
 * Check off a habit now or at `ts`
 */
export function checkHabit(
  ctx: ToolContext,
  name: string,
  ts?: string
): Promise<ToolResult> {
  return guard(async () => {
    const at = ts === undefined ? undefined : parseInstant(ts);
    const { event, created } = await ctx.ledger.recordCheck(name, at);
    return json({
      habit: name,
      created,
      periodStart: formatInstant(event.periodStart),
      periodEnd: formatInstant(event.periodEnd),
    });
  });
}

export function listDue(ctx: ToolContext, periodicity?: string): Promise<ToolResult> {
  return guard(async () => {
    const due = await ctx.ledger.listDue(periodicity);
    return json(due.map(habitSummary));
  });
}

export function getStreak(ctx: ToolContext, name: string): Promise<ToolResult> {
  return guard(async () => {
    const { habit, longest, current, total } = await ctx.ledger.streak(name);
    return json({ habit: habit.name, periodicity: habit.periodicity, longest, current, total });
  });
}

/**
 * Habit with the best longest streak
 */
export function bestStreak(ctx: ToolContext): Promise<ToolResult> {
  return guard(async () => {
    const best = await ctx.ledger.streakAll();
    return json(best ? { habit: best.habit.name, longest: best.longest } : null);
  });
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod/v4";
import type { HabitLedger } from "../ledger/index.js";
import {
  listHabits,
  checkHabit,
  listDue,
  getStreak,
  bestStreak,
  type ToolContext,
} from "./tools.js";

export function createServer(ledger: HabitLedger) {
  const server = new McpServer({
    name: "habitr",
    version: "1.0.0",
  });

  const ctx: ToolContext = { ledger };

  // Tool: list_habits
  server.tool(
    "list_habits",
    "List tracked habits, optionally only daily or weekly ones",
    { periodicity: z.string().optional().describe("daily or weekly") },
    async ({ periodicity }) => listHabits(ctx, periodicity)
  );

  // Tool: check_habit
  server.tool(
    "check_habit",
    "Check off a habit for the current period (or the period containing ts). Repeat checks in one period are no-ops",
    {
      name: z.string().describe("Habit name"),
      ts: z.string().optional().describe("UTC timestamp, e.g. 2025-09-15T09:00:00"),
    },
    async ({ name, ts }) => checkHabit(ctx, name, ts)
  );

  // Tool: list_due
  server.tool(
    "list_due",
    "List habits with no check in their current period",
    { periodicity: z.string().optional().describe("daily or weekly") },
    async ({ periodicity }) => listDue(ctx, periodicity)
  );

  // Tool: get_streak
  server.tool(
    "get_streak",
    "Get longest and current streak for a habit",
    { name: z.string().describe("Habit name") },
    async ({ name }) => getStreak(ctx, name)
  );

  // Tool: best_streak
  server.tool(
    "best_streak",
    "Get the habit with the best longest streak",
    {},
    async () => bestStreak(ctx)
  );

  return server;
}

export async function startServer(ledger: HabitLedger) {
  const server = createServer(ledger);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

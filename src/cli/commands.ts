import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { isAbsolute, join, relative, resolve } from "node:path";
import {
  CONFIG_FILE,
  DEFAULT_CONFIG_YAML,
  loadConfig,
  resolveHomeDir,
} from "../config/index.js";
import { isHabitError } from "../errors.js";
import {
  checksToCsv,
  checksToJson,
  formatInstant,
  habitsToCsv,
  habitsToJson,
  writeExport,
  type ExportFormat,
} from "../export/index.js";
import { HabitLedger } from "../ledger/index.js";
import { JsonFileStore } from "../store/json-file.js";
import { systemClock, type Clock } from "../store/port.js";
import { parseInstant } from "#core/instant";
import { parsePeriodicity } from "#core/period";
import { colors, consoleIO, type CliIO, type Colors } from "./output.js";

export interface CliOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  clock?: Clock;
  color?: boolean;
  /** Runs the MCP server; injected so the entry point owns stdio */
  serve?: (ledger: HabitLedger) => Promise<void>;
}

interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: Map<string, string>;
  flags: Set<string>;
}

// Options that take a value, as --key=value or --key value
const VALUE_OPTIONS = new Set(["periodicity", "ts", "format", "path", "name"]);

export function parseArgs(args: string[]): ParsedArgs {
  const [command, ...rest] = args;
  const positionals: string[] = [];
  const options = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) continue;

    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      if (eq !== -1) {
        options.set(arg.slice(2, eq), arg.slice(eq + 1));
        continue;
      }
      const key = arg.slice(2);
      const next = rest[i + 1];
      if (VALUE_OPTIONS.has(key) && next !== undefined && !next.startsWith("-")) {
        options.set(key, next);
        i++;
      } else {
        flags.add(key);
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      flags.add(arg.slice(1));
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, options, flags };
}

class UsageError extends Error {}

interface Context {
  cwd: string;
  homeDir: string;
  io: CliIO;
  c: Colors;
  clock: Clock;
  args: ParsedArgs;
  serve?: (ledger: HabitLedger) => Promise<void>;
}

function requireName(ctx: Context, usage: string): string {
  const [first = "", ...extra] = ctx.args.positionals;
  const name = first.trim();
  if (!name) {
    throw new UsageError(`Missing habit name\n  Usage: habitr ${usage}`);
  }
  if (extra.length > 0) {
    throw new UsageError(
      `Unexpected argument "${extra.join(" ")}" (quote names and timestamps containing spaces)\n  Usage: habitr ${usage}`
    );
  }
  return name;
}

function requireOption(ctx: Context, key: string, usage: string): string {
  const value = ctx.args.options.get(key);
  if (!value) {
    throw new UsageError(`Missing --${key}\n  Usage: habitr ${usage}`);
  }
  return value;
}

function parseFormat(value: string): ExportFormat {
  if (value === "json" || value === "csv") return value;
  throw new UsageError(`Invalid format "${value}" (expected json or csv)`);
}

async function openLedger(ctx: Context): Promise<{ ledger: HabitLedger; exportDir: string }> {
  const { config, warnings } = await loadConfig(ctx.homeDir);
  for (const warning of warnings) {
    ctx.io.err(ctx.c.yellow(`? ${warning}`));
  }
  const ledger = new HabitLedger({
    store: new JsonFileStore(config.dataFile),
    clock: ctx.clock,
  });
  return { ledger, exportDir: config.exportDir };
}

async function init(ctx: Context): Promise<number> {
  const configPath = join(ctx.homeDir, CONFIG_FILE);
  const shown = relative(ctx.cwd, ctx.homeDir) || ".";

  if (existsSync(configPath)) {
    ctx.io.err(ctx.c.red(`✗ ${shown}/${CONFIG_FILE} already exists`));
    return 1;
  }

  await mkdir(ctx.homeDir, { recursive: true });
  await writeFile(configPath, DEFAULT_CONFIG_YAML);

  ctx.io.out(ctx.c.green(`✓ Created ${shown}/`));
  ctx.io.out(`  └─ ${CONFIG_FILE}`);
  ctx.io.out(ctx.c.bold(`\nNext steps:`));
  ctx.io.out(`  1. Run: ${ctx.c.cyan(`habitr add "Drink water" --periodicity=daily`)}`);
  ctx.io.out(`  2. Run: ${ctx.c.cyan(`habitr check "Drink water"`)}`);
  return 0;
}

async function add(ctx: Context): Promise<number> {
  const usage = "add <name> --periodicity=daily|weekly";
  const name = requireName(ctx, usage);
  const periodicity = requireOption(ctx, "periodicity", usage);
  const { ledger } = await openLedger(ctx);

  const habit = await ledger.addHabit(name, periodicity);
  ctx.io.out(
    ctx.c.green(`✓ Added: ${habit.name} (${habit.periodicity}) @ ${formatInstant(habit.createdAt)}`)
  );
  return 0;
}

async function list(ctx: Context, filtered: boolean): Promise<number> {
  const periodicity = filtered
    ? parsePeriodicity(requireOption(ctx, "periodicity", "list-by --periodicity=daily|weekly"))
    : undefined;
  const { ledger } = await openLedger(ctx);
  const habits = await ledger.listHabits(periodicity);

  if (habits.length === 0) {
    ctx.io.out(ctx.c.dim(periodicity ? `No ${periodicity} habits.` : "No habits yet."));
    return 0;
  }

  for (const h of habits) {
    const line = `- ${h.periodicity.padEnd(6)} | ${h.name}`;
    ctx.io.out(filtered ? line : `${line} | created ${formatInstant(h.createdAt)}`);
  }
  return 0;
}

async function check(ctx: Context): Promise<number> {
  const name = requireName(ctx, "check <name> [--ts=YYYY-MM-DDTHH:MM:SS]");
  const ts = ctx.args.options.get("ts");
  const at = ts ? parseInstant(ts) : undefined;
  const { ledger } = await openLedger(ctx);

  const { event, created } = await ledger.recordCheck(name, at);
  const period = `[${formatInstant(event.periodStart)} .. ${formatInstant(event.periodEnd)})`;
  if (created) {
    ctx.io.out(ctx.c.green(`✓ Checked '${name}' for period ${period}`));
  } else {
    ctx.io.out(ctx.c.dim(`Already checked '${name}' for period ${period}`));
  }
  return 0;
}

async function due(ctx: Context): Promise<number> {
  const { ledger } = await openLedger(ctx);
  const habits = await ledger.listDue(ctx.args.options.get("periodicity"));

  if (habits.length === 0) {
    ctx.io.out(ctx.c.green("Nothing due. Great job!"));
    return 0;
  }
  for (const h of habits) {
    ctx.io.out(`- ${h.periodicity.padEnd(6)} | ${h.name}`);
  }
  return 0;
}

async function streak(ctx: Context): Promise<number> {
  const name = requireName(ctx, "streak <name>");
  const { ledger } = await openLedger(ctx);
  const result = await ledger.streak(name);

  ctx.io.out(`Longest streak for '${result.habit.name}': ${ctx.c.cyan(String(result.longest))}`);
  ctx.io.out(`  Current: ${result.current}`);
  ctx.io.out(`  Periods checked: ${result.total}`);
  return 0;
}

async function streakAll(ctx: Context): Promise<number> {
  const { ledger } = await openLedger(ctx);
  const best = await ledger.streakAll();

  if (!best) {
    ctx.io.out(ctx.c.dim("No streaks yet."));
    return 0;
  }
  ctx.io.out(`Best longest streak: ${ctx.c.cyan(String(best.longest))} (${best.habit.name})`);
  return 0;
}

async function exportData(ctx: Context, kind: "habits" | "checks"): Promise<number> {
  const format = parseFormat(
    requireOption(ctx, "format", `export-${kind} --format=json|csv [--path=FILE]`)
  );
  const { ledger, exportDir } = await openLedger(ctx);

  let content: string;
  if (kind === "habits") {
    const habits = await ledger.listHabits();
    content = format === "json" ? habitsToJson(habits) : habitsToCsv(habits);
  } else {
    const checks = await ledger.listChecks(ctx.args.options.get("name"));
    content = format === "json" ? checksToJson(checks) : checksToCsv(checks);
  }

  const pathOption = ctx.args.options.get("path");
  const target = pathOption
    ? isAbsolute(pathOption)
      ? pathOption
      : resolve(ctx.cwd, pathOption)
    : join(exportDir, `${kind}.${format}`);

  await writeExport(target, content);
  ctx.io.out(ctx.c.green(`✓ Exported ${kind} → ${relative(ctx.cwd, target)}`));
  return 0;
}

async function serve(ctx: Context): Promise<number> {
  const { ledger } = await openLedger(ctx);
  if (!ctx.serve) {
    throw new UsageError("MCP server is not available in this context");
  }
  await ctx.serve(ledger);
  return 0;
}

export function helpText(c: Colors): string {
  return `${c.bold("habitr")} - Habit tracker with daily and weekly streaks

${c.bold("Usage:")} habitr <command> [options]

${c.bold("Commands:")}
  ${c.cyan("init")}                Create .habits/ with a default config.yaml
  ${c.cyan("add")} <name>          Add a habit (requires --periodicity)
  ${c.cyan("list")}                List all habits
  ${c.cyan("list-by")}             List habits with one periodicity
  ${c.cyan("check")} <name>        Check off a habit for now or --ts
  ${c.cyan("due")}                 Show habits not yet checked this period
  ${c.cyan("streak")} <name>       Longest and current streak for a habit
  ${c.cyan("streak-all")}          Best longest streak overall
  ${c.cyan("export-habits")}       Export habits to JSON/CSV
  ${c.cyan("export-checks")}       Export checks to JSON/CSV
  ${c.cyan("serve")}               Start MCP server for AI assistants

${c.bold("Options:")}
  ${c.cyan("--periodicity")}       daily or weekly
  ${c.cyan("--ts")}                UTC timestamp, e.g. 2025-09-15T09:00:00
  ${c.cyan("--format")}            json or csv (exports)
  ${c.cyan("--path")}              Export file (default: .habits/exports/<kind>.<format>)
  ${c.cyan("--name")}              Only export checks of this habit

${c.bold("Examples:")}
  ${c.dim("$")} habitr add "Drink water" --periodicity=daily
  ${c.dim("$")} habitr check "Drink water"
  ${c.dim("$")} habitr check "Drink water" --ts=2025-09-15T09:00:00
  ${c.dim("$")} habitr due --periodicity=weekly
  ${c.dim("$")} habitr export-checks --format=csv --path=./checks.csv
`;
}

const COMMANDS = new Map<string, (ctx: Context) => Promise<number>>([
  ["init", init],
  ["add", add],
  ["list", (ctx) => list(ctx, false)],
  ["list-by", (ctx) => list(ctx, true)],
  ["check", check],
  ["due", due],
  ["streak", streak],
  ["streak-all", streakAll],
  ["export-habits", (ctx) => exportData(ctx, "habits")],
  ["export-checks", (ctx) => exportData(ctx, "checks")],
  ["serve", serve],
]);

/**
 * Run one CLI invocation and return its exit code
 */
export async function runCli(args: string[], options: CliOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const io = options.io ?? consoleIO;
  const c = colors(options.color ?? false);
  const parsed = parseArgs(args);
  const command = parsed.command;

  if (command === undefined || command === "--help" || command === "-h") {
    io.out(helpText(c));
    return 0;
  }

  const handler = COMMANDS.get(command);
  if (!handler) {
    io.err(c.red(`Unknown command: ${command}`));
    io.err(c.dim(`\nRun ${c.cyan("habitr --help")} for usage\n`));
    return 1;
  }

  const ctx: Context = {
    cwd,
    homeDir: resolveHomeDir(cwd, env),
    io,
    c,
    clock: options.clock ?? systemClock,
    args: parsed,
    serve: options.serve,
  };

  try {
    return await handler(ctx);
  } catch (err) {
    if (err instanceof UsageError || isHabitError(err)) {
      const [first = "", ...rest] = err.message.split("\n");
      io.err(c.red(`✗ ${first}`));
      for (const line of rest) {
        io.err(c.dim(line));
      }
      return 1;
    }
    throw err;
  }
}

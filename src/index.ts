export * from "#types";
export * from "./errors.js";
export {
  startOfDay,
  startOfIsoWeek,
  periodBounds,
  periodLength,
  parsePeriodicity,
  DAY_MS,
  WEEK_MS,
} from "#core/period";
export { parseInstant } from "#core/instant";
export { recordCheck } from "#core/registry";
export { longestStreak, currentStreak, streakSummary } from "#core/streak";
export { isDue } from "#core/due";
export * from "./store/index.js";
export * from "./ledger/index.js";
export { loadConfig, resolveHomeDir, type Config, type LoadedConfig } from "./config/index.js";
export {
  habitsToJson,
  habitsToCsv,
  checksToJson,
  checksToCsv,
  writeExport,
  formatInstant,
  type ExportFormat,
} from "./export/index.js";

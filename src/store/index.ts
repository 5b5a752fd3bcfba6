export {
  systemClock,
  fixedClock,
  type HabitStore,
  type Clock,
  type InsertCheckResult,
} from "./port.js";
export { MemoryStore } from "./memory.js";
export { JsonFileStore } from "./json-file.js";

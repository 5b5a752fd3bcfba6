export {
  HabitLedger,
  type LedgerDeps,
  type HabitStreak,
  type BestStreak,
} from "./ledger.js";

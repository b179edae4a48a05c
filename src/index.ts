/**
 * Team Lunch Allocation Engine
 *
 * Matches ordering teams to restaurants for a shared lunch order.
 *
 * Features:
 * - Restaurant ranking by rate with deterministic tie-breaking (input order or larger size class)
 * - FIFO arrival queue: teams are served strictly by arrival sequence
 * - Capacity ledger: no restaurant takes more teams than its capacity
 * - zod-validated entry point with pino logging
 */

export type * from "./types";
export * from "./errors";
export { rankRestaurants, compareRestaurants, sizeClassRank, assertValidRate } from "./domain/ranker";
export { ArrivalQueue } from "./domain/queue";
export { AllocationScheduler, allocate, placeTeam } from "./domain/scheduler";
export type { SchedulerOptions } from "./domain/scheduler";
export { CapacityLedger } from "./store/ledger";
export { formatAllocationReport } from "./report";
export { runAllocation } from "./runner";
export type { RunOptions } from "./runner";
export { loadConfig } from "./config";
export type { AllocationConfig, LogLevel } from "./config";
export { createLogger } from "./logger";
export type { Logger, LoggerOptions } from "./logger";
export {
    TieBreakModeSchema,
    SizeClassSchema,
    RestaurantSchema,
    TeamSchema,
    LogLevelSchema,
    AllocationRequestSchema
} from "./schemas";
export type { AllocationRequest } from "./schemas";

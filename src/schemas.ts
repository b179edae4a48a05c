import { z } from 'zod';

/**
 * Tie-break policy for restaurants with equal rates
 */
export const TieBreakModeSchema = z.enum(['ORIGINAL_ORDER', 'PREFER_LARGER']);

export const SizeClassSchema = z.enum(['small', 'medium', 'large']);

/**
 * Validation schema for a restaurant record
 *
 * Only the shape is checked here. Rate bounds are enforced by the ranker so
 * the engine reports them as InvalidRateError with the offending record.
 */
export const RestaurantSchema = z.object({
    id: z.string().min(1),
    name: z.string().optional(),
    rate: z.number(),
    /** Teams this restaurant can serve in one run */
    capacity: z.number().int().positive(),
    sizeClass: SizeClassSchema.optional(),
});

/**
 * Validation schema for a team arrival event
 */
export const TeamSchema = z.object({
    id: z.string().min(1),
    /** Arrival order, lower is served first */
    arrivalSeq: z.number().int().nonnegative(),
});

/**
 * Validation schema for a full allocation request
 *
 * The tie-break mode is optional; the configured default applies when omitted.
 */
export const AllocationRequestSchema = z.object({
    restaurants: z.array(RestaurantSchema),
    teams: z.array(TeamSchema),
    mode: TieBreakModeSchema.optional(),
});

export type AllocationRequest = z.infer<typeof AllocationRequestSchema>;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Validation schema for the process environment
 */
export const EnvSchema = z.object({
    NODE_ENV: z.string().optional(),
    ALLOCATION_TIE_BREAK: TieBreakModeSchema.default('ORIGINAL_ORDER'),
    LOG_LEVEL: LogLevelSchema.optional(),
    LOG_PRETTY: z.enum(['true', 'false']).optional(),
});

import { AllocationRequestSchema } from './schemas';
import { allocate } from './domain/scheduler';
import { AllocationError, InvalidInputError } from './errors';
import config from './config';
import defaultLogger from './logger';
import type { Logger } from './logger';
import type { Assignment, TieBreakMode } from './types';

export interface RunOptions {
    logger?: Logger;
    /** Tie-break mode when the request names none (default: configured ALLOCATION_TIE_BREAK) */
    defaultMode?: TieBreakMode;
}

/**
 * Validate a raw allocation request and run the engine on it
 *
 * Request shape:
 *   - restaurants: { id, name?, rate, capacity, sizeClass? }[]
 *   - teams: { id, arrivalSeq }[]
 *   - mode: Optional tie-break mode
 *
 * Engine errors are logged at warn and rethrown unchanged.
 *
 * @param input - Parsed but untrusted request data (e.g. JSON from a loader)
 * @param options - Logger and default mode overrides
 * @returns Final assignment
 *
 * @throws {InvalidInputError} Request does not match the schema
 * @throws {AllocationError} Any engine error (invalid rate, duplicate team, empty restaurant list...)
 */
export const runAllocation = (input: unknown, options: RunOptions = {}): Assignment => {
    const logger = options.logger ?? defaultLogger;

    const request = AllocationRequestSchema.safeParse(input);
    if (!request.success) {
        const error = new InvalidInputError(request.error.format());
        logger.warn({ error: error.code, detail: error.detail }, error.message);
        throw error;
    }

    const { restaurants, teams } = request.data;
    const mode = request.data.mode ?? options.defaultMode ?? config.tieBreak;

    try {
        const assignment = allocate(restaurants, teams, mode, { logger });
        const assigned = assignment.outcomes.filter(o => o.status === 'ASSIGNED').length;
        logger.info(
            { mode, restaurants: restaurants.length, assigned, unassigned: assignment.outcomes.length - assigned },
            'allocation complete'
        );
        return assignment;
    } catch (error) {
        if (error instanceof AllocationError) {
            logger.warn({ error: error.code, recordId: error.recordId }, error.message);
        }
        throw error;
    }
};

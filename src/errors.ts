import type { Assignment } from './types';

export type AllocationErrorCode =
    | 'invalid_input'
    | 'invalid_rate'
    | 'invalid_capacity'
    | 'duplicate_restaurant'
    | 'duplicate_team'
    | 'out_of_order_arrival'
    | 'empty_restaurant_list';

/**
 * Base class for every error raised by the allocation engine
 *
 * Any of these aborts the run. `recordId` names the restaurant or team
 * that triggered it, or null when no single record is to blame.
 */
export abstract class AllocationError extends Error {
    abstract readonly code: AllocationErrorCode;

    constructor(message: string, readonly recordId: string | null) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidRateError extends AllocationError {
    readonly code = 'invalid_rate';

    constructor(restaurantId: string, readonly rate: unknown) {
        super(`Restaurant ${restaurantId} has an invalid rate: ${String(rate)}`, restaurantId);
    }
}

export class InvalidCapacityError extends AllocationError {
    readonly code = 'invalid_capacity';

    constructor(restaurantId: string, readonly capacity: unknown) {
        super(`Restaurant ${restaurantId} has an invalid capacity: ${String(capacity)}`, restaurantId);
    }
}

export class DuplicateRestaurantError extends AllocationError {
    readonly code = 'duplicate_restaurant';

    constructor(restaurantId: string) {
        super(`Restaurant ${restaurantId} appears more than once`, restaurantId);
    }
}

export class DuplicateTeamError extends AllocationError {
    readonly code = 'duplicate_team';

    constructor(teamId: string) {
        super(`Team ${teamId} was already enqueued`, teamId);
    }
}

/**
 * Raised when a team arrives with a sequence number below one already processed
 */
export class OutOfOrderArrivalError extends AllocationError {
    readonly code = 'out_of_order_arrival';

    constructor(teamId: string, readonly arrivalSeq: number, readonly lastProcessedSeq: number) {
        super(
            `Team ${teamId} arrived with sequence ${arrivalSeq} after sequence ${lastProcessedSeq} was processed`,
            teamId
        );
    }
}

/**
 * Raised when teams are queued but there is no restaurant to offer them
 *
 * By the time this is thrown every queued team has been marked UNASSIGNED,
 * and the resulting assignment is attached.
 */
export class EmptyRestaurantListError extends AllocationError {
    readonly code = 'empty_restaurant_list';

    constructor(readonly teamIds: string[], readonly assignment: Assignment) {
        super(`No restaurants available for ${teamIds.length} queued team(s)`, teamIds[0] ?? null);
    }
}

export class InvalidInputError extends AllocationError {
    readonly code = 'invalid_input';

    constructor(readonly detail: unknown) {
        super('Allocation request failed validation', null);
    }
}

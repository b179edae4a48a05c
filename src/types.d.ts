/**
 * Policy for ordering restaurants that share the same rate
 *
 * - ORIGINAL_ORDER: equal rates keep their input order
 * - PREFER_LARGER: equal rates are ordered by size class, larger first
 */
export type TieBreakMode = 'ORIGINAL_ORDER' | 'PREFER_LARGER';

export type SizeClass = 'small' | 'medium' | 'large';

/**
 * Restaurant offering lunch slots to ordering teams
 *
 * Records are never mutated by the engine. Remaining capacity lives in the ledger.
 */
export interface Restaurant {
    id: string;
    name?: string;
    /** Ranking metric, higher is offered first. Must be a finite number >= 0. */
    rate: number;
    /** Number of teams this restaurant can serve in one allocation run */
    capacity: number;
    /** Only consulted as a tie-break signal under PREFER_LARGER */
    sizeClass?: SizeClass;
}

/**
 * Team requesting an allocation
 *
 * Teams are processed strictly by ascending arrivalSeq.
 */
export interface Team {
    id: string;
    arrivalSeq: number;
}

/**
 * Team lifecycle in the scheduler
 *
 * PENDING is the only non-terminal state. A team never leaves ASSIGNED or UNASSIGNED.
 */
export type TeamStatus = 'PENDING' | 'ASSIGNED' | 'UNASSIGNED';

/**
 * Result of processing a single team
 */
export interface TeamOutcome {
    teamId: string;
    arrivalSeq: number;
    status: Exclude<TeamStatus, 'PENDING'>;
    /** null when the team could not be placed */
    restaurantId: string | null;
}

/**
 * Final result of an allocation run
 */
export interface Assignment {
    /** Ranked restaurant sequence the run scanned */
    ranking: Restaurant[];
    /** One entry per processed team, in processing order */
    outcomes: TeamOutcome[];
    /** Team id to restaurant id, null is the unassigned sentinel */
    teams: Map<string, string | null>;
    /** Every ranked restaurant, in rank order, with its teams in assignment order */
    restaurants: Map<string, string[]>;
}

/**
 * Seed data structure for fixtures and demo runs
 */
export interface SeedData {
    restaurants: Restaurant[];
    teams: Team[];
}

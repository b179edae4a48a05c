import type * as types from "../types";
import { EmptyRestaurantListError } from "../errors";
import { CapacityLedger } from "../store/ledger";
import defaultLogger from "../logger";
import type { Logger } from "../logger";
import { ArrivalQueue } from "./queue";
import { rankRestaurants } from "./ranker";

export interface SchedulerOptions {
    logger?: Logger;
}

/**
 * Place one team at the first ranked restaurant with room left
 *
 * Scans `ranked` in order and records the team in the ledger. Nothing is
 * reserved or retried: if every restaurant is full the team is UNASSIGNED.
 *
 * @param team - Team to place
 * @param ranked - Restaurants in rank order
 * @param ledger - Capacity ledger tracking the ranked restaurants
 * @returns ASSIGNED outcome with the chosen restaurant, or UNASSIGNED with a null restaurant
 */
export function placeTeam(
    team: types.Team,
    ranked: readonly types.Restaurant[],
    ledger: CapacityLedger
): types.TeamOutcome {
    const restaurant = ranked.find(r => ledger.hasRoom(r.id));
    if (!restaurant) {
        return { teamId: team.id, arrivalSeq: team.arrivalSeq, status: 'UNASSIGNED', restaurantId: null };
    }

    ledger.assign(restaurant.id, team.id);
    return { teamId: team.id, arrivalSeq: team.arrivalSeq, status: 'ASSIGNED', restaurantId: restaurant.id };
}

/**
 * Serves queued teams against a fixed restaurant ranking
 *
 * Teams enter PENDING when enqueued and leave it exactly once, in arrival
 * order, for ASSIGNED or UNASSIGNED. Capacity consumed by a team is never
 * given back during the run.
 */
export class AllocationScheduler {
    private readonly ranked: types.Restaurant[];
    private readonly ledger: CapacityLedger;
    private readonly queue = new ArrivalQueue();
    private readonly statuses: Map<string, types.TeamStatus> = new Map();
    private readonly outcomes: types.TeamOutcome[] = [];
    private readonly logger: Logger;

    /**
     * @param ranked - Restaurants already in rank order
     * @param options - Optional logger override
     * @throws {DuplicateRestaurantError} If two restaurants share an id
     * @throws {InvalidCapacityError} If a capacity is not an integer >= 1
     */
    constructor(ranked: readonly types.Restaurant[], options: SchedulerOptions = {}) {
        this.ranked = [...ranked];
        this.ledger = new CapacityLedger(this.ranked);
        this.logger = options.logger ?? defaultLogger;
    }

    get pending(): number {
        return this.queue.size;
    }

    /**
     * Queue one or more team requests
     *
     * A batch is queued whole or not at all.
     *
     * @throws {DuplicateTeamError} If a team id repeats in the batch or was already queued in this run
     * @throws {OutOfOrderArrivalError} If a team arrives behind one already served
     */
    enqueue(teams: types.Team | readonly types.Team[]): void {
        const batch: readonly types.Team[] = 'arrivalSeq' in teams ? [teams] : teams;
        this.queue.enqueueAll(batch);
        for (const team of batch) {
            this.statuses.set(team.id, 'PENDING');
        }
    }

    /**
     * Queue a team under the next arrival number
     */
    request(teamId: string): types.Team {
        const team = this.queue.request(teamId);
        this.statuses.set(team.id, 'PENDING');
        return team;
    }

    statusOf(teamId: string): types.TeamStatus | undefined {
        return this.statuses.get(teamId);
    }

    /**
     * Serve the earliest pending team
     *
     * @returns The team's outcome, or null when nothing is queued
     * @throws {EmptyRestaurantListError} If teams are queued but there are no restaurants
     */
    step(): types.TeamOutcome | null {
        if (this.ranked.length === 0 && this.queue.size > 0) {
            this.failEmpty();
        }

        const team = this.queue.dequeue();
        if (!team) return null;

        const outcome = placeTeam(team, this.ranked, this.ledger);
        this.record(outcome);
        return outcome;
    }

    /**
     * Serve every pending team and return the resulting assignment
     *
     * @throws {EmptyRestaurantListError} If teams are queued but there are no restaurants
     */
    run(): types.Assignment {
        let outcome = this.step();
        while (outcome) {
            outcome = this.step();
        }
        return this.assignment();
    }

    /**
     * Current assignment, including teams processed so far only
     */
    assignment(): types.Assignment {
        return {
            ranking: [...this.ranked],
            outcomes: [...this.outcomes],
            teams: new Map(this.outcomes.map((o): [string, string | null] => [o.teamId, o.restaurantId])),
            restaurants: this.ledger.snapshot()
        };
    }

    /**
     * Forget every team and restore full capacity for a new run
     */
    reset(): void {
        this.queue.clear();
        this.statuses.clear();
        this.outcomes.length = 0;
        this.ledger.reset();
    }

    private record(outcome: types.TeamOutcome): void {
        this.statuses.set(outcome.teamId, outcome.status);
        this.outcomes.push(outcome);

        if (outcome.status === 'ASSIGNED') {
            this.logger.debug({ teamId: outcome.teamId, restaurantId: outcome.restaurantId }, 'team assigned');
        } else {
            this.logger.debug({ teamId: outcome.teamId }, 'team unassigned, no restaurant has capacity left');
        }
    }

    private failEmpty(): never {
        const teams = this.queue.drain();
        for (const team of teams) {
            this.record({ teamId: team.id, arrivalSeq: team.arrivalSeq, status: 'UNASSIGNED', restaurantId: null });
        }
        throw new EmptyRestaurantListError(teams.map(t => t.id), this.assignment());
    }
}

/**
 * Rank restaurants and serve every team in arrival order
 *
 * All teams are queued before any is served, so a duplicate id aborts the
 * run without a partial result. The inputs are not modified and the same
 * inputs always produce the same assignment.
 *
 * @param restaurants - Restaurant records in input order
 * @param teams - Team arrival events
 * @param mode - Tie-break policy for equal rates (default: ORIGINAL_ORDER)
 * @param options - Optional logger override
 * @returns Final assignment of teams to restaurants
 * @throws {InvalidRateError} From ranking
 * @throws {DuplicateTeamError} If a team id repeats
 * @throws {EmptyRestaurantListError} If teams are given but no restaurants
 */
export function allocate(
    restaurants: readonly types.Restaurant[],
    teams: readonly types.Team[],
    mode: types.TieBreakMode = 'ORIGINAL_ORDER',
    options: SchedulerOptions = {}
): types.Assignment {
    const ranked = rankRestaurants(restaurants, mode);
    const scheduler = new AllocationScheduler(ranked, options);
    scheduler.enqueue(teams);
    return scheduler.run();
}

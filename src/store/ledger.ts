import type * as types from "../types";
import { DuplicateRestaurantError, InvalidCapacityError } from "../errors";

/**
 * In-memory capacity ledger for one allocation run
 *
 * Features:
 * - Tracks how many teams each restaurant has taken against its capacity
 * - Keeps each restaurant's teams in the order they were assigned
 * - Can be reset to full capacity for another run over the same restaurants
 *
 * Restaurant records are referenced, never modified. Iteration order of
 * snapshots follows the order restaurants were handed to the constructor.
 */
export class CapacityLedger {
    private readonly _capacity: Map<string, number> = new Map();
    private readonly _teams: Map<string, string[]> = new Map();

    /**
     * @param restaurants - Restaurants to track, usually in rank order
     * @throws {DuplicateRestaurantError} If two restaurants share an id
     * @throws {InvalidCapacityError} If a capacity is not an integer >= 1
     */
    constructor(restaurants: readonly types.Restaurant[]) {
        for (const restaurant of restaurants) {
            if (this._capacity.has(restaurant.id)) {
                throw new DuplicateRestaurantError(restaurant.id);
            }
            if (!Number.isInteger(restaurant.capacity) || restaurant.capacity < 1) {
                throw new InvalidCapacityError(restaurant.id, restaurant.capacity);
            }
            this._capacity.set(restaurant.id, restaurant.capacity);
            this._teams.set(restaurant.id, []);
        }
    }

    get size(): number {
        return this._capacity.size;
    }

    /**
     * Seats still open at a restaurant
     *
     * @returns Remaining capacity, or 0 for unknown ids
     */
    remaining(restaurantId: string): number {
        const capacity = this._capacity.get(restaurantId) ?? 0;
        return capacity - this.teamsAt(restaurantId).length;
    }

    hasRoom(restaurantId: string): boolean {
        return this.remaining(restaurantId) > 0;
    }

    /**
     * Teams assigned to a restaurant, in assignment order
     */
    teamsAt(restaurantId: string): string[] {
        return [...(this._teams.get(restaurantId) ?? [])];
    }

    /**
     * Record one team against a restaurant
     *
     * The scheduler only calls this after `hasRoom` returned true, so a
     * full or unknown restaurant here is a programming error.
     *
     * @throws {RangeError} If the restaurant is unknown or already full
     */
    assign(restaurantId: string, teamId: string): void {
        const teams = this._teams.get(restaurantId);
        if (!teams) {
            throw new RangeError(`Restaurant ${restaurantId} is not tracked by this ledger`);
        }
        if (!this.hasRoom(restaurantId)) {
            throw new RangeError(`Restaurant ${restaurantId} has no remaining capacity for team ${teamId}`);
        }
        teams.push(teamId);
    }

    /**
     * Copy of every restaurant's team list, in ledger order
     */
    snapshot(): Map<string, string[]> {
        return new Map(Array.from(this._teams.entries(), ([id, teams]): [string, string[]] => [id, [...teams]]));
    }

    /**
     * Restore full capacity and forget every assignment
     */
    reset(): void {
        for (const teams of this._teams.values()) {
            teams.length = 0;
        }
    }
}

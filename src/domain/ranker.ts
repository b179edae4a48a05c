import type * as types from "../types";
import { InvalidRateError } from "../errors";

const SIZE_CLASS_RANK: Record<types.SizeClass, number> = {
    small: 1,
    medium: 2,
    large: 3
};

/**
 * Numeric rank of a restaurant's size class
 *
 * Restaurants without a size class rank below every named class.
 *
 * @param restaurant - Restaurant to inspect
 * @returns 0 (unset), 1 (small), 2 (medium) or 3 (large)
 */
export const sizeClassRank = (restaurant: types.Restaurant): number =>
    restaurant.sizeClass ? SIZE_CLASS_RANK[restaurant.sizeClass] : 0;

/**
 * Reject rates that cannot be ranked
 *
 * @throws {InvalidRateError} When the rate is not a number, is NaN or infinite, or is negative
 */
export const assertValidRate = (restaurant: types.Restaurant): void => {
    const rate: unknown = restaurant.rate;
    if (typeof rate !== 'number' || !Number.isFinite(rate) || rate < 0) {
        throw new InvalidRateError(restaurant.id, rate);
    }
};

/**
 * Compare two restaurants by rate, then by the tie-break mode
 *
 * Returns 0 when the pair is tied under the mode; callers that need a
 * total order fall back to input position.
 *
 * @param a - First restaurant
 * @param b - Second restaurant
 * @param mode - Tie-break policy for equal rates
 * @returns Negative when `a` ranks first, positive when `b` ranks first
 */
export function compareRestaurants(a: types.Restaurant, b: types.Restaurant, mode: types.TieBreakMode): number {
    if (a.rate !== b.rate) return b.rate - a.rate;
    if (mode === 'PREFER_LARGER') return sizeClassRank(b) - sizeClassRank(a);
    return 0;
}

/**
 * Order restaurants for the scheduler, highest rate first
 *
 * Ranking rules (in priority order):
 * 1. Rate: descending
 * 2. Size class: larger first, only under PREFER_LARGER
 * 3. Input position: earlier first, so the result never depends on sort stability
 *
 * The input array is left untouched.
 *
 * @param restaurants - Restaurants to rank
 * @param mode - Tie-break policy for equal rates (default: ORIGINAL_ORDER)
 * @returns New array holding every input restaurant exactly once
 * @throws {InvalidRateError} If any restaurant has an unrankable rate
 */
export function rankRestaurants(
    restaurants: readonly types.Restaurant[],
    mode: types.TieBreakMode = 'ORIGINAL_ORDER'
): types.Restaurant[] {
    restaurants.forEach(assertValidRate);

    return restaurants
        .map((restaurant, position) => ({ restaurant, position }))
        .sort((a, b) => compareRestaurants(a.restaurant, b.restaurant, mode) || a.position - b.position)
        .map(entry => entry.restaurant);
}

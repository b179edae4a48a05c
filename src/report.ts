import type * as types from "./types";

const NONE = '(none)';

const describeRestaurant = (restaurant: types.Restaurant): string => {
    const details = [`rate ${restaurant.rate}`, `capacity ${restaurant.capacity}`];
    if (restaurant.sizeClass) details.push(restaurant.sizeClass);
    return `${restaurant.id} (${details.join(', ')})`;
};

/**
 * Render an assignment as plain text, one restaurant per line
 *
 * Example:
 *   Ranking: B > A
 *   B (rate 5, capacity 1, large): T1
 *   A (rate 5, capacity 1, small): T2
 *   Unassigned: T3
 *
 * @param assignment - Result of an allocation run
 * @returns Report lines joined with "\n"
 */
export function formatAllocationReport(assignment: types.Assignment): string {
    const lines = [`Ranking: ${assignment.ranking.map(r => r.id).join(' > ') || NONE}`];

    for (const restaurant of assignment.ranking) {
        const teams = assignment.restaurants.get(restaurant.id) ?? [];
        lines.push(`${describeRestaurant(restaurant)}: ${teams.join(', ') || NONE}`);
    }

    const unassigned = assignment.outcomes
        .filter(o => o.status === 'UNASSIGNED')
        .map(o => o.teamId);
    lines.push(`Unassigned: ${unassigned.join(', ') || NONE}`);

    return lines.join('\n');
}

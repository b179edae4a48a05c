import type { Restaurant, SeedData, SizeClass, Team, TieBreakMode } from '../types';

/** Two equal-rate restaurants that differ only in size class */
export const tiedRestaurants: Restaurant[] = [
    { id: 'A', rate: 5, capacity: 1, sizeClass: 'small' },
    { id: 'B', rate: 5, capacity: 1, sizeClass: 'large' }
];

export const teams = (...ids: string[]): Team[] =>
    ids.map((id, index) => ({ id, arrivalSeq: index + 1 }));

export const seedData: SeedData = {
    restaurants: [
        { id: 'noodle-bar', name: 'Noodle Bar', rate: 4, capacity: 2, sizeClass: 'medium' },
        { id: 'green-bowl', name: 'Green Bowl', rate: 5, capacity: 1, sizeClass: 'small' },
        { id: 'grill-house', name: 'Grill House', rate: 3, capacity: 3, sizeClass: 'large' },
        { id: 'taco-stand', name: 'Taco Stand', rate: 4, capacity: 1, sizeClass: 'large' }
    ],
    teams: [
        { id: 'design', arrivalSeq: 3 },
        { id: 'platform', arrivalSeq: 1 },
        { id: 'sales', arrivalSeq: 2 },
        { id: 'support', arrivalSeq: 5 },
        { id: 'finance', arrivalSeq: 4 },
        { id: 'legal', arrivalSeq: 6 },
        { id: 'ops', arrivalSeq: 7 },
        { id: 'hr', arrivalSeq: 8 }
    ]
};

export interface GeneratedCase {
    restaurants: Restaurant[];
    queue: Team[];
    mode: TieBreakMode;
}

// Small deterministic generator so failures reproduce
const lcg = (seed: number) => () => {
    seed = (seed * 16807) % 2147483647;
    return (seed - 1) / 2147483646;
};

const sizes: SizeClass[] = ['small', 'medium', 'large'];

/**
 * Seeded restaurant sets and arrival queues with plenty of rate and size ties
 */
export const generateCases = (count: number): GeneratedCase[] =>
    Array.from({ length: count }, (_, index) => {
        const next = lcg(index + 1);
        const restaurants: Restaurant[] = Array.from({ length: 1 + Math.floor(next() * 6) }, (_, i) => ({
            id: `R${i}`,
            rate: Math.floor(next() * 4),
            capacity: 1 + Math.floor(next() * 3),
            sizeClass: sizes[Math.floor(next() * sizes.length)]
        }));
        const queue: Team[] = Array.from({ length: Math.floor(next() * 12) }, (_, i) => ({
            id: `T${i}`,
            arrivalSeq: Math.floor(next() * 20)
        }));
        const mode: TieBreakMode = next() < 0.5 ? 'ORIGINAL_ORDER' : 'PREFER_LARGER';
        return { restaurants, queue, mode };
    });

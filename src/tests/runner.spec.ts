import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import type { Logger } from 'pino';
import { runAllocation } from '../runner';
import { DuplicateTeamError, InvalidInputError, InvalidRateError } from '../errors';
import { seedData } from './seed-data';

interface LogLine {
    level: number;
    msg: string;
    [key: string]: unknown;
}

describe('runAllocation', () => {
    let lines: LogLine[];
    let logger: Logger;

    beforeEach(() => {
        lines = [];
        logger = pino({ level: 'info' }, { write: (msg: string) => { lines.push(JSON.parse(msg)); } });
    });

    it('should allocate a valid request and log a summary', () => {
        const assignment = runAllocation({ ...seedData, mode: 'PREFER_LARGER' }, { logger });

        expect(assignment.teams.get('sales')).toBe('taco-stand');
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({
            level: 30,
            msg: 'allocation complete',
            mode: 'PREFER_LARGER',
            restaurants: 4,
            assigned: 7,
            unassigned: 1
        });
    });

    it('should fall back to the default mode when the request names none', () => {
        const assignment = runAllocation(seedData, { logger, defaultMode: 'ORIGINAL_ORDER' });

        expect(assignment.teams.get('sales')).toBe('noodle-bar');
        expect(lines[0]?.mode).toBe('ORIGINAL_ORDER');
    });

    it('should reject malformed input with the validation detail', () => {
        const input = { restaurants: [{ id: 'A', rate: 'five', capacity: 0 }], teams: [] };

        try {
            runAllocation(input, { logger });
            expect.unreachable('validation should have failed');
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidInputError);
            if (error instanceof InvalidInputError) {
                expect(error.code).toBe('invalid_input');
                expect(error.recordId).toBeNull();
                expect(error.detail).toMatchObject({
                    restaurants: { 0: { rate: { _errors: ['Expected number, received string'] } } }
                });
            }
        }
        expect(lines[0]).toMatchObject({ level: 40, error: 'invalid_input', msg: 'Allocation request failed validation' });
    });

    it('should reject a request that is not an object', () => {
        expect(() => runAllocation(null, { logger })).toThrow(InvalidInputError);
    });

    it('should log and rethrow engine errors', () => {
        const input = {
            restaurants: [{ id: 'A', rate: -1, capacity: 1 }],
            teams: [{ id: 'T1', arrivalSeq: 1 }]
        };

        expect(() => runAllocation(input, { logger })).toThrow(InvalidRateError);
        expect(lines[0]).toMatchObject({
            level: 40,
            error: 'invalid_rate',
            recordId: 'A',
            msg: 'Restaurant A has an invalid rate: -1'
        });
    });

    it('should report which team was duplicated', () => {
        const input = {
            restaurants: [{ id: 'A', rate: 1, capacity: 1 }],
            teams: [{ id: 'T1', arrivalSeq: 1 }, { id: 'T1', arrivalSeq: 2 }]
        };

        expect(() => runAllocation(input, { logger })).toThrow(DuplicateTeamError);
        expect(lines[0]?.recordId).toBe('T1');
    });
});

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { createLogger } from '../logger';
import { LogLevelSchema } from '../schemas';

describe('Configuration', () => {

    it('should apply defaults outside tests', () => {
        expect(loadConfig({})).toEqual({ tieBreak: 'ORIGINAL_ORDER', logLevel: 'info', prettyLogs: true });
    });

    it('should silence logs under NODE_ENV=test', () => {
        expect(loadConfig({ NODE_ENV: 'test' })).toEqual({ tieBreak: 'ORIGINAL_ORDER', logLevel: 'silent', prettyLogs: false });
    });

    it('should read explicit values', () => {
        const config = loadConfig({ ALLOCATION_TIE_BREAK: 'PREFER_LARGER', LOG_LEVEL: 'debug', LOG_PRETTY: 'false' });

        expect(config).toEqual({ tieBreak: 'PREFER_LARGER', logLevel: 'debug', prettyLogs: false });
    });

    it('should reject an unknown tie-break mode', () => {
        expect(() => loadConfig({ ALLOCATION_TIE_BREAK: 'RANDOM' })).toThrow(/^Invalid configuration: ALLOCATION_TIE_BREAK: /);
    });

    it('should accept every pino level and reject others', () => {
        for (const level of LogLevelSchema.options) {
            expect(loadConfig({ LOG_LEVEL: level }).logLevel).toBe(level);
        }
        expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
    });

    it('should build a logger at the requested level', () => {
        expect(createLogger({ level: 'warn', pretty: false }).level).toBe('warn');
    });
});

import { EnvSchema } from './schemas';
import type { LogLevel } from './schemas';
import type { TieBreakMode } from './types';

export type { LogLevel };

export interface AllocationConfig {
    /** Tie-break mode used when a request does not name one */
    tieBreak: TieBreakMode;
    logLevel: LogLevel;
    /** Route logs through pino-pretty */
    prettyLogs: boolean;
}

/**
 * Read engine configuration from environment variables
 *
 * Variables:
 * - ALLOCATION_TIE_BREAK: ORIGINAL_ORDER (default) or PREFER_LARGER
 * - LOG_LEVEL: pino level, defaults to "info" ("silent" under NODE_ENV=test)
 * - LOG_PRETTY: "true" or "false", defaults to true outside tests
 *
 * @param env - Environment to read (default: process.env)
 * @throws {Error} If a variable holds an unsupported value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AllocationConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }

    const isTest = parsed.data.NODE_ENV === 'test';
    return {
        tieBreak: parsed.data.ALLOCATION_TIE_BREAK,
        logLevel: parsed.data.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
        prettyLogs: parsed.data.LOG_PRETTY ? parsed.data.LOG_PRETTY === 'true' : !isTest,
    };
}

const config = loadConfig();

export default config;

import pino from 'pino';
import type { Logger } from 'pino';
import config from './config';
import type { LogLevel } from './config';

export type { Logger };

export interface LoggerOptions {
    level?: LogLevel;
    pretty?: boolean;
}

/**
 * Build a pino logger for the allocation engine
 *
 * Pretty output is colorized, drops pid/hostname and prints local timestamps.
 * Tests run with pretty output off so no transport worker is started.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
    const pretty = options.pretty ?? config.prettyLogs;

    return pino({
        level: options.level ?? config.logLevel,
        ...(pretty ? {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    ignore: 'pid,hostname',
                    translateTime: 'SYS:dd-mm-yyyy HH:MM:ss'
                }
            }
        } : {})
    });
};

const logger = createLogger();

export default logger;

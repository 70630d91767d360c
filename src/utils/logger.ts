/**
 * Structured logging
 *
 * Every component takes an optional pino logger. Library callers get a
 * logger at the configured level; tests pass `createLogger({ level: 'silent' })`.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
    level: LogLevel;
    name?: string;
}

export function createLogger(options: Partial<LoggerOptions> = {}): Logger {
    return pino({
        name: options.name ?? 'manifest-healer',
        level: options.level ?? 'warn',
        base: undefined
    });
}

let sharedLogger: Logger | undefined;

/**
 * Process-wide default logger, created on first use
 */
export function getDefaultLogger(): Logger {
    if (!sharedLogger) {
        sharedLogger = createLogger();
    }
    return sharedLogger;
}

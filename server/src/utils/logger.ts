/**
 * Centralized logger using Pino
 *
 * Development: pretty-printed through pino-pretty.
 * Production: JSON lines on stdout with string level labels.
 * Tests: silent.
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDev = !isTest && process.env.NODE_ENV !== 'production';

function resolveLevel(): string {
    if (isTest) return 'silent';
    return process.env.LOG_LEVEL || (isDev ? 'debug' : 'info');
}

const options: LoggerOptions = {
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

const logger: Logger = isDev
    ? pino(options, pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    }))
    : pino(options);

// Child loggers per pipeline stage
export const syncLogger: Logger = logger.child({ module: 'sync' });
export const customerLogger: Logger = logger.child({ module: 'customers' });
export const conversionLogger: Logger = logger.child({ module: 'conversions' });
export const statsLogger: Logger = logger.child({ module: 'stats' });
export const reconciliationLogger: Logger = logger.child({ module: 'reconciliation' });

export default logger;

// Helper to log with context
export function logWithContext<T extends Record<string, unknown>>(childLogger: Logger, context: T): Logger {
    return childLogger.child(context);
}

import pino, { type Logger, type LoggerOptions } from 'pino';

// =================================================================
// LOGGER
// =================================================================
// One pino root per process. Components take a child:
//
//   logger.child({ component: 'route-table' })
//   logger.child({ route: 'orders' })
// =================================================================

export type { Logger };

export const DEFAULT_LOGGER_CONFIG: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
    serializers: {
        err: pino.stdSerializers.err,
    },
};

export function createLogger(options?: LoggerOptions): Logger {
    return pino({
        ...DEFAULT_LOGGER_CONFIG,
        ...options,
    });
}

/** Logger that writes nothing; the default in tests. */
export function createSilentLogger(): Logger {
    return pino({ enabled: false });
}

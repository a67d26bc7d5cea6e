/**
 * Centralized logger using Pino
 * One base logger, one child per pipeline stage
 */
import { pino } from 'pino';
import type { Logger } from 'pino';

// Pretty output for interactive runs; JSON lines in production and under test
const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const logger: Logger = pino({
    level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
    ...(isDev ? {
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    } : {}),
});

// Create child loggers for different stages
export const pipelineLogger: Logger = logger.child({ module: 'pipeline' });
export const sourcesLogger: Logger = logger.child({ module: 'sources' });
export const reconciliationLogger: Logger = logger.child({ module: 'reconciliation' });
export const enrichmentLogger: Logger = logger.child({ module: 'enrichment' });
export const notifyLogger: Logger = logger.child({ module: 'notify' });
export const reportLogger: Logger = logger.child({ module: 'report' });

export default logger;

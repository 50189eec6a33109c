import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId } from '../errors/index.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    recordId?: string;
    lineNumber?: number;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = keyof Logger;

/**
 * Creates a Pino logger
 * Injects the current run's correlation ID into every entry.
 * Structured mode writes JSON lines; otherwise pino-pretty formats for a terminal.
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = pino({
        level: config.level,
        ...(config.structured === false && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname,correlationId',
                },
            },
        }),
    });

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            config.customLogger(level, message, enrichedMeta);
            return;
        }

        pinoLogger[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}

/**
 * Centralized logger using Pino
 *
 * Pretty output in development, JSON lines in production, silent under test.
 * Modules log through their own child logger so every line carries `module`.
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
    redact: {
        paths: ['password', 'Password', '*.password', '*.Password', 'cookie', '*.cookie'],
        censor: '[redacted]',
    },
};

// pino-pretty runs in a worker thread; keep it out of tests so nothing lingers
const logger: Logger = isDev
    ? pino({
        ...options,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino(options);

// Child loggers per module
export const erpLogger: Logger = logger.child({ module: 'erp' });
export const sessionLogger: Logger = logger.child({ module: 'session' });
export const queueLogger: Logger = logger.child({ module: 'queue' });
export const workerLogger: Logger = logger.child({ module: 'worker' });
export const syncLogger: Logger = logger.child({ module: 'sync' });
export const stockLogger: Logger = logger.child({ module: 'stock' });
export const orderLogger: Logger = logger.child({ module: 'orders' });
export const customerLogger: Logger = logger.child({ module: 'customers' });
export const productLogger: Logger = logger.child({ module: 'products' });
export const eventLogger: Logger = logger.child({ module: 'events' });
export const dbLogger: Logger = logger.child({ module: 'db' });
export const httpLogger: Logger = logger.child({ module: 'http' });
export const storefrontLogger: Logger = logger.child({ module: 'storefront' });

export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.url,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}

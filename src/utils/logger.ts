import { pino, type Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger honouring ROLEGRAPH_LOG_LEVEL.
 */
export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({
            level: parseLogLevel(process.env['ROLEGRAPH_LOG_LEVEL']) ?? 'info',
            jsonLogs: process.env['ROLEGRAPH_JSON_LOGS'] === '1',
        });
    }
    return loggerInstance;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return value;
        default:
            return undefined;
    }
}

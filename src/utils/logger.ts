import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Pretty output on stderr by default, JSON lines with `jsonLogs`.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ name: 'bibkeys', level }, pino.destination({ dest: 2, sync: true }));
    } else {
        loggerInstance = pino({
            name: 'bibkeys',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    destination: 2,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance, or a child tagged with `component`.
 * If not initialized, creates a default info-level logger.
 */
export function getLogger(component?: string): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return component ? loggerInstance.child({ component }) : loggerInstance;
}

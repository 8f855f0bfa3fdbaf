import pino from 'pino';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Pretty output goes to stderr so command output on stdout stays parseable.
 */
let loggerInstance: pino.Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,module',
                    messageFormat: '{if module}[{module}] {end}{msg}',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates one at `HISTOGRAPH_LOG_LEVEL` (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const envLevel = process.env['HISTOGRAPH_LOG_LEVEL'];
        loggerInstance = initLogger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
    }
    return loggerInstance;
}

/**
 * Child logger tagged with the calling module.
 * Resolved per call so that a later `initLogger()` takes effect.
 */
export function getModuleLogger(module: string): pino.Logger {
    return getLogger().child({ module });
}

export { isLogLevel };

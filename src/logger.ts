/**
 * Logger wrapper for consistent library logging.
 *
 * Messages below the current level are dropped. The level starts from `INLINE_TABLE_LOG_LEVEL`
 * (`debug`, `info`, `warn`, `error` or `silent`) and defaults to `warn`.
 */

const PREFIX = '[InlineTable]';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.INLINE_TABLE_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export const logger = {
    info: (...args: unknown[]): void => {
        if (enabled('info')) console.info(PREFIX, ...args);
    },
    warn: (...args: unknown[]): void => {
        if (enabled('warn')) console.warn(PREFIX, ...args);
    },
    error: (...args: unknown[]): void => {
        if (enabled('error')) console.error(PREFIX, ...args);
    },
    debug: (...args: unknown[]): void => {
        if (enabled('debug')) console.debug(PREFIX, ...args);
    },
};

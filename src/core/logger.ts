/**
 * Dev-friendly logger with levels and timestamps
 * One instance per module; the minimum level is shared and adjustable at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

let minLevel: LogLevel = import.meta.env.DEV ? 'debug' : 'info';

export function setLogLevel(level: LogLevel): void {
    minLevel = level;
}

export function getLogLevel(): LogLevel {
    return minLevel;
}

function shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

function formatTime(): string {
    return new Date().toISOString().slice(11, 23);
}

export function formatMessage(level: LogLevel, module: string, msg: string): string {
    return `[${formatTime()}] [${level.toUpperCase()}] [${module}] ${msg}`;
}

export interface Logger {
    debug(msg: string, ...args: unknown[]): void;
    info(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
}

const SINKS: Record<LogLevel, (...data: unknown[]) => void> = {
    debug: (...data) => console.debug(...data),
    info: (...data) => console.info(...data),
    warn: (...data) => console.warn(...data),
    error: (...data) => console.error(...data),
};

export function createLogger(module: string): Logger {
    const emit = (level: LogLevel, msg: string, args: unknown[]) => {
        if (shouldLog(level)) {
            SINKS[level](formatMessage(level, module, msg), ...args);
        }
    };
    return {
        debug: (msg, ...args) => emit('debug', msg, args),
        info: (msg, ...args) => emit('info', msg, args),
        warn: (msg, ...args) => emit('warn', msg, args),
        error: (msg, ...args) => emit('error', msg, args),
    };
}

export const log = createLogger('App');

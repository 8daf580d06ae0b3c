/**
 * Leveled console logging for lookup sessions, plus once-only warnings for
 * deprecations.
 */

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

export const LOG_PREFIX = '[tiered-lookup]';

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

class ConsoleLogger implements Logger {
    private readonly threshold: number;

    constructor(level: LogLevel) {
        this.threshold = LOG_LEVELS.indexOf(level);
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) <= this.threshold;
    }

    error(message: string, ...args: unknown[]): void {
        if (this.shouldLog('error')) {
            console.error(`${LOG_PREFIX} ${message}`, ...args);
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.shouldLog('warn')) {
            console.warn(`${LOG_PREFIX} ${message}`, ...args);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (this.shouldLog('info')) {
            console.info(`${LOG_PREFIX} ${message}`, ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.shouldLog('debug')) {
            console.debug(`${LOG_PREFIX} ${message}`, ...args);
        }
    }

    trace(message: string, ...args: unknown[]): void {
        if (this.shouldLog('trace')) {
            console.log(`${LOG_PREFIX} ${message}`, ...args);
        }
    }
}

/** A console logger that drops messages below `level`. */
export function createLogger(level: LogLevel): Logger {
    return new ConsoleLogger(level);
}

let defaultLogger: Logger | undefined;

/**
 * The logger used where no session logger is at hand. Its level comes from
 * TIERED_LOOKUP_LOG_LEVEL, else info.
 */
export function getLogger(): Logger {
    if (!defaultLogger) {
        const fromEnv = process.env.TIERED_LOOKUP_LOG_LEVEL?.toLowerCase();
        defaultLogger = createLogger(fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'info');
    }
    return defaultLogger;
}

// kind:key pairs already warned about during this process
const warnedOnce = new Set<string>();

/**
 * Emits `message` as a warning unless the same kind and key were already reported.
 * Returns true when the warning was emitted.
 */
export function warnOnce(logger: Logger, kind: string, key: string, message: string): boolean {
    const id = `${kind}:${key}`;
    if (warnedOnce.has(id)) {
        return false;
    }
    warnedOnce.add(id);
    logger.warn(message);
    return true;
}

export function resetWarnOnce(): void {
    warnedOnce.clear();
}

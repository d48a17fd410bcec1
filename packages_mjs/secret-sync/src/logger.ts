/**
 * Leveled console logging for kvsync.
 *
 * Warnings about skipped secrets and debug traces go through a `SyncLogger`;
 * progress lines and diffs are written to the output sink instead.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug', 'trace'];
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
export const DEFAULT_LOG_PREFIX = '[kvsync]';

export const ENV_LOG_LEVEL = 'KVSYNC_LOG_LEVEL';
export const ENV_LOG_PREFIX = 'KVSYNC_LOG_PREFIX';

export interface SyncLogger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
    setLevel(level: LogLevel): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    prefix?: string;
}

/**
 * Where formatted lines end up. `console` satisfies it.
 */
export type LogWriter = Pick<Console, 'error' | 'warn' | 'info' | 'debug' | 'log'>;

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Level and prefix taken from the environment; unknown levels are ignored.
 */
export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
    const options: LoggerOptions = {};
    const level = env[ENV_LOG_LEVEL]?.toLowerCase();
    if (level && isLogLevel(level)) {
        options.level = level;
    }
    if (env[ENV_LOG_PREFIX]) {
        options.prefix = env[ENV_LOG_PREFIX];
    }
    return options;
}

export class ConsoleLogger implements SyncLogger {
    private level: LogLevel;
    private readonly prefix: string;

    constructor(options: LoggerOptions = {}, private writer: LogWriter = console) {
        this.level = options.level ?? DEFAULT_LOG_LEVEL;
        this.prefix = options.prefix ?? DEFAULT_LOG_PREFIX;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    isEnabled(level: LogLevel): boolean {
        return level !== 'silent' && LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
    }

    error(message: string, ...args: unknown[]): void {
        if (this.isEnabled('error')) this.writer.error(`${this.prefix} ${message}`, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.isEnabled('warn')) this.writer.warn(`${this.prefix} ${message}`, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        if (this.isEnabled('info')) this.writer.info(`${this.prefix} ${message}`, ...args);
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.isEnabled('debug')) this.writer.debug(`${this.prefix} ${message}`, ...args);
    }

    trace(message: string, ...args: unknown[]): void {
        if (this.isEnabled('trace')) this.writer.log(`${this.prefix} ${message}`, ...args);
    }
}

let sharedLogger: ConsoleLogger | undefined;

/**
 * Process-wide logger, configured from the environment on first use.
 */
export function getLogger(): ConsoleLogger {
    if (!sharedLogger) {
        sharedLogger = new ConsoleLogger(loggerOptionsFromEnv());
    }
    return sharedLogger;
}

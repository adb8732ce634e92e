/**
 * Logger shared by every command and the cleanup engine.
 *
 * Backed by winston; callers only ever see the {@link SimpleLogger} shape so
 * that tests can substitute a plain object of spies.
 */
import winston from 'winston';

/**
 * Simple logger interface - avoids exposing winston types
 */
export interface SimpleLogger {
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    debug: (message: string, ...args: unknown[]) => void;
    verbose: (message: string, ...args: unknown[]) => void;
    silly: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export const DRY_RUN_LOG_PREFIX = 'DRY RUN: ';

// info lines are user-facing report output and carry no level label
const lineFormat = winston.format.printf(({ level, message }) =>
    level === 'info' ? String(message) : `${level}: ${String(message)}`
);

const coreLogger = winston.createLogger({
    level: 'info',
    levels: winston.config.npm.levels,
    format: lineFormat,
    transports: [
        new winston.transports.Console({ stderrLevels: ['error', 'warn'] }),
    ],
});

export const setLogLevel = (level: LogLevel): void => {
    coreLogger.level = level;
};

export const getLogger = (): SimpleLogger => coreLogger;

/**
 * Get a logger that marks every message as a dry-run message when `isDryRun`
 * is set. Errors are never prefixed.
 */
export const getDryRunLogger = (isDryRun: boolean): SimpleLogger => {
    if (!isDryRun) {
        return coreLogger;
    }

    return {
        info: (message: string, ...args: unknown[]) => coreLogger.info(`${DRY_RUN_LOG_PREFIX}${message}`, ...args),
        warn: (message: string, ...args: unknown[]) => coreLogger.warn(`${DRY_RUN_LOG_PREFIX}${message}`, ...args),
        debug: (message: string, ...args: unknown[]) => coreLogger.debug(`${DRY_RUN_LOG_PREFIX}${message}`, ...args),
        verbose: (message: string, ...args: unknown[]) => coreLogger.verbose(`${DRY_RUN_LOG_PREFIX}${message}`, ...args),
        silly: (message: string, ...args: unknown[]) => coreLogger.silly(`${DRY_RUN_LOG_PREFIX}${message}`, ...args),
        error: (message: string, ...args: unknown[]) => coreLogger.error(message, ...args),
    };
};

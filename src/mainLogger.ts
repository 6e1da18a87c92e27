/**
 * Process Logger
 *
 * Configures electron-log (Node entry) for the whole library and hands out
 * scoped loggers, one per component. The file transport writes to the
 * default electron-log location unless a path is given.
 */

import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

export type ScopedLogger = ReturnType<typeof log.scope>;

export interface LoggerOptions {
    /** Console transport level */
    level: LogLevel;
    /** File transport level, or false to disable the log file */
    fileLevel?: LogLevel | false;
    /** Absolute path of the log file */
    filePath?: string;
}

let consoleLevel: LogLevel = 'info';

/**
 * Initialize the logger - call this once before starting the watcher
 */
export function initializeLogger(options: LoggerOptions): void {
    consoleLevel = options.level;
    log.transports.console.level = options.level;

    if (options.fileLevel !== undefined) {
        log.transports.file.level = options.fileLevel;
    }

    const filePath = options.filePath;
    if (filePath) {
        log.transports.file.resolvePathFn = () => filePath;
    }

    log.scope('Logger').debug('Initialized at level', options.level);
}

/**
 * Get a logger whose lines are tagged with the given scope
 */
export function createLogger(scope: string): ScopedLogger {
    return log.scope(scope);
}

/**
 * Enable or disable debug output on the console
 */
export function setDebugLogging(enable: boolean): void {
    const logger = log.scope('Logger');
    if (enable) {
        log.transports.console.level = 'debug';
        logger.debug('Debugging enabled');
    } else {
        logger.debug('Disabling debugging');
        log.transports.console.level = consoleLevel === 'debug' ? 'info' : consoleLevel;
    }
}

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

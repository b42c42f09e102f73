/**
 * Returns the current timestamp in ISO format.
 * @returns string - Current ISO timestamp
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Threshold names accepted from configuration. */
export type LogThreshold = `debug` | `info` | `warn` | `error`;

// lower is more verbose
const LEVEL_SEVERITY: Record<LogLevel, number> = {
    [LogLevel.Debug]: 0,
    [LogLevel.Info]: 1,
    [LogLevel.Warning]: 2,
    [LogLevel.Error]: 3,
    [LogLevel.Critical]: 4,
};

const THRESHOLD_SEVERITY: Record<LogThreshold, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let _threshold: LogThreshold = `info`;

/**
 * Sets the minimum level that reaches the console.
 * @param level LogThreshold - 'debug' | 'info' | 'warn' | 'error'
 * @example
 * SetLogLevel('debug');
 */
export function SetLogLevel(level: LogThreshold): void {
    _threshold = level;
}

/** Current threshold as configured. */
export function GetLogLevel(): LogThreshold {
    return _threshold;
}

/**
 * Logs a message at the specified log level, prepending a timestamp.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier (module or class)
 * @param context string - Optional context (mod id, file path)
 * @example
 * log(LogLevel.Info, 'Catalog scanned', 'ModCatalog');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (LEVEL_SEVERITY[level] < THRESHOLD_SEVERITY[_threshold]) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

/**
 * Level shorthands.
 */
export namespace log {
    /**
     * Logs a critical level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /**
     * Logs an error level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /**
     * Logs a warning level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /**
     * Logs an informational level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /**
     * Logs a debug level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}

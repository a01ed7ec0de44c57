/**
 * Logger Types
 *
 * Type definitions for the versioner logging system.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: Everything, including debug entries and payloads
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Severity of a single entry.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Numeric priority for entry levels, comparable with LOG_LEVEL_PRIORITY.
 */
export const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * A single log entry.
 *
 * Entries are JSON-serialized, one per line in the log file.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "message": "applying version 3",
 *     "data": { "version": 3 },
 *     "context": { "database": "app" }
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    /** Entry severity level */
    level: EntryLevel;

    /** Human-readable summary */
    message: string;

    /** Structured payload */
    data?: Record<string, unknown>;

    /** Additional context shared by every entry */
    context?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Enable logging */
    enabled: boolean;

    /** Minimum level to capture */
    level: LogLevel;

    /** Colorize console lines */
    color: boolean;

    /** Log file path. JSON lines are appended when set. */
    file?: string;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    enabled: true,
    level: 'info',
    color: false,
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'running' | 'stopped';

/**
 * Logger
 *
 * Simple stream-based logger. Writes plain (or colored) lines to a console
 * stream and JSON entries to a file stream.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     config: { level: 'verbose' },
 *     file: createWriteStream('versioner.log', { flags: 'a' }),
 * })
 *
 * logger.info('applying version 3', { version: 3 })
 * await logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { isCi } from '../environment.js';
import { formatColorLine } from './color.js';
import { formatEntry, formatLine, serializeEntry } from './formatter.js';
import type { EntryLevel, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG, ENTRY_LEVEL_PRIORITY, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every entry */
    context?: Record<string, unknown>;

    /** File stream to write JSON entries to */
    file?: Writable;

    /** Console stream to write lines to (defaults to stdout in CI mode) */
    console?: Writable;
}

/**
 * Check if an entry at `level` passes the configured verbosity.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')      // true
 * shouldLog('debug', 'info')      // false
 * shouldLog('debug', 'verbose')   // true
 * ```
 */
export function shouldLog(level: EntryLevel, configLevel: LogLevel): boolean {

    return ENTRY_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}

export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #file: Writable | null = null;
    #console: Writable | null = null;
    #state: LoggerState = 'running';

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};

        if (options.console) {

            this.#console = options.console;

        }
        else if (isCi()) {

            this.#console = process.stdout;

        }

        if (options.file) {

            this.#file = options.file;

        }

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    /**
     * Update the logging context.
     *
     * Context is included with every file entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Clear the logging context.
     */
    clearContext(): void {

        this.#context = {};

    }

    /**
     * Stop the logger and close the file stream.
     *
     * Console streams are left open; stdout and stderr are never ended.
     */
    async stop(): Promise<void> {

        if (this.#state === 'stopped') {

            return;

        }

        this.#state = 'stopped';

        const file = this.#file;
        this.#file = null;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

    }

    info(message: string, data?: Record<string, unknown>): void {

        this.log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.log('debug', message, data);

    }

    /**
     * Write an entry at `level` to every stream.
     *
     * Console lines carry data only at verbose level; file entries always do.
     */
    log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || this.#state !== 'running') {

            return;

        }

        if (!shouldLog(level, this.#config.level)) {

            return;

        }

        const entry = formatEntry(level, message, data, this.#context);

        if (this.#console) {

            const verbose = this.#config.level === 'verbose';

            const line = this.#config.color
                ? formatColorLine(level, message, verbose ? entry.data : undefined) + '\n'
                : formatLine(entry, verbose);

            this.#console.write(line);

        }

        if (this.#file) {

            this.#file.write(serializeEntry(entry));

        }

    }

}

/**
 * Log Formatter
 *
 * Builds LogEntry objects and serializes them for console and file output.
 */
import type { EntryLevel, LogEntry } from './types.js'


const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'auth']


/**
 * Format a message into a LogEntry.
 *
 * @example
 * ```typescript
 * const entry = formatEntry('info', 'applying version 3', { version: 3 }, { database: 'app' })
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     message: 'applying version 3',
 * //     data: { version: 3 },
 * //     context: { database: 'app' }
 * // }
 * ```
 */
export function formatEntry(
    level: EntryLevel,
    message: string,
    data?: Record<string, unknown>,
    context?: Record<string, unknown>,
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
    }

    if (data && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Sanitize data for logging.
 * Redacts sensitive fields and handles non-serializable values.
 */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        const lowerKey = key.toLowerCase()

        if (SENSITIVE_KEYS.some((s) => lowerKey.includes(s))) {

            result[key] = '[REDACTED]'
            continue
        }

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        try {

            JSON.stringify(value)
            result[key] = value
        }
        catch {

            result[key] = String(value)
        }
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line for file output.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}


/**
 * Format a LogEntry as a plain console line.
 *
 * Format: `[timestamp] [LEVEL] message {data}`
 */
export function formatLine(entry: LogEntry, includeData = false): string {

    const levelLabel = entry.level.toUpperCase().padEnd(5)

    let line = `[${entry.timestamp}] [${levelLabel}] ${entry.message}`

    if (includeData && entry.data) {

        line += ` ${JSON.stringify(entry.data)}`
    }

    return line + '\n'
}

/**
 * Color Formatter
 *
 * Formats log entries with ANSI colors for console output.
 * Flattens data one level deep - nested objects are stringified.
 */
import ansis from 'ansis';
import { attemptSync } from '../shared/attempt.js';

import type { EntryLevel } from './types.js';

/**
 * Hex palette, truecolor through ansis.
 */
const palette = {
    error: '#EF4444',
    warn: '#F59E0B',
    info: '#3B82F6',
    debug: '#8B5CF6',
    text: '#E5E7EB',
    muted: '#9CA3AF',
    number: '#10B981',
};

const muted = (text: string): string => ansis.hex(palette.muted)(text);
const text = (value: string): string => ansis.hex(palette.text)(value);

/**
 * Level icons and colors.
 */
const LEVEL_STYLE: Record<EntryLevel, { icon: string; color: (s: string) => string }> = {
    error: { icon: '✗', color: (s) => ansis.hex(palette.error)(s) },
    warn: { icon: '⚠', color: (s) => ansis.hex(palette.warn)(s) },
    info: { icon: '●', color: (s) => ansis.hex(palette.info)(s) },
    debug: { icon: '○', color: (s) => ansis.hex(palette.debug)(s) },
};

/**
 * Format a value for single-line display.
 */
function formatValue(value: unknown): string {

    if (value === null || value === undefined) {

        return muted(String(value));

    }

    if (typeof value === 'string') {

        return value.length > 50
            ? text(`"${value.slice(0, 47)}..."`)
            : text(value);

    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return ansis.hex(palette.number)(String(value));

    }

    if (value instanceof Error) {

        return ansis.hex(palette.error)(value.message);

    }

    const [str, error] = attemptSync(() => JSON.stringify(value));

    if (error || typeof str !== 'string') {

        return muted('[object]');

    }

    return text(str.length > 60 ? str.slice(0, 57) + '...' : str);

}

/**
 * Format a log entry as a colored line.
 *
 * Format: `[icon] message  key=value key=value ...`
 *
 * @returns Colored line string (no newline)
 */
export function formatColorLine(
    level: EntryLevel,
    message: string,
    data?: Record<string, unknown>,
): string {

    const style = LEVEL_STYLE[level];

    let line = `${style.color(style.icon)} ${text(message)}`;

    if (data && Object.keys(data).length > 0) {

        const pairs = Object.entries(data).map(([key, value]) => `${muted(key)}=${formatValue(value)}`);

        line += `  ${pairs.join(' ')}`;

    }

    return line;

}

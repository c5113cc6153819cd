/**
 * Closed time intervals used both to slice series and to parameterize the
 * correction kernel. All timestamps are UTC.
 */

import { DateTime, Duration } from 'luxon';

export interface TimeWindow {
    readonly start: DateTime;
    readonly stop: DateTime;
}

const DATE_FORMATS = ['yyyy-MM-dd', 'yyyy-MM-dd HH:mm:ss', 'yyyy-MM-dd HH:mm', 'yyyy/MM/dd'];

/**
 * Parse a date or date-time string as UTC. Accepts ISO 8601 plus
 * the space-separated forms common in CSV exports.
 * Returns null when nothing matches.
 */
export function parseTimestamp(value: string): DateTime | null {
    const trimmed = value.trim();
    if (!trimmed) return null;

    const iso = DateTime.fromISO(trimmed, { zone: 'utc' });
    if (iso.isValid) return iso;

    for (const format of DATE_FORMATS) {
        const parsed = DateTime.fromFormat(trimmed, format, { zone: 'utc' });
        if (parsed.isValid) return parsed;
    }
    return null;
}

export function makeWindow(start: DateTime, stop: DateTime): TimeWindow {
    return Object.freeze({ start, stop });
}

/**
 * [year-01-01 00:00, year-12-31 00:00]
 */
export function calendarYearWindow(year: number): TimeWindow {
    return makeWindow(
        DateTime.utc(year, 1, 1),
        DateTime.utc(year, 12, 31)
    );
}

/**
 * Move both ends of a window by the same signed duration, preserving its span.
 */
export function shiftWindow(window: TimeWindow, offset: Duration): TimeWindow {
    return makeWindow(window.start.plus(offset), window.stop.plus(offset));
}

export function formatWindow(window: TimeWindow): string {
    return `[${formatTimestamp(window.start)}, ${formatTimestamp(window.stop)}]`;
}

export function isMidnight(value: DateTime): boolean {
    const utc = value.toUTC();
    return utc.hour === 0 && utc.minute === 0 && utc.second === 0 && utc.millisecond === 0;
}

/**
 * Without an explicit `withTime`, midnight prints as a date only.
 */
export function formatTimestamp(value: DateTime, withTime: boolean = !isMidnight(value)): string {
    return value.toUTC().toFormat(withTime ? 'yyyy-MM-dd HH:mm:ss' : 'yyyy-MM-dd');
}

/**
 * Window Planner
 *
 * Splits a correction period into calendar years and gives each year the
 * historical span ("CDF window") used to estimate its correction:
 *
 *   target(y) = [y-01-01, y-12-31]
 *   cdf(y)    = [(y-h)-01-01, (y+h)-12-31]
 *
 * The CDF window is then fitted to the available raw data [D0, D1] by rigid
 * shifts, in this order:
 *   1. start < D0  -> move the whole window forward by (D0 - start)
 *   2. stop  > D1  -> move the whole window backward by (stop - D1)
 * A window longer than the data can still end up outside [D0, D1] after both
 * shifts; it is handed to the kernel as is.
 */

import { Duration } from 'luxon';
import {
    TimeWindow,
    calendarYearWindow,
    makeWindow,
    shiftWindow,
} from '../series/time-window.js';

export type ClampKind = 'none' | 'start' | 'stop' | 'both';

export interface ClampedWindow {
    window: TimeWindow;
    clamp: ClampKind;
}

export interface YearPlan {
    year: number;
    targetWindow: TimeWindow;
    unclampedCdfWindow: TimeWindow;
    cdfWindow: TimeWindow;
    clamp: ClampKind;
}

export function correctionYears(correctionWindow: TimeWindow): number[] {
    const first = correctionWindow.start.toUTC().year;
    const last = correctionWindow.stop.toUTC().year;
    const years: number[] = [];
    for (let y = first; y <= last; y++) {
        years.push(y);
    }
    return years;
}

export function targetWindow(year: number): TimeWindow {
    return calendarYearWindow(year);
}

export function rawCdfWindow(year: number, halfPeriod: number): TimeWindow {
    if (!Number.isInteger(halfPeriod) || halfPeriod < 0) {
        throw new RangeError(`CDF half period must be a non-negative integer, got ${halfPeriod}`);
    }
    return makeWindow(
        calendarYearWindow(year - halfPeriod).start,
        calendarYearWindow(year + halfPeriod).stop
    );
}

export function clampCdfWindow(window: TimeWindow, dataBounds: TimeWindow): ClampedWindow {
    let result = window;
    let startShifted = false;
    let stopShifted = false;

    const deficit = dataBounds.start.toMillis() - result.start.toMillis();
    if (deficit > 0) {
        result = shiftWindow(result, Duration.fromMillis(deficit));
        startShifted = true;
    }

    const excess = result.stop.toMillis() - dataBounds.stop.toMillis();
    if (excess > 0) {
        result = shiftWindow(result, Duration.fromMillis(-excess));
        stopShifted = true;
    }

    const clamp: ClampKind = startShifted
        ? (stopShifted ? 'both' : 'start')
        : (stopShifted ? 'stop' : 'none');
    return { window: result, clamp };
}

export function planYear(year: number, halfPeriod: number, dataBounds: TimeWindow): YearPlan {
    const unclamped = rawCdfWindow(year, halfPeriod);
    const { window, clamp } = clampCdfWindow(unclamped, dataBounds);
    return {
        year,
        targetWindow: targetWindow(year),
        unclampedCdfWindow: unclamped,
        cdfWindow: window,
        clamp,
    };
}

/**
 * One plan per calendar year of the correction window, ascending.
 */
export function planCorrectionYears(
    correctionWindow: TimeWindow,
    halfPeriod: number,
    dataBounds: TimeWindow
): YearPlan[] {
    return correctionYears(correctionWindow).map(year => planYear(year, halfPeriod, dataBounds));
}

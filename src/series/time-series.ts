/**
 * Immutable time series: strictly increasing UTC timestamps (epoch millis)
 * paired with numeric values. Every transformation returns a new series.
 */

import { DateTime } from 'luxon';
import { mean } from '../correction/stats.js';
import { SeriesFormatError } from '../errors.js';
import { TimeWindow, makeWindow } from './time-window.js';

export interface SeriesPoint {
    readonly time: DateTime;
    readonly value: number;
}

export class TimeSeries {
    private readonly times: readonly number[];
    private readonly values: readonly number[];

    private constructor(times: readonly number[], values: readonly number[]) {
        this.times = times;
        this.values = values;
    }

    /**
     * Build a series from parallel arrays of epoch millis and values.
     * Throws SeriesFormatError if lengths differ or timestamps do not
     * strictly increase.
     */
    static fromArrays(times: readonly number[], values: readonly number[]): TimeSeries {
        if (times.length !== values.length) {
            throw new SeriesFormatError(
                `Timestamp and value counts differ (${times.length} vs ${values.length})`
            );
        }
        for (let i = 1; i < times.length; i++) {
            if (times[i] <= times[i - 1]) {
                throw new SeriesFormatError(
                    `Timestamps must strictly increase: ${DateTime.fromMillis(times[i], { zone: 'utc' }).toISO()} ` +
                    `follows ${DateTime.fromMillis(times[i - 1], { zone: 'utc' }).toISO()}`
                );
            }
        }
        return new TimeSeries([...times], [...values]);
    }

    static empty(): TimeSeries {
        return new TimeSeries([], []);
    }

    /**
     * Join series end to end in the given order. Each series must start
     * after the previous one ends; no overlap resolution is attempted.
     */
    static concat(parts: ReadonlyArray<TimeSeries>): TimeSeries {
        const times: number[] = [];
        const values: number[] = [];
        for (const part of parts) {
            for (let i = 0; i < part.times.length; i++) {
                times.push(part.times[i]);
                values.push(part.values[i]);
            }
        }
        return TimeSeries.fromArrays(times, values);
    }

    get length(): number {
        return this.times.length;
    }

    get isEmpty(): boolean {
        return this.times.length === 0;
    }

    timeAt(index: number): DateTime {
        return DateTime.fromMillis(this.times[index], { zone: 'utc' });
    }

    valueAt(index: number): number {
        return this.values[index];
    }

    millisArray(): number[] {
        return [...this.times];
    }

    valueArray(): number[] {
        return [...this.values];
    }

    points(): SeriesPoint[] {
        return this.times.map((t, i) => ({
            time: DateTime.fromMillis(t, { zone: 'utc' }),
            value: this.values[i],
        }));
    }

    /**
     * First and last timestamps. Undefined for an empty series.
     */
    bounds(): TimeWindow | undefined {
        if (this.isEmpty) return undefined;
        return makeWindow(this.timeAt(0), this.timeAt(this.times.length - 1));
    }

    /**
     * Points with start <= t <= stop.
     */
    slice(window: TimeWindow): TimeSeries {
        const lo = lowerBound(this.times, window.start.toMillis());
        const hi = upperBound(this.times, window.stop.toMillis());
        if (hi <= lo) return TimeSeries.empty();
        return new TimeSeries(this.times.slice(lo, hi), this.values.slice(lo, hi));
    }

    /**
     * Same timestamps, values replaced by fn(value, index).
     */
    map(fn: (value: number, index: number) => number): TimeSeries {
        return new TimeSeries(this.times, this.values.map(fn));
    }

    copy(): TimeSeries {
        return new TimeSeries([...this.times], [...this.values]);
    }

    /**
     * Mean over the window, or the whole series. NaN when nothing falls inside.
     */
    mean(window?: TimeWindow): number {
        const target = window ? this.slice(window) : this;
        return mean(target.values);
    }
}

// First index with times[i] >= target
function lowerBound(times: readonly number[], target: number): number {
    let lo = 0;
    let hi = times.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (times[mid] < target) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}

// First index with times[i] > target
function upperBound(times: readonly number[], target: number): number {
    let lo = 0;
    let hi = times.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (times[mid] <= target) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}

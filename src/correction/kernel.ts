/**
 * Quantile-Mapping Correction Kernel
 *
 * correctSegment: for each raw value x_t in the target window,
 *
 *   u_t  = F_raw(x~_t)                      (ECDF of smoothed raw over the CDF window)
 *   m_t  = Q_ref(u_t) / Q_train(u_t)        (smoothed reference / training quantiles
 *                                            over the training window)
 *   y_t  = x_t * m_t
 *
 * meanRescale: over the full window,
 *
 *   y'_t = y_t * (refMean / trainMean) * R_t / C_t
 *
 * where R and C are centered long-window rolling means of the raw and
 * corrected series. This restores the raw series' long-term trend scaled by
 * the reference/training bias ratio.
 */

import { KernelError } from '../errors.js';
import { TimeSeries } from '../series/time-series.js';
import { TimeWindow, formatWindow } from '../series/time-window.js';
import { ecdf, quantile, rollingMean, sortedCopy } from './stats.js';

export interface SegmentRequest {
    raw: TimeSeries;
    cdfWindow: TimeWindow;
    targetWindow: TimeWindow;
    reference: TimeSeries;
    training: TimeSeries;
    trainingWindow: TimeWindow;
    nSmooth: number;
}

export interface RescaleRequest {
    raw: TimeSeries;
    corrected: TimeSeries;
    window: TimeWindow;
    referenceMean: number;
    trainingMean: number;
    nSmooth: number;
}

export interface CorrectionKernel {
    correctSegment(request: SegmentRequest): TimeSeries;
    meanRescale(request: RescaleRequest): TimeSeries;
}

// Series are immutable and the orchestrator passes the same raw, training and
// reference instances for every year, so smoothing and sorting happen once per run.
const smoothedCache = new WeakMap<TimeSeries, Map<number, TimeSeries>>();
const sortedCache = new WeakMap<TimeSeries, Map<string, readonly number[]>>();

function smooth(series: TimeSeries, width: number): TimeSeries {
    let byWidth = smoothedCache.get(series);
    if (!byWidth) {
        byWidth = new Map();
        smoothedCache.set(series, byWidth);
    }
    const cached = byWidth.get(width);
    if (cached) return cached;

    const values = rollingMean(series.valueArray(), width);
    const smoothed = series.map((_, i) => values[i]);
    byWidth.set(width, smoothed);
    return smoothed;
}

function requireSample(series: TimeSeries, window: TimeWindow, label: string): number[] {
    const sample = series.slice(window).valueArray();
    if (sample.length === 0) {
        throw new KernelError(`No ${label} data inside ${formatWindow(window)}`);
    }
    return sample;
}

function sortedSample(series: TimeSeries, window: TimeWindow, label: string): readonly number[] {
    let byWindow = sortedCache.get(series);
    if (!byWindow) {
        byWindow = new Map();
        sortedCache.set(series, byWindow);
    }
    const key = `${window.start.toMillis()}/${window.stop.toMillis()}`;
    const cached = byWindow.get(key);
    if (cached) return cached;

    const sorted = sortedCopy(requireSample(series, window, label));
    byWindow.set(key, sorted);
    return sorted;
}

export const quantileMappingKernel: CorrectionKernel = {
    correctSegment(request: SegmentRequest): TimeSeries {
        const { raw, cdfWindow, targetWindow, reference, training, trainingWindow, nSmooth } = request;

        const rawSmoothed = smooth(raw, nSmooth);
        const rawCdf = ecdf(requireSample(rawSmoothed, cdfWindow, 'raw CDF'));
        const trainingSorted = sortedSample(smooth(training, nSmooth), trainingWindow, 'training');
        const referenceSorted = sortedSample(smooth(reference, nSmooth), trainingWindow, 'reference');

        const target = raw.slice(targetWindow);
        const targetSmoothed = rawSmoothed.slice(targetWindow);

        return target.map((value, i) => {
            const u = rawCdf(targetSmoothed.valueAt(i));
            const trainingQ = quantile(trainingSorted, u);
            const referenceQ = quantile(referenceSorted, u);
            const multiplier = trainingQ === 0 ? 1 : referenceQ / trainingQ;
            return value * multiplier;
        });
    },

    meanRescale(request: RescaleRequest): TimeSeries {
        const { raw, corrected, window, referenceMean, trainingMean, nSmooth } = request;

        if (!Number.isFinite(referenceMean) || !Number.isFinite(trainingMean) || trainingMean === 0) {
            throw new KernelError(
                `Cannot rescale with reference mean ${referenceMean} and training mean ${trainingMean}`
            );
        }
        const ratio = referenceMean / trainingMean;

        const rawInWindow = raw.slice(window);
        const rawLong = rollingMean(rawInWindow.valueArray(), nSmooth);
        const rawLongByTime = new Map<number, number>();
        rawInWindow.millisArray().forEach((t, i) => rawLongByTime.set(t, rawLong[i]));

        const target = corrected.slice(window);
        const correctedLong = rollingMean(target.valueArray(), nSmooth);
        const times = target.millisArray();

        return target.map((value, i) => {
            const rawValue = rawLongByTime.get(times[i]);
            if (rawValue === undefined) {
                throw new KernelError(
                    `Corrected timestamp ${target.timeAt(i).toISO()} has no raw counterpart`
                );
            }
            // A zero long-term mean means the neighbourhood is all zero flow
            if (correctedLong[i] === 0) return value;
            return value * ratio * rawValue / correctedLong[i];
        });
    },
};

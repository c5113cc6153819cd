/**
 * Sample statistics used by the correction kernel.
 */

/**
 * Centered rolling mean. The window for index i spans
 * [i - floor(width/2), i - floor(width/2) + width - 1], clipped to the array,
 * so edges average over fewer points instead of producing gaps.
 */
export function rollingMean(values: readonly number[], width: number): number[] {
    if (!Number.isInteger(width) || width < 1) {
        throw new RangeError(`Rolling window width must be a positive integer, got ${width}`);
    }

    const n = values.length;
    const prefix = new Array<number>(n + 1);
    prefix[0] = 0;
    for (let i = 0; i < n; i++) {
        prefix[i + 1] = prefix[i] + values[i];
    }

    const half = Math.floor(width / 2);
    const out = new Array<number>(n);
    for (let i = 0; i < n; i++) {
        const lo = Math.max(0, i - half);
        const hi = Math.min(n, i - half + width);
        out[i] = (prefix[hi] - prefix[lo]) / (hi - lo);
    }
    return out;
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return Number.NaN;
    let sum = 0;
    for (const v of values) sum += v;
    return sum / values.length;
}

export function sortedCopy(values: readonly number[]): number[] {
    return [...values].sort((a, b) => a - b);
}

/**
 * Empirical CDF: F(x) = (# samples <= x) / n
 */
export function ecdf(sample: readonly number[]): (x: number) => number {
    const sorted = sortedCopy(sample);
    const n = sorted.length;
    return (x: number): number => {
        if (n === 0) return Number.NaN;
        let lo = 0;
        let hi = n;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (sorted[mid] <= x) lo = mid + 1;
            else hi = mid;
        }
        return lo / n;
    };
}

/**
 * Quantile of an ascending sample with linear interpolation between order
 * statistics: h = (n - 1) * p.
 */
export function quantile(sortedSample: readonly number[], p: number): number {
    const n = sortedSample.length;
    if (n === 0) return Number.NaN;

    const clamped = Math.min(1, Math.max(0, p));
    const h = (n - 1) * clamped;
    const lo = Math.floor(h);
    const hi = Math.min(lo + 1, n - 1);
    return sortedSample[lo] + (h - lo) * (sortedSample[hi] - sortedSample[lo]);
}

import type { LocalSlope } from '../types';
import { SLOPE_WINDOW } from '../config';
import { fitLinear } from './curveFit';

const UNDEFINED_SLOPE: LocalSlope = { slope: NaN, basis: 'none' };

const countDistinct = (values: ArrayLike<number>, start: number, end: number) => {
    const seen = new Set<number>();
    for (let i = start; i < end; i++) {
        seen.add(values[i]);
        if (seen.size >= 2) break;
    }
    return seen.size;
};

// First index whose value is closest to target.
export const nearestIndex = (values: ArrayLike<number>, target: number): number => {
    let best = -1;
    let bestDistance = Infinity;
    for (let i = 0; i < values.length; i++) {
        const distance = Math.abs(values[i] - target);
        if (distance < bestDistance) {
            best = i;
            bestDistance = distance;
        }
    }
    return best;
};

const fitSlope = (xs: Float64Array, ys: Float64Array, basis: LocalSlope['basis']): LocalSlope => {
    const fit = fitLinear(xs, ys);
    if (!fit) return UNDEFINED_SLOPE;
    return { slope: fit.slope, basis };
};

/**
 * Estimates dy/dx at x0 from a least-squares line through the samples
 * nearest to it. `xs` must be sorted ascending.
 *
 * window: `window` neighbours on each side of the nearest sample
 * full:   the whole array, when the window has no spread in x
 * none:   NaN, when even the whole array has a single x value
 */
export const estimateLocalSlope = (
    xs: Float64Array,
    ys: Float64Array,
    x0: number,
    window: number = SLOPE_WINDOW
): LocalSlope => {
    const n = Math.min(xs.length, ys.length);
    if (n < 2 || !Number.isFinite(x0)) return UNDEFINED_SLOPE;

    const idx = nearestIndex(xs.subarray(0, n), x0);
    if (idx < 0) return UNDEFINED_SLOPE;

    const reach = Math.max(0, Math.floor(window));
    const lo = Math.max(0, idx - reach);
    const hi = Math.min(n, idx + reach + 1);

    if (countDistinct(xs, lo, hi) >= 2) {
        return fitSlope(xs.subarray(lo, hi), ys.subarray(lo, hi), 'window');
    }
    if (countDistinct(xs, 0, n) >= 2) {
        return fitSlope(xs.subarray(0, n), ys.subarray(0, n), 'full');
    }
    return UNDEFINED_SLOPE;
};

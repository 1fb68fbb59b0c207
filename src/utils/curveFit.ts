import regression, { type DataPoint } from 'regression';
import type { LinearFit } from '../types';
import { formatNumber } from './format';

export const formatLineEquation = (slope: number, intercept: number): string => {
    const sign = intercept < 0 ? '-' : '+';
    return `y = ${formatNumber(slope, 4)}x ${sign} ${formatNumber(Math.abs(intercept), 4)}`;
};

// Spread of x around its mean; not finite once the sums overflow.
const varianceSum = (xs: ArrayLike<number>, n: number) => {
    let total = 0;
    for (let i = 0; i < n; i++) total += xs[i];
    const mean = total / n;

    let sxx = 0;
    for (let i = 0; i < n; i++) sxx += (xs[i] - mean) * (xs[i] - mean);
    return sxx;
};

/**
 * Least-squares fit of y = slope * x + intercept.
 *
 * Returns null for a singular system (fewer than two points or no spread
 * in x), where regression-js would report a flat line, and when the
 * coefficients overflow.
 */
export const fitLinear = (xs: ArrayLike<number>, ys: ArrayLike<number>): LinearFit | null => {
    const n = Math.min(xs.length, ys.length);
    if (n < 2) return null;
    const sxx = varianceSum(xs, n);
    if (!(Number.isFinite(sxx) && sxx > 0)) return null;

    const data: DataPoint[] = Array.from({ length: n }, (_, i) => [xs[i], ys[i]]);
    const result = regression.linear(data, { precision: 10 });
    const [slope, intercept] = result.equation;
    if (!Number.isFinite(slope) || !Number.isFinite(intercept)) return null;

    return {
        slope,
        intercept,
        // NaN for constant y
        r2: Number.isFinite(result.r2) ? result.r2 : NaN,
        equation: formatLineEquation(slope, intercept),
        predicted: Float64Array.from(result.points, (point) => point[1]),
    };
};

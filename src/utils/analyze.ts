import type { AnalysisResult, LinearFit, PlotMode, Sample, SampleSet } from '../types';
import { HIGHLIGHT_COUNT, SLOPE_WINDOW } from '../config';
import { fitLinear } from './curveFit';
import { EmptyDataError, ShapeMismatchError } from './errors';
import { pickDistinctIndices, type RandomSource } from './random';
import { estimateLocalSlope } from './slope';

export interface AnalysisOptions {
    random?: RandomSource;
    window?: number;
}

// Drops every pair where either side is NaN or infinite.
export const filterFinite = (x: ArrayLike<number>, y: ArrayLike<number>): SampleSet => {
    if (x.length !== y.length) {
        throw new ShapeMismatchError(`x and y must have the same length (got ${x.length} and ${y.length}).`);
    }

    const keep: number[] = [];
    for (let i = 0; i < x.length; i++) {
        if (Number.isFinite(x[i]) && Number.isFinite(y[i])) keep.push(i);
    }

    if (keep.length === 0) {
        throw new EmptyDataError('No valid finite data to plot.');
    }

    return {
        x: Float64Array.from(keep, (i) => x[i]),
        y: Float64Array.from(keep, (i) => y[i]),
    };
};

// Stable: equal x values keep their input order.
export const sortByX = ({ x, y }: SampleSet): SampleSet => {
    const order = Array.from({ length: x.length }, (_, i) => i).sort((a, b) => x[a] - x[b]);
    return {
        x: Float64Array.from(order, (i) => x[i]),
        y: Float64Array.from(order, (i) => y[i]),
    };
};

const mean = (values: Float64Array) => {
    let total = 0;
    for (let i = 0; i < values.length; i++) total += values[i];
    return total / values.length;
};

export const centroidOf = ({ x, y }: SampleSet): Sample => ({ x: mean(x), y: mean(y) });

/**
 * Runs one analysis pass for a draw request.
 *
 * In point mode a least-squares line is fitted and its slope is reported
 * at G. Otherwise the slope at G comes from the local estimator and may be
 * NaN. Only the highlighted samples depend on `options.random`.
 */
export const analyze = (
    x: ArrayLike<number>,
    y: ArrayLike<number>,
    mode: PlotMode,
    options: AnalysisOptions = {}
): AnalysisResult => {
    const { random = Math.random, window = SLOPE_WINDOW } = options;
    const samples = sortByX(filterFinite(x, y));

    const fit: LinearFit | null = mode === 'points' ? fitLinear(samples.x, samples.y) : null;
    const centroid = centroidOf(samples);

    const slopeAtCentroid = fit
        ? fit.slope
        : estimateLocalSlope(samples.x, samples.y, centroid.x, window).slope;

    const highlighted = pickDistinctIndices(samples.x.length, HIGHLIGHT_COUNT, random).map((i) => ({
        x: samples.x[i],
        y: samples.y[i],
    }));

    return {
        x: samples.x,
        y: samples.y,
        centroid,
        slopeAtCentroid,
        fit,
        highlighted,
    };
};

import type { ChartBounds } from '../types';

export const PLOT_MARGIN = { l: 64, r: 24, t: 64, b: 44 };

export interface PlotMapper {
    left: number;
    top: number;
    width: number;
    height: number;
    X: (x: number) => number;
    Y: (y: number) => number;
}

// Data space -> stage pixels, y growing upwards.
export const createMapper = (bounds: ChartBounds, stageWidth: number, stageHeight: number): PlotMapper => {
    const width = Math.max(1, stageWidth - PLOT_MARGIN.l - PLOT_MARGIN.r);
    const height = Math.max(1, stageHeight - PLOT_MARGIN.t - PLOT_MARGIN.b);
    const sx = width / (bounds.xMax - bounds.xMin);
    const sy = height / (bounds.yMax - bounds.yMin);

    return {
        left: PLOT_MARGIN.l,
        top: PLOT_MARGIN.t,
        width,
        height,
        X: (x) => PLOT_MARGIN.l + (x - bounds.xMin) * sx,
        Y: (y) => PLOT_MARGIN.t + height - (y - bounds.yMin) * sy,
    };
};

/** Round-number tick positions (steps of 1, 2 or 5 x 10^n) inside [min, max]. */
export const niceTicks = (min: number, max: number, target: number = 6): number[] => {
    if (!Number.isFinite(min) || !Number.isFinite(max) || !(max > min) || target < 1) return [];

    const rough = (max - min) / target;
    const magnitude = Math.pow(10, Math.floor(Math.log10(rough)));
    const residual = rough / magnitude;
    const factor = residual > 5 ? 10 : residual > 2 ? 5 : residual > 1 ? 2 : 1;
    const step = factor * magnitude;

    const ticks: number[] = [];
    for (let k = Math.ceil(min / step); k <= Math.floor(max / step); k++) {
        ticks.push(Number((k * step).toPrecision(12)));
    }
    return ticks;
};

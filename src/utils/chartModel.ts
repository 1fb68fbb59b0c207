import type { AnalysisResult, ChartBounds, ChartModel, LinearFit, PlotMode, Sample } from '../types';
import { formatNumber, formatPoint } from './format';

export const EMPTY_SLOPE = '—';

export const formatSubtitle = ({ centroid, slopeAtCentroid }: AnalysisResult): string => {
    const g = `G=${formatPoint(centroid.x, centroid.y, 4)}`;
    if (Number.isNaN(slopeAtCentroid)) return g;
    return `${g}   |   slope at G=${formatNumber(slopeAtCentroid, 4)}`;
};

export const formatStatus = ({ centroid, slopeAtCentroid }: AnalysisResult): string => {
    const slope = Number.isNaN(slopeAtCentroid) ? EMPTY_SLOPE : formatNumber(slopeAtCentroid, 6);
    return `G Point: ${formatPoint(centroid.x, centroid.y, 6)}    |    Slope at G: ${slope}`;
};

export const formatFitLabel = ({ equation, r2 }: LinearFit): string =>
    Number.isNaN(r2) ? equation : `${equation} (R² = ${formatNumber(r2, 4)})`;

const padRange = (min: number, max: number): [number, number] => {
    const padding = (max - min) * 0.1 || 1;
    return [min - padding, max + padding];
};

/** Extent of every finite coordinate, padded by 10% (or 1 for a flat range). */
export const computeBounds = (samples: Sample[]): ChartBounds => {
    let xMin = Infinity;
    let xMax = -Infinity;
    let yMin = Infinity;
    let yMax = -Infinity;

    for (const { x, y } of samples) {
        if (Number.isFinite(x)) {
            xMin = Math.min(xMin, x);
            xMax = Math.max(xMax, x);
        }
        if (Number.isFinite(y)) {
            yMin = Math.min(yMin, y);
            yMax = Math.max(yMax, y);
        }
    }

    if (xMin > xMax) [xMin, xMax] = [0, 0];
    if (yMin > yMax) [yMin, yMax] = [0, 0];

    const [x0, x1] = padRange(xMin, xMax);
    const [y0, y1] = padRange(yMin, yMax);
    return { xMin: x0, xMax: x1, yMin: y0, yMax: y1 };
};

export const buildChartModel = (result: AnalysisResult, mode: PlotMode, title: string): ChartModel => {
    const points: Sample[] = Array.from(result.x, (x, i) => ({ x, y: result.y[i] }));
    const { fit } = result;
    const fitLine = fit ? Array.from(result.x, (x, i) => ({ x, y: fit.predicted[i] })) : null;

    const highlighted = result.highlighted.map((point) => ({
        point,
        label: formatPoint(point.x, point.y, 3),
    }));

    return {
        mode,
        title,
        subtitle: formatSubtitle(result),
        status: formatStatus(result),
        points,
        fitLine,
        fitLabel: fit ? formatFitLabel(fit) : null,
        centroid: result.centroid,
        slopeAtCentroid: result.slopeAtCentroid,
        highlighted,
        bounds: computeBounds([...points, ...(fitLine ?? []), result.centroid]),
    };
};

import type { ChartModel, DrawRequest } from '../types';
import { analyze, type AnalysisOptions } from './analyze';
import { buildChartModel } from './chartModel';
import { parseDomainSpec, sampleDomain } from './domain';
import { EmptyDataError, ExpressionError } from './errors';
import { evaluate } from './expression';
import { parsePointRows } from './pointTable';

export const POINTS_TITLE = 'From x, y values';

/**
 * Runs one draw request end to end: read the input, evaluate the formula
 * if there is one, analyze, and build the render request. Every failure
 * is thrown before anything is returned.
 */
export const drawChart = (request: DrawRequest, options: AnalysisOptions = {}): ChartModel => {
    if (request.mode === 'points') {
        const { x, y } = parsePointRows(request.rows);
        if (x.length < 2) {
            throw new EmptyDataError('Please enter at least two points to draw a chart.');
        }
        return buildChartModel(analyze(x, y, 'points', options), 'points', POINTS_TITLE);
    }

    const expression = request.expression.trim();
    if (expression === '') {
        throw new ExpressionError('Please enter an equation for y in terms of x.');
    }

    const x = sampleDomain(parseDomainSpec(request.domain));
    const y = evaluate(expression, x);

    return buildChartModel(analyze(x, y, 'equation', options), 'equation', `y = ${expression}`);
};

import type { DomainFields, DomainSpec } from '../types';
import { MIN_POINT_COUNT } from '../config';
import { DomainError } from './errors';
import { parseNumber } from './pointTable';

const parseNumeric = (text: string): number => parseNumber(text) ?? NaN;

export const validateDomainSpec = (spec: DomainSpec): DomainSpec => {
    const { xMin, xMax, pointCount } = spec;
    if (!Number.isFinite(xMin) || !Number.isFinite(xMax) || !Number.isFinite(pointCount)) {
        throw new DomainError('x-range and points must be numeric.');
    }
    if (!(xMax > xMin)) {
        throw new DomainError('x max must be greater than x min.');
    }
    if (!Number.isInteger(pointCount) || pointCount < MIN_POINT_COUNT) {
        throw new DomainError(`Use at least ${MIN_POINT_COUNT} points for a meaningful curve.`);
    }
    return spec;
};

// Point counts such as "400.7" are truncated toward zero.
export const parseDomainSpec = (fields: DomainFields): DomainSpec => {
    const xMin = parseNumeric(fields.xMin);
    const xMax = parseNumeric(fields.xMax);
    const rawCount = parseNumeric(fields.pointCount);

    return validateDomainSpec({
        xMin,
        xMax,
        pointCount: Number.isFinite(rawCount) ? Math.trunc(rawCount) : rawCount,
    });
};

export const linspace = (start: number, stop: number, count: number): Float64Array => {
    const values = new Float64Array(Math.max(0, count));
    if (count < 1) return values;
    if (count === 1) {
        values[0] = start;
        return values;
    }

    const step = (stop - start) / (count - 1);
    for (let i = 0; i < count; i++) {
        values[i] = start + i * step;
    }
    values[count - 1] = stop;
    return values;
};

export const sampleDomain = (spec: DomainSpec): Float64Array => {
    const { xMin, xMax, pointCount } = validateDomainSpec(spec);
    return linspace(xMin, xMax, pointCount);
};

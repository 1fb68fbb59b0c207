import type { PointRow, SampleSet } from '../types';
import { EmptyDataError, InputError } from './errors';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// Whole-string decimal parse; "", "1e", "12abc" and "0x10" are rejected.
// nan/inf are accepted so such rows reach the finiteness filter.
export const parseNumber = (text: string): number | null => {
    const trimmed = text.trim();
    if (trimmed === '') return null;

    const special = /^([+-]?)(nan|inf|infinity)$/i.exec(trimmed);
    if (special) {
        const magnitude = special[2].toLowerCase() === 'nan' ? NaN : Infinity;
        return special[1] === '-' ? -magnitude : magnitude;
    }

    return DECIMAL.test(trimmed) ? Number(trimmed) : null;
};

/**
 * Reads the point editor. Blank rows are skipped; a row with only one side
 * filled in, or with text that is not a number, rejects the whole table.
 */
export const parsePointRows = (rows: Pick<PointRow, 'x' | 'y'>[]): SampleSet => {
    const xs: number[] = [];
    const ys: number[] = [];

    for (const row of rows) {
        const sx = row.x.trim();
        const sy = row.y.trim();
        if (sx === '' && sy === '') continue;
        if (sx === '' || sy === '') {
            throw new InputError('Each row must have both x and y values.');
        }

        const xv = parseNumber(sx);
        const yv = parseNumber(sy);
        if (xv === null || yv === null) {
            throw new InputError(`Invalid number: x='${sx}', y='${sy}'`);
        }
        xs.push(xv);
        ys.push(yv);
    }

    if (xs.length === 0) {
        throw new EmptyDataError('Please enter at least one (x, y) pair.');
    }

    return { x: Float64Array.from(xs), y: Float64Array.from(ys) };
};

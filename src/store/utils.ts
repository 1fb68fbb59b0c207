import { v4 as uuidv4 } from 'uuid';
import type { DrawRequest, PointRow } from '../types';
import { SAMPLE_POINTS } from '../config';
import type { StoreState } from './types';

export const createRow = (x: string = '', y: string = ''): PointRow => ({
    id: uuidv4(),
    x,
    y,
});

export const createBlankRows = (count: number): PointRow[] =>
    Array.from({ length: count }, () => createRow());

// Sample parabola plus a spare blank row
export const createSampleRows = (): PointRow[] => [
    ...SAMPLE_POINTS.map(([x, y]) => createRow(String(x), String(y))),
    createRow(),
];

export const toDrawRequest = (state: Pick<StoreState, 'mode' | 'rows' | 'expression' | 'domain'>): DrawRequest =>
    state.mode === 'points'
        ? { mode: 'points', rows: state.rows }
        : { mode: 'equation', expression: state.expression, domain: state.domain };

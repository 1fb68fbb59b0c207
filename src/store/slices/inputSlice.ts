import type { InputSlice, StoreSlice } from '../types';
import { DEFAULT_DOMAIN, DEFAULT_EXPRESSION, INITIAL_ROW_COUNT } from '../../config';
import { createBlankRows, createRow, createSampleRows } from '../utils';

export const createInputSlice: StoreSlice<InputSlice> = (set) => ({
    mode: 'points',
    rows: createBlankRows(INITIAL_ROW_COUNT),
    expression: DEFAULT_EXPRESSION,
    domain: { ...DEFAULT_DOMAIN },

    setMode: (mode) => set({ mode }),

    addRow: (x = '', y = '') => set((state) => ({ rows: [...state.rows, createRow(x, y)] })),

    updateRow: (id, field, value) => set((state) => ({
        rows: state.rows.map((row) => (row.id === id ? { ...row, [field]: value } : row)),
    })),

    removeRow: (id) => set((state) => ({ rows: state.rows.filter((row) => row.id !== id) })),

    clearRows: () => set({ rows: [] }),

    loadSampleRows: () => set({ rows: createSampleRows() }),

    setExpression: (expression) => set({ expression }),

    setDomainField: (field, value) => set((state) => ({ domain: { ...state.domain, [field]: value } })),
});

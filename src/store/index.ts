import { create } from 'zustand';
import type { StoreState } from './types';
import { createUISlice } from './slices/uiSlice';
import { createInputSlice } from './slices/inputSlice';
import { createChartSlice } from './slices/chartSlice';

export const useStore = create<StoreState>()((...a) => ({
    ...createUISlice(...a),
    ...createInputSlice(...a),
    ...createChartSlice(...a),
}));

export * from './types';

import type { ChartSlice, StoreSlice } from '../types';
import { EMPTY_STATUS } from '../../config';
import { drawChart } from '../../utils/draw';
import { getErrorMessage } from '../../utils/errors';
import { toDrawRequest } from '../utils';

export const createChartSlice: StoreSlice<ChartSlice> = (set, get) => ({
    chart: null,
    status: EMPTY_STATUS,

    // A failed draw keeps the previous chart and status on screen.
    drawChart: () => {
        const state = get();
        try {
            const chart = drawChart(toDrawRequest(state));
            set({ chart, status: chart.status });
        } catch (error) {
            console.error('Draw request failed', error);
            state.openModal({ type: 'alert', title: 'Error', message: getErrorMessage(error) });
        }
    },
});

import type { StateCreator } from 'zustand';
import type { ChartModel, DomainFields, PlotMode, PointRow } from '../types';

export type { ChartModel, DomainFields, PlotMode, PointRow };

export type ModalType = 'alert';

export interface ModalState {
    isOpen: boolean;
    type: ModalType;
    title?: string;
    message: string;
}

export interface UISlice {
    theme: 'light' | 'dark';
    modal: ModalState;
    toggleTheme: () => void;
    openModal: (params: Omit<ModalState, 'isOpen'>) => void;
    closeModal: () => void;
}

export interface InputSlice {
    mode: PlotMode;
    rows: PointRow[];
    expression: string;
    domain: DomainFields;
    setMode: (mode: PlotMode) => void;
    addRow: (x?: string, y?: string) => void;
    updateRow: (id: string, field: 'x' | 'y', value: string) => void;
    removeRow: (id: string) => void;
    clearRows: () => void;
    loadSampleRows: () => void;
    setExpression: (expression: string) => void;
    setDomainField: (field: keyof DomainFields, value: string) => void;
}

export interface ChartSlice {
    chart: ChartModel | null;
    status: string;
    drawChart: () => void;
}

export type StoreState = UISlice & InputSlice & ChartSlice;

export type StoreSlice<T> = StateCreator<StoreState, [], [], T>;

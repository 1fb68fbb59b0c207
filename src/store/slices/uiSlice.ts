import type { StoreSlice, UISlice } from '../types';

const THEME_KEY = 'theme';

const readInitialTheme = (): UISlice['theme'] => {
    if (typeof window === 'undefined') return 'light';
    const stored = window.localStorage.getItem(THEME_KEY);
    if (stored === 'light' || stored === 'dark') return stored;
    return window.matchMedia('(prefers-color-scheme: dark)').matches ? 'dark' : 'light';
};

export const createUISlice: StoreSlice<UISlice> = (set) => ({
    theme: readInitialTheme(),
    modal: {
        isOpen: false,
        type: 'alert',
        message: '',
    },

    toggleTheme: () => set((state) => {
        const newTheme = state.theme === 'light' ? 'dark' : 'light';
        if (typeof window !== 'undefined') window.localStorage.setItem(THEME_KEY, newTheme);
        return { theme: newTheme };
    }),

    openModal: (params) => set({ modal: { ...params, isOpen: true } }),
    closeModal: () => set({ modal: { isOpen: false, type: 'alert', message: '' } }),
});

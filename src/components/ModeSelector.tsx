import React from 'react';
import { clsx } from 'clsx';
import { Spline, Table, type LucideIcon } from 'lucide-react';
import { useStore } from '../store';
import type { PlotMode } from '../types';

const MODES: { value: PlotMode; label: string; Icon: LucideIcon }[] = [
    { value: 'points', label: 'Using x, y values', Icon: Table },
    { value: 'equation', label: 'Using Equation', Icon: Spline },
];

export const ModeSelector: React.FC = () => {
    const { mode, setMode } = useStore();

    return (
        <div className="grid grid-cols-2 gap-1 p-1 rounded-lg bg-slate-200 dark:bg-slate-800">
            {MODES.map(({ value, label, Icon }) => (
                <button
                    key={value}
                    onClick={() => setMode(value)}
                    className={clsx(
                        'flex items-center justify-center gap-2 px-3 py-1.5 rounded-md text-sm font-medium transition-colors',
                        mode === value
                            ? 'bg-white dark:bg-slate-700 text-blue-700 dark:text-blue-300 shadow-sm'
                            : 'text-slate-600 dark:text-slate-400 hover:text-slate-800'
                    )}
                >
                    <Icon className="w-4 h-4" />
                    {label}
                </button>
            ))}
        </div>
    );
};

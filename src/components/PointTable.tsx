import React from 'react';
import { Plus, Trash2, X, Sparkles } from 'lucide-react';
import { useAutoAnimate } from '@formkit/auto-animate/react';
import { useStore } from '../store';

const inputClass =
    'w-full rounded border border-slate-300 dark:border-slate-600 bg-white dark:bg-slate-900 px-2 py-1 text-sm focus:border-blue-500 focus:ring-1 focus:ring-blue-500 outline-none';

export const PointTable: React.FC = () => {
    const { rows, addRow, updateRow, removeRow, clearRows, loadSampleRows } = useStore();
    const [parent] = useAutoAnimate();

    return (
        <div className="flex flex-col gap-2 min-h-0">
            <p className="text-xs text-slate-500">Enter data points below. Add rows as needed.</p>

            <div className="grid grid-cols-[1fr_1fr_2rem] gap-2 px-1 text-xs font-semibold text-slate-500 uppercase">
                <span>x</span>
                <span>y</span>
                <span />
            </div>

            <div ref={parent} className="flex flex-col gap-1 max-h-72 overflow-y-auto px-1">
                {rows.map((row) => (
                    <div key={row.id} className="grid grid-cols-[1fr_1fr_2rem] gap-2 items-center">
                        <input
                            aria-label="x value"
                            value={row.x}
                            onChange={(e) => updateRow(row.id, 'x', e.target.value)}
                            className={inputClass}
                        />
                        <input
                            aria-label="y value"
                            value={row.y}
                            onChange={(e) => updateRow(row.id, 'y', e.target.value)}
                            className={inputClass}
                        />
                        <button
                            onClick={() => removeRow(row.id)}
                            className="p-1 text-slate-400 hover:text-red-500"
                            title="Remove row"
                        >
                            <X className="w-4 h-4" />
                        </button>
                    </div>
                ))}
            </div>

            <div className="grid grid-cols-3 gap-2">
                <button onClick={() => addRow()} className="flex items-center justify-center gap-1 px-2 py-1.5 text-sm rounded bg-slate-200 dark:bg-slate-700 hover:bg-slate-300">
                    <Plus className="w-4 h-4" /> Add row
                </button>
                <button onClick={clearRows} className="flex items-center justify-center gap-1 px-2 py-1.5 text-sm rounded bg-slate-200 dark:bg-slate-700 hover:bg-slate-300">
                    <Trash2 className="w-4 h-4" /> Clear
                </button>
                <button onClick={loadSampleRows} className="flex items-center justify-center gap-1 px-2 py-1.5 text-sm rounded bg-slate-200 dark:bg-slate-700 hover:bg-slate-300">
                    <Sparkles className="w-4 h-4" /> Load sample
                </button>
            </div>
        </div>
    );
};

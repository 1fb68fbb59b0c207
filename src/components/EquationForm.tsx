import React from 'react';
import { useStore } from '../store';
import type { DomainFields } from '../types';
import { SUPPORTED_NAMES } from '../utils/expression';

const inputClass =
    'w-full rounded border border-slate-300 dark:border-slate-600 bg-white dark:bg-slate-900 px-2 py-1 text-sm focus:border-blue-500 focus:ring-1 focus:ring-blue-500 outline-none';

const DOMAIN_FIELDS: { field: keyof DomainFields; label: string }[] = [
    { field: 'xMin', label: 'x min' },
    { field: 'xMax', label: 'x max' },
    { field: 'pointCount', label: 'points' },
];

export const EquationForm: React.FC = () => {
    const { expression, domain, setExpression, setDomainField } = useStore();

    return (
        <div className="flex flex-col gap-3">
            <label htmlFor="equation" className="text-xs text-slate-500">
                Enter equation for y in terms of x:
            </label>
            <div className="flex items-center gap-2">
                <span className="text-sm font-medium">y =</span>
                <input
                    id="equation"
                    value={expression}
                    onChange={(e) => setExpression(e.target.value)}
                    placeholder="e.g., sin(x) + 0.5*x^2"
                    className={inputClass}
                />
            </div>

            <p className="text-[11px] text-slate-400 leading-snug">
                Available: {SUPPORTED_NAMES.join(', ')}. Use ^ or ** for powers.
            </p>

            <div className="grid grid-cols-3 gap-2">
                {DOMAIN_FIELDS.map(({ field, label }) => (
                    <label key={field} className="flex flex-col gap-1 text-xs text-slate-500">
                        {label}
                        <input
                            value={domain[field]}
                            onChange={(e) => setDomainField(field, e.target.value)}
                            className={inputClass}
                        />
                    </label>
                ))}
            </div>
        </div>
    );
};

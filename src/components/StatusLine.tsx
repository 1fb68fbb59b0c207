import React from 'react';
import { useStore } from '../store';

export const StatusLine: React.FC = () => {
    const status = useStore((state) => state.status);
    return <p className="text-xs font-mono text-slate-600 dark:text-slate-300 whitespace-pre">{status}</p>;
};

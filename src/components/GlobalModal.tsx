import React, { useEffect, useRef } from 'react';
import { useStore } from '../store';
import { AlertTriangle } from 'lucide-react';

// Single error surface for failed draw requests.
export const GlobalModal: React.FC = () => {
    const { modal, closeModal } = useStore();
    const buttonRef = useRef<HTMLButtonElement>(null);

    useEffect(() => {
        if (modal.isOpen) {
            setTimeout(() => buttonRef.current?.focus(), 50);
        }
    }, [modal.isOpen]);

    if (!modal.isOpen) return null;

    const handleKeyDown = (e: React.KeyboardEvent) => {
        if (e.key === 'Enter' || e.key === 'Escape') {
            e.preventDefault();
            closeModal();
        }
    };

    return (
        <div className="fixed inset-0 z-[100] flex items-center justify-center p-4">
            {/* Backdrop */}
            <div
                className="absolute inset-0 bg-black/60 backdrop-blur-sm transition-opacity"
                onClick={closeModal}
            />

            <div
                role="alertdialog"
                className="relative bg-white dark:bg-slate-800 rounded-xl shadow-2xl border border-slate-200 dark:border-slate-700 w-full max-w-sm overflow-hidden"
                onKeyDown={handleKeyDown}
            >
                <div className="p-6">
                    <div className="flex items-start gap-4">
                        <div className="p-3 rounded-full shrink-0 bg-yellow-100 dark:bg-yellow-900/30">
                            <AlertTriangle className="w-6 h-6 text-yellow-500" />
                        </div>
                        <div className="flex-1">
                            <h3 className="text-lg font-semibold text-slate-900 dark:text-slate-100 mb-2">
                                {modal.title || 'Alert'}
                            </h3>
                            <p className="text-slate-600 dark:text-slate-300 mb-4 leading-relaxed break-words">
                                {modal.message}
                            </p>
                        </div>
                    </div>

                    <div className="flex justify-end gap-3 mt-2">
                        <button
                            ref={buttonRef}
                            onClick={closeModal}
                            className="px-4 py-2 text-sm font-medium text-white rounded-lg focus:outline-none focus:ring-2 focus:ring-offset-2 transition-colors bg-yellow-600 hover:bg-yellow-700 focus:ring-yellow-500"
                        >
                            OK
                        </button>
                    </div>
                </div>
            </div>
        </div>
    );
};

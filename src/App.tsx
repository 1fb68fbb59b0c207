import { useEffect } from 'react';
import { Activity, Moon, Sun } from 'lucide-react';
import { useStore } from './store';
import { MainLayout } from './components/Layout/MainLayout';
import { ModeSelector } from './components/ModeSelector';
import { PointTable } from './components/PointTable';
import { EquationForm } from './components/EquationForm';
import { StatusLine } from './components/StatusLine';
import { ChartCanvas } from './components/ChartCanvas';
import { GlobalModal } from './components/GlobalModal';

export default function App() {
  const { mode, theme, toggleTheme, drawChart } = useStore();

  useEffect(() => {
    document.documentElement.classList.toggle('dark', theme === 'dark');
  }, [theme]);

  return (
    <MainLayout>
      <aside className="w-[380px] shrink-0 flex flex-col gap-4 p-4 bg-white dark:bg-slate-900 border-r border-slate-200 dark:border-slate-800 text-slate-800 dark:text-slate-100">
        <header className="flex items-center justify-between">
          <h1 className="text-lg font-bold">Graph Explorer</h1>
          <button
            onClick={toggleTheme}
            className="p-2 rounded-lg text-slate-500 hover:bg-slate-100 dark:hover:bg-slate-800"
            title="Toggle theme"
          >
            {theme === 'dark' ? <Sun className="w-4 h-4" /> : <Moon className="w-4 h-4" />}
          </button>
        </header>

        <ModeSelector />

        <section className="flex-1 min-h-0 rounded-lg border border-slate-200 dark:border-slate-700 p-3">
          {mode === 'points' ? <PointTable /> : <EquationForm />}
        </section>

        <button
          onClick={drawChart}
          className="flex items-center justify-center gap-2 px-4 py-2 text-sm font-medium text-white bg-blue-600 rounded-lg hover:bg-blue-700 shadow-sm"
        >
          <Activity className="w-4 h-4" />
          Draw the Chart
        </button>

        <StatusLine />

        <footer className="text-[10px] text-slate-400">v{__APP_VERSION__}</footer>
      </aside>

      <main className="flex-1 flex flex-col min-w-0 p-2 bg-white dark:bg-slate-950">
        <ChartCanvas />
      </main>

      <GlobalModal />
    </MainLayout>
  );
}

import { useCallback, useState } from 'react';
import { useTranslation } from 'react-i18next';
import { useSearchParams } from 'react-router-dom';
import { AlertTriangle, CheckCircle2, Info } from 'lucide-react';
import { Sidebar } from '../components/layout/Sidebar';
import { ReportSkeleton } from '../components/ui/Skeleton';
import { FailurePanel } from '../components/report/FailurePanel';
import { RepoTable } from '../components/report/RepoTable';
import { SummaryMetrics } from '../components/report/SummaryMetrics';
import { ChartCard } from '../components/charts/ChartCard';
import { CreationTrendChart } from '../components/charts/CreationTrendChart';
import { LanguageTrendsChart } from '../components/charts/LanguageTrendsChart';
import { TimeSeriesChart } from '../components/charts/TimeSeriesChart';
import { useConfig } from '../contexts/ConfigContext';
import { useRepoAnalysis } from '../hooks/useRepoAnalysis';
import { readSearchForm, toSearchForm } from '../lib/searchForm';
import type { AnalysisReport, SearchParams } from '../types';

// ============================================================================
// Sub Components
// ============================================================================

const Divider = () => <hr className="border-border-light" />;

const ReportView = ({ report }: { report: AnalysisReport }) => {
  const { t } = useTranslation();
  const { rows, stats, charts, params } = report;

  return (
    <div className="space-y-8">
      <div className="flex items-center gap-2 rounded-lg border border-green-200 bg-green-50 px-4 py-3 text-sm text-green-800">
        <CheckCircle2 className="h-4 w-4" />
        {t('dashboard.success', { count: rows.length })}
      </div>

      <section>
        <h2 className="text-lg font-semibold text-text-main mb-4">{t('metrics.heading')}</h2>
        <SummaryMetrics stats={stats} />
      </section>

      <Divider />

      <section>
        <h2 className="text-lg font-semibold text-text-main">{t('table.heading')}</h2>
        <p className="text-sm text-text-muted mt-1 mb-4">
          {t('table.caption', { count: rows.length, sort: t(`form.sort.${params.sort}`) })}
        </p>
        <RepoTable rows={rows} />
      </section>

      <Divider />

      <section className="space-y-6">
        <h2 className="text-lg font-semibold text-text-main">{t('charts.heading')}</h2>
        <div className="grid grid-cols-1 xl:grid-cols-2 gap-6">
          <ChartCard heading={t('charts.languages')} title={charts.languages.title}>
            <LanguageTrendsChart spec={charts.languages} />
          </ChartCard>
          <ChartCard heading={t('charts.creation')} title={charts.creation.title}>
            <CreationTrendChart spec={charts.creation} />
          </ChartCard>
        </div>
        <ChartCard heading={t('charts.time_series')} title={charts.timeSeries.title}>
          <TimeSeriesChart spec={charts.timeSeries} />
        </ChartCard>
      </section>
    </div>
  );
};

// ============================================================================
// Page
// ============================================================================

const Dashboard = () => {
  const { t } = useTranslation();
  const { config, client } = useConfig();
  const { state, analyze, reset } = useRepoAnalysis(config, client);
  const [searchParams, setSearchParams] = useSearchParams();
  const [form, setForm] = useState<SearchParams>(() => readSearchForm(searchParams));

  const handleParamsChange = useCallback(
    (next: SearchParams) => {
      setForm(next);
      setSearchParams(toSearchForm(next), { replace: true });
    },
    [setSearchParams]
  );

  const handleAnalyze = useCallback(() => {
    void analyze(form);
  }, [analyze, form]);

  return (
    <div className="flex min-h-screen bg-bg-main text-text-main">
      <Sidebar
        params={form}
        onParamsChange={handleParamsChange}
        onAnalyze={handleAnalyze}
        isRunning={state.status === 'fetching'}
      />

      <main className="flex-1 flex flex-col min-w-0" style={{ marginLeft: 'var(--sidebar-width)' }}>
        <header className="flex items-center h-14 px-8 border-b border-border-light sticky top-0 bg-bg-main/95 backdrop-blur-sm z-40">
          <div className="flex items-center gap-3 select-none">
            <h1 className="text-base font-semibold text-text-main tracking-tight">{t('dashboard.title')}</h1>
            <div className="h-4 w-[1px] bg-border-light mx-1" />
            <span className="text-sm text-text-muted">{t('app.subtitle')}</span>
          </div>
        </header>

        <section className="flex-1 p-8 max-w-6xl w-full space-y-6">
          {!config.githubToken && (
            <div
              role="status"
              className="flex items-start gap-2 rounded-lg border border-amber-200 bg-amber-50 px-4 py-3 text-sm text-amber-800"
            >
              <AlertTriangle className="h-4 w-4 mt-0.5 flex-shrink-0" />
              {t('dashboard.token_missing')}
            </div>
          )}

          {state.status === 'idle' && (
            <p className="text-sm text-text-muted">{t('dashboard.idle_hint')}</p>
          )}

          {state.status === 'fetching' && <ReportSkeleton />}

          {state.status === 'empty' && (
            <div className="flex items-center gap-2 rounded-lg border border-blue-200 bg-blue-50 px-4 py-3 text-sm text-blue-800">
              <Info className="h-4 w-4" />
              {t('dashboard.empty', { query: state.params.query })}
            </div>
          )}

          {state.status === 'failed' && <FailurePanel failure={state.failure} onDismiss={reset} />}

          {state.status === 'analyzed' && <ReportView report={state.report} />}
        </section>
      </main>
    </div>
  );
};

export default Dashboard;

import React from 'react';
import { useTranslation } from 'react-i18next';
import { formatCount, formatMean } from '../../lib/format';
import type { SummaryStats } from '../../types';

const MetricCard: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <div className="bg-white p-5 rounded-lg border border-border-light shadow-sm">
    <div className="text-xs font-medium text-text-muted">{label}</div>
    <div className="mt-2 text-2xl font-semibold text-text-main tabular-nums" data-testid={`metric-${label}`}>
      {value}
    </div>
  </div>
);

export const SummaryMetrics: React.FC<{ stats: SummaryStats }> = ({ stats }) => {
  const { t } = useTranslation();

  return (
    <div className="space-y-6">
      <div>
        <h4 className="text-sm font-semibold text-text-muted mb-3">{t('metrics.raw_heading')}</h4>
        <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
          <MetricCard label={t('metrics.avg_stars')} value={formatMean(stats.avgStars, 1)} />
          <MetricCard label={t('metrics.avg_forks')} value={formatMean(stats.avgForks, 1)} />
          <MetricCard label={t('metrics.avg_watchers')} value={formatMean(stats.avgWatchers, 1)} />
        </div>
      </div>

      <div>
        <h4 className="text-sm font-semibold text-text-muted mb-3">{t('metrics.log_heading')}</h4>
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          <MetricCard label={t('metrics.log_stars_mean')} value={formatMean(stats.avgLogStars, 2)} />
          <MetricCard label={t('metrics.equivalent_stars')} value={formatCount(stats.equivalentStars)} />
        </div>
      </div>
    </div>
  );
};

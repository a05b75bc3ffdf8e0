import React from 'react';
import { useTranslation } from 'react-i18next';
import { clsx } from 'clsx';
import { Loader2 } from 'lucide-react';

// ============================================================================
// Base Skeleton Component
// ============================================================================

interface SkeletonProps {
  className?: string;
  animate?: boolean;
  style?: React.CSSProperties;
}

export const Skeleton: React.FC<SkeletonProps> = ({ className, animate = true, style }) => (
  <div
    style={style}
    className={clsx('bg-gray-200 rounded', animate && 'animate-pulse', className)}
  />
);

// ============================================================================
// Metric Card Skeleton
// ============================================================================

export const MetricCardSkeleton: React.FC = () => (
  <div className="bg-white p-5 rounded-lg border border-border-light shadow-sm">
    <Skeleton className="h-4 w-24 mb-3" />
    <Skeleton className="h-8 w-16" />
  </div>
);

// ============================================================================
// Report Skeleton
// ============================================================================

const BAR_HEIGHTS = [35, 80, 55, 90, 40, 65, 25, 70, 50, 60];

export const ReportSkeleton: React.FC = () => {
  const { t } = useTranslation();

  return (
    <div className="space-y-8" aria-busy="true">
      <div className="inline-flex items-center gap-2 px-4 py-2 bg-white rounded-lg shadow-sm border border-border-light">
        <Loader2 className="w-4 h-4 animate-spin text-action-primary" />
        <span className="text-sm text-text-muted">{t('dashboard.fetching')}</span>
      </div>

      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        {[0, 1, 2].map((i) => (
          <MetricCardSkeleton key={i} />
        ))}
      </div>

      <div className="bg-white rounded-lg border border-border-light shadow-sm p-4 space-y-3">
        {[0, 1, 2, 3, 4].map((i) => (
          <Skeleton key={i} className="h-4 w-full" />
        ))}
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        {[0, 1].map((chart) => (
          <div key={chart} className="bg-white p-6 rounded-lg border border-border-light shadow-sm">
            <Skeleton className="h-5 w-40 mb-6" />
            <div className="flex items-end gap-1 h-32">
              {BAR_HEIGHTS.map((height, i) => (
                <div key={i} className="flex-1 h-full flex items-end">
                  <Skeleton className="w-full rounded-t" style={{ height: `${height}%` }} />
                </div>
              ))}
            </div>
          </div>
        ))}
      </div>
    </div>
  );
};

import React from 'react';
import { AlertTriangle, X } from 'lucide-react';
import { useTranslation } from 'react-i18next';
import type { RunFailure } from '../../lib/errors';

interface FailurePanelProps {
  failure: RunFailure;
  onDismiss: () => void;
}

export const FailurePanel: React.FC<FailurePanelProps> = ({ failure, onDismiss }) => {
  const { t } = useTranslation();

  return (
    <div role="alert" className="rounded-lg border border-red-200 bg-red-50 p-4 text-sm text-red-800">
      <div className="flex items-start gap-3">
        <AlertTriangle className="h-5 w-5 flex-shrink-0 mt-0.5" />
        <div className="flex-1 min-w-0">
          <div className="font-semibold">
            {t('errors.title')}: {t(`errors.${failure.kind}`)}
            {failure.kind === 'api' && (
              <span className="ml-2 font-mono text-xs">{t('errors.status', { status: failure.status })}</span>
            )}
          </div>
          <p className="mt-1 break-words">{failure.message}</p>
        </div>
        <button
          type="button"
          onClick={onDismiss}
          aria-label={t('dashboard.clear')}
          className="text-red-700 hover:text-red-900"
        >
          <X className="h-4 w-4" />
        </button>
      </div>
    </div>
  );
};

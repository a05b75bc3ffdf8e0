import React from 'react';
import { AlertOctagon } from 'lucide-react';
import { useTranslation } from 'react-i18next';

const FatalErrorPanel: React.FC<{ error: Error; onReset: () => void }> = ({ error, onReset }) => {
  const { t } = useTranslation();

  return (
    <div role="alert" className="flex min-h-screen items-center justify-center bg-bg-main p-8">
      <div className="max-w-lg w-full bg-white rounded-lg border border-red-200 shadow-sm p-6">
        <div className="flex items-center gap-2 text-red-700">
          <AlertOctagon className="h-5 w-5" />
          <h2 className="text-base font-semibold">{t('errors.fatal_title')}</h2>
        </div>
        <p className="mt-2 text-sm text-text-muted">{t('errors.fatal_hint')}</p>
        <pre className="mt-4 text-xs bg-bg-sidebar rounded-md p-3 whitespace-pre-wrap break-words text-text-main">
          {error.message}
        </pre>
        <button
          type="button"
          onClick={onReset}
          className="mt-4 h-9 px-4 rounded-md text-sm font-medium bg-black text-white hover:bg-gray-800"
        >
          {t('errors.try_again')}
        </button>
      </div>
    </div>
  );
};

interface ErrorBoundaryProps {
  children: React.ReactNode;
}

interface ErrorBoundaryState {
  error: Error | null;
}

/** Catches failures a run cannot recover from and remounts its children on reset. */
export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo) {
    console.error('[analysis] unrecoverable error:', error, info.componentStack);
  }

  private handleReset = () => {
    this.setState({ error: null });
  };

  render() {
    const { error } = this.state;
    if (error) {
      return <FatalErrorPanel error={error} onReset={this.handleReset} />;
    }
    return this.props.children;
  }
}

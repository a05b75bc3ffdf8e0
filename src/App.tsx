import { Suspense, lazy } from 'react';
import { BrowserRouter as Router, Routes, Route, Navigate } from 'react-router-dom';
import type { AxiosInstance } from 'axios';
import { ConfigProvider } from './contexts/ConfigContext';
import { ErrorBoundary } from './components/ui/ErrorBoundary';
import type { AppConfig } from './config/env';

const Dashboard = lazy(() => import('./pages/Dashboard'));

export const AppRoutes = () => (
  <div className="min-h-screen bg-bg-main text-text-main font-sans selection:bg-action-primary/20">
    <ErrorBoundary>
      <Suspense
        fallback={
          <div className="flex min-h-screen items-center justify-center text-sm text-text-muted">Loading...</div>
        }
      >
        <Routes>
          <Route path="/" element={<Dashboard />} />
          <Route path="*" element={<Navigate to="/" replace />} />
        </Routes>
      </Suspense>
    </ErrorBoundary>
  </div>
);

interface AppProps {
  config: AppConfig;
  client?: AxiosInstance;
}

function App({ config, client }: AppProps) {
  return (
    <ConfigProvider config={config} client={client}>
      <Router>
        <AppRoutes />
      </Router>
    </ConfigProvider>
  );
}

export default App;

import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import { loadConfig } from './config/env';
import './i18n';
import './index.css';

const config = loadConfig();
if (!config.githubToken) {
  console.warn('[config] VITE_GITHUB_TOKEN not found; analysis is disabled until it is set.');
}

const container = document.getElementById('root');
if (!container) {
  throw new Error('Root element #root not found');
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <App config={config} />
  </React.StrictMode>
);

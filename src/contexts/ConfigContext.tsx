import React, { createContext, useContext, useMemo } from 'react';
import type { AxiosInstance } from 'axios';
import type { AppConfig } from '../config/env';

interface ConfigContextValue {
  config: AppConfig;
  /** Replaces the GitHub client built from `config`; used to stub the API */
  client?: AxiosInstance;
}

const ConfigContext = createContext<ConfigContextValue | null>(null);

export const ConfigProvider: React.FC<{
  config: AppConfig;
  client?: AxiosInstance;
  children: React.ReactNode;
}> = ({ config, client, children }) => {
  const value = useMemo(() => ({ config, client }), [config, client]);
  return <ConfigContext.Provider value={value}>{children}</ConfigContext.Provider>;
};

export const useConfig = (): ConfigContextValue => {
  const context = useContext(ConfigContext);
  if (!context) {
    throw new Error('useConfig must be used within ConfigProvider');
  }
  return context;
};

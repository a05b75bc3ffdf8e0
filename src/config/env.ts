export interface AppConfig {
  readonly githubToken: string | null;
  readonly apiBaseUrl: string;
  readonly requestTimeoutMs: number;
}

export interface EnvSource {
  VITE_GITHUB_TOKEN?: string;
  VITE_GITHUB_API_URL?: string;
}

export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const REQUEST_TIMEOUT_MS = 15_000;

/**
 * Read configuration from Vite's env (populated from `.env` or the process environment).
 * Called once at startup; the result is frozen.
 */
export const loadConfig = (env: EnvSource = import.meta.env): AppConfig => {
  const token = env.VITE_GITHUB_TOKEN?.trim();
  const apiBaseUrl = env.VITE_GITHUB_API_URL?.trim().replace(/\/+$/, '');

  return Object.freeze({
    githubToken: token ? token : null,
    apiBaseUrl: apiBaseUrl || DEFAULT_API_BASE_URL,
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
  });
};

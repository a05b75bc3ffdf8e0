import axios from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';
import type { AppConfig } from '../config/env';
import type { RawRepoRecord } from '../types';

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  githubToken: 'test-token',
  apiBaseUrl: 'https://api.github.test',
  requestTimeoutMs: 15_000,
  ...overrides,
});

export const rawRepo = (overrides: Partial<RawRepoRecord> = {}): RawRepoRecord => ({
  full_name: 'octo/alpha',
  stargazers_count: 0,
  forks_count: 0,
  watchers_count: 0,
  language: 'TypeScript',
  created_at: '2020-01-01T00:00:00Z',
  ...overrides,
});

/** The two-record sample used across suites: one unnamed-language repo and one Go repo. */
export const sampleRecords = (): RawRepoRecord[] => [
  rawRepo({
    full_name: 'octo/alpha',
    stargazers_count: 150,
    forks_count: 10,
    watchers_count: 150,
    language: null,
    created_at: '2020-01-01T00:00:00Z',
  }),
  rawRepo({
    full_name: 'octo/beta',
    stargazers_count: 5,
    forks_count: 0,
    watchers_count: 5,
    language: 'Go',
    created_at: '2021-06-15T00:00:00Z',
  }),
];

interface StubReply {
  status: number;
  data: unknown;
}

/**
 * Axios instance whose adapter answers in process.
 * `respond` may throw to simulate a transport failure.
 */
export const stubClient = (respond: (config: InternalAxiosRequestConfig) => StubReply) => {
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const { status, data } = respond(config);
    return { status, statusText: String(status), data, headers: {}, config };
  });

  return { client: axios.create({ adapter }), adapter };
};

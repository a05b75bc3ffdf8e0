import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { AppConfig } from '../config/env';

/**
 * Axios instance bound to the GitHub REST API.
 * Status codes are checked by the callers, so no response is rejected by axios itself.
 */
export const createGithubClient = (config: AppConfig, token: string): AxiosInstance =>
  axios.create({
    baseURL: config.apiBaseUrl,
    timeout: config.requestTimeoutMs,
    headers: {
      Accept: 'application/vnd.github+json',
      Authorization: `token ${token}`,
    },
    validateStatus: () => true,
  });

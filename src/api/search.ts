import { isAxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { createGithubClient } from './client';
import type { AppConfig } from '../config/env';
import {
  ApiError,
  DEFAULT_API_ERROR_MESSAGE,
  MalformedPayloadError,
  MissingCredentialError,
  NetworkError,
  TimeoutError,
} from '../lib/errors';
import type { RawRepoRecord, SearchParams } from '../types';

export const MAX_PER_PAGE = 100;

const countSchema = z.number().int().nonnegative().nullish();

const repoItemSchema = z.object({
  full_name: z.string(),
  stargazers_count: countSchema,
  forks_count: countSchema,
  watchers_count: countSchema,
  language: z.string().nullish(),
  created_at: z.string(),
});

const searchResponseSchema = z.object({
  total_count: z.number().optional(),
  items: z.array(repoItemSchema),
});

const errorBodySchema = z.object({ message: z.string().min(1) });

export interface SearchOptions {
  config: AppConfig;
  /** Overrides the default GitHub client, e.g. with a stub adapter in tests */
  client?: AxiosInstance;
}

export const clampLimit = (limit: number): number => {
  if (!Number.isFinite(limit)) return 1;
  return Math.min(MAX_PER_PAGE, Math.max(1, Math.trunc(limit)));
};

const extractErrorMessage = (data: unknown): string => {
  const parsed = errorBodySchema.safeParse(data);
  return parsed.success ? parsed.data.message : DEFAULT_API_ERROR_MESSAGE;
};

/**
 * Run one repository search and return at most `params.limit` raw items.
 * A single page is requested; nothing is retried or cached.
 */
export const searchRepositories = async (
  params: SearchParams,
  { config, client }: SearchOptions
): Promise<RawRepoRecord[]> => {
  const token = config.githubToken;
  if (!token) {
    throw new MissingCredentialError();
  }

  const http = client ?? createGithubClient(config, token);
  const limit = clampLimit(params.limit);

  let response: AxiosResponse<unknown>;
  try {
    response = await http.get<unknown>('/search/repositories', {
      params: {
        q: params.query,
        sort: params.sort,
        order: params.order,
        per_page: limit,
      },
      validateStatus: () => true,
    });
  } catch (error) {
    if (isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
      throw new TimeoutError(config.requestTimeoutMs);
    }
    const reason = error instanceof Error ? error.message : String(error);
    console.warn('[search] request failed:', reason);
    throw new NetworkError(`Could not reach GitHub: ${reason}`);
  }

  if (response.status !== 200) {
    throw new ApiError(response.status, extractErrorMessage(response.data));
  }

  const body = searchResponseSchema.safeParse(response.data);
  if (!body.success) {
    throw new MalformedPayloadError(
      `Unexpected search response: ${body.error.issues[0]?.message ?? 'invalid body'}`
    );
  }

  return body.data.items.slice(0, limit);
};

import { AxiosError } from 'axios';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createGithubClient } from '../api/client';
import { clampLimit, searchRepositories } from '../api/search';
import {
  ApiError,
  MalformedPayloadError,
  MissingCredentialError,
  NetworkError,
  TimeoutError,
} from '../lib/errors';
import type { SearchParams } from '../types';
import { rawRepo, stubClient, testConfig } from './fixtures';

const params: SearchParams = { query: 'language:Go', sort: 'stars', order: 'desc', limit: 3 };

const items = (count: number) =>
  Array.from({ length: count }, (_, i) => rawRepo({ full_name: `octo/repo-${i}` }));

describe('createGithubClient', () => {
  it('sends the token and applies the configured timeout', () => {
    const client = createGithubClient(testConfig(), 'test-token');

    expect(client.defaults.baseURL).toBe('https://api.github.test');
    expect(client.defaults.timeout).toBe(15_000);
    expect(client.defaults.headers.Authorization).toBe('token test-token');
  });
});

describe('searchRepositories', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('fails without a token and makes no request', async () => {
    const { client, adapter } = stubClient(() => ({ status: 200, data: { items: [] } }));

    await expect(
      searchRepositories(params, { config: testConfig({ githubToken: null }), client })
    ).rejects.toBeInstanceOf(MissingCredentialError);
    expect(adapter).not.toHaveBeenCalled();
  });

  it('queries the search endpoint with the paging parameters', async () => {
    const { client, adapter } = stubClient(() => ({ status: 200, data: { items: items(3) } }));

    await searchRepositories(params, { config: testConfig(), client });

    expect(adapter).toHaveBeenCalledTimes(1);
    const request = adapter.mock.calls[0][0];
    expect(request.method).toBe('get');
    expect(request.url).toBe('/search/repositories');
    expect(request.params).toEqual({ q: 'language:Go', sort: 'stars', order: 'desc', per_page: 3 });
  });

  it('returns at most `limit` items', async () => {
    const { client } = stubClient(() => ({ status: 200, data: { total_count: 900, items: items(5) } }));

    const result = await searchRepositories(params, { config: testConfig(), client });

    expect(result.map((item) => item.full_name)).toEqual(['octo/repo-0', 'octo/repo-1', 'octo/repo-2']);
  });

  it('returns every item when the provider sends fewer than `limit`', async () => {
    const { client } = stubClient(() => ({ status: 200, data: { items: items(2) } }));

    const result = await searchRepositories({ ...params, limit: 20 }, { config: testConfig(), client });

    expect(result).toHaveLength(2);
  });

  it('returns an empty list for a result set with no items', async () => {
    const { client } = stubClient(() => ({ status: 200, data: { total_count: 0, items: [] } }));

    await expect(searchRepositories(params, { config: testConfig(), client })).resolves.toEqual([]);
  });

  it('surfaces the provider message on a non-200 response', async () => {
    const { client } = stubClient(() => ({ status: 403, data: { message: 'API rate limit exceeded' } }));

    const error = await searchRepositories(params, { config: testConfig(), client }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ kind: 'api', status: 403, message: 'API rate limit exceeded' });
  });

  it('falls back to a token hint when the error body has no message', async () => {
    const { client } = stubClient(() => ({ status: 502, data: '<html>Bad gateway</html>' }));

    await expect(searchRepositories(params, { config: testConfig(), client })).rejects.toMatchObject({
      status: 502,
      message: 'Check your token and rate limit.',
    });
  });

  it('reports a timeout when axios aborts the request', async () => {
    const { client } = stubClient(() => {
      throw new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED');
    });

    const error = await searchRepositories(params, { config: testConfig(), client }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'GitHub did not respond within 15s.' });
  });

  it('reports a network error when no response arrives', async () => {
    const { client } = stubClient(() => {
      throw new AxiosError('Network Error', 'ERR_NETWORK');
    });

    const error = await searchRepositories(params, { config: testConfig(), client }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ kind: 'network', message: 'Could not reach GitHub: Network Error' });
  });

  it('rejects a 200 body without an items array', async () => {
    const { client } = stubClient(() => ({ status: 200, data: { items: 'nope' } }));

    await expect(searchRepositories(params, { config: testConfig(), client })).rejects.toBeInstanceOf(
      MalformedPayloadError
    );
  });
});

describe('clampLimit', () => {
  it('keeps the page size within 1..100', () => {
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(20)).toBe(20);
    expect(clampLimit(12.9)).toBe(12);
    expect(clampLimit(250)).toBe(100);
    expect(clampLimit(Number.NaN)).toBe(1);
  });
});

import { SORT_KEYS, SORT_ORDERS } from '../types';
import type { SearchParams } from '../types';

export const LIMIT_MIN = 5;
export const LIMIT_MAX = 50;

export const DEFAULT_SEARCH_PARAMS: SearchParams = {
  query: 'language:Python',
  limit: 20,
  sort: 'stars',
  order: 'desc',
};

const readLimit = (value: string | null): number => {
  const parsed = Number(value);
  if (value === null || value.trim() === '' || !Number.isInteger(parsed)) {
    return DEFAULT_SEARCH_PARAMS.limit;
  }
  return Math.min(LIMIT_MAX, Math.max(LIMIT_MIN, parsed));
};

/** Form values from the URL; unknown or missing entries fall back to the defaults. */
export const readSearchForm = (search: URLSearchParams): SearchParams => {
  const sort = search.get('sort');
  const order = search.get('order');

  return {
    query: search.get('q') ?? DEFAULT_SEARCH_PARAMS.query,
    limit: readLimit(search.get('limit')),
    sort: SORT_KEYS.find((key) => key === sort) ?? DEFAULT_SEARCH_PARAMS.sort,
    order: SORT_ORDERS.find((value) => value === order) ?? DEFAULT_SEARCH_PARAMS.order,
  };
};

export const toSearchForm = (params: SearchParams): Record<string, string> => ({
  q: params.query,
  limit: String(params.limit),
  sort: params.sort,
  order: params.order,
});

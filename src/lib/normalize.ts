import { MalformedTimestampError } from './errors';
import type { RawRepoRecord, RepoRow } from '../types';

export const UNKNOWN_LANGUAGE = 'Other/None';

const GITHUB_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/** Parse GitHub's `YYYY-MM-DDTHH:MM:SSZ` timestamps as UTC. */
export const parseGithubTimestamp = (value: string): Date => {
  const match = GITHUB_TIMESTAMP.exec(value);
  if (!match) {
    throw new MalformedTimestampError(value);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls over out-of-range parts (e.g. Feb 30); reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new MalformedTimestampError(value);
  }

  return date;
};

export const logScale = (count: number): number => Math.log10(1 + count);

const countOf = (value: number | null | undefined): number => value ?? 0;

export const normalizeRepo = (record: RawRepoRecord): RepoRow => {
  const stars = countOf(record.stargazers_count);
  const forks = countOf(record.forks_count);

  return Object.freeze({
    name: record.full_name,
    stars,
    forks,
    watchers: countOf(record.watchers_count),
    language: record.language || UNKNOWN_LANGUAGE,
    createdAt: parseGithubTimestamp(record.created_at),
    logStars: logScale(stars),
    logForks: logScale(forks),
  });
};

export const normalizeRepos = (records: readonly RawRepoRecord[]): RepoRow[] =>
  records.map(normalizeRepo);

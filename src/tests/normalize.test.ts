import { describe, expect, it } from 'vitest';
import { MalformedTimestampError } from '../lib/errors';
import { normalizeRepo, normalizeRepos, parseGithubTimestamp, UNKNOWN_LANGUAGE } from '../lib/normalize';
import { rawRepo, sampleRecords } from './fixtures';

describe('parseGithubTimestamp', () => {
  it('reads the fixed GitHub format as UTC', () => {
    expect(parseGithubTimestamp('2021-06-15T08:30:05Z').getTime()).toBe(Date.UTC(2021, 5, 15, 8, 30, 5));
  });

  it.each([
    '2020-01-01T00:00:00.000Z',
    '2020-01-01 00:00:00',
    '2020-01-01T00:00:00+02:00',
    '2020-02-30T00:00:00Z',
    '2020-13-01T00:00:00Z',
    '2020-01-01T24:00:00Z',
    '',
  ])('rejects %j', (value) => {
    expect(() => parseGithubTimestamp(value)).toThrow(MalformedTimestampError);
  });
});

describe('normalizeRepos', () => {
  it('maps the sample records to rows', () => {
    const [alpha, beta] = normalizeRepos(sampleRecords());

    expect(alpha.name).toBe('octo/alpha');
    expect(alpha.language).toBe(UNKNOWN_LANGUAGE);
    expect(alpha.stars).toBe(150);
    expect(alpha.watchers).toBe(150);
    expect(alpha.logStars).toBeCloseTo(2.179, 3);
    expect(alpha.logForks).toBeCloseTo(Math.log10(11), 10);
    expect(alpha.createdAt.toISOString()).toBe('2020-01-01T00:00:00.000Z');

    expect(beta.language).toBe('Go');
    expect(beta.logStars).toBeCloseTo(0.778, 3);
    expect(beta.logForks).toBe(0);
  });

  it('puts zero counts at log value 0 and 99 stars at exactly 2', () => {
    expect(normalizeRepo(rawRepo({ stargazers_count: 0 })).logStars).toBe(0);
    expect(normalizeRepo(rawRepo({ stargazers_count: 99 })).logStars).toBe(2);
  });

  it('labels empty or missing languages as Other/None', () => {
    const rows = normalizeRepos([rawRepo({ language: '' }), rawRepo({ language: undefined })]);
    expect(rows.map((row) => row.language)).toEqual([UNKNOWN_LANGUAGE, UNKNOWN_LANGUAGE]);
  });

  it('treats missing counts as zero', () => {
    const row = normalizeRepo({ full_name: 'octo/bare', created_at: '2019-03-04T05:06:07Z' });
    expect(row).toMatchObject({ stars: 0, forks: 0, watchers: 0, logStars: 0, logForks: 0 });
  });

  it('keeps input order and freezes rows', () => {
    const rows = normalizeRepos([
      rawRepo({ full_name: 'z/last', stargazers_count: 1 }),
      rawRepo({ full_name: 'a/first', stargazers_count: 1000 }),
    ]);
    expect(rows.map((row) => row.name)).toEqual(['z/last', 'a/first']);
    expect(Object.isFrozen(rows[0])).toBe(true);
  });

  it('fails the whole batch on a malformed timestamp', () => {
    const records = [rawRepo(), rawRepo({ full_name: 'octo/bad', created_at: '15/06/2021' })];
    expect(() => normalizeRepos(records)).toThrow('Unexpected created_at format: "15/06/2021"');
  });
});

import { describe, expect, it } from 'vitest';
import { normalizeRepos } from '../lib/normalize';
import { summarize } from '../lib/stats';
import { rawRepo, sampleRecords } from './fixtures';

describe('summarize', () => {
  it('computes raw and log means for the sample records', () => {
    const stats = summarize(normalizeRepos(sampleRecords()));

    expect(stats.count).toBe(2);
    expect(stats.avgStars).toBe(77.5);
    expect(stats.avgForks).toBe(5);
    expect(stats.avgWatchers).toBe(77.5);
    expect(stats.avgLogStars).toBeCloseTo(1.4786, 4);
    expect(stats.avgLogForks).toBeCloseTo(Math.log10(11) / 2, 10);
    // 10^mean(log10(1 + s)) is the geometric mean of 151 and 6, about 30.1
    expect(stats.equivalentStars).toBe(29);
  });

  it('matches sum / N for each raw count', () => {
    const rows = normalizeRepos([
      rawRepo({ stargazers_count: 1, forks_count: 7, watchers_count: 3 }),
      rawRepo({ stargazers_count: 2, forks_count: 0, watchers_count: 3 }),
      rawRepo({ stargazers_count: 4, forks_count: 1, watchers_count: 4 }),
    ]);
    const stats = summarize(rows);

    expect(stats.avgStars).toBeCloseTo(7 / 3, 12);
    expect(stats.avgForks).toBeCloseTo(8 / 3, 12);
    expect(stats.avgWatchers).toBeCloseTo(10 / 3, 12);
  });

  it('differs from the log of the raw mean', () => {
    const rows = normalizeRepos([
      rawRepo({ stargazers_count: 0 }),
      rawRepo({ stargazers_count: 99_999 }),
    ]);
    const stats = summarize(rows);

    expect(stats.avgLogStars).toBeCloseTo(2.5, 10);
    expect(Math.log10(1 + stats.avgStars)).toBeCloseTo(4.699, 3);
    expect(stats.equivalentStars).toBe(315);
  });

  it('never reports negative equivalent stars', () => {
    const stats = summarize(normalizeRepos([rawRepo(), rawRepo({ full_name: 'octo/zero' })]));
    expect(stats.avgLogStars).toBe(0);
    expect(stats.equivalentStars).toBe(0);
  });

  it('derives equivalent stars from the log mean as displayed', () => {
    // log10(99) is 1.9956, shown as 2.00, so the figure is 10^2 - 1
    const stats = summarize(normalizeRepos([rawRepo({ stargazers_count: 98 })]));
    expect(stats.avgLogStars).toBeCloseTo(1.9956, 4);
    expect(stats.equivalentStars).toBe(99);
  });

  it('rejects an empty dataset', () => {
    expect(() => summarize([])).toThrow(RangeError);
  });
});

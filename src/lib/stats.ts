import type { RepoRow, SummaryStats } from '../types';

const mean = (rows: readonly RepoRow[], pick: (row: RepoRow) => number): number =>
  rows.reduce((sum, row) => sum + pick(row), 0) / rows.length;

/**
 * Raw and log-space means of a non-empty dataset.
 *
 * The log means are averages of log10(1 + n), not the log of the raw mean, so a
 * handful of very popular repositories pulls them far less than the raw averages.
 */
export const summarize = (rows: readonly RepoRow[]): SummaryStats => {
  if (rows.length === 0) {
    throw new RangeError('Cannot summarize an empty dataset');
  }

  const avgLogStars = mean(rows, (row) => row.logStars);
  // Taken from the log mean as displayed (2 decimals) so the two cards agree
  const displayedLogStars = Math.round(avgLogStars * 100) / 100;

  return {
    count: rows.length,
    avgStars: mean(rows, (row) => row.stars),
    avgForks: mean(rows, (row) => row.forks),
    avgWatchers: mean(rows, (row) => row.watchers),
    avgLogStars,
    avgLogForks: mean(rows, (row) => row.logForks),
    equivalentStars: Math.max(0, Math.trunc(10 ** displayedLogStars - 1)),
  };
};

import { UNKNOWN_LANGUAGE } from './normalize';
import type {
  BarChartSpec,
  LanguageTotals,
  LineChartSpec,
  RepoRow,
  ScatterChartSpec,
  YearCount,
} from '../types';

// ============================================================================
// Constants
// ============================================================================

export const TOP_LANGUAGES = 10;

const COLORS = {
  stars: '#2383e2',
  forks: '#f59e0b',
  trend: '#10b981',
  logStars: '#1d4ed8',
  logForks: '#dc2626',
} as const;

// ============================================================================
// Builders
// ============================================================================

/** Summed stars and forks per named language, top 10 by stars. */
export const buildLanguageTrends = (rows: readonly RepoRow[]): BarChartSpec => {
  const totals = new Map<string, LanguageTotals>();

  for (const row of rows) {
    if (row.language === UNKNOWN_LANGUAGE) continue;
    const entry = totals.get(row.language) ?? { language: row.language, stars: 0, forks: 0 };
    entry.stars += row.stars;
    entry.forks += row.forks;
    totals.set(row.language, entry);
  }

  const data = Array.from(totals.values())
    .sort((a, b) => b.stars - a.stars || a.language.localeCompare(b.language))
    .slice(0, TOP_LANGUAGES);

  return {
    kind: 'bar',
    title: 'Top 10 Languages: Total Stars and Forks',
    xLabel: 'Language',
    yLabel: 'Count',
    showLegend: true,
    showGrid: false,
    data,
    series: [
      { dataKey: 'stars', label: 'Stars', color: COLORS.stars },
      { dataKey: 'forks', label: 'Forks', color: COLORS.forks },
    ],
  };
};

/** Repositories created per calendar year (UTC). Years without repositories are left out. */
export const buildCreationTrend = (rows: readonly RepoRow[]): LineChartSpec => {
  const counts = new Map<number, number>();
  for (const row of rows) {
    const year = row.createdAt.getUTCFullYear();
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }

  const data: YearCount[] = Array.from(counts, ([year, count]) => ({ year, count })).sort(
    (a, b) => a.year - b.year
  );

  return {
    kind: 'line',
    title: 'Repository Creation Trend Over Years',
    xLabel: 'Year',
    yLabel: 'Number of Repositories',
    showLegend: false,
    showGrid: false,
    data,
    series: [{ dataKey: 'count', label: 'Repositories', color: COLORS.trend, marker: 'circle' }],
  };
};

export const buildTimeSeries = (rows: readonly RepoRow[]): ScatterChartSpec => ({
  kind: 'scatter',
  title: 'Log-Transformed Popularity (Stars & Forks) Over Time',
  xLabel: 'Repository Creation Date',
  yLabel: 'log10(1 + Count)',
  showLegend: true,
  showGrid: true,
  series: [
    {
      label: 'Log(Stars)',
      color: COLORS.logStars,
      marker: 'circle',
      opacity: 0.6,
      points: rows.map((row) => ({ x: row.createdAt.getTime(), y: row.logStars, name: row.name })),
    },
    {
      label: 'Log(Forks)',
      color: COLORS.logForks,
      marker: 'cross',
      opacity: 0.6,
      points: rows.map((row) => ({ x: row.createdAt.getTime(), y: row.logForks, name: row.name })),
    },
  ],
});

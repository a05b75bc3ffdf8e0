export type SortKey = 'stars' | 'forks' | 'updated';
export type SortOrder = 'asc' | 'desc';

export const SORT_KEYS: readonly SortKey[] = ['stars', 'forks', 'updated'];
export const SORT_ORDERS: readonly SortOrder[] = ['desc', 'asc'];

export interface SearchParams {
  query: string;
  sort: SortKey;
  order: SortOrder;
  limit: number;
}

/** Fields of a GitHub search item that the dashboard consumes. */
export interface RawRepoRecord {
  full_name: string;
  stargazers_count?: number | null;
  forks_count?: number | null;
  watchers_count?: number | null;
  language?: string | null;
  created_at: string;
}

export interface RepoRow {
  readonly name: string;
  readonly stars: number;
  readonly forks: number;
  readonly watchers: number;
  readonly language: string;
  readonly createdAt: Date;
  readonly logStars: number;
  readonly logForks: number;
}

export interface SummaryStats {
  count: number;
  avgStars: number;
  avgForks: number;
  avgWatchers: number;
  avgLogStars: number;
  avgLogForks: number;
  // 10^avgLogStars - 1, from the mean rounded to 2 decimals, truncated
  equivalentStars: number;
}

// ============================================================================
// Chart specs
// ============================================================================

export type MarkerShape = 'circle' | 'cross';

export interface SeriesStyle {
  label: string;
  color: string;
  opacity?: number;
  marker?: MarkerShape;
}

export interface LanguageTotals {
  language: string;
  stars: number;
  forks: number;
}

export interface YearCount {
  year: number;
  count: number;
}

export interface ScatterPoint {
  /** Creation time, epoch milliseconds */
  x: number;
  y: number;
  name: string;
}

interface ChartBase {
  title: string;
  xLabel: string;
  yLabel: string;
  showLegend: boolean;
  showGrid: boolean;
}

export interface BarChartSpec extends ChartBase {
  kind: 'bar';
  data: LanguageTotals[];
  series: Array<SeriesStyle & { dataKey: 'stars' | 'forks' }>;
}

export interface LineChartSpec extends ChartBase {
  kind: 'line';
  data: YearCount[];
  series: Array<SeriesStyle & { dataKey: 'count' }>;
}

export interface ScatterChartSpec extends ChartBase {
  kind: 'scatter';
  series: Array<SeriesStyle & { points: ScatterPoint[] }>;
}

export type ChartSpec = BarChartSpec | LineChartSpec | ScatterChartSpec;

export interface AnalysisReport {
  params: SearchParams;
  rows: RepoRow[];
  stats: SummaryStats;
  charts: {
    languages: BarChartSpec;
    creation: LineChartSpec;
    timeSeries: ScatterChartSpec;
  };
}

import { buildCreationTrend, buildLanguageTrends, buildTimeSeries } from './charts';
import { normalizeRepos } from './normalize';
import { summarize } from './stats';
import type { RunFailure } from './errors';
import type { AnalysisReport, RawRepoRecord, SearchParams } from '../types';

// ============================================================================
// State
// ============================================================================

export type ReportState =
  | { status: 'idle' }
  | { status: 'fetching'; runId: number; params: SearchParams }
  | { status: 'empty'; params: SearchParams }
  | { status: 'analyzed'; report: AnalysisReport }
  | { status: 'failed'; params: SearchParams; failure: RunFailure };

export type ReportAction =
  | { type: 'submit'; runId: number; params: SearchParams }
  | { type: 'succeeded'; runId: number; records: RawRepoRecord[] }
  | { type: 'failed'; runId: number; failure: RunFailure }
  | { type: 'reset' };

export const initialReportState: ReportState = { status: 'idle' };

/**
 * Normalize, summarize and chart a non-empty result set.
 * Throws MalformedTimestampError when a record's created_at is not in GitHub's format.
 */
export const buildReport = (params: SearchParams, records: readonly RawRepoRecord[]): AnalysisReport => {
  const rows = normalizeRepos(records);
  return {
    params,
    rows,
    stats: summarize(rows),
    charts: {
      languages: buildLanguageTrends(rows),
      creation: buildCreationTrend(rows),
      timeSeries: buildTimeSeries(rows),
    },
  };
};

// ============================================================================
// Reducer
// ============================================================================

export const reportReducer = (state: ReportState, action: ReportAction): ReportState => {
  switch (action.type) {
    case 'submit':
      return { status: 'fetching', runId: action.runId, params: action.params };

    case 'succeeded':
      // Outcomes of a run that is no longer current are dropped
      if (state.status !== 'fetching' || state.runId !== action.runId) return state;
      if (action.records.length === 0) {
        return { status: 'empty', params: state.params };
      }
      return { status: 'analyzed', report: buildReport(state.params, action.records) };

    case 'failed':
      if (state.status !== 'fetching' || state.runId !== action.runId) return state;
      return { status: 'failed', params: state.params, failure: action.failure };

    case 'reset':
      return initialReportState;
  }
};

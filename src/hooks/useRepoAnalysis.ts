import { useCallback, useReducer, useRef, useState } from 'react';
import type { AxiosInstance } from 'axios';
import { searchRepositories } from '../api/search';
import type { AppConfig } from '../config/env';
import { isRunFailure } from '../lib/errors';
import { initialReportState, reportReducer } from '../lib/report';
import type { ReportState } from '../lib/report';
import type { SearchParams } from '../types';

interface UseRepoAnalysisReturn {
  state: ReportState;
  /** Start a new run; any run still in flight is superseded */
  analyze: (params: SearchParams) => Promise<void>;
  /** Back to idle */
  reset: () => void;
}

/**
 * Drives one analysis run at a time through the report state machine.
 *
 * Recoverable failures end in the `failed` state. Anything else (a malformed
 * payload or timestamp) is rethrown while rendering so the nearest error
 * boundary takes over.
 */
export function useRepoAnalysis(config: AppConfig, client?: AxiosInstance): UseRepoAnalysisReturn {
  const [state, dispatch] = useReducer(reportReducer, initialReportState);
  const [fatalError, setFatalError] = useState<Error | null>(null);
  const runCounter = useRef(0);

  const analyze = useCallback(
    async (params: SearchParams) => {
      runCounter.current += 1;
      const runId = runCounter.current;
      dispatch({ type: 'submit', runId, params });

      try {
        const records = await searchRepositories(params, { config, client });
        dispatch({ type: 'succeeded', runId, records });
      } catch (error) {
        if (isRunFailure(error)) {
          console.warn(`[analysis] run failed (${error.kind}): ${error.message}`);
          dispatch({ type: 'failed', runId, failure: error });
          return;
        }
        if (runId !== runCounter.current) {
          return;
        }
        setFatalError(error instanceof Error ? error : new Error(String(error)));
      }
    },
    [config, client]
  );

  const reset = useCallback(() => {
    runCounter.current += 1;
    dispatch({ type: 'reset' });
  }, []);

  if (fatalError) {
    throw fatalError;
  }

  return { state, analyze, reset };
}

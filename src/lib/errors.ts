export type FailureKind =
  | 'missing_credential'
  | 'api'
  | 'timeout'
  | 'network'
  | 'malformed_payload'
  | 'malformed_timestamp';

export abstract class AnalysisError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends AnalysisError {
  readonly kind = 'missing_credential';

  constructor() {
    super('GITHUB token is missing. Set VITE_GITHUB_TOKEN in your .env file.');
  }
}

export const DEFAULT_API_ERROR_MESSAGE = 'Check your token and rate limit.';

export class ApiError extends AnalysisError {
  readonly kind = 'api';

  constructor(
    readonly status: number,
    message: string = DEFAULT_API_ERROR_MESSAGE
  ) {
    super(message);
  }
}

export class TimeoutError extends AnalysisError {
  readonly kind = 'timeout';

  constructor(readonly timeoutMs: number) {
    super(`GitHub did not respond within ${timeoutMs / 1000}s.`);
  }
}

export class NetworkError extends AnalysisError {
  readonly kind = 'network';
}

export class MalformedPayloadError extends AnalysisError {
  readonly kind = 'malformed_payload';
}

export class MalformedTimestampError extends AnalysisError {
  readonly kind = 'malformed_timestamp';

  constructor(readonly value: string) {
    super(`Unexpected created_at format: "${value}" (expected YYYY-MM-DDTHH:MM:SSZ)`);
  }
}

export type RunFailure = MissingCredentialError | ApiError | TimeoutError | NetworkError;

/** Failures that end a run normally; anything else is a defect for this run. */
export const isRunFailure = (error: unknown): error is RunFailure =>
  error instanceof MissingCredentialError ||
  error instanceof ApiError ||
  error instanceof TimeoutError ||
  error instanceof NetworkError;

export type AnalysisErrorCode =
  | 'EMPTY_INPUT'
  | 'SOURCE_UNAVAILABLE'
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_REJECTED'
  | 'MALFORMED_RESPONSE'
  | 'ANALYSIS_FAILED';

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: AnalysisErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AnalysisError';
  }
}

export class EmptyInputError extends AnalysisError {
  constructor(message = 'Input text is empty or whitespace only') {
    super(message, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class SourceUnavailableError extends AnalysisError {
  constructor(public readonly source: string, cause?: unknown) {
    super(`Could not read text source: ${source}`, 'SOURCE_UNAVAILABLE', { cause });
    this.name = 'SourceUnavailableError';
  }
}

/** Transport could not be reached or timed out. Retryable. */
export class BackendUnavailableError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, 'BACKEND_UNAVAILABLE', { cause });
    this.name = 'BackendUnavailableError';
  }
}

/** Provider refused the request (auth, quota, bad request). Not retryable. */
export class BackendRejectedError extends AnalysisError {
  constructor(message: string, public readonly status?: number, cause?: unknown) {
    super(message, 'BACKEND_REJECTED', { cause });
    this.name = 'BackendRejectedError';
  }
}

export class MalformedResponseError extends AnalysisError {
  constructor(public readonly reason: string, public readonly rawText: string) {
    super(`Model response has no usable structured block: ${reason}`, 'MALFORMED_RESPONSE');
    this.name = 'MalformedResponseError';
  }
}

export class AnalysisFailedError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ANALYSIS_FAILED', { cause });
    this.name = 'AnalysisFailedError';
  }
}

export function isRetryableBackendError(error: unknown): error is BackendUnavailableError {
  return error instanceof BackendUnavailableError;
}

// src/core/errors.ts
export enum ErrorCode {
  CONFIG_INVALID = 'config_invalid',
  NETWORK_ERROR = 'network_error',
  HTTP_ERROR = 'http_error',
  RATE_LIMITED = 'rate_limited',
  INVALID_RESPONSE = 'invalid_response',
  SCRAPE_FAILED = 'scrape_failed',
  SUMMARY_FAILED = 'summary_failed',
  STATE_IO = 'state_io',
}

export class LinkDigestError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LinkDigestError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof LinkDigestError && error.retryable;
}

export function describeError(error: unknown): string {
  if (error instanceof LinkDigestError) {
    return error.suggestion ? `${error.message} (${error.suggestion})` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

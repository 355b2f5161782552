export type ErrorCode = 'VALIDATION_ERROR' | 'UNAUTHORIZED' | 'UPSTREAM_UNAVAILABLE';

export class HttpError extends Error {
  readonly status: number;
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(status: number, code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class InvalidParametersError extends HttpError {
  constructor(details: unknown) {
    super(400, 'VALIDATION_ERROR', 'Invalid request parameters', details);
    this.name = 'InvalidParametersError';
  }
}

export class UnauthorizedError extends HttpError {
  constructor() {
    super(401, 'UNAUTHORIZED', 'Invalid token');
    this.name = 'UnauthorizedError';
  }
}

/** Upstream call failed: network, non-2xx, or a payload we could not read. */
export class UpstreamUnavailableError extends HttpError {
  readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number) {
    super(502, 'UPSTREAM_UNAVAILABLE', message);
    this.name = 'UpstreamUnavailableError';
    this.upstreamStatus = upstreamStatus;
  }
}

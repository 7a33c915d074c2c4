// Error taxonomy rendered by middleware/errorHandler into { detail, code } bodies

export type ErrorCode =
  | 'credential_required'
  | 'invalid_credential'
  | 'validation_error'
  | 'downstream_unavailable'
  | 'downstream_error'
  | 'not_found'
  | 'bad_request'
  | 'internal_error';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: ErrorCode,
    readonly detail: string,
    readonly headers: Readonly<Record<string, string>> = {},
  ) {
    super(detail);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends HttpError {
  constructor(detail: string, headers?: Record<string, string>) {
    super(401, 'credential_required', detail, headers);
  }
}

export class InvalidCredentialError extends HttpError {
  constructor(detail: string, headers?: Record<string, string>) {
    super(401, 'invalid_credential', detail, headers);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends HttpError {
  constructor(
    detail: string,
    readonly issues: ValidationIssue[],
  ) {
    super(422, 'validation_error', detail);
  }
}

// Transport-level failure talking to the scanning API (refused, DNS, timeout, aborted)
export class DownstreamUnavailableError extends HttpError {
  constructor(readonly reason: string) {
    super(500, 'downstream_unavailable', 'AI service unavailable');
  }
}

// The scanning API answered, but not with a usable 2xx body
export class DownstreamError extends HttpError {
  constructor(
    status: number,
    readonly downstreamStatus: number,
  ) {
    super(status, 'downstream_error', 'AI service error');
  }
}

export class NotFoundError extends HttpError {
  constructor() {
    super(404, 'not_found', 'Not Found');
  }
}

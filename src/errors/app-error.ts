/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }
}

export type NetworkErrorKind =
  | 'transport'
  | 'timeout'
  | 'aborted'
  | 'cors-check'
  | 'preflight'
  | 'redirect-mode'
  | 'too-many-redirects'
  | 'bad-redirect'
  | 'local-urls-only'
  | 'scheme'
  | 'same-origin'
  | 'decode'
  | 'file';

/**
 * Terminal failure of a fetch. Never thrown out of the orchestrator; it is
 * carried as the termination reason of an `error` response.
 */
export class NetworkError extends AppError {
  public readonly kind: NetworkErrorKind;
  public readonly url: string | undefined;
  public readonly details: Record<string, unknown>;

  constructor(
    kind: NetworkErrorKind,
    message: string,
    url?: string,
    details: Record<string, unknown> = {}
  ) {
    super(message, 502, 'NETWORK_ERROR');
    this.kind = kind;
    this.url = url;
    this.details = details;
  }
}

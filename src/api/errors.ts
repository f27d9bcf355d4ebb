/**
 * Request error classes
 *
 * Every failure of an endpoint invocation is surfaced as a RequestError whose
 * code identifies the stage of the pipeline that rejected it.
 */

/** Request error codes */
export enum RequestErrorCode {
  // Transport never produced a response
  CONNECTIVITY = 'CONNECTIVITY',

  // Programmer errors found while building the request
  CONFIGURATION = 'CONFIGURATION',
  ENCODING = 'ENCODING',

  // Response rejected by a service hook
  VALIDATION = 'VALIDATION',

  // Failure status with a body in the service's error shape
  SERVICE = 'SERVICE',

  // Failure status with any other body
  STATUS = 'STATUS',

  // Body did not conform to the expected shape
  DECODING = 'DECODING',
}

/** Location of a single schema mismatch */
export interface DecodingIssue {
  path: string;
  message: string;
}

/** Request error details */
export interface RequestErrorDetails {
  code: RequestErrorCode;
  message: string;
  status?: number;
  bodyExcerpt?: string;
  serviceResponse?: unknown;
  issues?: DecodingIssue[];
  isTimeout?: boolean;
  originalError?: Error;
}

/** Maximum number of body characters kept for diagnostics */
export const BODY_EXCERPT_LENGTH = 500;

/**
 * Custom request error class
 */
export class RequestError extends Error {
  readonly code: RequestErrorCode;
  readonly status?: number;
  readonly bodyExcerpt?: string;
  readonly serviceResponse?: unknown;
  readonly issues?: DecodingIssue[];
  readonly isTimeout: boolean;
  readonly originalError?: Error;

  constructor(details: RequestErrorDetails) {
    super(details.message);
    this.name = 'RequestError';
    this.code = details.code;
    this.status = details.status;
    this.bodyExcerpt = details.bodyExcerpt;
    this.serviceResponse = details.serviceResponse;
    this.issues = details.issues;
    this.isTimeout = details.isTimeout ?? false;
    this.originalError = details.originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RequestError);
    }
  }

  /** Check if repeating the same request could succeed */
  get isRetryable(): boolean {
    if (this.code === RequestErrorCode.CONNECTIVITY) {
      return true;
    }
    if (this.status === undefined) {
      return false;
    }
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }

  /** Check if error requires re-authentication */
  get requiresAuth(): boolean {
    return this.status === 401;
  }

  /** Convert to JSON-serializable object */
  toJSON(): Omit<RequestErrorDetails, 'originalError'> {
    return {
      code: this.code,
      message: this.message,
      status: this.status,
      bodyExcerpt: this.bodyExcerpt,
      serviceResponse: this.serviceResponse,
      issues: this.issues,
      isTimeout: this.isTimeout,
    };
  }
}

export function isRequestError(error: unknown): error is RequestError {
  return error instanceof RequestError;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function excerpt(body: string): string {
  return body.length > BODY_EXCERPT_LENGTH ? body.slice(0, BODY_EXCERPT_LENGTH) : body;
}

/**
 * Create RequestError from a transport failure
 */
export function createConnectivityError(error: unknown): RequestError {
  const cause = toError(error);
  if (cause.name === 'AbortError' || cause.name === 'TimeoutError') {
    return new RequestError({
      code: RequestErrorCode.CONNECTIVITY,
      message: 'Request timed out',
      isTimeout: true,
      originalError: cause,
    });
  }

  return new RequestError({
    code: RequestErrorCode.CONNECTIVITY,
    message: `Network error: ${cause.message}`,
    originalError: cause,
  });
}

export function createConfigurationError(message: string, error?: unknown): RequestError {
  return new RequestError({
    code: RequestErrorCode.CONFIGURATION,
    message,
    originalError: error === undefined ? undefined : toError(error),
  });
}

export function createEncodingError(
  message: string,
  options: { issues?: DecodingIssue[]; error?: unknown } = {}
): RequestError {
  return new RequestError({
    code: RequestErrorCode.ENCODING,
    message,
    issues: options.issues,
    originalError: options.error === undefined ? undefined : toError(options.error),
  });
}

/**
 * Create RequestError from a rejecting validation hook
 */
export function createValidationError(error: unknown, status?: number): RequestError {
  const cause = toError(error);
  return new RequestError({
    code: RequestErrorCode.VALIDATION,
    message: `Response rejected: ${cause.message}`,
    status,
    originalError: cause,
  });
}

/**
 * Create RequestError from a failure status whose body matched the service's error shape
 */
export function createServiceError(status: number, serviceResponse: unknown): RequestError {
  return new RequestError({
    code: RequestErrorCode.SERVICE,
    message: serviceMessage(serviceResponse) ?? `Service returned status ${status}`,
    status,
    serviceResponse,
  });
}

/**
 * Create RequestError from a failure status
 */
export function createStatusError(status: number, body: string): RequestError {
  return new RequestError({
    code: RequestErrorCode.STATUS,
    message: `Unexpected status ${status}`,
    status,
    bodyExcerpt: excerpt(body),
  });
}

export function createDecodingError(
  message: string,
  options: { issues?: DecodingIssue[]; body?: string; error?: unknown; status?: number } = {}
): RequestError {
  return new RequestError({
    code: RequestErrorCode.DECODING,
    message,
    status: options.status,
    issues: options.issues,
    bodyExcerpt: options.body === undefined ? undefined : excerpt(options.body),
    originalError: options.error === undefined ? undefined : toError(options.error),
  });
}

function serviceMessage(serviceResponse: unknown): string | undefined {
  if (typeof serviceResponse !== 'object' || serviceResponse === null) {
    return undefined;
  }
  const message: unknown = Reflect.get(serviceResponse, 'message');
  return typeof message === 'string' && message.length > 0 ? message : undefined;
}

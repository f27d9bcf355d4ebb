import { describe, it, expect } from 'vitest';
import {
  RequestError,
  RequestErrorCode,
  createConnectivityError,
  createServiceError,
  createStatusError,
  createValidationError,
  isRequestError,
} from './errors';

describe('RequestError', () => {
  it('should keep the first 500 characters of a failure body', () => {
    const error = createStatusError(503, 'x'.repeat(600));

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(RequestError);
    expect(error.code).toBe(RequestErrorCode.STATUS);
    expect(error.status).toBe(503);
    expect(error.message).toBe('Unexpected status 503');
    expect(error.bodyExcerpt).toHaveLength(500);
  });

  it('should take the message of a service error from its message field', () => {
    const error = createServiceError(401, { message: 'bad credentials' });

    expect(error.code).toBe(RequestErrorCode.SERVICE);
    expect(error.message).toBe('bad credentials');
    expect(error.serviceResponse).toEqual({ message: 'bad credentials' });
    expect(error.requiresAuth).toBe(true);
    expect(error.isRetryable).toBe(false);
  });

  it('should fall back to the status when the service error has no message', () => {
    const error = createServiceError(400, { code: 7 });

    expect(error.message).toBe('Service returned status 400');
  });

  it('should flag timeouts among connectivity errors', () => {
    const cause = new Error('The operation was aborted due to timeout');
    cause.name = 'TimeoutError';

    const error = createConnectivityError(cause);

    expect(error.code).toBe(RequestErrorCode.CONNECTIVITY);
    expect(error.isTimeout).toBe(true);
    expect(error.message).toBe('Request timed out');
    expect(error.originalError).toBe(cause);
    expect(error.isRetryable).toBe(true);
  });

  it('should wrap non-error transport failures', () => {
    const error = createConnectivityError('offline');

    expect(error.isTimeout).toBe(false);
    expect(error.message).toBe('Network error: offline');
    expect(error.originalError?.message).toBe('offline');
  });

  it('should describe the rejecting hook in validation errors', () => {
    const error = createValidationError(new Error('missing request id'), 200);

    expect(error.code).toBe(RequestErrorCode.VALIDATION);
    expect(error.message).toBe('Response rejected: missing request id');
    expect(error.status).toBe(200);
  });

  it('should treat 429 and 5xx as retryable', () => {
    expect(createStatusError(429, '').isRetryable).toBe(true);
    expect(createStatusError(502, '').isRetryable).toBe(true);
    expect(createStatusError(404, '').isRetryable).toBe(false);
  });

  it('should serialize without the original error', () => {
    const error = createStatusError(404, 'nope');

    expect(JSON.parse(JSON.stringify(error))).toEqual({
      code: 'STATUS',
      message: 'Unexpected status 404',
      status: 404,
      bodyExcerpt: 'nope',
      isTimeout: false,
    });
  });

  it('should recognise request errors', () => {
    expect(isRequestError(createStatusError(500, ''))).toBe(true);
    expect(isRequestError(new Error('plain'))).toBe(false);
  });
});

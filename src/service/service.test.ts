import { afterEach, describe, it, expect, vi } from 'vitest';
import { RequestErrorCode } from '../api/errors';
import type { Transport, TransportRequest } from '../transport/types';
import { authorizationHeader } from './authorization';
import { defineService, getDefaultService, setDefaultService } from './service';

function createMockTransport(): Transport {
  return { send: vi.fn(), download: vi.fn() };
}

class RequestTracer {
  seen: string[] = [];

  configureRequest(request: TransportRequest): void {
    this.seen.push(request.url);
  }
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('defineService', () => {
  afterEach(() => {
    setDefaultService(null);
  });

  it('should fill in defaults and freeze the service', () => {
    const transport = createMockTransport();

    const service = defineService({ baseURL: 'https://example.com', transport });

    expect(service.baseURL).toBe('https://example.com/');
    expect(service.authorization).toEqual({ type: 'none' });
    expect(service.basicResponseFormat).toBe('json');
    expect(service.errorResponseFormat).toBe('json');
    expect(service.defaultHeaders).toEqual({});
    expect(service.transport).toBe(transport);
    expect(Object.isFrozen(service)).toBe(true);
  });

  it('should bind hooks to their owner', async () => {
    const hooks = new RequestTracer();
    const service = defineService({ baseURL: 'https://example.com', transport: createMockTransport(), hooks });

    await service.hooks.configureRequest(
      { method: 'GET', url: 'https://example.com/a', headers: {} },
      { kind: 'empty', method: 'GET', path: '/a', authorizationRequirement: 'none' }
    );

    expect(hooks.seen).toEqual(['https://example.com/a']);
  });

  it.each(['example.com/api', 'ftp://example.com'])('should reject the base URL %s', (baseURL) => {
    const error = thrownBy(() => defineService({ baseURL, transport: createMockTransport() }));

    expect(error).toMatchObject({ code: RequestErrorCode.CONFIGURATION });
  });

  it('should register a default service', () => {
    const service = defineService({ baseURL: 'https://example.com', transport: createMockTransport() });

    setDefaultService(service);

    expect(getDefaultService()).toBe(service);
  });
});

describe('authorizationHeader', () => {
  it('should encode basic credentials', () => {
    expect(authorizationHeader({ type: 'basic', username: 'user', password: 'pass' })).toEqual([
      'Authorization',
      'Basic dXNlcjpwYXNz',
    ]);
  });

  it('should produce nothing without authorization', () => {
    expect(authorizationHeader({ type: 'none' })).toBeUndefined();
  });
});

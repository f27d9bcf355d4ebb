/**
 * Service definition and the default service
 */

import { createConfigurationError } from '../api/errors';
import { createFetchTransport } from '../transport/fetch-transport';
import type { Transport } from '../transport/types';
import type { ResolvedServiceHooks, Service, ServiceHooks, ServiceOptions } from './types';

const noop = (): void => {};

let sharedTransport: Transport | null = null;
let defaultService: Service | null = null;

function getSharedTransport(): Transport {
  if (!sharedTransport) {
    sharedTransport = createFetchTransport();
  }
  return sharedTransport;
}

function parseBaseURL(baseURL: string): string {
  let url: URL;
  try {
    url = new URL(baseURL);
  } catch (error) {
    throw createConfigurationError(`Base URL "${baseURL}" is not an absolute URL`, error);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError(`Base URL "${baseURL}" must use http or https`);
  }
  return url.toString();
}

function resolveHooks<B>(hooks: ServiceHooks<B> = {}): ResolvedServiceHooks<B> {
  return {
    configureRequest: hooks.configureRequest?.bind(hooks) ?? noop,
    configureEncoder: hooks.configureEncoder?.bind(hooks) ?? noop,
    configureDecoder: hooks.configureDecoder?.bind(hooks) ?? noop,
    validateResponse: hooks.validateResponse?.bind(hooks) ?? noop,
    validateBasicResponse: hooks.validateBasicResponse?.bind(hooks) ?? noop,
  };
}

/**
 * Define a service. The result is frozen and safe to share between
 * concurrent requests.
 *
 * @throws RequestError (CONFIGURATION) when baseURL is not an absolute http(s) URL
 */
export function defineService<B = unknown, E = unknown>(options: ServiceOptions<B, E>): Service<B, E> {
  const service: Service<B, E> = {
    baseURL: parseBaseURL(options.baseURL),
    basicResponse: options.basicResponse,
    basicResponseFormat: options.basicResponseFormat ?? 'json',
    errorResponse: options.errorResponse,
    errorResponseFormat: options.errorResponseFormat ?? 'json',
    authorization: options.authorization ?? { type: 'none' },
    defaultHeaders: Object.freeze({ ...options.defaultHeaders }),
    timeout: options.timeout,
    transport: options.transport ?? getSharedTransport(),
    hooks: Object.freeze(resolveHooks(options.hooks)),
  };
  return Object.freeze(service);
}

/**
 * Service used by requests that do not name one
 */
export function setDefaultService<B, E>(service: Service<B, E> | null): void {
  defaultService = service;
}

export function getDefaultService(): Service {
  if (!defaultService) {
    throw createConfigurationError('No service given and no default service registered');
  }
  return defaultService;
}

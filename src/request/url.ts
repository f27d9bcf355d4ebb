/**
 * Endpoint URL resolution
 */

import { createConfigurationError } from '../api/errors';

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Append an endpoint path to the base URL as a path component. The base
 * URL's query string is kept.
 *
 * @throws RequestError (CONFIGURATION) when path is itself an absolute URL
 */
export function resolveEndpointURL(baseURL: string, path: string): URL {
  if (ABSOLUTE_URL.test(path) || path.startsWith('//')) {
    throw createConfigurationError(`Endpoint path "${path}" must be relative to the base URL`);
  }

  const url = new URL(baseURL);
  const basePath = url.pathname.replace(/\/+$/, '');
  const endpointPath = path.replace(/^\/+/, '');
  url.pathname = endpointPath.length > 0 ? `${basePath}/${endpointPath}` : basePath || '/';
  return url;
}

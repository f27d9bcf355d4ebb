/**
 * Request builder
 *
 * Composes an endpoint, a service and the caller's input into a request the
 * transport can send. Order of operations:
 *
 *   1. resolve the URL
 *   2. check the authorization requirement
 *   3. validate and encode input (after the encoder hook)
 *   4. apply authorization
 *   5. run the request hook
 */

import { hasInput, hasOutput } from '../api/endpoints';
import type { Endpoint } from '../api/endpoints';
import {
  createConfigurationError,
  createEncodingError,
  isRequestError,
} from '../api/errors';
import { acceptHeader, encodeInput } from '../codec';
import { checkSchema, describeIssues } from '../codec/schema';
import { createEncoderSettings } from '../codec/settings';
import { authorizationHeader } from '../service/authorization';
import type { Service } from '../service/types';
import type { TransportRequest } from '../transport/types';
import { resolveEndpointURL } from './url';

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

function setHeader(headers: Record<string, string>, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) {
      delete headers[key];
    }
  }
  headers[name] = value;
}

async function encodeEndpointInput(
  endpoint: Endpoint,
  service: Service,
  input: unknown,
  url: URL,
  headers: Record<string, string>
): Promise<Uint8Array | undefined> {
  if (!hasInput(endpoint)) {
    return undefined;
  }

  const checked = checkSchema(endpoint.input, input);
  if (!checked.ok) {
    throw createEncodingError(`Invalid input: ${describeIssues(checked.issues)}`, {
      issues: checked.issues,
    });
  }

  const settings = createEncoderSettings();
  try {
    await service.hooks.configureEncoder(settings, endpoint);
  } catch (error) {
    throw isRequestError(error)
      ? error
      : createConfigurationError('Encoder configuration failed', error);
  }

  try {
    const encoded = await encodeInput(endpoint.inputFormat, checked.value, url, settings);
    if (encoded.placement === 'query') {
      return undefined;
    }
    setHeader(headers, 'Content-Type', encoded.contentType);
    return encoded.body;
  } catch (error) {
    if (isRequestError(error)) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw createEncodingError(`Could not encode input as ${endpoint.inputFormat}: ${reason}`, { error });
  }
}

/**
 * Build the transport request for one invocation
 *
 * @throws RequestError (CONFIGURATION or ENCODING)
 */
export async function buildRequest(
  endpoint: Endpoint,
  service: Service,
  input?: unknown
): Promise<TransportRequest> {
  const url = resolveEndpointURL(service.baseURL, endpoint.path);

  if (endpoint.authorizationRequirement === 'required' && service.authorization.type === 'none') {
    throw createConfigurationError(
      `${endpoint.method} ${endpoint.path} requires authorization but the service has none`
    );
  }

  const headers: Record<string, string> = { ...service.defaultHeaders };
  if (hasOutput(endpoint) && !hasHeader(headers, 'Accept')) {
    headers['Accept'] = acceptHeader(endpoint.outputFormat);
  }

  const body = await encodeEndpointInput(endpoint, service, input, url, headers);

  if (endpoint.authorizationRequirement !== 'none') {
    const authorization = authorizationHeader(service.authorization);
    if (authorization) {
      setHeader(headers, authorization[0], authorization[1]);
    }
  }

  const request: TransportRequest = {
    method: endpoint.method,
    url: url.toString(),
    headers,
  };
  if (body !== undefined) {
    request.body = body;
  }
  if (service.timeout !== undefined) {
    request.timeout = service.timeout;
  }

  try {
    await service.hooks.configureRequest(request, endpoint);
  } catch (error) {
    throw isRequestError(error)
      ? error
      : createConfigurationError('Request configuration failed', error);
  }

  return request;
}

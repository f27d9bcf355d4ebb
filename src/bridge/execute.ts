/**
 * One invocation of the pipeline: build, send, interpret.
 *
 * Both functions resolve with an Outcome and never reject; every failure is
 * folded into the outcome.
 */

import type { Endpoint } from '../api/endpoints';
import { createConfigurationError, isRequestError } from '../api/errors';
import type { RequestError } from '../api/errors';
import { buildRequest } from '../request/builder';
import { requestDigest } from '../request/digest';
import { failure, interpretDownload, interpretResponse } from '../response/interpreter';
import type { Outcome, TransportOutcome } from '../response/interpreter';
import type { Service } from '../service/types';
import type { TransportDownload, TransportProgressEvent } from '../transport/types';
import { logger } from '../utils/logger';

const log = logger.scope('[request]');

export interface ExecutionOptions {
  input?: unknown;
  onProgress?: (event: TransportProgressEvent) => void;
}

export function toRequestError(error: unknown): RequestError {
  if (isRequestError(error)) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return createConfigurationError(`Unexpected failure: ${reason}`, error);
}

async function settle<R>(send: () => Promise<R>): Promise<TransportOutcome<R>> {
  try {
    return { ok: true, response: await send() };
  } catch (error) {
    return { ok: false, error };
  }
}

function logOutcome(endpoint: Endpoint, outcome: Outcome<unknown>): void {
  if (!outcome.ok) {
    log.debug(`${endpoint.method} ${endpoint.path} failed`, outcome.error.code, outcome.error.message);
  }
}

export async function executeRequest(
  endpoint: Endpoint,
  service: Service,
  options: ExecutionOptions
): Promise<Outcome<unknown>> {
  let outcome: Outcome<unknown>;
  try {
    const request = await buildRequest(endpoint, service, options.input);
    log.debug(`${request.method} ${request.url}`, requestDigest(request));

    const sent = await settle(() =>
      service.transport.send(request, { onProgress: options.onProgress })
    );
    outcome = await interpretResponse(endpoint, service, sent);
  } catch (error) {
    outcome = failure(toRequestError(error));
  }
  logOutcome(endpoint, outcome);
  return outcome;
}

export async function executeDownload(
  endpoint: Endpoint,
  service: Service,
  options: ExecutionOptions
): Promise<Outcome<string>> {
  let outcome: Outcome<string>;
  try {
    const request = await buildRequest(endpoint, service, options.input);
    log.debug(`${request.method} ${request.url} (download)`, requestDigest(request));

    const sent: TransportOutcome<TransportDownload> = await settle(() =>
      service.transport.download(request, { onProgress: options.onProgress })
    );
    outcome = await interpretDownload(endpoint, service, sent);
  } catch (error) {
    outcome = failure(toRequestError(error));
  }
  logOutcome(endpoint, outcome);
  return outcome;
}

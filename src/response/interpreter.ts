/**
 * Response interpreter
 *
 * Turns what the transport produced into an Outcome. Each step either
 * passes the response on or ends the invocation:
 *
 *   1. transport failure       -> CONNECTIVITY
 *   2. response hook           -> VALIDATION
 *   3. basic response envelope -> DECODING / VALIDATION
 *   4. failure status          -> SERVICE / STATUS
 *   5. endpoint output         -> DECODING or success
 */

import { readFile, rm } from 'node:fs/promises';
import { hasOutput } from '../api/endpoints';
import type { Endpoint, OutputFormat, Schema } from '../api/endpoints';
import {
  createConfigurationError,
  createConnectivityError,
  createDecodingError,
  createServiceError,
  createStatusError,
  createValidationError,
  isRequestError,
} from '../api/errors';
import type { RequestError } from '../api/errors';
import { decodeBody } from '../codec';
import { checkSchema, describeIssues } from '../codec/schema';
import { createDecoderSettings } from '../codec/settings';
import type { DecoderSettings } from '../codec/settings';
import type { Service } from '../service/types';
import type { ResponseHead, TransportDownload, TransportResponse } from '../transport/types';
import { bytesToString } from '../utils/encoding';
import { logger } from '../utils/logger';

const log = logger.scope('[response]');

export type Success<T> = { ok: true; value: T };

export type Failure = { ok: false; error: RequestError };

export type Outcome<T> = Success<T> | Failure;

/** What the transport produced: a response, or the reason there is none */
export type TransportOutcome<R> = { ok: true; response: R } | { ok: false; error: unknown };

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(error: RequestError): Failure {
  return { ok: false, error };
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Runs the decoder hook at most once, on first use
 */
function lazyDecoderSettings(
  service: Service,
  endpoint: Endpoint
): () => Promise<DecoderSettings> {
  let pending: Promise<DecoderSettings> | null = null;
  return () => {
    if (!pending) {
      pending = (async () => {
        const settings = createDecoderSettings();
        try {
          await service.hooks.configureDecoder(settings, endpoint);
        } catch (error) {
          throw isRequestError(error)
            ? error
            : createConfigurationError('Decoder configuration failed', error);
        }
        return settings;
      })();
    }
    return pending;
  };
}

function decodeWith<T>(
  schema: Schema<T>,
  format: OutputFormat,
  body: Uint8Array,
  settings: DecoderSettings,
  status: number,
  what: string
): Outcome<T> {
  let parsed: unknown;
  try {
    parsed = decodeBody(format, body, settings, schema);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: createDecodingError(`Could not parse ${what} as ${format}: ${reason}`, {
        body: bytesToString(body),
        error,
        status,
      }),
    };
  }

  const checked = checkSchema(schema, parsed);
  if (!checked.ok) {
    return {
      ok: false,
      error: createDecodingError(`Unexpected ${what}: ${describeIssues(checked.issues)}`, {
        issues: checked.issues,
        body: bytesToString(body),
        status,
      }),
    };
  }
  return { ok: true, value: checked.value };
}

/**
 * Step 2: the response hook may throw, or return a boolean that replaces
 * the 2xx judgment.
 */
async function judgeResponse(
  service: Service,
  endpoint: Endpoint,
  head: ResponseHead
): Promise<Outcome<boolean>> {
  try {
    const verdict = await service.hooks.validateResponse(head, endpoint);
    return success(typeof verdict === 'boolean' ? verdict : isSuccessStatus(head.status));
  } catch (error) {
    return failure(createValidationError(error, head.status));
  }
}

/**
 * Step 4: prefer the service's error shape, fall back to the raw status
 */
async function interpretFailureStatus(
  service: Service,
  status: number,
  body: Uint8Array,
  settings: () => Promise<DecoderSettings>
): Promise<RequestError> {
  if (service.errorResponse) {
    const decoded = decodeWith(
      service.errorResponse,
      service.errorResponseFormat,
      body,
      await settings(),
      status,
      'error response'
    );
    if (decoded.ok) {
      return createServiceError(status, decoded.value);
    }
    log.debug('error response did not match the service error shape', decoded.error.message);
  }
  return createStatusError(status, bytesToString(body));
}

/**
 * Interpret a buffered response
 */
export async function interpretResponse(
  endpoint: Endpoint,
  service: Service,
  outcome: TransportOutcome<TransportResponse>
): Promise<Outcome<unknown>> {
  if (!outcome.ok) {
    return failure(createConnectivityError(outcome.error));
  }

  const response = outcome.response;
  const settings = lazyDecoderSettings(service, endpoint);

  try {
    const judged = await judgeResponse(service, endpoint, response);
    if (!judged.ok) {
      return judged;
    }

    if (service.basicResponse) {
      const basic = decodeWith(
        service.basicResponse,
        service.basicResponseFormat,
        response.body,
        await settings(),
        response.status,
        'basic response'
      );
      if (!basic.ok) {
        return basic;
      }
      try {
        await service.hooks.validateBasicResponse(basic.value, endpoint);
      } catch (error) {
        return failure(createValidationError(error, response.status));
      }
    }

    if (!judged.value) {
      return failure(await interpretFailureStatus(service, response.status, response.body, settings));
    }

    if (!hasOutput(endpoint)) {
      return success(undefined);
    }

    return decodeWith(
      endpoint.output,
      endpoint.outputFormat,
      response.body,
      await settings(),
      response.status,
      'response'
    );
  } catch (error) {
    // Only the decoder hook throws past this point
    if (isRequestError(error)) {
      return failure(error);
    }
    throw error;
  }
}

export async function removeTemporaryFile(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    log.warn('could not remove temporary download', filePath, error);
  }
}

/**
 * Interpret a response streamed to a file. The basic response envelope does
 * not apply. On failure the file is removed; on success its path is the value.
 */
export async function interpretDownload(
  endpoint: Endpoint,
  service: Service,
  outcome: TransportOutcome<TransportDownload>
): Promise<Outcome<string>> {
  if (!outcome.ok) {
    return failure(createConnectivityError(outcome.error));
  }

  const download = outcome.response;
  let kept = false;

  try {
    const judged = await judgeResponse(service, endpoint, download);
    if (!judged.ok) {
      return judged;
    }

    if (!judged.value) {
      let body: Uint8Array;
      try {
        body = new Uint8Array(await readFile(download.filePath));
      } catch (error) {
        return failure(createConnectivityError(error));
      }
      const settings = lazyDecoderSettings(service, endpoint);
      return failure(await interpretFailureStatus(service, download.status, body, settings));
    }

    kept = true;
    return success(download.filePath);
  } catch (error) {
    if (isRequestError(error)) {
      return failure(error);
    }
    throw error;
  } finally {
    if (!kept) {
      await removeTemporaryFile(download.filePath);
    }
  }
}

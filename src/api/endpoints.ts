/**
 * Endpoint descriptors
 *
 * An endpoint is immutable data describing one remote operation. The four
 * variants differ only in whether they send input and/or expect output:
 *
 *   empty  - no input, no output
 *   in     - input only
 *   out    - output only
 *   inOut  - input and output
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { createConfigurationError } from './errors';

/** HTTP methods */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** How input is placed on the request */
export type InputFormat = 'json' | 'urlQuery' | 'formURLEncoded' | 'formData' | 'xml';

/** How output is read from the response */
export type OutputFormat = 'json' | 'xml';

/** Whether the service's authorization must, may or must not be present */
export type AuthorizationRequirement = 'none' | 'required' | 'optional';

/** Runtime shape of a value; decoding accepts anything and yields T */
export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export type EndpointKind = 'empty' | 'in' | 'out' | 'inOut';

interface EndpointBase {
  readonly method: HttpMethod;
  /** Relative to the service base URL */
  readonly path: string;
  readonly authorizationRequirement: AuthorizationRequirement;
}

export interface EmptyEndpoint extends EndpointBase {
  readonly kind: 'empty';
}

export interface InEndpoint<I> extends EndpointBase {
  readonly kind: 'in';
  readonly input: Schema<I>;
  readonly inputFormat: InputFormat;
}

export interface OutEndpoint<O> extends EndpointBase {
  readonly kind: 'out';
  readonly output: Schema<O>;
  readonly outputFormat: OutputFormat;
}

export interface InOutEndpoint<I, O> extends EndpointBase {
  readonly kind: 'inOut';
  readonly input: Schema<I>;
  readonly inputFormat: InputFormat;
  readonly output: Schema<O>;
  readonly outputFormat: OutputFormat;
}

export type Endpoint =
  | EmptyEndpoint
  | InEndpoint<unknown>
  | OutEndpoint<unknown>
  | InOutEndpoint<unknown, unknown>;

/** Endpoints whose response body can be downloaded to a file */
export type DownloadableEndpoint = OutEndpoint<unknown> | InOutEndpoint<unknown, unknown>;

export interface EndpointOptions {
  path: string;
  method?: HttpMethod;
  authorizationRequirement?: AuthorizationRequirement;
}

export interface InEndpointOptions<I> extends EndpointOptions {
  input: Schema<I>;
  inputFormat?: InputFormat;
}

export interface OutEndpointOptions<O> extends EndpointOptions {
  output: Schema<O>;
  outputFormat?: OutputFormat;
}

export interface InOutEndpointOptions<I, O> extends InEndpointOptions<I> {
  output: Schema<O>;
  outputFormat?: OutputFormat;
}

// ============ Factories ============

function base(options: EndpointOptions): EndpointBase {
  return {
    method: options.method ?? 'GET',
    path: options.path,
    authorizationRequirement: options.authorizationRequirement ?? 'none',
  };
}

/**
 * Variants without input never carry input fields, variants without output
 * never carry output fields. Object literals are checked by the compiler;
 * this catches options assembled elsewhere.
 */
function rejectFields(options: object, kind: EndpointKind, fields: string[]): void {
  for (const field of fields) {
    if (field in options) {
      throw createConfigurationError(`A "${kind}" endpoint cannot declare "${field}"`);
    }
  }
}

export function emptyEndpoint(options: EndpointOptions): EmptyEndpoint {
  rejectFields(options, 'empty', ['input', 'inputFormat', 'output', 'outputFormat']);
  const endpoint: EmptyEndpoint = { kind: 'empty', ...base(options) };
  return Object.freeze(endpoint);
}

export function inEndpoint<I>(options: InEndpointOptions<I>): InEndpoint<I> {
  rejectFields(options, 'in', ['output', 'outputFormat']);
  const endpoint: InEndpoint<I> = {
    kind: 'in',
    ...base(options),
    input: options.input,
    inputFormat: options.inputFormat ?? 'json',
  };
  return Object.freeze(endpoint);
}

export function outEndpoint<O>(options: OutEndpointOptions<O>): OutEndpoint<O> {
  rejectFields(options, 'out', ['input', 'inputFormat']);
  const endpoint: OutEndpoint<O> = {
    kind: 'out',
    ...base(options),
    output: options.output,
    outputFormat: options.outputFormat ?? 'json',
  };
  return Object.freeze(endpoint);
}

export function inOutEndpoint<I, O>(options: InOutEndpointOptions<I, O>): InOutEndpoint<I, O> {
  const endpoint: InOutEndpoint<I, O> = {
    kind: 'inOut',
    ...base(options),
    input: options.input,
    inputFormat: options.inputFormat ?? 'json',
    output: options.output,
    outputFormat: options.outputFormat ?? 'json',
  };
  return Object.freeze(endpoint);
}

// ============ Guards ============

export function hasInput(
  endpoint: Endpoint
): endpoint is InEndpoint<unknown> | InOutEndpoint<unknown, unknown> {
  return endpoint.kind === 'in' || endpoint.kind === 'inOut';
}

export function hasOutput(endpoint: Endpoint): endpoint is DownloadableEndpoint {
  return endpoint.kind === 'out' || endpoint.kind === 'inOut';
}

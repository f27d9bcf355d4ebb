/**
 * Service types
 *
 * A service holds everything shared by the endpoints of one deployment:
 * where it lives, how requests are authorized, which envelope and error
 * shapes its responses use, and hooks to customise each request.
 */

import type { Endpoint, OutputFormat, Schema } from '../api/endpoints';
import type { DecoderSettings, EncoderSettings } from '../codec/settings';
import type { ResponseHead, Transport, TransportRequest } from '../transport/types';

export type Authorization =
  | { type: 'none' }
  | { type: 'basic'; username: string; password: string }
  | { type: 'bearer'; token: string }
  | { type: 'custom'; header: string; value: string };

/**
 * Per-service customisation points. Every hook may be async; any hook that
 * throws ends the invocation with an error.
 */
export interface ServiceHooks<B> {
  /** Last chance to adjust the fully built request */
  configureRequest?(request: TransportRequest, endpoint: Endpoint): void | Promise<void>;

  configureEncoder?(settings: EncoderSettings, endpoint: Endpoint): void | Promise<void>;

  configureDecoder?(settings: DecoderSettings, endpoint: Endpoint): void | Promise<void>;

  /**
   * Inspect status and headers before any body is decoded. Returning a
   * boolean replaces the default 2xx success judgment.
   */
  validateResponse?(
    response: ResponseHead,
    endpoint: Endpoint
  ): boolean | void | Promise<boolean | void>;

  validateBasicResponse?(response: B, endpoint: Endpoint): void | Promise<void>;
}

/** Hooks with the no-op defaults filled in */
export interface ResolvedServiceHooks<B> {
  configureRequest(request: TransportRequest, endpoint: Endpoint): void | Promise<void>;
  configureEncoder(settings: EncoderSettings, endpoint: Endpoint): void | Promise<void>;
  configureDecoder(settings: DecoderSettings, endpoint: Endpoint): void | Promise<void>;
  validateResponse(
    response: ResponseHead,
    endpoint: Endpoint
  ): boolean | void | Promise<boolean | void>;
  validateBasicResponse(response: B, endpoint: Endpoint): void | Promise<void>;
}

export interface ServiceOptions<B, E> {
  /** Absolute http(s) URL every endpoint path is appended to */
  baseURL: string;
  /** Envelope decoded from every buffered response before the endpoint's output */
  basicResponse?: Schema<B>;
  basicResponseFormat?: OutputFormat;
  /** Shape attempted when a response has a failure status */
  errorResponse?: Schema<E>;
  errorResponseFormat?: OutputFormat;
  authorization?: Authorization;
  defaultHeaders?: Record<string, string>;
  timeout?: number;
  /** Replaces the shared fetch transport for this service */
  transport?: Transport;
  hooks?: ServiceHooks<B>;
}

export interface Service<B = unknown, E = unknown> {
  readonly baseURL: string;
  readonly basicResponse?: Schema<B>;
  readonly basicResponseFormat: OutputFormat;
  readonly errorResponse?: Schema<E>;
  readonly errorResponseFormat: OutputFormat;
  readonly authorization: Authorization;
  readonly defaultHeaders: Readonly<Record<string, string>>;
  readonly timeout?: number;
  readonly transport: Transport;
  readonly hooks: ResolvedServiceHooks<B>;
}

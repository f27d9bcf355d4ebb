/**
 * Transport types and interfaces
 *
 * The transport moves a fully built request over the network. It knows
 * nothing about endpoints, encodings or error shapes; any rejection it
 * produces is treated as a connectivity failure.
 */

import type { HttpMethod } from '../api/endpoints';

// ============ Requests ============

export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL including any query string */
  url: string;
  headers: Record<string, string>;
  body?: Uint8Array;
  /** Milliseconds before the request is abandoned */
  timeout?: number;
}

export interface TransportProgressEvent {
  loaded: number;
  /** Expected byte count, when the response announces one */
  total?: number;
}

export interface TransportSendOptions {
  onProgress?: (event: TransportProgressEvent) => void;
}

// ============ Responses ============

export interface ResponseHead {
  status: number;
  /** Lower-case header names */
  headers: Record<string, string>;
}

export interface TransportResponse extends ResponseHead {
  body: Uint8Array;
}

export interface TransportDownload extends ResponseHead {
  /** File holding the response body */
  filePath: string;
}

/**
 * Transport - moves requests over the network
 *
 * Implementations:
 * - Fetch: createFetchTransport()
 * - Tests: in-process stubs
 */
export interface Transport {
  /**
   * Send a request and buffer the response body
   */
  send(request: TransportRequest, options?: TransportSendOptions): Promise<TransportResponse>;

  /**
   * Send a request and stream the response body into a temporary file
   */
  download(request: TransportRequest, options?: TransportSendOptions): Promise<TransportDownload>;
}

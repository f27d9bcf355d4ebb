/**
 * Fetch-based transport
 *
 * Reads response bodies chunk by chunk so progress can be reported against
 * the announced content length.
 */

import { randomUUID } from 'node:crypto';
import { open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { concatBytes } from '../utils/encoding';
import type {
  ResponseHead,
  Transport,
  TransportDownload,
  TransportRequest,
  TransportResponse,
  TransportSendOptions,
} from './types';

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchTransportOptions {
  fetch?: FetchFunction;
  /** Directory for downloads; defaults to the OS temporary directory */
  tempDirectory?: string;
}

function toHead(response: Response): ResponseHead {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });
  return { status: response.status, headers };
}

function contentLength(response: Response): number | undefined {
  const header = response.headers.get('content-length');
  if (header === null) {
    return undefined;
  }
  const length = Number.parseInt(header, 10);
  return Number.isFinite(length) && length >= 0 ? length : undefined;
}

async function readBody(
  response: Response,
  onChunk: (chunk: Uint8Array) => Promise<void> | void,
  options: TransportSendOptions
): Promise<number> {
  if (!response.body) {
    return 0;
  }

  const total = contentLength(response);
  const reader = response.body.getReader();
  let loaded = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    if (!(value instanceof Uint8Array)) {
      throw new TypeError('Response body produced a non-byte chunk');
    }
    loaded += value.byteLength;
    await onChunk(value);
    options.onProgress?.({ loaded, total });
  }

  return loaded;
}

export class FetchTransport implements Transport {
  private fetchFunction: FetchFunction;
  private tempDirectory?: string;

  constructor(options: FetchTransportOptions = {}) {
    // Resolved per call so a replaced global fetch is picked up
    this.fetchFunction = options.fetch ?? ((input, init) => fetch(input, init));
    this.tempDirectory = options.tempDirectory;
  }

  private fetch(request: TransportRequest): Promise<Response> {
    return this.fetchFunction(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.timeout !== undefined ? AbortSignal.timeout(request.timeout) : undefined,
    });
  }

  async send(request: TransportRequest, options: TransportSendOptions = {}): Promise<TransportResponse> {
    const response = await this.fetch(request);
    const chunks: Uint8Array[] = [];
    const length = await readBody(response, (chunk) => {
      chunks.push(chunk);
    }, options);

    return { ...toHead(response), body: concatBytes(chunks, length) };
  }

  async download(request: TransportRequest, options: TransportSendOptions = {}): Promise<TransportDownload> {
    const response = await this.fetch(request);
    const filePath = join(this.tempDirectory ?? tmpdir(), `download-${randomUUID()}`);

    let file: FileHandle;
    try {
      file = await open(filePath, 'w');
    } catch (error) {
      await response.body?.cancel(error);
      throw error;
    }

    try {
      await readBody(response, async (chunk) => {
        await file.write(chunk);
      }, options);
    } catch (error) {
      await file.close();
      await rm(filePath, { force: true });
      throw error;
    }
    await file.close();

    return { ...toHead(response), filePath };
  }
}

/**
 * Factory function to create a fetch transport
 */
export function createFetchTransport(options: FetchTransportOptions = {}): Transport {
  return new FetchTransport(options);
}

/**
 * Transport module exports
 */

export type {
  Transport,
  TransportRequest,
  TransportResponse,
  TransportDownload,
  TransportSendOptions,
  TransportProgressEvent,
  ResponseHead,
} from './types';

export { FetchTransport, createFetchTransport } from './fetch-transport';
export type { FetchFunction, FetchTransportOptions } from './fetch-transport';

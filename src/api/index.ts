/**
 * API exports
 */

// Endpoint descriptors
export {
  emptyEndpoint,
  inEndpoint,
  outEndpoint,
  inOutEndpoint,
  hasInput,
  hasOutput,
} from './endpoints';
export type {
  HttpMethod,
  InputFormat,
  OutputFormat,
  AuthorizationRequirement,
  Schema,
  EndpointKind,
  EmptyEndpoint,
  InEndpoint,
  OutEndpoint,
  InOutEndpoint,
  Endpoint,
  DownloadableEndpoint,
  EndpointOptions,
  InEndpointOptions,
  OutEndpointOptions,
  InOutEndpointOptions,
} from './endpoints';

// Errors
export {
  RequestError,
  RequestErrorCode,
  BODY_EXCERPT_LENGTH,
  isRequestError,
  createConnectivityError,
  createConfigurationError,
  createEncodingError,
  createValidationError,
  createServiceError,
  createStatusError,
  createDecodingError,
} from './errors';
export type { RequestErrorDetails, DecodingIssue } from './errors';

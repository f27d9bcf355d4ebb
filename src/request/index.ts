/**
 * Request builder exports
 */

export { buildRequest } from './builder';
export { requestDigest } from './digest';
export { resolveEndpointURL } from './url';

/**
 * Service exports
 */

export { defineService, setDefaultService, getDefaultService } from './service';
export { authorizationHeader } from './authorization';
export type {
  Authorization,
  Service,
  ServiceHooks,
  ResolvedServiceHooks,
  ServiceOptions,
} from './types';

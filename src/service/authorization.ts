/**
 * Authorization headers
 */

import { bytesToBase64, stringToBytes } from '../utils/encoding';
import type { Authorization } from './types';

/**
 * Header carrying the given authorization, or undefined for none
 */
export function authorizationHeader(authorization: Authorization): [string, string] | undefined {
  switch (authorization.type) {
    case 'none':
      return undefined;
    case 'basic': {
      const credentials = bytesToBase64(
        stringToBytes(`${authorization.username}:${authorization.password}`)
      );
      return ['Authorization', `Basic ${credentials}`];
    }
    case 'bearer':
      return ['Authorization', `Bearer ${authorization.token}`];
    case 'custom':
      return [authorization.header, authorization.value];
  }
}

/**
 * Stable fingerprint of a built request
 */

import { sha256 } from '@noble/hashes/sha2';
import { bytesToHex, concatBytes, stringToBytes } from '../utils/encoding';
import type { TransportRequest } from '../transport/types';

/**
 * SHA-256 over method, URL, headers (sorted by lower-case name) and body.
 * Two requests built from the same endpoint, service and input share a
 * digest unless the body carries a multipart boundary.
 */
export function requestDigest(request: TransportRequest): string {
  const headers = Object.entries(request.headers)
    .map(([name, value]) => `${name.toLowerCase()}:${value}`)
    .sort()
    .join('\n');
  const head = stringToBytes(`${request.method} ${request.url}\n${headers}\n\n`);
  return bytesToHex(sha256(concatBytes([head, request.body ?? new Uint8Array(0)])));
}

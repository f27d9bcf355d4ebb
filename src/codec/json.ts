/**
 * JSON encoding and decoding
 */

import { bytesToString, stringToBytes } from '../utils/encoding';
import type { DecoderSettings, EncoderSettings } from './settings';
import { applyDecoderKeys, prepareValue } from './values';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export function encodeJson(value: unknown, settings: EncoderSettings): Uint8Array {
  const prepared = prepareValue(value, settings, { binary: 'base64', dropNull: false });
  return stringToBytes(JSON.stringify(prepared));
}

/**
 * Parse a JSON body
 *
 * @throws SyntaxError when the body is empty or not JSON
 */
export function decodeJson(body: Uint8Array, settings: DecoderSettings): unknown {
  const text = bytesToString(body);
  if (text.trim().length === 0) {
    throw new SyntaxError('Empty response body');
  }
  return applyDecoderKeys(JSON.parse(text), settings);
}

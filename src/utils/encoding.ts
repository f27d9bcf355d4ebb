/**
 * Encoding utilities for hex, base64 and UTF-8 conversions
 */

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8');

/**
 * Convert a byte array to a hex string
 * @returns Hexadecimal string (lowercase, no prefix)
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Convert a byte array to a base64 string
 */
export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Convert a UTF-8 string to a byte array
 */
export function stringToBytes(str: string): Uint8Array {
  return utf8Encoder.encode(str);
}

/**
 * Convert a byte array to a UTF-8 string
 */
export function bytesToString(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/**
 * Join byte chunks into one array
 */
export function concatBytes(chunks: Uint8Array[], totalLength?: number): Uint8Array {
  const length = totalLength ?? chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const joined = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    joined.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return joined;
}

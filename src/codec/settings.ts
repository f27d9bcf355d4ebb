/**
 * Encoder and decoder settings
 *
 * A fresh copy of the defaults is handed to the service's configure hooks
 * once per request, so a hook can adjust it without affecting other requests.
 */

export type DateEncodingStrategy = 'iso8601' | 'secondsSince1970' | 'millisecondsSince1970';

export type KeyEncodingStrategy = 'useDefaultKeys' | 'convertToSnakeCase';

export type KeyDecodingStrategy = 'useDefaultKeys' | 'convertFromSnakeCase';

export interface EncoderSettings {
  dateEncoding: DateEncodingStrategy;
  keyEncoding: KeyEncodingStrategy;
  /** Emit object keys in sorted order instead of insertion order */
  sortKeys: boolean;
  /** Element wrapping XML request bodies */
  xmlRootElement: string;
}

export interface DecoderSettings {
  keyDecoding: KeyDecodingStrategy;
  /** A document with a single root element decodes to that element's content */
  xmlUnwrapRoot: boolean;
  /** Convert numeric and boolean XML text to numbers and booleans */
  xmlParseValues: boolean;
}

export const DEFAULT_ENCODER_SETTINGS: Readonly<EncoderSettings> = Object.freeze({
  dateEncoding: 'iso8601',
  keyEncoding: 'useDefaultKeys',
  sortKeys: false,
  xmlRootElement: 'request',
});

export const DEFAULT_DECODER_SETTINGS: Readonly<DecoderSettings> = Object.freeze({
  keyDecoding: 'useDefaultKeys',
  xmlUnwrapRoot: true,
  xmlParseValues: true,
});

export function createEncoderSettings(): EncoderSettings {
  return { ...DEFAULT_ENCODER_SETTINGS };
}

export function createDecoderSettings(): DecoderSettings {
  return { ...DEFAULT_DECODER_SETTINGS };
}

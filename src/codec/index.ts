/**
 * Codec exports and format dispatch
 */

import type { ZodTypeAny } from 'zod';
import type { InputFormat, OutputFormat } from '../api/endpoints';
import { encodeFormData, encodeFormUrlEncoded, encodeUrlQuery, FORM_URL_ENCODED_CONTENT_TYPE } from './form';
import { decodeJson, encodeJson, JSON_CONTENT_TYPE } from './json';
import type { DecoderSettings, EncoderSettings } from './settings';
import { decodeXml, encodeXml, XML_CONTENT_TYPE } from './xml';

/** Where encoded input ends up on the request */
export type EncodedInput =
  | { placement: 'query' }
  | { placement: 'body'; body: Uint8Array; contentType: string };

/**
 * Encode input for the given format. URL query input is written straight
 * into `url`; every other format produces a body.
 */
export async function encodeInput(
  format: InputFormat,
  value: unknown,
  url: URL,
  settings: EncoderSettings
): Promise<EncodedInput> {
  switch (format) {
    case 'json':
      return { placement: 'body', body: encodeJson(value, settings), contentType: JSON_CONTENT_TYPE };
    case 'urlQuery':
      encodeUrlQuery(url, value, settings);
      return { placement: 'query' };
    case 'formURLEncoded':
      return {
        placement: 'body',
        body: encodeFormUrlEncoded(value, settings),
        contentType: FORM_URL_ENCODED_CONTENT_TYPE,
      };
    case 'formData':
      return { placement: 'body', ...(await encodeFormData(value, settings)) };
    case 'xml':
      return { placement: 'body', body: encodeXml(value, settings), contentType: XML_CONTENT_TYPE };
  }
}

/**
 * Decode a response body. The schema the result will be checked against
 * guides XML decoding; JSON carries its own types.
 */
export function decodeBody(
  format: OutputFormat,
  body: Uint8Array,
  settings: DecoderSettings,
  schema?: ZodTypeAny
): unknown {
  switch (format) {
    case 'json':
      return decodeJson(body, settings);
    case 'xml':
      return decodeXml(body, settings, schema);
  }
}

export function acceptHeader(format: OutputFormat): string {
  return format === 'xml' ? 'application/xml' : 'application/json';
}

export { FormFile } from './form-file';
export { flattenFields, encodeFormData, encodeFormUrlEncoded, encodeUrlQuery } from './form';
export type { FieldValue, FormField, MultipartBody } from './form';
export { encodeJson, decodeJson, JSON_CONTENT_TYPE } from './json';
export { encodeXml, decodeXml, XML_CONTENT_TYPE } from './xml';
export { FORM_URL_ENCODED_CONTENT_TYPE } from './form';
export {
  DEFAULT_ENCODER_SETTINGS,
  DEFAULT_DECODER_SETTINGS,
  createEncoderSettings,
  createDecoderSettings,
} from './settings';
export type {
  EncoderSettings,
  DecoderSettings,
  DateEncodingStrategy,
  KeyEncodingStrategy,
  KeyDecodingStrategy,
} from './settings';

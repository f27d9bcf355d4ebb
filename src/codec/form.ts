/**
 * Field-based encodings: URL query, form-urlencoded and multipart form-data
 *
 * Input is flattened into ordered name/value pairs. Nested objects use
 * `parent[child]` names, arrays repeat the name, null and undefined are
 * omitted.
 */

import { createEncodingError } from '../api/errors';
import { stringToBytes } from '../utils/encoding';
import { FormFile } from './form-file';
import type { EncoderSettings } from './settings';
import { isRecord, prepareValue } from './values';

export const FORM_URL_ENCODED_CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=utf-8';

export type FieldValue = string | Uint8Array | FormFile;

export type FormField = [name: string, value: FieldValue];

function flattenInto(name: string, value: unknown, fields: FormField[]): void {
  if (value === null || value === undefined) {
    return;
  }
  if (value instanceof Uint8Array || value instanceof FormFile) {
    fields.push([name, value]);
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      flattenInto(name, item, fields);
    }
    return;
  }
  if (isRecord(value)) {
    for (const [key, field] of Object.entries(value)) {
      flattenInto(`${name}[${key}]`, field, fields);
    }
    return;
  }
  switch (typeof value) {
    case 'string':
      fields.push([name, value]);
      return;
    case 'number':
    case 'boolean':
    case 'bigint':
      fields.push([name, String(value)]);
      return;
    default:
      throw createEncodingError(`Field "${name}" cannot be encoded as a form value`);
  }
}

/**
 * Flatten an input object into ordered form fields
 */
export function flattenFields(value: unknown, settings: EncoderSettings): FormField[] {
  const prepared = prepareValue(value, settings, { binary: 'keep', dropNull: true });
  if (!isRecord(prepared)) {
    throw createEncodingError('Form and query input must be an object');
  }

  const fields: FormField[] = [];
  for (const [key, field] of Object.entries(prepared)) {
    flattenInto(key, field, fields);
  }
  return fields;
}

function textFields(value: unknown, settings: EncoderSettings): Array<[string, string]> {
  return flattenFields(value, settings).map(([name, field]): [string, string] => {
    if (typeof field !== 'string') {
      throw createEncodingError(`Field "${name}" holds binary data; use the formData input format`);
    }
    return [name, field];
  });
}

/**
 * Append input fields to the URL's query string
 */
export function encodeUrlQuery(url: URL, value: unknown, settings: EncoderSettings): void {
  for (const [name, field] of textFields(value, settings)) {
    url.searchParams.append(name, field);
  }
}

export function encodeFormUrlEncoded(value: unknown, settings: EncoderSettings): Uint8Array {
  return stringToBytes(new URLSearchParams(textFields(value, settings)).toString());
}

export interface MultipartBody {
  body: Uint8Array;
  contentType: string;
}

/**
 * Encode fields as multipart/form-data. The boundary is generated per call,
 * so it is the only part of the body that differs between two encodings of
 * the same input.
 */
export async function encodeFormData(
  value: unknown,
  settings: EncoderSettings
): Promise<MultipartBody> {
  const form = new FormData();
  for (const [name, field] of flattenFields(value, settings)) {
    if (typeof field === 'string') {
      form.append(name, field);
    } else if (field instanceof FormFile) {
      form.append(name, new Blob([field.content], { type: field.contentType }), field.filename);
    } else {
      form.append(name, new Blob([field], { type: 'application/octet-stream' }), name);
    }
  }

  const serialized = new Response(form);
  const contentType = serialized.headers.get('content-type');
  if (!contentType) {
    throw createEncodingError('Multipart encoder produced no content type');
  }
  return {
    body: new Uint8Array(await serialized.arrayBuffer()),
    contentType,
  };
}

/**
 * Value preparation shared by every encoder, and key conversion shared by
 * every decoder.
 */

import { bytesToBase64 } from '../utils/encoding';
import { FormFile } from './form-file';
import type {
  DateEncodingStrategy,
  DecoderSettings,
  EncoderSettings,
  KeyEncodingStrategy,
} from './settings';

export interface PrepareOptions {
  /** 'keep' leaves Uint8Array and FormFile values for multipart encoding */
  binary: 'keep' | 'base64';
  dropNull: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toSnakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

export function fromSnakeCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

function encodeKey(key: string, strategy: KeyEncodingStrategy): string {
  return strategy === 'convertToSnakeCase' ? toSnakeCase(key) : key;
}

function encodeDate(date: Date, strategy: DateEncodingStrategy): string | number {
  switch (strategy) {
    case 'iso8601':
      return date.toISOString();
    case 'secondsSince1970':
      return date.getTime() / 1000;
    case 'millisecondsSince1970':
      return date.getTime();
  }
}

/**
 * Apply date, key and binary strategies, dropping undefined fields.
 * Key order is insertion order unless settings.sortKeys is set.
 */
export function prepareValue(
  value: unknown,
  settings: EncoderSettings,
  options: PrepareOptions
): unknown {
  if (value instanceof Date) {
    return encodeDate(value, settings.dateEncoding);
  }
  if (value instanceof FormFile) {
    return options.binary === 'keep' ? value : bytesToBase64(value.content);
  }
  if (value instanceof Uint8Array) {
    return options.binary === 'keep' ? value : bytesToBase64(value);
  }
  if (Array.isArray(value)) {
    return value
      .filter((item) => item !== undefined && !(options.dropNull && item === null))
      .map((item) => prepareValue(item, settings, options));
  }
  if (isRecord(value)) {
    const keys = Object.keys(value);
    if (settings.sortKeys) {
      keys.sort();
    }
    const prepared: Record<string, unknown> = {};
    for (const key of keys) {
      const field = value[key];
      if (field === undefined || (options.dropNull && field === null)) {
        continue;
      }
      prepared[encodeKey(key, settings.keyEncoding)] = prepareValue(field, settings, options);
    }
    return prepared;
  }
  return value;
}

function camelCaseKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(camelCaseKeys);
  }
  if (isRecord(value)) {
    const decoded: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      decoded[fromSnakeCase(key)] = camelCaseKeys(field);
    }
    return decoded;
  }
  return value;
}

export function applyDecoderKeys(value: unknown, settings: DecoderSettings): unknown {
  return settings.keyDecoding === 'convertFromSnakeCase' ? camelCaseKeys(value) : value;
}

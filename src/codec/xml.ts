/**
 * XML encoding and decoding
 *
 * Request bodies are wrapped in settings.xmlRootElement. Attributes are
 * ignored in both directions. XML cannot tell a one-item list from a single
 * value, or text from numbers, so decoding takes those from the schema.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  ZodArray,
  ZodBoolean,
  ZodBranded,
  ZodCatch,
  ZodDate,
  ZodDefault,
  ZodEffects,
  ZodEnum,
  ZodLazy,
  ZodLiteral,
  ZodNativeEnum,
  ZodNullable,
  ZodNumber,
  ZodObject,
  ZodOptional,
  ZodReadonly,
  ZodRecord,
  ZodString,
} from 'zod';
import type { ZodRawShape, ZodTypeAny } from 'zod';
import { bytesToString, stringToBytes } from '../utils/encoding';
import type { DecoderSettings, EncoderSettings } from './settings';
import { applyDecoderKeys, isRecord, prepareValue } from './values';

export const XML_CONTENT_TYPE = 'application/xml; charset=utf-8';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const builder = new XMLBuilder({
  ignoreAttributes: true,
  format: false,
  suppressEmptyNode: false,
});

export function encodeXml(value: unknown, settings: EncoderSettings): Uint8Array {
  const prepared = prepareValue(value, settings, { binary: 'base64', dropNull: true });
  const document: string = builder.build({ [settings.xmlRootElement]: prepared });
  return stringToBytes(XML_DECLARATION + document);
}

function parseDocument(text: string, parseValues: boolean): unknown {
  const parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: parseValues,
    trimValues: true,
  });
  return parser.parse(text);
}

function unwrapRoot(document: unknown, settings: DecoderSettings): unknown {
  if (settings.xmlUnwrapRoot && isRecord(document)) {
    const roots = Object.keys(document);
    if (roots.length === 1) {
      return document[roots[0]];
    }
  }
  return document;
}

function asList(value: unknown): unknown[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function toNumber(raw: unknown): unknown {
  if (typeof raw !== 'string' || raw.trim() === '') {
    return raw;
  }
  const value = Number(raw);
  return Number.isNaN(value) ? raw : value;
}

function toBoolean(raw: unknown): unknown {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return raw;
}

/**
 * Shape a parsed document after a schema. `raw` holds element text as
 * written; `typed` is the same document with values parsed per the decoder
 * settings and is used wherever the schema gives no guidance. Repeated,
 * single and missing elements all become arrays where the schema expects one.
 */
function conform(schema: ZodTypeAny, raw: unknown, typed: unknown): unknown {
  if (schema instanceof ZodOptional) {
    return raw === undefined ? undefined : conform(schema.unwrap(), raw, typed);
  }
  if (schema instanceof ZodDefault) {
    return raw === undefined ? undefined : conform(schema.removeDefault(), raw, typed);
  }
  if (schema instanceof ZodNullable || schema instanceof ZodReadonly || schema instanceof ZodBranded) {
    return conform(schema.unwrap(), raw, typed);
  }
  if (schema instanceof ZodCatch) {
    return conform(schema.removeCatch(), raw, typed);
  }
  if (schema instanceof ZodEffects) {
    return conform(schema.innerType(), raw, typed);
  }
  if (schema instanceof ZodLazy) {
    return conform(schema.schema, raw, typed);
  }

  if (schema instanceof ZodArray) {
    const rawItems = asList(raw);
    const typedItems = asList(typed);
    const element: ZodTypeAny = schema.element;
    return rawItems.map((item, index) => conform(element, item, typedItems[index]));
  }
  if (schema instanceof ZodObject) {
    // An element with no children parses as empty text
    const rawFields = isRecord(raw) ? raw : raw === '' ? {} : undefined;
    if (!rawFields) {
      return typed;
    }
    const typedFields = isRecord(typed) ? typed : {};
    const shape: ZodRawShape = schema.shape;
    const fields: Record<string, unknown> = { ...typedFields };
    for (const [key, field] of Object.entries(shape)) {
      const value = conform(field, rawFields[key], typedFields[key]);
      if (value === undefined) {
        delete fields[key];
      } else {
        fields[key] = value;
      }
    }
    return fields;
  }
  if (schema instanceof ZodRecord) {
    if (!isRecord(raw) || !isRecord(typed)) {
      return typed;
    }
    const valueSchema: ZodTypeAny = schema.valueSchema;
    const fields: Record<string, unknown> = {};
    for (const key of Object.keys(raw)) {
      fields[key] = conform(valueSchema, raw[key], typed[key]);
    }
    return fields;
  }

  if (schema instanceof ZodNumber) {
    return toNumber(raw);
  }
  if (schema instanceof ZodBoolean) {
    return toBoolean(raw);
  }
  if (schema instanceof ZodLiteral) {
    const literal: unknown = schema.value;
    if (typeof literal === 'number') return toNumber(raw);
    if (typeof literal === 'boolean') return toBoolean(raw);
    return raw;
  }
  if (
    schema instanceof ZodString ||
    schema instanceof ZodEnum ||
    schema instanceof ZodNativeEnum ||
    schema instanceof ZodDate
  ) {
    return raw;
  }
  return typed;
}

/**
 * Parse an XML body. With a schema, element text is kept as written except
 * where the schema expects a number or boolean, and arrays keep their length.
 *
 * @throws SyntaxError when the body is empty or not well-formed
 */
export function decodeXml(body: Uint8Array, settings: DecoderSettings, schema?: ZodTypeAny): unknown {
  const text = bytesToString(body);
  if (text.trim().length === 0) {
    throw new SyntaxError('Empty response body');
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new SyntaxError(`${msg} (line ${line}, column ${col})`);
  }

  const typed = applyDecoderKeys(
    unwrapRoot(parseDocument(text, settings.xmlParseValues), settings),
    settings
  );
  if (!schema) {
    return typed;
  }

  const raw = applyDecoderKeys(unwrapRoot(parseDocument(text, false), settings), settings);
  return conform(schema, raw, typed);
}

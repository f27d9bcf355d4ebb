import { describe, it, expect } from 'vitest';
import { RequestErrorCode } from '../api/errors';
import { bytesToString, stringToBytes } from '../utils/encoding';
import { encodeFormData, encodeFormUrlEncoded, encodeUrlQuery, flattenFields } from './form';
import { FormFile } from './form-file';
import { createEncoderSettings } from './settings';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('flattenFields', () => {
  it('should flatten nested objects and repeat array names', () => {
    const fields = flattenFields(
      { name: 'a b', tags: ['x', 'y'], filter: { min: 1, max: 2 }, skip: null, flag: true },
      createEncoderSettings()
    );

    expect(fields).toEqual([
      ['name', 'a b'],
      ['tags', 'x'],
      ['tags', 'y'],
      ['filter[min]', '1'],
      ['filter[max]', '2'],
      ['flag', 'true'],
    ]);
  });

  it('should apply the date strategy', () => {
    const settings = { ...createEncoderSettings(), dateEncoding: 'secondsSince1970' as const };

    const fields = flattenFields({ since: new Date('2024-01-02T03:04:05.000Z') }, settings);

    expect(fields).toEqual([['since', '1704164645']]);
  });

  it('should require an object at the top level', () => {
    expect(thrownBy(() => flattenFields('plain', createEncoderSettings()))).toMatchObject({
      code: RequestErrorCode.ENCODING,
      message: 'Form and query input must be an object',
    });
  });
});

describe('encodeUrlQuery', () => {
  it('should append fields after the existing query', () => {
    const url = new URL('https://example.com/search?v=1');

    encodeUrlQuery(url, { q: 'a b', page: 2 }, createEncoderSettings());

    expect(url.toString()).toBe('https://example.com/search?v=1&q=a+b&page=2');
  });
});

describe('encodeFormUrlEncoded', () => {
  it('should percent-encode reserved characters', () => {
    const body = encodeFormUrlEncoded({ username: 'u@x', password: 'p&q' }, createEncoderSettings());

    expect(bytesToString(body)).toBe('username=u%40x&password=p%26q');
  });

  it('should refuse binary fields', () => {
    const error = thrownBy(() =>
      encodeFormUrlEncoded({ avatar: new Uint8Array([1]) }, createEncoderSettings())
    );

    expect(error).toMatchObject({
      code: RequestErrorCode.ENCODING,
      message: 'Field "avatar" holds binary data; use the formData input format',
    });
  });
});

describe('encodeFormData', () => {
  it('should produce text fields and file parts', async () => {
    const { body, contentType } = await encodeFormData(
      { title: 'report', file: new FormFile(stringToBytes('hello'), 'hello.txt', 'text/plain') },
      createEncoderSettings()
    );

    expect(contentType).toMatch(/^multipart\/form-data; boundary=/);

    const form = await new Response(body, { headers: { 'content-type': contentType } }).formData();
    expect(form.get('title')).toBe('report');

    const file = form.get('file');
    if (file === null || typeof file === 'string') {
      throw new Error('expected a file part');
    }
    expect(file.name).toBe('hello.txt');
    expect(file.type).toBe('text/plain');
    expect(await file.text()).toBe('hello');
  });

  it('should differ between two encodings only by the boundary', async () => {
    const input = { title: 'report', count: 3 };

    const first = await encodeFormData(input, createEncoderSettings());
    const second = await encodeFormData(input, createEncoderSettings());

    const firstBoundary = first.contentType.split('boundary=')[1];
    const secondBoundary = second.contentType.split('boundary=')[1];
    expect(firstBoundary).not.toBe(secondBoundary);
    expect(bytesToString(first.body).replaceAll(firstBoundary, 'BOUNDARY')).toBe(
      bytesToString(second.body).replaceAll(secondBoundary, 'BOUNDARY')
    );
  });
});

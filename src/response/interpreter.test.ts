import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { emptyEndpoint, outEndpoint } from '../api/endpoints';
import { RequestErrorCode } from '../api/errors';
import { defineService } from '../service/service';
import type { DecoderSettings } from '../codec/settings';
import type { ServiceOptions } from '../service/types';
import type { Transport, TransportResponse } from '../transport/types';
import { stringToBytes } from '../utils/encoding';
import { interpretDownload, interpretResponse } from './interpreter';
import type { TransportOutcome } from './interpreter';

// ============ Test helpers ============

function createMockTransport(): Transport {
  return { send: vi.fn(), download: vi.fn() };
}

function createService<B>(options: Partial<ServiceOptions<B, { message: string }>> = {}) {
  return defineService({
    baseURL: 'https://example.com',
    transport: createMockTransport(),
    errorResponse: z.object({ message: z.string() }),
    ...options,
  });
}

function respond(status: number, body: string, headers: Record<string, string> = {}): TransportOutcome<TransportResponse> {
  return { ok: true, response: { status, headers, body: stringToBytes(body) } };
}

const status = emptyEndpoint({ path: '/status' });
const token = outEndpoint({ path: '/token', output: z.object({ token: z.string() }) });

// ============ Tests ============

describe('interpretResponse', () => {
  it('should turn a transport failure into a connectivity error', async () => {
    const outcome = await interpretResponse(token, createService(), {
      ok: false,
      error: new Error('ECONNREFUSED'),
    });

    expect(outcome).toMatchObject({
      ok: false,
      error: { code: RequestErrorCode.CONNECTIVITY, message: 'Network error: ECONNREFUSED' },
    });
  });

  it('should succeed with no value for an endpoint without output', async () => {
    expect(await interpretResponse(status, createService(), respond(204, ''))).toEqual({
      ok: true,
      value: undefined,
    });
  });

  it('should decode the output of a successful response', async () => {
    expect(await interpretResponse(token, createService(), respond(200, '{"token":"abc"}'))).toEqual({
      ok: true,
      value: { token: 'abc' },
    });
  });

  it('should decode XML output', async () => {
    const user = outEndpoint({
      path: '/user',
      output: z.object({ name: z.string(), age: z.number() }),
      outputFormat: 'xml',
    });

    const outcome = await interpretResponse(
      user,
      createService(),
      respond(200, '<user><name>Ada</name><age>36</age></user>')
    );

    expect(outcome).toEqual({ ok: true, value: { name: 'Ada', age: 36 } });
  });

  it('should report where the output did not match', async () => {
    const outcome = await interpretResponse(token, createService(), respond(200, '{"token":5}'));

    expect(outcome).toMatchObject({
      ok: false,
      error: {
        code: RequestErrorCode.DECODING,
        message: 'Unexpected response: token: Expected string, received number',
        issues: [{ path: 'token', message: 'Expected string, received number' }],
        status: 200,
        bodyExcerpt: '{"token":5}',
      },
    });
  });

  it('should report unparseable output', async () => {
    const outcome = await interpretResponse(token, createService(), respond(200, ''));

    expect(outcome).toMatchObject({
      ok: false,
      error: {
        code: RequestErrorCode.DECODING,
        message: 'Could not parse response as json: Empty response body',
      },
    });
  });

  describe('failure statuses', () => {
    it('should decode the service error shape', async () => {
      const outcome = await interpretResponse(
        token,
        createService(),
        respond(401, '{"message":"bad credentials"}')
      );

      expect(outcome).toMatchObject({
        ok: false,
        error: {
          code: RequestErrorCode.SERVICE,
          status: 401,
          message: 'bad credentials',
          serviceResponse: { message: 'bad credentials' },
        },
      });
    });

    it('should fall back to the status when the body is not the error shape', async () => {
      const outcome = await interpretResponse(token, createService(), respond(500, 'oops'));

      expect(outcome).toMatchObject({
        ok: false,
        error: { code: RequestErrorCode.STATUS, status: 500, bodyExcerpt: 'oops' },
      });
    });

    it('should fall back to the status when the service has no error shape', async () => {
      const service = createService({ errorResponse: undefined });

      const outcome = await interpretResponse(status, service, respond(404, '{"message":"gone"}'));

      expect(outcome).toMatchObject({
        ok: false,
        error: { code: RequestErrorCode.STATUS, status: 404, message: 'Unexpected status 404' },
      });
    });
  });

  describe('response hook', () => {
    it('should reject the response when the hook throws', async () => {
      const service = createService({
        hooks: {
          validateResponse(head) {
            if (!head.headers['x-request-id']) {
              throw new Error('missing request id');
            }
          },
        },
      });

      const outcome = await interpretResponse(token, service, respond(200, '{"token":"abc"}'));

      expect(outcome).toMatchObject({
        ok: false,
        error: {
          code: RequestErrorCode.VALIDATION,
          status: 200,
          message: 'Response rejected: missing request id',
        },
      });
    });

    it('should let the hook accept a non-2xx status', async () => {
      const service = createService({ hooks: { validateResponse: (head) => head.status === 304 } });

      expect(await interpretResponse(status, service, respond(304, ''))).toEqual({
        ok: true,
        value: undefined,
      });
    });

    it('should let the hook refuse a 2xx status', async () => {
      const service = createService({ hooks: { validateResponse: () => false } });

      const outcome = await interpretResponse(status, service, respond(200, 'fine'));

      expect(outcome).toMatchObject({ ok: false, error: { code: RequestErrorCode.STATUS, status: 200 } });
    });
  });

  describe('basic response', () => {
    const envelope = z.object({ status: z.literal('ok') });
    const items = outEndpoint({
      path: '/items',
      output: z.object({ status: z.string(), items: z.array(z.number()) }),
    });

    it('should decode the envelope and then the output from the same body', async () => {
      const validateBasicResponse = vi.fn();
      const service = createService({ basicResponse: envelope, hooks: { validateBasicResponse } });

      const outcome = await interpretResponse(items, service, respond(200, '{"status":"ok","items":[1,2]}'));

      expect(outcome).toEqual({ ok: true, value: { status: 'ok', items: [1, 2] } });
      expect(validateBasicResponse).toHaveBeenCalledWith({ status: 'ok' }, items);
    });

    it('should fail when the envelope does not match', async () => {
      const service = createService({ basicResponse: envelope });

      const outcome = await interpretResponse(items, service, respond(200, '{"status":"error"}'));

      expect(outcome).toMatchObject({
        ok: false,
        error: { code: RequestErrorCode.DECODING, issues: [{ path: 'status' }] },
      });
    });

    it('should fail when the envelope hook rejects it', async () => {
      const service = createService({
        basicResponse: envelope,
        hooks: {
          validateBasicResponse() {
            throw new Error('maintenance mode');
          },
        },
      });

      const outcome = await interpretResponse(items, service, respond(200, '{"status":"ok","items":[]}'));

      expect(outcome).toMatchObject({
        ok: false,
        error: { code: RequestErrorCode.VALIDATION, message: 'Response rejected: maintenance mode' },
      });
    });

    it('should check the envelope before the status', async () => {
      const service = createService({ basicResponse: envelope });

      const outcome = await interpretResponse(items, service, respond(500, 'oops'));

      expect(outcome).toMatchObject({ ok: false, error: { code: RequestErrorCode.DECODING } });
    });
  });

  describe('decoder hook', () => {
    it('should configure decoding once per response', async () => {
      const configureDecoder = vi.fn((settings: DecoderSettings) => {
        settings.keyDecoding = 'convertFromSnakeCase';
      });
      const service = createService({
        basicResponse: z.object({ requestId: z.string() }),
        hooks: { configureDecoder },
      });
      const endpoint = outEndpoint({
        path: '/session',
        output: z.object({ requestId: z.string(), accessToken: z.string() }),
      });

      const outcome = await interpretResponse(
        endpoint,
        service,
        respond(200, '{"request_id":"r1","access_token":"abc"}')
      );

      expect(outcome).toEqual({ ok: true, value: { requestId: 'r1', accessToken: 'abc' } });
      expect(configureDecoder).toHaveBeenCalledTimes(1);
    });

    it('should not configure decoding for an endpoint without output', async () => {
      const configureDecoder = vi.fn();
      const service = createService({ hooks: { configureDecoder } });

      await interpretResponse(status, service, respond(200, ''));

      expect(configureDecoder).not.toHaveBeenCalled();
    });

    it('should report a failing decoder hook as a configuration error', async () => {
      const service = createService({
        hooks: {
          configureDecoder() {
            throw new Error('broken');
          },
        },
      });

      const outcome = await interpretResponse(token, service, respond(200, '{"token":"abc"}'));

      expect(outcome).toMatchObject({
        ok: false,
        error: { code: RequestErrorCode.CONFIGURATION, message: 'Decoder configuration failed' },
      });
    });
  });
});

describe('interpretDownload', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'interpreter-test-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  async function downloaded(content: string): Promise<string> {
    const filePath = join(directory, 'body');
    await writeFile(filePath, content);
    return filePath;
  }

  it('should hand over the file of a successful download', async () => {
    const filePath = await downloaded('report contents');

    const outcome = await interpretDownload(token, createService(), {
      ok: true,
      response: { status: 200, headers: {}, filePath },
    });

    expect(outcome).toEqual({ ok: true, value: filePath });
    expect(await readFile(filePath, 'utf8')).toBe('report contents');
  });

  it('should ignore the basic response envelope', async () => {
    const filePath = await downloaded('not json');
    const service = createService({ basicResponse: z.object({ status: z.literal('ok') }) });

    const outcome = await interpretDownload(token, service, {
      ok: true,
      response: { status: 200, headers: {}, filePath },
    });

    expect(outcome).toEqual({ ok: true, value: filePath });
  });

  it('should decode the error shape from the file and remove it', async () => {
    const filePath = await downloaded('{"message":"expired"}');

    const outcome = await interpretDownload(token, createService(), {
      ok: true,
      response: { status: 401, headers: {}, filePath },
    });

    expect(outcome).toMatchObject({
      ok: false,
      error: { code: RequestErrorCode.SERVICE, message: 'expired' },
    });
    expect(existsSync(filePath)).toBe(false);
  });

  it('should remove the file when the response hook rejects it', async () => {
    const filePath = await downloaded('anything');
    const service = createService({
      hooks: {
        validateResponse() {
          throw new Error('unsigned');
        },
      },
    });

    const outcome = await interpretDownload(token, service, {
      ok: true,
      response: { status: 200, headers: {}, filePath },
    });

    expect(outcome).toMatchObject({ ok: false, error: { code: RequestErrorCode.VALIDATION } });
    expect(existsSync(filePath)).toBe(false);
  });
});

import { z } from 'zod';
import { describe, expect, it } from 'vitest';
import { ZosmfRestClient, isHttpError } from '../../../src/rest/zosmf-rest-client.js';
import { ValidationError, ZosmfRemoteError } from '../../../src/utils/errors.js';
import { createLogger } from '../../../src/utils/logger.js';
import { StubExecutor, TEST_AUTH, TEST_CONNECTION } from '../../support/stub-executor.js';

const pingSchema = z.object({ ok: z.boolean() });

describe('isHttpError', () => {
  it('accepts only 2xx', () => {
    expect(isHttpError(199)).toBe(true);
    expect(isHttpError(200)).toBe(false);
    expect(isHttpError(204)).toBe(false);
    expect(isHttpError(300)).toBe(true);
    expect(isHttpError(500)).toBe(true);
  });
});

describe('ZosmfRestClient', () => {
  it('validates the connection', () => {
    const executor = new StubExecutor();
    expect(() => new ZosmfRestClient({ ...TEST_CONNECTION, host: '' }, executor)).toThrow('host not specified');
    expect(() => new ZosmfRestClient({ ...TEST_CONNECTION, password: '' }, executor)).toThrow(
      'password not specified',
    );
    expect(() => new ZosmfRestClient({ ...TEST_CONNECTION, port: 0 }, executor)).toThrow(
      'port must be an integer between 1 and 65535, got 0',
    );
  });

  it('builds URLs with a base path and query', () => {
    const client = new ZosmfRestClient({ ...TEST_CONNECTION, basePath: '/gateway/' }, new StubExecutor());
    expect(client.buildUrl('/zosmf/info', { a: 'x y', skipped: undefined, n: 3 })).toBe(
      'https://zos.example.test:10443/gateway/zosmf/info?a=x+y&n=3',
    );
  });

  it('rejects relative paths', () => {
    const client = new ZosmfRestClient(TEST_CONNECTION, new StubExecutor());
    expect(() => client.buildUrl('zosmf/info')).toThrow(ValidationError);
  });

  it('sends auth, CSRF and content headers', async () => {
    const executor = new StubExecutor().respond(200, { ok: true });
    const client = new ZosmfRestClient(TEST_CONNECTION, executor);

    await expect(client.putJson('/zosmf/thing', { a: 1 }, pingSchema)).resolves.toEqual({ ok: true });

    expect(executor.lastRequest).toEqual({
      method: 'PUT',
      url: 'https://zos.example.test:10443/zosmf/thing',
      headers: {
        Authorization: TEST_AUTH,
        'X-CSRF-ZOSMF-HEADER': 'true',
        'Content-Type': 'application/json',
      },
      body: '{"a":1}',
      signal: undefined,
    });
  });

  it('lets callers add headers', async () => {
    const executor = new StubExecutor().respond(200, 'text');
    const client = new ZosmfRestClient(TEST_CONNECTION, executor);

    await client.getText('/zosmf/thing', { headers: { 'X-IBM-Record-Range': '0-99' } });

    expect(executor.lastRequest?.headers['X-IBM-Record-Range']).toBe('0-99');
  });

  it('maps non-2xx responses to ZosmfRemoteError', async () => {
    const executor = new StubExecutor().respond(401, '', 'Unauthorized');
    const client = new ZosmfRestClient(TEST_CONNECTION, executor);

    const error = await client.getText('/zosmf/thing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ZosmfRemoteError);
    expect(error).toMatchObject({
      message: 'GET https://zos.example.test:10443/zosmf/thing returned 401 Unauthorized',
      statusCode: 401,
      statusText: 'Unauthorized',
      body: '',
    });
    if (!(error instanceof ZosmfRemoteError)) return;
    expect(error.isUnauthorized).toBe(true);
    expect(error.isServerError).toBe(false);
  });

  it('truncates long bodies in the message but keeps them on the error', async () => {
    const body = 'x'.repeat(600);
    const executor = new StubExecutor().respond(500, body, 'Internal Server Error');
    const client = new ZosmfRestClient(TEST_CONNECTION, executor);

    const error = await client.deleteJson('/zosmf/thing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ZosmfRemoteError);
    if (!(error instanceof ZosmfRemoteError)) return;
    expect(error.message).toBe(
      `DELETE https://zos.example.test:10443/zosmf/thing returned 500 Internal Server Error: ${'x'.repeat(500)}`,
    );
    expect(error.body).toBe(body);
    expect(error.isServerError).toBe(true);
  });

  it('rejects unparsable JSON', async () => {
    const executor = new StubExecutor().respond(200, 'not json');
    const client = new ZosmfRestClient(TEST_CONNECTION, executor);

    await expect(client.getJson('/zosmf/thing', pingSchema)).rejects.toThrow(/^Unparsable JSON response: /);
  });

  it('rejects JSON of the wrong shape', async () => {
    const executor = new StubExecutor().respond(200, { ok: 'yes' });
    const client = new ZosmfRestClient(TEST_CONNECTION, executor);

    await expect(client.getJson('/zosmf/thing', pingSchema)).rejects.toThrow(
      'Unexpected response shape: ok: Expected boolean, received string',
    );
  });

  it('logs each request at debug level', async () => {
    const lines: string[] = [];
    const logger = createLogger('debug', { scope: 'rest', sink: (line) => lines.push(line) });
    const executor = new StubExecutor().respond(200, 'ok');
    const client = new ZosmfRestClient(TEST_CONNECTION, executor, logger);

    await client.getText('/zosmf/thing');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/DEBUG \[rest\]: GET https:\/\/zos\.example\.test:10443\/zosmf\/thing$/);
  });

  it('never logs credentials', async () => {
    const lines: string[] = [];
    const logger = createLogger('debug', { sink: (line) => lines.push(line) });
    const executor = new StubExecutor().respond(403, 'denied', 'Forbidden');
    const client = new ZosmfRestClient(TEST_CONNECTION, executor, logger);

    await client.getText('/zosmf/thing').catch((e: unknown) => e);

    expect(lines).toHaveLength(3);
    expect(lines.some((l) => l.includes('test-secret') || l.includes(TEST_AUTH))).toBe(false);
  });
});

import type { IncomingMessage, ServerResponse } from 'node:http';
import { createServer } from 'node:http';
import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import { DomeneshopClient } from '../../src/client.js';
import {
  AuthenticationRejectedError,
  RemoteUnavailableError,
  ValidationFailedError,
} from '../../src/errors.js';

let server: ReturnType<typeof createServer>;
let baseUrl = '';
let lastMethod = '';
let lastUrl = '';
let lastHeaders: Record<string, string | string[] | undefined> = {};
let lastBody = '';
let responseStatus = 200;
let responseBody = '[]';

function client(): DomeneshopClient {
  return new DomeneshopClient(
    { token: 'test-token', secret: 'test-secret' },
    { baseUrl, timeoutMs: 2000 },
  );
}

beforeAll(async () => {
  server = createServer((req: IncomingMessage, res: ServerResponse) => {
    lastMethod = req.method ?? '';
    lastUrl = req.url ?? '';
    lastHeaders = req.headers;
    let body = '';
    req.on('data', (chunk: Buffer) => {
      body += chunk.toString();
    });
    req.on('end', () => {
      lastBody = body;
      if (responseStatus === 204) {
        res.writeHead(204);
        res.end();
        return;
      }
      res.writeHead(responseStatus, { 'Content-Type': 'application/json' });
      res.end(responseBody);
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      if (addr && typeof addr === 'object') {
        baseUrl = `http://127.0.0.1:${addr.port}/v0`;
      }
      resolve();
    });
  });
});

afterEach(() => {
  responseStatus = 200;
  responseBody = '[]';
});

afterAll(() => {
  server.close();
});

describe('DomeneshopClient against a local server', () => {
  it('authenticates every request with HTTP Basic', async () => {
    await client().listDomains();

    const expected = `Basic ${Buffer.from('test-token:test-secret').toString('base64')}`;
    expect(lastHeaders.authorization).toBe(expected);
    expect(lastHeaders.accept).toBe('application/json');
  });

  it('passes list filters as query parameters', async () => {
    responseBody = JSON.stringify([{ id: 1, domain: 'example.no' }]);

    const domains = await client().listDomains('.no');
    expect(lastMethod).toBe('GET');
    expect(lastUrl).toBe('/v0/domains?domain=.no');
    expect(domains).toEqual([{ id: 1, domain: 'example.no' }]);

    await client().listDnsRecords(1, { type: 'MX' });
    expect(lastUrl).toBe('/v0/domains/1/dns?type=MX');
  });

  it('sends JSON bodies and returns the new record id', async () => {
    responseStatus = 201;
    responseBody = JSON.stringify({ id: 7 });

    const created = await client().createDnsRecord(1, {
      type: 'A',
      host: 'www',
      data: '192.0.2.1',
      ttl: 3600,
    });

    expect(created).toEqual({ id: 7 });
    expect(lastMethod).toBe('POST');
    expect(lastUrl).toBe('/v0/domains/1/dns');
    expect(lastHeaders['content-type']).toBe('application/json');
    expect(JSON.parse(lastBody)).toEqual({ type: 'A', host: 'www', data: '192.0.2.1', ttl: 3600 });
  });

  it('escapes forward hosts in the path', async () => {
    responseStatus = 204;
    await client().deleteForward(3, '@');
    expect(lastMethod).toBe('DELETE');
    expect(lastUrl).toBe('/v0/domains/3/forwards/%40');
  });

  it('returns null for empty responses', async () => {
    responseStatus = 204;
    expect(await client().call('DELETE', '/domains/1/dns/9')).toBeNull();
  });

  it('calls the dynamic DNS endpoint with hostname and address', async () => {
    responseStatus = 204;
    await client().updateDynDns('home.example.com', '192.0.2.1');
    expect(lastUrl).toBe('/v0/dyndns/update?hostname=home.example.com&myip=192.0.2.1');
  });

  it('maps 401 to AuthenticationRejected with the remote message', async () => {
    responseStatus = 401;
    responseBody = JSON.stringify({ code: 'unauthorized', help: 'Invalid credentials' });

    const err = await client()
      .listDomains()
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthenticationRejectedError);
    expect(err).toMatchObject({ status: 401, message: 'Invalid credentials' });
  });

  it('maps 403 to AuthenticationRejected', async () => {
    responseStatus = 403;
    responseBody = '';

    const err = await client()
      .listDomains()
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthenticationRejectedError);
    expect(err).toMatchObject({
      status: 403,
      message: 'authentication rejected (HTTP 403); check token and secret',
    });
  });

  it('maps 404 and 400 to ValidationFailed', async () => {
    responseStatus = 404;
    responseBody = '';
    await expect(client().getDomain(99)).rejects.toThrow(
      new ValidationFailedError('resource not found (HTTP 404)'),
    );

    responseStatus = 400;
    responseBody = JSON.stringify({ code: 'dns:validation', help: 'Invalid TTL' });
    const err = await client()
      .getDomain(1)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationFailedError);
    expect(err).toMatchObject({ status: 400, message: 'Invalid TTL' });
  });

  it('maps 5xx to RemoteUnavailable', async () => {
    responseStatus = 503;
    responseBody = '';
    const err = await client()
      .listInvoices()
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteUnavailableError);
    expect(err).toMatchObject({ status: 503, message: 'remote server error (HTTP 503)' });
  });

  it('maps a refused connection to RemoteUnavailable', async () => {
    const unreachable = new DomeneshopClient(
      { token: 'test-token', secret: 'test-secret' },
      { baseUrl: 'http://127.0.0.1:1/v0', timeoutMs: 2000 },
    );
    await expect(unreachable.listDomains()).rejects.toThrow(RemoteUnavailableError);
  });
});

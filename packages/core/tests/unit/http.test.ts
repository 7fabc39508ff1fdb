import { describe, expect, it } from 'vitest';
import { RemoteUnavailableError } from '../../src/errors.js';
import type { FetchFn } from '../../src/http.js';
import { apiFetch, basicAuthHeader, buildUrl, remoteMessage } from '../../src/http.js';

const credentials = { token: 'test-token', secret: 'test-secret' };

describe('basicAuthHeader', () => {
  it('encodes token:secret', () => {
    expect(basicAuthHeader(credentials)).toBe(
      `Basic ${Buffer.from('test-token:test-secret').toString('base64')}`,
    );
  });
});

describe('buildUrl', () => {
  it('skips empty query values', () => {
    expect(
      buildUrl('https://api.example.test/v0', '/domains/1/dns', {
        host: 'www',
        type: undefined,
        extra: '',
      }),
    ).toBe('https://api.example.test/v0/domains/1/dns?host=www');
  });

  it('leaves the path alone without a query', () => {
    expect(buildUrl('https://api.example.test/v0', '/invoices', {})).toBe(
      'https://api.example.test/v0/invoices',
    );
  });
});

describe('remoteMessage', () => {
  it('prefers help, then error, then message', () => {
    expect(remoteMessage({ code: 'dns:exists', help: 'Record already exists' })).toBe(
      'Record already exists',
    );
    expect(remoteMessage({ error: 'nope', message: 'ignored' })).toBe('nope');
    expect(remoteMessage({ code: 'forbidden' })).toBe('forbidden');
  });

  it('uses short plain-text bodies', () => {
    expect(remoteMessage('  Bad Gateway \n')).toBe('Bad Gateway');
    expect(remoteMessage('x'.repeat(400))).toHaveLength(300);
    expect(remoteMessage(null)).toBeUndefined();
  });
});

describe('apiFetch transport failures', () => {
  const config = (fetch: FetchFn) => ({
    baseUrl: 'https://api.example.test/v0',
    credentials,
    timeoutMs: 250,
    fetch,
  });

  it('reports a timeout', async () => {
    const timingOut: FetchFn = async () => {
      const err = new Error('The operation was aborted due to timeout');
      err.name = 'TimeoutError';
      throw err;
    };

    await expect(apiFetch('GET', '/domains', {}, config(timingOut))).rejects.toThrow(
      new RemoteUnavailableError('request timed out after 250 ms'),
    );
  });

  it('reports the underlying network cause', async () => {
    const refusing: FetchFn = async () => {
      throw new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND') });
    };

    await expect(apiFetch('GET', '/domains', {}, config(refusing))).rejects.toThrow(
      'could not connect to api.example.test: getaddrinfo ENOTFOUND',
    );
  });
});

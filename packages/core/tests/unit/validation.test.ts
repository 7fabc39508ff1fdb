import { describe, expect, it } from 'vitest';
import { ValidationFailedError } from '../../src/errors.js';
import {
  isValidCredentialFormat,
  normalizeAccountName,
  parseHostnames,
  parseId,
  parseIntOption,
  parseInvoiceStatus,
  parseIpList,
  validateDnsRecord,
  validateForward,
} from '../../src/validation.js';

describe('validateDnsRecord', () => {
  it('normalizes type and applies the default TTL', () => {
    expect(validateDnsRecord({ type: 'a', host: 'www', data: '192.0.2.10' })).toEqual({
      type: 'A',
      host: 'www',
      data: '192.0.2.10',
      ttl: 3600,
    });
  });

  it('rejects unknown record types', () => {
    expect(() => validateDnsRecord({ type: 'PTR', host: 'www', data: 'x' })).toThrow(
      'invalid record type "PTR"; expected one of A, AAAA, CNAME, MX, TXT, SRV',
    );
  });

  it('requires host and data', () => {
    expect(() => validateDnsRecord({ type: 'TXT', host: ' ', data: 'v=spf1' })).toThrow(
      'host is required (use @ for the zone apex)',
    );
    expect(() => validateDnsRecord({ type: 'TXT', host: '@', data: '' })).toThrow(
      'data is required',
    );
  });

  it('requires a priority for MX', () => {
    expect(() => validateDnsRecord({ type: 'MX', host: '@', data: 'mail.example.com' })).toThrow(
      'MX records require --priority',
    );
    expect(
      validateDnsRecord({ type: 'MX', host: '@', data: 'mail.example.com', priority: 10 }),
    ).toEqual({ type: 'MX', host: '@', data: 'mail.example.com', ttl: 3600, priority: 10 });
  });

  it('names every missing SRV field', () => {
    expect(() =>
      validateDnsRecord({ type: 'SRV', host: '_sip._tcp', data: 'sip.example.com', priority: 10 }),
    ).toThrow('SRV records require --priority, --weight and --port (missing: weight, port)');
  });

  it('keeps SRV fields when complete', () => {
    const record = validateDnsRecord({
      type: 'SRV',
      host: '_sip._tcp',
      data: 'sip.example.com',
      ttl: 300,
      priority: 10,
      weight: 5,
      port: 5060,
    });
    expect(record).toEqual({
      type: 'SRV',
      host: '_sip._tcp',
      data: 'sip.example.com',
      ttl: 300,
      priority: 10,
      weight: 5,
      port: 5060,
    });
  });

  it('drops fields the type does not use', () => {
    const record = validateDnsRecord({
      type: 'CNAME',
      host: 'www',
      data: 'example.com',
      priority: 10,
    });
    expect('priority' in record).toBe(false);
  });

  it('checks address families and TTL range', () => {
    expect(() => validateDnsRecord({ type: 'A', host: 'www', data: '2001:db8::1' })).toThrow(
      'A record data must be an IPv4 address, got "2001:db8::1"',
    );
    expect(() => validateDnsRecord({ type: 'AAAA', host: 'www', data: '192.0.2.1' })).toThrow(
      ValidationFailedError,
    );
    expect(() => validateDnsRecord({ type: 'TXT', host: '@', data: 'x', ttl: 0 })).toThrow(
      'ttl must be an integer between 1 and 2147483647',
    );
  });
});

describe('parseId', () => {
  it('accepts positive integers', () => {
    expect(parseId('12', 'domain id')).toBe(12);
    expect(parseId(7, 'record id')).toBe(7);
  });

  it('rejects zero, negatives and text', () => {
    expect(() => parseId('0', 'domain id')).toThrow(
      'domain id must be a positive integer, got "0"',
    );
    expect(() => parseId('-3', 'domain id')).toThrow(ValidationFailedError);
    expect(() => parseId('abc', 'invoice id')).toThrow(
      'invoice id must be a positive integer, got "abc"',
    );
  });
});

describe('parseIntOption', () => {
  it('passes through absent flags', () => {
    expect(parseIntOption(undefined, 'ttl')).toBeUndefined();
  });

  it('parses integers and rejects the rest', () => {
    expect(parseIntOption('300', 'ttl')).toBe(300);
    expect(() => parseIntOption('1.5', 'ttl')).toThrow('ttl must be an integer, got "1.5"');
  });
});

describe('validateForward', () => {
  it('defaults frame to false', () => {
    expect(validateForward({ host: 'www', url: 'https://example.org' })).toEqual({
      host: 'www',
      url: 'https://example.org',
      frame: false,
    });
  });

  it('requires an absolute http(s) URL', () => {
    expect(() => validateForward({ host: 'www', url: 'example.org' })).toThrow(
      'url must be an absolute URL including https://, got "example.org"',
    );
    expect(() => validateForward({ host: 'www', url: 'ftp://example.org' })).toThrow(
      'url must use http or https, got "ftp:"',
    );
  });
});

describe('list and enum parsing', () => {
  it('parses invoice status case-insensitively', () => {
    expect(parseInvoiceStatus('PAID')).toBe('paid');
    expect(parseInvoiceStatus(undefined)).toBeUndefined();
    expect(() => parseInvoiceStatus('overdue')).toThrow(
      'invalid invoice status "overdue"; expected one of unpaid, paid, settled',
    );
  });

  it('splits hostnames and rejects invalid ones', () => {
    expect(parseHostnames('www.example.com, api.example.com')).toEqual([
      'www.example.com',
      'api.example.com',
    ]);
    expect(() => parseHostnames(' , ')).toThrow('at least one hostname is required');
    expect(() => parseHostnames('bad host')).toThrow('invalid hostname "bad host"');
  });

  it('accepts mixed IPv4 and IPv6 lists', () => {
    expect(parseIpList('192.0.2.1, 2001:db8::1')).toEqual(['192.0.2.1', '2001:db8::1']);
    expect(parseIpList(undefined)).toEqual([]);
    expect(() => parseIpList('300.1.1.1')).toThrow('invalid IP address "300.1.1.1"');
  });
});

describe('credential and account names', () => {
  it('checks token format', () => {
    expect(isValidCredentialFormat('test-token_01')).toBe(true);
    expect(isValidCredentialFormat('short')).toBe(false);
    expect(isValidCredentialFormat('has a space')).toBe(false);
  });

  it('trims account names and rejects empty ones', () => {
    expect(normalizeAccountName('  work ')).toBe('work');
    expect(() => normalizeAccountName('   ')).toThrow('account name cannot be empty');
  });
});

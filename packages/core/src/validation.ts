/**
 * Input validation performed before any request leaves the machine.
 */

import { isIP } from 'node:net';
import { ValidationFailedError } from './errors.js';
import type { DnsRecordInput, DnsRecordType, Forward, InvoiceStatus } from './types.js';
import { DNS_RECORD_TYPES, INVOICE_STATUSES } from './types.js';

export const DEFAULT_TTL = 3600;

/** Loosely typed record fields as they arrive from flags or JSON bodies. */
export interface DnsRecordDraft {
  type?: string;
  host?: string;
  data?: string;
  ttl?: number;
  priority?: number;
  weight?: number;
  port?: number;
}

function isDnsRecordType(value: string): value is DnsRecordType {
  return (DNS_RECORD_TYPES as readonly string[]).includes(value);
}

function isInvoiceStatus(value: string): value is InvoiceStatus {
  return (INVOICE_STATUSES as readonly string[]).includes(value);
}

/**
 * Parse a numeric path id (domain, record, invoice).
 */
export function parseId(value: string | number, label: string): number {
  const n = typeof value === 'number' ? value : /^\d+$/.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isInteger(n) || n <= 0) {
    throw new ValidationFailedError(`${label} must be a positive integer, got "${value}"`);
  }
  return n;
}

/**
 * Parse an integer flag value. Returns undefined when the flag was not given.
 */
export function parseIntOption(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ValidationFailedError(`${label} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function checkRange(value: number | undefined, label: string, min: number, max: number): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationFailedError(`${label} must be an integer between ${min} and ${max}`);
  }
}

export function parseDnsRecordType(value: string | undefined): DnsRecordType | undefined {
  if (value === undefined || value === '') return undefined;
  const type = value.trim().toUpperCase();
  if (!isDnsRecordType(type)) {
    throw new ValidationFailedError(
      `invalid record type "${value}"; expected one of ${DNS_RECORD_TYPES.join(', ')}`,
    );
  }
  return type;
}

/**
 * Validate a DNS record and return the exact body to submit.
 *
 * MX needs a priority; SRV needs priority, weight and port. Type-specific
 * fields are dropped for types that do not use them.
 */
export function validateDnsRecord(draft: DnsRecordDraft): DnsRecordInput {
  const type = parseDnsRecordType(draft.type ?? '');
  if (!type) throw new ValidationFailedError('record type is required');

  const host = draft.host?.trim() ?? '';
  if (!host) throw new ValidationFailedError('host is required (use @ for the zone apex)');

  const data = draft.data?.trim() ?? '';
  if (!data) throw new ValidationFailedError('data is required');

  const ttl = draft.ttl ?? DEFAULT_TTL;
  checkRange(ttl, 'ttl', 1, 2_147_483_647);

  const record: DnsRecordInput = { type, host, data, ttl };

  if (type === 'A' && isIP(data) !== 4) {
    throw new ValidationFailedError(`A record data must be an IPv4 address, got "${data}"`);
  }
  if (type === 'AAAA' && isIP(data) !== 6) {
    throw new ValidationFailedError(`AAAA record data must be an IPv6 address, got "${data}"`);
  }

  if (type === 'MX') {
    if (draft.priority === undefined) {
      throw new ValidationFailedError('MX records require --priority');
    }
    checkRange(draft.priority, 'priority', 0, 65535);
    record.priority = draft.priority;
  }

  if (type === 'SRV') {
    const missing = (['priority', 'weight', 'port'] as const).filter((f) => draft[f] === undefined);
    if (missing.length > 0) {
      throw new ValidationFailedError(
        `SRV records require --priority, --weight and --port (missing: ${missing.join(', ')})`,
      );
    }
    checkRange(draft.priority, 'priority', 0, 65535);
    checkRange(draft.weight, 'weight', 0, 65535);
    checkRange(draft.port, 'port', 0, 65535);
    record.priority = draft.priority;
    record.weight = draft.weight;
    record.port = draft.port;
  }

  return record;
}

export function validateForward(draft: { host?: string; url?: string; frame?: boolean }): Forward {
  const host = draft.host?.trim() ?? '';
  if (!host) throw new ValidationFailedError('host is required (use @ for the zone apex)');

  const url = draft.url?.trim() ?? '';
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationFailedError(`url must be an absolute URL including https://, got "${url}"`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationFailedError(`url must use http or https, got "${parsed.protocol}"`);
  }

  return { host, url, frame: draft.frame ?? false };
}

export function parseInvoiceStatus(value: string | undefined): InvoiceStatus | undefined {
  if (value === undefined || value === '') return undefined;
  const status = value.trim().toLowerCase();
  if (!isInvoiceStatus(status)) {
    throw new ValidationFailedError(
      `invalid invoice status "${value}"; expected one of ${INVOICE_STATUSES.join(', ')}`,
    );
  }
  return status;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function parseHostnames(value: string): string[] {
  const hostnames = splitList(value);
  if (hostnames.length === 0) {
    throw new ValidationFailedError('at least one hostname is required');
  }
  for (const h of hostnames) {
    if (!/^[a-zA-Z0-9.*_-]+$/.test(h)) {
      throw new ValidationFailedError(`invalid hostname "${h}"`);
    }
  }
  return hostnames;
}

/**
 * Parse a comma-separated list of IPv4/IPv6 addresses.
 */
export function parseIpList(value: string | undefined): string[] {
  if (value === undefined) return [];
  const ips = splitList(value);
  for (const ip of ips) {
    if (isIP(ip) === 0) {
      throw new ValidationFailedError(`invalid IP address "${ip}"`);
    }
  }
  return ips;
}

const CREDENTIAL_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * API tokens and secrets are 10–200 characters of [A-Za-z0-9_-].
 */
export function isValidCredentialFormat(value: string): boolean {
  return value.length >= 10 && value.length <= 200 && CREDENTIAL_PATTERN.test(value);
}

export function normalizeAccountName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) throw new ValidationFailedError('account name cannot be empty');
  return trimmed;
}

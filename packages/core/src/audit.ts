/**
 * Audit log for security-relevant events.
 *
 * One line per event, appended to a local file:
 *
 *   2026-01-31 14:02:11 | INFO | DNS_CREATED | Domain: 12 | Record: 34 | type: A
 *
 * Writes are best-effort: a failing write is reported once on stderr and
 * never reaches the caller.
 */

import { appendFileSync, existsSync, readFileSync } from 'node:fs';

export const AuditEvent = {
  AUTH_SUCCESS: 'AUTH_SUCCESS',
  AUTH_FAILURE: 'AUTH_FAILURE',
  CREDENTIALS_SAVED: 'CREDENTIALS_SAVED',
  CREDENTIALS_DELETED: 'CREDENTIALS_DELETED',
  CREDENTIALS_MIGRATED: 'CREDENTIALS_MIGRATED',
  ACCOUNT_CREATED: 'ACCOUNT_CREATED',
  ACCOUNT_DELETED: 'ACCOUNT_DELETED',
  ACCOUNT_RENAMED: 'ACCOUNT_RENAMED',
  ACCOUNT_SELECTED: 'ACCOUNT_SELECTED',
  DNS_CREATED: 'DNS_CREATED',
  DNS_UPDATED: 'DNS_UPDATED',
  DNS_DELETED: 'DNS_DELETED',
  FORWARD_CREATED: 'FORWARD_CREATED',
  FORWARD_UPDATED: 'FORWARD_UPDATED',
  FORWARD_DELETED: 'FORWARD_DELETED',
  RATE_LIMIT_HIT: 'RATE_LIMIT_HIT',
  CSRF_FAILURE: 'CSRF_FAILURE',
  INVALID_INPUT: 'INVALID_INPUT',
  OPERATION_CANCELLED: 'OPERATION_CANCELLED',
} as const;

export type AuditEventType = (typeof AuditEvent)[keyof typeof AuditEvent];

export type ChangeAction = 'create' | 'update' | 'delete';

const WARNING_EVENTS: ReadonlySet<AuditEventType> = new Set([
  AuditEvent.AUTH_FAILURE,
  AuditEvent.RATE_LIMIT_HIT,
  AuditEvent.CSRF_FAILURE,
  AuditEvent.INVALID_INPUT,
]);

const USER_AGENT_MAX = 100;

export interface AuditEntryParams {
  event: AuditEventType;
  message?: string;
  ipAddress?: string;
  userAgent?: string;
  domainId?: number;
  recordId?: number;
  extra?: Record<string, string | number>;
}

export interface AuditLogOptions {
  file: string;
  enabled?: boolean;
  now?: () => Date;
  /** Diagnostic channel for write failures. Defaults to stderr. */
  onWriteError?: (err: unknown) => void;
}

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Render an entry as a single log line (no trailing newline).
 */
export function formatEntry(params: AuditEntryParams, at: Date): string {
  const parts: string[] = [params.event];

  if (params.message) parts.push(params.message);
  if (params.ipAddress) parts.push(`IP: ${params.ipAddress}`);
  if (params.userAgent) {
    const ua =
      params.userAgent.length > USER_AGENT_MAX
        ? `${params.userAgent.slice(0, USER_AGENT_MAX)}...`
        : params.userAgent;
    parts.push(`UA: ${ua}`);
  }
  if (params.domainId !== undefined) parts.push(`Domain: ${params.domainId}`);
  if (params.recordId !== undefined) parts.push(`Record: ${params.recordId}`);
  for (const [key, value] of Object.entries(params.extra ?? {})) {
    parts.push(`${key}: ${value}`);
  }

  const level = WARNING_EVENTS.has(params.event) ? 'WARNING' : 'INFO';
  // Keep one event per line whatever the caller passed in.
  const message = parts.join(' | ').replace(/[\r\n]+/g, ' ');
  return `${formatTimestamp(at)} | ${level} | ${message}`;
}

export class AuditLog {
  readonly file: string;
  private readonly enabled: boolean;
  private readonly now: () => Date;
  private readonly onWriteError: (err: unknown) => void;
  private reported = false;

  constructor(options: AuditLogOptions) {
    this.file = options.file;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
    this.onWriteError =
      options.onWriteError ??
      ((err) => {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`Warning: could not write audit log ${this.file}: ${reason}`);
      });
  }

  record(params: AuditEntryParams): void {
    if (!this.enabled) return;
    try {
      appendFileSync(this.file, `${formatEntry(params, this.now())}\n`, {
        encoding: 'utf-8',
        mode: 0o600,
      });
    } catch (err) {
      if (!this.reported) {
        this.reported = true;
        this.onWriteError(err);
      }
    }
  }

  authSuccess(ipAddress?: string, userAgent?: string): void {
    this.record({ event: AuditEvent.AUTH_SUCCESS, ipAddress, userAgent });
  }

  authFailure(reason: string, ipAddress?: string, userAgent?: string): void {
    this.record({ event: AuditEvent.AUTH_FAILURE, message: reason, ipAddress, userAgent });
  }

  credentialsSaved(storage: string, ipAddress?: string): void {
    this.record({ event: AuditEvent.CREDENTIALS_SAVED, message: `Storage: ${storage}`, ipAddress });
  }

  credentialsDeleted(ipAddress?: string): void {
    this.record({ event: AuditEvent.CREDENTIALS_DELETED, ipAddress });
  }

  credentialsMigrated(from: string, to: string): void {
    this.record({ event: AuditEvent.CREDENTIALS_MIGRATED, message: `From: ${from} To: ${to}` });
  }

  accountCreated(name: string, storage: string, ipAddress?: string): void {
    this.record({
      event: AuditEvent.ACCOUNT_CREATED,
      message: `Account: ${name} Storage: ${storage}`,
      ipAddress,
    });
  }

  accountDeleted(name: string, ipAddress?: string): void {
    this.record({ event: AuditEvent.ACCOUNT_DELETED, message: `Account: ${name}`, ipAddress });
  }

  accountRenamed(from: string, to: string, ipAddress?: string): void {
    this.record({
      event: AuditEvent.ACCOUNT_RENAMED,
      message: `From: ${from} To: ${to}`,
      ipAddress,
    });
  }

  accountSelected(name: string, ipAddress?: string): void {
    this.record({ event: AuditEvent.ACCOUNT_SELECTED, message: `Account: ${name}`, ipAddress });
  }

  dnsChange(
    action: ChangeAction,
    domainId: number,
    recordId?: number,
    recordType?: string,
    ipAddress?: string,
  ): void {
    const event = {
      create: AuditEvent.DNS_CREATED,
      update: AuditEvent.DNS_UPDATED,
      delete: AuditEvent.DNS_DELETED,
    }[action];
    this.record({
      event,
      domainId,
      recordId,
      ipAddress,
      extra: recordType ? { type: recordType } : undefined,
    });
  }

  forwardChange(action: ChangeAction, domainId: number, host: string, ipAddress?: string): void {
    const event = {
      create: AuditEvent.FORWARD_CREATED,
      update: AuditEvent.FORWARD_UPDATED,
      delete: AuditEvent.FORWARD_DELETED,
    }[action];
    this.record({ event, message: `Host: ${host}`, domainId, ipAddress });
  }

  rateLimitHit(ipAddress: string, endpoint: string): void {
    this.record({ event: AuditEvent.RATE_LIMIT_HIT, message: `Endpoint: ${endpoint}`, ipAddress });
  }

  csrfFailure(ipAddress?: string, endpoint?: string): void {
    this.record({
      event: AuditEvent.CSRF_FAILURE,
      message: endpoint ? `Endpoint: ${endpoint}` : undefined,
      ipAddress,
    });
  }

  invalidInput(field: string, reason?: string, ipAddress?: string): void {
    const message = reason ? `Field: ${field} Reason: ${reason}` : `Field: ${field}`;
    this.record({ event: AuditEvent.INVALID_INPUT, message, ipAddress });
  }

  cancelled(operation: string): void {
    this.record({ event: AuditEvent.OPERATION_CANCELLED, message: `Operation: ${operation}` });
  }

  /**
   * Most recent lines, newest first.
   */
  recent(count = 50): string[] {
    if (count <= 0 || !existsSync(this.file)) return [];
    const lines = readFileSync(this.file, 'utf-8')
      .split('\n')
      .filter((line) => line.trim() !== '');
    return lines.slice(-count).reverse();
  }
}

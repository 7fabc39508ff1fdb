import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AccountStore, AuditLog, CredentialsFile, loadConfig } from '@dshop/core';
import type { KeychainBackend } from '@dshop/core';
import type { Hono } from 'hono';
import { API_BASE_URL, FakeApi } from '../../../core/tests/helpers/fake-api.js';
import { createApp } from '../../src/app.js';
import type { GuiEnv } from '../../src/env.js';

export const CSRF_TOKEN = 'test-csrf-token';

export interface GuiHarnessOptions {
  /** Put test-token/test-secret in the environment. Defaults to true. */
  envCredentials?: boolean;
  keychain?: KeychainBackend;
}

export interface RequestOptions {
  body?: unknown;
  /** Send the X-CSRF-Token header. Defaults to true. */
  csrf?: boolean;
}

export interface GuiHarness {
  app: Hono<GuiEnv>;
  api: FakeApi;
  accounts: AccountStore;
  /** Request log lines. */
  logs: string[];
  request(method: string, path: string, options?: RequestOptions): Promise<Response>;
  /** Move the rate limiter's clock forward. */
  advance(ms: number): void;
  auditEvents(): string[];
  cleanup(): void;
}

export function createGuiHarness(options: GuiHarnessOptions = {}): GuiHarness {
  const dir = mkdtempSync(join(tmpdir(), 'dshop-gui-'));
  const env: NodeJS.ProcessEnv = {
    DOMENESHOP_API_URL: API_BASE_URL,
    DOMENESHOP_CREDENTIALS_FILE: join(dir, 'credentials.json'),
    DOMENESHOP_AUDIT_LOG: join(dir, 'audit.log'),
    DOMENESHOP_IP_ECHO_URL: 'https://ip.example.test/',
  };
  if (options.envCredentials !== false) {
    env.DOMENESHOP_TOKEN = 'test-token';
    env.DOMENESHOP_SECRET = 'test-secret';
  }

  const config = loadConfig(env);
  const api = new FakeApi();
  const audit = new AuditLog({ file: config.auditLogFile });
  const accounts = new AccountStore({
    file: new CredentialsFile(config.credentialsFile),
    keychain: options.keychain ?? null,
  });
  const logs: string[] = [];
  let clock = 1_700_000_000_000;

  const app = createApp({
    config,
    env,
    audit,
    accounts,
    fetch: api.fetch,
    csrfToken: CSRF_TOKEN,
    now: () => clock,
    log: (line) => logs.push(line),
  });

  return {
    app,
    api,
    accounts,
    logs,
    request: async (method, path, { body, csrf = true } = {}) => {
      const headers: Record<string, string> = {};
      if (csrf) headers['X-CSRF-Token'] = CSRF_TOKEN;
      if (body !== undefined) headers['Content-Type'] = 'application/json';
      return app.request(path, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    },
    advance: (ms) => {
      clock += ms;
    },
    auditEvents: () =>
      audit
        .recent()
        .reverse()
        .map((line) => line.split(' | ')[2] ?? ''),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

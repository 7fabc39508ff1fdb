/**
 * Process-wide GUI state: the CSRF token handed to the page and the
 * account the user activated.
 */

import { randomBytes } from 'node:crypto';
import {
  AuthenticationRejectedError,
  DomeneshopClient,
  defaultProviders,
  lookupPublicIp,
  resolveCredentials,
} from '@dshop/core';
import type {
  AccountStore,
  AuditLog,
  Credentials,
  DshopConfig,
  FetchFn,
  ResolvedCredentials,
} from '@dshop/core';

export interface GuiDeps {
  config: DshopConfig;
  env: NodeJS.ProcessEnv;
  audit: AuditLog;
  accounts: AccountStore;
  /** Overrides the global fetch for API and IP-echo calls. */
  fetch?: FetchFn;
  /** Fixed CSRF token; a random one is generated otherwise. */
  csrfToken?: string;
  /** Clock for the rate limiter, in milliseconds. */
  now?: () => number;
  /** Sink for the per-request log line. Defaults to console.log. */
  log?: (line: string) => void;
}

export class GuiSession {
  readonly csrfToken: string;
  activeAccount: string | null = null;

  constructor(readonly deps: GuiDeps) {
    this.csrfToken = deps.csrfToken ?? randomBytes(32).toString('hex');
  }

  get audit(): AuditLog {
    return this.deps.audit;
  }

  get accounts(): AccountStore {
    return this.deps.accounts;
  }

  clientFor(credentials: Credentials): DomeneshopClient {
    return new DomeneshopClient(credentials, {
      baseUrl: this.deps.config.apiBaseUrl,
      timeoutMs: this.deps.config.timeoutMs,
      fetch: this.deps.fetch,
    });
  }

  /**
   * Check a pair with one read, auditing a rejection with the caller's address.
   * Returns the number of domains the account can see.
   */
  async verify(credentials: Credentials, ip?: string, userAgent?: string): Promise<number> {
    let count: number;
    try {
      count = (await this.clientFor(credentials).listDomains()).length;
    } catch (err) {
      if (err instanceof AuthenticationRejectedError) {
        this.audit.authFailure(err.message, ip, userAgent);
      }
      throw err;
    }
    this.audit.authSuccess(ip, userAgent);
    return count;
  }

  /** Never prompts: the browser has no terminal to answer from. */
  credentials(): Promise<ResolvedCredentials> {
    return resolveCredentials(
      defaultProviders({ store: this.accounts, env: this.deps.env, audit: this.audit }),
      { account: this.activeAccount ?? undefined },
    );
  }

  async client(): Promise<DomeneshopClient> {
    return this.clientFor(await this.credentials());
  }

  publicIp(): Promise<string | null> {
    return lookupPublicIp(this.deps.config.ipEchoUrl, {
      timeoutMs: this.deps.config.timeoutMs,
      fetch: this.deps.fetch,
    });
  }
}

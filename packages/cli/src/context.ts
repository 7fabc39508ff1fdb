/**
 * Per-invocation state shared by every command: configuration, the account
 * store, the audit log, and the lazily resolved API client.
 */

import {
  AccountStore,
  AuditLog,
  CredentialsFile,
  DomeneshopClient,
  defaultProviders,
  loadConfig,
  platformKeychain,
  resolveCredentials,
} from '@dshop/core';
import type {
  Credentials,
  DshopConfig,
  FetchFn,
  Prompter,
  ResolvedCredentials,
} from '@dshop/core';
import type { Command } from 'commander';
import { TerminalPrompter } from './prompt.js';

export interface CliRuntime {
  config: DshopConfig;
  env: NodeJS.ProcessEnv;
  audit: AuditLog;
  accounts: AccountStore;
  prompter: Prompter;
  /** Whether a person can answer prompts (TTY on stdin, not CI). */
  interactive: boolean;
  /** Overrides the global fetch for API and IP-echo calls. */
  fetch?: FetchFn;
}

export interface GlobalOptions {
  json?: boolean;
  account?: string;
  /** False when --no-input was given. */
  input: boolean;
}

export function createRuntime(env: NodeJS.ProcessEnv = process.env): CliRuntime {
  const config = loadConfig(env);
  return {
    config,
    env,
    audit: new AuditLog({ file: config.auditLogFile, enabled: config.auditEnabled }),
    accounts: new AccountStore({
      file: new CredentialsFile(config.credentialsFile),
      keychain: config.keychainEnabled ? platformKeychain() : null,
    }),
    prompter: new TerminalPrompter(),
    interactive: Boolean(process.stdin.isTTY) && !env.CI,
  };
}

export class CommandContext {
  private resolved?: Promise<ResolvedCredentials>;

  constructor(
    readonly runtime: CliRuntime,
    readonly globals: GlobalOptions,
  ) {}

  get json(): boolean {
    return this.globals.json === true;
  }

  get audit(): AuditLog {
    return this.runtime.audit;
  }

  get accounts(): AccountStore {
    return this.runtime.accounts;
  }

  get prompter(): Prompter {
    return this.runtime.prompter;
  }

  get canPrompt(): boolean {
    return this.runtime.interactive && this.globals.input;
  }

  clientFor(credentials: Credentials): DomeneshopClient {
    return new DomeneshopClient(credentials, {
      baseUrl: this.runtime.config.apiBaseUrl,
      timeoutMs: this.runtime.config.timeoutMs,
      fetch: this.runtime.fetch,
    });
  }

  /** Checks a pair with one cheap read. */
  async verify(credentials: Credentials): Promise<void> {
    await this.clientFor(credentials).listDomains();
  }

  credentials(): Promise<ResolvedCredentials> {
    this.resolved ??= resolveCredentials(
      defaultProviders({
        store: this.accounts,
        env: this.runtime.env,
        audit: this.audit,
        prompter: this.canPrompt ? this.prompter : undefined,
        verify: this.canPrompt ? (creds) => this.verify(creds) : undefined,
      }),
      { account: this.globals.account },
    );
    return this.resolved;
  }

  async client(): Promise<DomeneshopClient> {
    return this.clientFor(await this.credentials());
  }
}

export function contextFor(runtime: CliRuntime, command: Command): CommandContext {
  return new CommandContext(runtime, command.optsWithGlobals<GlobalOptions>());
}

/**
 * Ends the command with a non-zero exit status after its output has been
 * printed. The top-level handler prints nothing more for it.
 */
export class ExitStatus extends Error {
  constructor(readonly code: number) {
    super(`exit ${code}`);
    this.name = 'ExitStatus';
  }
}

/**
 * Credential resolution: providers are tried in order, the first one that
 * yields a complete pair wins. Pairs are never merged across providers.
 */

import type { AuditLog } from '../audit.js';
import {
  AuthenticationRejectedError,
  CredentialsMissingError,
  ValidationFailedError,
} from '../errors.js';
import type { Prompter } from '../prompt.js';
import type { CredentialSource, Credentials, ResolvedCredentials } from '../types.js';
import { DEFAULT_ACCOUNT, type AccountStore } from './accounts.js';

export interface CredentialRequest {
  /** Account named on the command line or picked in the GUI. */
  account?: string;
}

export interface CredentialProvider {
  readonly source: CredentialSource;
  supply(request: CredentialRequest): Promise<ResolvedCredentials | null>;
}

export async function resolveCredentials(
  providers: readonly CredentialProvider[],
  request: CredentialRequest = {},
): Promise<ResolvedCredentials> {
  for (const provider of providers) {
    const credentials = await provider.supply(request);
    if (credentials) return credentials;
  }
  throw new CredentialsMissingError(
    'no API credentials found; set DOMENESHOP_TOKEN and DOMENESHOP_SECRET or run "dshop configure"',
  );
}

export class EnvironmentProvider implements CredentialProvider {
  readonly source = 'environment';

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly selector?: AccountSelector,
  ) {}

  async supply(request: CredentialRequest): Promise<ResolvedCredentials | null> {
    // A named account must exist even when the environment pair is used.
    if (request.account && this.selector) await this.selector.select(request.account);

    const token = this.env.DOMENESHOP_TOKEN;
    const secret = this.env.DOMENESHOP_SECRET;
    if (!token || !secret) return null;
    return { token, secret, source: this.source };
  }
}

export interface AccountSelectorOptions {
  /** Asks the user to pick among several accounts. Absent when prompting is not possible. */
  pick?: (names: string[]) => Promise<string>;
  audit?: AuditLog;
}

/**
 * Decides which stored account the keychain and file providers read.
 * The decision is made once and shared, so a picker prompts at most once.
 *
 * Resolves to null when the legacy single pair (or nothing) should be used.
 */
export class AccountSelector {
  private decision?: Promise<string | null>;

  constructor(
    private readonly store: AccountStore,
    private readonly options: AccountSelectorOptions = {},
  ) {}

  select(requested?: string): Promise<string | null> {
    this.decision ??= this.decide(requested);
    return this.decision;
  }

  private async decide(requested?: string): Promise<string | null> {
    const names = await this.store.list();

    if (requested) {
      if (!names.includes(requested)) {
        const available = names.length > 0 ? names.join(', ') : 'none';
        throw new ValidationFailedError(
          `account "${requested}" does not exist (available: ${available})`,
        );
      }
      return requested;
    }

    if (names.length <= 1) return names[0] ?? null;
    if (await this.store.legacyKeychainPair()) return null;

    if (!this.options.pick) {
      throw new CredentialsMissingError(
        `several accounts are configured (${names.join(', ')}); choose one with --account`,
      );
    }
    const chosen = await this.options.pick(names);
    this.options.audit?.accountSelected(chosen);
    return chosen;
  }
}

export class KeychainProvider implements CredentialProvider {
  readonly source = 'keychain';

  constructor(
    private readonly store: AccountStore,
    private readonly selector: AccountSelector,
  ) {}

  async supply(request: CredentialRequest): Promise<ResolvedCredentials | null> {
    if (!(await this.store.keychainAvailable())) return null;

    const account = await this.selector.select(request.account);
    if (account === null) {
      const legacy = await this.store.legacyKeychainPair();
      return legacy ? { ...legacy, source: this.source } : null;
    }

    const creds = await this.store.keychainCredentials(account);
    return creds ? { ...creds, source: this.source, account } : null;
  }
}

export class FileProvider implements CredentialProvider {
  readonly source = 'file';

  constructor(
    private readonly store: AccountStore,
    private readonly selector: AccountSelector,
  ) {}

  async supply(request: CredentialRequest): Promise<ResolvedCredentials | null> {
    const account = await this.selector.select(request.account);
    if (account === null) return null;

    const creds = this.store.fileCredentials(account);
    return creds ? { ...creds, source: this.source, account } : null;
  }
}

export interface InteractiveProviderOptions {
  prompter: Prompter;
  store: AccountStore;
  /** Checks a pair against the API; throws AuthenticationRejectedError when refused. */
  verify: (credentials: Credentials) => Promise<void>;
  audit?: AuditLog;
}

export class InteractiveProvider implements CredentialProvider {
  readonly source = 'interactive';

  constructor(private readonly options: InteractiveProviderOptions) {}

  async supply(): Promise<ResolvedCredentials | null> {
    const { prompter, store, verify, audit } = this.options;

    console.error('No stored credentials. Create an API token at https://domene.shop/admin?view=api');
    const token = (await prompter.ask('API token')).trim();
    const secret = (await prompter.askSecret('API secret')).trim();
    if (!token || !secret) return null;

    const credentials = { token, secret };
    try {
      await verify(credentials);
    } catch (err) {
      if (err instanceof AuthenticationRejectedError) {
        audit?.authFailure('interactive credentials rejected');
      }
      throw err;
    }
    audit?.authSuccess();

    if (!(await prompter.confirm('Save these credentials for later use?', true))) {
      return { ...credentials, source: this.source };
    }

    const account = await prompter.ask('Account name', DEFAULT_ACCOUNT);
    const keychain = store.keychainName;
    const preferKeychain =
      keychain !== null && (await store.keychainAvailable())
        ? await prompter.confirm(`Store in ${keychain}?`, true)
        : false;
    const storage = await store.save(account, credentials, { preferKeychain });
    audit?.credentialsSaved(storage);
    audit?.accountCreated(account.trim(), storage);
    console.error(`Saved account "${account.trim()}" (${storage}).`);

    return { ...credentials, source: this.source, account: account.trim() };
  }
}

export interface DefaultProvidersOptions {
  store: AccountStore;
  env?: NodeJS.ProcessEnv;
  audit?: AuditLog;
  /** Enables account picking and the interactive provider. */
  prompter?: Prompter;
  verify?: (credentials: Credentials) => Promise<void>;
}

/**
 * The standard chain: environment, keychain, file, then interactive prompting
 * when a prompter and a verifier are supplied.
 */
export function defaultProviders(options: DefaultProvidersOptions): CredentialProvider[] {
  const { store, env, audit, prompter, verify } = options;
  const selector = new AccountSelector(store, {
    audit,
    pick: prompter ? (names) => prompter.choose('Choose an account', names) : undefined,
  });

  const providers: CredentialProvider[] = [
    new EnvironmentProvider(env, selector),
    new KeychainProvider(store, selector),
    new FileProvider(store, selector),
  ];
  if (prompter && verify) {
    providers.push(new InteractiveProvider({ prompter, store, verify, audit }));
  }
  return providers;
}

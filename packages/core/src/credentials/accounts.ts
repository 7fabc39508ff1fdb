/**
 * Named API accounts, stored in the OS keychain when available and in the
 * credentials file otherwise.
 *
 * Keychain layout (service "domeneshop-cli"):
 *   <name>:token, <name>:secret   one pair per account
 *   _accounts                     JSON array of account names
 *   token, secret                 legacy single-account pair
 */

import { z } from 'zod';
import { ValidationFailedError } from '../errors.js';
import type { Credentials } from '../types.js';
import { normalizeAccountName } from '../validation.js';
import type { CredentialsFile } from './file-store.js';
import type { KeychainBackend } from './keychain.js';

/** Name given to a pair stored in one of the legacy single-account layouts. */
export const DEFAULT_ACCOUNT = 'Standard';

const ACCOUNT_LIST_KEY = '_accounts';
const LEGACY_TOKEN_KEY = 'token';
const LEGACY_SECRET_KEY = 'secret';

const accountListSchema = z.array(z.string());

export type StorageType = 'keychain' | 'file';

export type ActiveStorage = 'environment' | StorageType | 'none';

export interface StorageInfo {
  keychainAvailable: boolean;
  keychainBackend: string | null;
  fileExists: boolean;
  filePath: string;
  envConfigured: boolean;
  storageType: ActiveStorage;
  accountCount: number;
  accounts: string[];
  needsMigration: boolean;
}

export interface AccountStoreOptions {
  file: CredentialsFile;
  keychain: KeychainBackend | null;
  /** Reports keychain failures that were recovered from by falling back. */
  warn?: (message: string) => void;
}

function keyFor(account: string, part: 'token' | 'secret'): string {
  return `${account}:${part}`;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class AccountStore {
  private readonly file: CredentialsFile;
  private readonly keychain: KeychainBackend | null;
  private readonly warn: (message: string) => void;
  private availability?: Promise<boolean>;

  constructor(options: AccountStoreOptions) {
    this.file = options.file;
    this.keychain = options.keychain;
    this.warn = options.warn ?? ((message) => console.warn(`Warning: ${message}`));
  }

  get filePath(): string {
    return this.file.path;
  }

  get keychainName(): string | null {
    return this.keychain?.name ?? null;
  }

  keychainAvailable(): Promise<boolean> {
    if (!this.keychain) return Promise.resolve(false);
    this.availability ??= this.keychain.isAvailable();
    return this.availability;
  }

  /** The keychain backend, if it is usable on this machine. */
  private async usableKeychain(): Promise<KeychainBackend | null> {
    return this.keychain && (await this.keychainAvailable()) ? this.keychain : null;
  }

  private async keychainGet(key: string): Promise<string | null> {
    const keychain = await this.usableKeychain();
    if (!keychain) return null;
    try {
      return await keychain.get(key);
    } catch (err) {
      this.warn(`keychain lookup failed: ${reason(err)}`);
      return null;
    }
  }

  async keychainAccounts(): Promise<string[]> {
    const raw = await this.keychainGet(ACCOUNT_LIST_KEY);
    if (!raw) return [];
    try {
      const parsed = accountListSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : [];
    } catch {
      return [];
    }
  }

  private async saveKeychainAccounts(keychain: KeychainBackend, names: string[]): Promise<void> {
    await keychain.set(ACCOUNT_LIST_KEY, JSON.stringify(names));
  }

  private async keychainSave(
    keychain: KeychainBackend,
    name: string,
    creds: Credentials,
  ): Promise<void> {
    await keychain.set(keyFor(name, 'token'), creds.token);
    await keychain.set(keyFor(name, 'secret'), creds.secret);
    const names = await this.keychainAccounts();
    if (!names.includes(name)) {
      await this.saveKeychainAccounts(keychain, [...names, name]);
    }
  }

  private fileAccounts(): Record<string, Credentials> {
    return this.file.accounts(DEFAULT_ACCOUNT);
  }

  /**
   * All account names across keychain and file, sorted.
   */
  async list(): Promise<string[]> {
    const names = new Set(await this.keychainAccounts());
    for (const name of Object.keys(this.fileAccounts())) names.add(name);
    return [...names].sort();
  }

  async exists(name: string): Promise<boolean> {
    return (await this.list()).includes(name);
  }

  /**
   * Save an account. Uses the keychain when preferred and usable, the file
   * otherwise (including when a keychain write fails).
   */
  async save(
    name: string,
    creds: Credentials,
    options: { preferKeychain?: boolean } = {},
  ): Promise<StorageType> {
    const account = normalizeAccountName(name);
    const keychain = options.preferKeychain === false ? null : await this.usableKeychain();

    if (keychain) {
      try {
        await this.keychainSave(keychain, account, creds);
        return 'keychain';
      } catch (err) {
        this.warn(`could not save to keychain (${reason(err)}); using ${this.file.path}`);
      }
    }

    const accounts = this.fileAccounts();
    accounts[account] = { token: creds.token, secret: creds.secret };
    this.file.writeAccounts(accounts);
    return 'file';
  }

  async keychainCredentials(name: string): Promise<Credentials | null> {
    const token = await this.keychainGet(keyFor(name, 'token'));
    const secret = await this.keychainGet(keyFor(name, 'secret'));
    return token && secret ? { token, secret } : null;
  }

  fileCredentials(name: string): Credentials | null {
    const stored = this.fileAccounts()[name];
    return stored?.token && stored.secret ? { token: stored.token, secret: stored.secret } : null;
  }

  /**
   * Credentials for one account: keychain first, then file.
   */
  async load(name: string): Promise<Credentials | null> {
    if (!name) return null;
    return (await this.keychainCredentials(name)) ?? this.fileCredentials(name);
  }

  /**
   * Remove an account from both keychain and file.
   */
  async delete(name: string): Promise<boolean> {
    let deleted = false;

    const keychain = await this.usableKeychain();
    if (keychain) {
      const names = await this.keychainAccounts();
      const removedToken = await keychain.delete(keyFor(name, 'token'));
      const removedSecret = await keychain.delete(keyFor(name, 'secret'));
      if (names.includes(name)) {
        await this.saveKeychainAccounts(
          keychain,
          names.filter((n) => n !== name),
        );
      }
      deleted = removedToken || removedSecret || names.includes(name);
    }

    const data = this.file.read();
    if (data.kind === 'multi' && name in data.accounts) {
      const rest = { ...data.accounts };
      delete rest[name];
      this.file.writeAccounts(rest);
      deleted = true;
    } else if (data.kind === 'legacy' && name === DEFAULT_ACCOUNT) {
      this.file.remove();
      deleted = true;
    }

    return deleted;
  }

  async rename(oldName: string, newName: string): Promise<StorageType> {
    const target = normalizeAccountName(newName);
    const creds = await this.load(oldName);
    if (!creds) {
      throw new ValidationFailedError(`account "${oldName}" does not exist`);
    }
    if (target !== oldName && (await this.exists(target))) {
      throw new ValidationFailedError(`account "${target}" already exists`);
    }
    if (target === oldName) {
      return (await this.keychainAccounts()).includes(oldName) ? 'keychain' : 'file';
    }

    const storage = await this.save(target, creds);
    await this.delete(oldName);
    return storage;
  }

  /**
   * The pre-multi-account keychain pair (keys "token" and "secret"), if present.
   */
  async legacyKeychainPair(): Promise<Credentials | null> {
    const token = await this.keychainGet(LEGACY_TOKEN_KEY);
    const secret = await this.keychainGet(LEGACY_SECRET_KEY);
    return token && secret ? { token, secret } : null;
  }

  async needsMigration(): Promise<boolean> {
    if (this.file.read().kind === 'legacy') return true;
    return (await this.keychainGet(LEGACY_TOKEN_KEY)) !== null;
  }

  /**
   * Move legacy single-account credentials into the named-account layout.
   * Returns where the legacy pair was found, or null when there was none.
   */
  async migrateLegacy(name: string = DEFAULT_ACCOUNT): Promise<StorageType | null> {
    const account = normalizeAccountName(name);

    const data = this.file.read();
    if (data.kind === 'legacy') {
      this.file.writeAccounts({ [account]: data.credentials });
      return 'file';
    }

    const keychain = await this.usableKeychain();
    const legacy = await this.legacyKeychainPair();
    if (keychain && legacy) {
      await this.keychainSave(keychain, account, legacy);
      await keychain.delete(LEGACY_TOKEN_KEY);
      await keychain.delete(LEGACY_SECRET_KEY);
      return 'keychain';
    }

    return null;
  }

  /**
   * Move every file account into the keychain and delete the file.
   * Returns the number of accounts migrated.
   */
  async migrateFileToKeychain(): Promise<number> {
    const keychain = await this.usableKeychain();
    if (!keychain) {
      throw new ValidationFailedError('no OS keychain is available on this system');
    }

    const accounts = this.fileAccounts();
    let migrated = 0;
    for (const [name, creds] of Object.entries(accounts)) {
      if (!creds.token || !creds.secret) continue;
      await this.keychainSave(keychain, name, creds);
      migrated++;
    }

    if (migrated > 0) this.file.remove();
    return migrated;
  }

  /**
   * Remove every stored account and legacy pair, from keychain and file.
   */
  async deleteAll(): Promise<boolean> {
    let deleted = false;
    for (const name of await this.list()) {
      if (await this.delete(name)) deleted = true;
    }

    const keychain = await this.usableKeychain();
    if (keychain) {
      for (const key of [LEGACY_TOKEN_KEY, LEGACY_SECRET_KEY, ACCOUNT_LIST_KEY]) {
        if (await keychain.delete(key)) deleted = true;
      }
    }

    if (this.file.remove()) deleted = true;
    return deleted;
  }

  async storageType(env: NodeJS.ProcessEnv = process.env): Promise<ActiveStorage> {
    if (env.DOMENESHOP_TOKEN) return 'environment';
    if ((await this.keychainAccounts()).length > 0) return 'keychain';
    if ((await this.keychainGet(LEGACY_TOKEN_KEY)) !== null) return 'keychain';
    if (this.file.exists()) return 'file';
    return 'none';
  }

  async info(env: NodeJS.ProcessEnv = process.env): Promise<StorageInfo> {
    const accounts = await this.list();
    return {
      keychainAvailable: await this.keychainAvailable(),
      keychainBackend: this.keychainName,
      fileExists: this.file.exists(),
      filePath: this.file.path,
      envConfigured: Boolean(env.DOMENESHOP_TOKEN),
      storageType: await this.storageType(env),
      accountCount: accounts.length,
      accounts,
      needsMigration: await this.needsMigration(),
    };
  }
}

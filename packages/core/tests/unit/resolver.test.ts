import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuditLog } from '../../src/audit.js';
import { AccountStore } from '../../src/credentials/accounts.js';
import { CredentialsFile } from '../../src/credentials/file-store.js';
import {
  EnvironmentProvider,
  defaultProviders,
  resolveCredentials,
} from '../../src/credentials/resolver.js';
import {
  AuthenticationRejectedError,
  CredentialsMissingError,
  ValidationFailedError,
} from '../../src/errors.js';
import { MemoryKeychain } from '../helpers/memory-keychain.js';
import { ScriptedPrompter } from '../helpers/scripted-prompter.js';

const work = { token: 'work-token', secret: 'work-secret' };
const home = { token: 'home-token', secret: 'home-secret' };

let dir: string;
let keychain: MemoryKeychain;
let store: AccountStore;
let audit: AuditLog;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'dshop-resolve-'));
  keychain = new MemoryKeychain();
  store = new AccountStore({
    file: new CredentialsFile(join(dir, 'credentials.json')),
    keychain,
    warn: () => {},
  });
  audit = new AuditLog({ file: join(dir, 'audit.log') });
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function auditEvents(): string[] {
  return audit
    .recent()
    .reverse()
    .map((line) => line.split(' | ')[2] ?? '');
}

describe('resolveCredentials', () => {
  it('prefers the environment', async () => {
    await store.save('work', work);
    const env = { DOMENESHOP_TOKEN: 'env-token', DOMENESHOP_SECRET: 'env-secret' };

    const creds = await resolveCredentials(defaultProviders({ store, env }));
    expect(creds).toEqual({ token: 'env-token', secret: 'env-secret', source: 'environment' });
  });

  it('falls through a half-set environment', async () => {
    await store.save('work', work, { preferKeychain: false });
    const env = { DOMENESHOP_TOKEN: 'env-token' };

    const creds = await resolveCredentials(defaultProviders({ store, env }));
    expect(creds).toEqual({ ...work, source: 'file', account: 'work' });
  });

  it('uses the only stored account', async () => {
    await store.save('work', work);
    const creds = await resolveCredentials(defaultProviders({ store, env: {} }));
    expect(creds).toEqual({ ...work, source: 'keychain', account: 'work' });
  });

  it('reads the named account', async () => {
    await store.save('work', work);
    await store.save('home', home, { preferKeychain: false });

    const creds = await resolveCredentials(defaultProviders({ store, env: {} }), {
      account: 'home',
    });
    expect(creds).toEqual({ ...home, source: 'file', account: 'home' });
  });

  it('rejects an unknown account and lists the others', async () => {
    await store.save('work', work);
    await store.save('home', home);

    await expect(
      resolveCredentials(defaultProviders({ store, env: {} }), { account: 'nope' }),
    ).rejects.toThrow(
      new ValidationFailedError('account "nope" does not exist (available: home, work)'),
    );
  });

  it('checks a named account even when the environment supplies the pair', async () => {
    await store.save('work', work);
    const env = { DOMENESHOP_TOKEN: 'env-token', DOMENESHOP_SECRET: 'env-secret' };

    await expect(
      resolveCredentials(defaultProviders({ store, env }), { account: 'nope' }),
    ).rejects.toThrow(new ValidationFailedError('account "nope" does not exist (available: work)'));

    const creds = await resolveCredentials(defaultProviders({ store, env }), { account: 'work' });
    expect(creds.source).toBe('environment');
  });

  it('refuses to guess between several accounts without a prompt', async () => {
    await store.save('work', work);
    await store.save('home', home);

    await expect(resolveCredentials(defaultProviders({ store, env: {} }))).rejects.toThrow(
      new CredentialsMissingError(
        'several accounts are configured (home, work); choose one with --account',
      ),
    );
  });

  it('lets an interactive user pick an account', async () => {
    await store.save('work', work);
    await store.save('home', home);
    const prompter = new ScriptedPrompter(['work']);

    const creds = await resolveCredentials(
      defaultProviders({ store, env: {}, audit, prompter, verify: vi.fn() }),
    );
    expect(creds).toEqual({ ...work, source: 'keychain', account: 'work' });
    expect(prompter.questions).toEqual(['Choose an account']);
    expect(auditEvents()).toEqual(['ACCOUNT_SELECTED']);
  });

  it('uses the legacy keychain pair', async () => {
    keychain.entries.set('token', 'legacy-token');
    keychain.entries.set('secret', 'legacy-secret');

    const creds = await resolveCredentials(defaultProviders({ store, env: {} }));
    expect(creds).toEqual({ token: 'legacy-token', secret: 'legacy-secret', source: 'keychain' });
  });

  it('fails when nothing supplies credentials', async () => {
    await expect(resolveCredentials([new EnvironmentProvider({})])).rejects.toThrow(
      CredentialsMissingError,
    );
  });
});

describe('interactive provider', () => {
  it('verifies and saves entered credentials', async () => {
    keychain.available = false;
    const prompter = new ScriptedPrompter(['test-token', 'test-secret', true, 'personal']);
    const verify = vi.fn().mockResolvedValue(undefined);

    const creds = await resolveCredentials(
      defaultProviders({ store, env: {}, audit, prompter, verify }),
    );

    expect(creds).toEqual({
      token: 'test-token',
      secret: 'test-secret',
      source: 'interactive',
      account: 'personal',
    });
    expect(verify).toHaveBeenCalledWith({ token: 'test-token', secret: 'test-secret' });
    expect(store.fileCredentials('personal')).toEqual({
      token: 'test-token',
      secret: 'test-secret',
    });
    expect(auditEvents()).toEqual(['AUTH_SUCCESS', 'CREDENTIALS_SAVED', 'ACCOUNT_CREATED']);
  });

  it('offers the keychain when one is available', async () => {
    const prompter = new ScriptedPrompter(['test-token', 'test-secret', true, '', true]);

    const creds = await resolveCredentials(
      defaultProviders({ store, env: {}, audit, prompter, verify: vi.fn() }),
    );

    expect(creds.account).toBe('Standard');
    expect(prompter.questions[4]).toBe('Store in Test Keychain?');
    expect(await store.keychainCredentials('Standard')).toEqual({
      token: 'test-token',
      secret: 'test-secret',
    });
  });

  it('uses unsaved credentials when the user declines to store them', async () => {
    const prompter = new ScriptedPrompter(['test-token', 'test-secret', false]);

    const creds = await resolveCredentials(
      defaultProviders({ store, env: {}, prompter, verify: vi.fn() }),
    );
    expect(creds).toEqual({ token: 'test-token', secret: 'test-secret', source: 'interactive' });
    expect(await store.list()).toEqual([]);
  });

  it('audits and rethrows a rejected pair', async () => {
    const prompter = new ScriptedPrompter(['test-token', 'test-secret']);
    const verify = vi
      .fn()
      .mockRejectedValue(new AuthenticationRejectedError('bad credentials', { status: 401 }));

    await expect(
      resolveCredentials(defaultProviders({ store, env: {}, audit, prompter, verify })),
    ).rejects.toThrow(AuthenticationRejectedError);
    expect(auditEvents()).toEqual(['AUTH_FAILURE']);
  });

  it('gives up on empty input', async () => {
    const prompter = new ScriptedPrompter(['', '']);
    await expect(
      resolveCredentials(defaultProviders({ store, env: {}, prompter, verify: vi.fn() })),
    ).rejects.toThrow(CredentialsMissingError);
  });
});

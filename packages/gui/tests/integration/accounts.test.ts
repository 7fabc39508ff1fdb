import { basicAuthHeader } from '@dshop/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { GuiHarness } from '../helpers/gui-harness.js';
import { createGuiHarness } from '../helpers/gui-harness.js';

const work = { token: 'work-token-01', secret: 'work-secret-01' };
const home = { token: 'home-token-01', secret: 'home-secret-01' };

let h: GuiHarness;

beforeEach(() => {
  h = createGuiHarness({ envCredentials: false });
  h.api.on('GET', '/domains', 200, [{ id: 1 }, { id: 2 }]);
});

afterEach(() => {
  h.cleanup();
});

describe('POST /api/accounts', () => {
  it('creates, verifies and activates an account', async () => {
    const res = await h.request('POST', '/api/accounts', { body: { name: ' work ', ...work } });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ success: true, account: 'work', storage: 'file' });
    expect(h.auditEvents()).toEqual(['AUTH_SUCCESS', 'CREDENTIALS_SAVED', 'ACCOUNT_CREATED']);

    const list = await h.request('GET', '/api/accounts');
    expect(await list.json()).toEqual({ accounts: ['work'], active_account: 'work', count: 1 });
  });

  it('refuses a name that is taken', async () => {
    await h.accounts.save('work', work);

    const res = await h.request('POST', '/api/accounts', { body: { name: 'work', ...home } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { kind: 'ValidationFailed', message: 'account "work" already exists' },
    });
    expect(h.api.calls).toHaveLength(0);
  });

  it('requires every field', async () => {
    const res = await h.request('POST', '/api/accounts', { body: { name: 'work' } });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'token: Required' } });
  });
});

describe('account selection', () => {
  beforeEach(async () => {
    await h.accounts.save('home', home);
    await h.accounts.save('work', work);
  });

  it('needs a choice when several accounts exist', async () => {
    const res = await h.request('GET', '/api/domains');
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: {
        kind: 'CredentialsMissing',
        message: 'several accounts are configured (home, work); choose one with --account',
      },
    });
  });

  it('uses the selected account for later calls', async () => {
    const select = await h.request('POST', '/api/accounts/select', { body: { name: 'work' } });
    expect(await select.json()).toEqual({ success: true, active_account: 'work' });

    await h.request('GET', '/api/domains');
    expect(h.api.calls.map((c) => c.authorization)).toEqual([
      basicAuthHeader(work),
      basicAuthHeader(work),
    ]);
    expect(h.auditEvents()).toEqual(['AUTH_SUCCESS', 'ACCOUNT_SELECTED']);
  });

  it('rejects an unknown account', async () => {
    const res = await h.request('POST', '/api/accounts/select', { body: { name: 'nope' } });
    expect(res.status).toBe(400);
    expect(h.api.calls).toHaveLength(0);
  });

  it('follows a rename of the active account', async () => {
    await h.request('POST', '/api/accounts/select', { body: { name: 'work' } });

    const res = await h.request('POST', '/api/accounts/work/rename', {
      body: { new_name: 'office' },
    });
    expect(await res.json()).toEqual({
      success: true,
      from: 'work',
      to: 'office',
      storage: 'file',
    });

    const list = await h.request('GET', '/api/accounts');
    expect(await list.json()).toEqual({
      accounts: ['home', 'office'],
      active_account: 'office',
      count: 2,
    });
  });

  it('clears the active account when it is deleted', async () => {
    await h.request('POST', '/api/accounts/select', { body: { name: 'work' } });

    const res = await h.request('DELETE', '/api/accounts/work');
    expect(await res.json()).toEqual({ success: true, deleted: 'work' });

    const list = await h.request('GET', '/api/accounts');
    expect(await list.json()).toEqual({ accounts: ['home'], active_account: null, count: 1 });
  });

  it('tests one account', async () => {
    const res = await h.request('GET', '/api/accounts/home/test');
    expect(await res.json()).toEqual({ success: true, domain_count: 2 });
    expect(h.api.calls[0]?.authorization).toBe(basicAuthHeader(home));
  });
});

/**
 * Named accounts and the active-account switch.
 */

import { ValidationFailedError, normalizeAccountName } from '@dshop/core';
import type { Credentials } from '@dshop/core';
import { Hono } from 'hono';
import { z } from 'zod';
import type { GuiEnv } from '../env.js';
import { readBody } from '../errors.js';
import type { SlidingWindowLimiter } from '../middleware/rate-limit.js';
import { rateLimit } from '../middleware/rate-limit.js';
import type { GuiSession } from '../session.js';
import { checkCredentialFormat, credentialsSchema } from './auth.js';

const createSchema = credentialsSchema.extend({
  name: z.string(),
  /** Store in the credentials file even when a keychain is available. */
  use_file: z.boolean().optional(),
});

const selectSchema = z.object({ name: z.string() });

const renameSchema = z.object({ new_name: z.string() });

export function accountRoutes(session: GuiSession, limiter: SlidingWindowLimiter): Hono<GuiEnv> {
  const accounts = new Hono<GuiEnv>();

  async function requireAccount(name: string): Promise<Credentials> {
    const creds = await session.accounts.load(name);
    if (!creds) throw new ValidationFailedError(`account "${name}" does not exist`);
    return creds;
  }

  accounts.get('/', async (c) => {
    const names = await session.accounts.list();
    return c.json({ accounts: names, active_account: session.activeAccount, count: names.length });
  });

  accounts.post(
    '/',
    rateLimit(session, limiter, { endpoint: 'accounts/create', max: 5 }),
    async (c) => {
      const ip = c.get('clientIp');
      const body = await readBody(c, createSchema);
      const name = normalizeAccountName(body.name);
      if (await session.accounts.exists(name)) {
        throw new ValidationFailedError(`account "${name}" already exists`);
      }
      const creds = checkCredentialFormat({ token: body.token, secret: body.secret });

      await session.verify(creds, ip, c.get('userAgent'));
      const storage = await session.accounts.save(name, creds, { preferKeychain: !body.use_file });
      session.audit.credentialsSaved(storage, ip);
      session.audit.accountCreated(name, storage, ip);
      session.activeAccount = name;

      return c.json({ success: true, account: name, storage }, 201);
    },
  );

  accounts.post('/select', async (c) => {
    const ip = c.get('clientIp');
    const { name } = await readBody(c, selectSchema);
    const creds = await requireAccount(name);

    await session.verify(creds, ip, c.get('userAgent'));
    session.activeAccount = name;
    session.audit.accountSelected(name, ip);

    return c.json({ success: true, active_account: name });
  });

  accounts.delete(
    '/:name',
    rateLimit(session, limiter, { endpoint: 'accounts/delete', max: 3 }),
    async (c) => {
      const name = c.req.param('name');
      if (!(await session.accounts.exists(name))) {
        throw new ValidationFailedError(`account "${name}" does not exist`);
      }

      await session.accounts.delete(name);
      session.audit.accountDeleted(name, c.get('clientIp'));
      if (session.activeAccount === name) session.activeAccount = null;

      return c.json({ success: true, deleted: name });
    },
  );

  accounts.post('/:name/rename', async (c) => {
    const from = c.req.param('name');
    const to = normalizeAccountName((await readBody(c, renameSchema)).new_name);

    const storage = await session.accounts.rename(from, to);
    session.audit.accountRenamed(from, to, c.get('clientIp'));
    if (session.activeAccount === from) session.activeAccount = to;

    return c.json({ success: true, from, to, storage });
  });

  accounts.get('/:name/test', async (c) => {
    const creds = await requireAccount(c.req.param('name'));
    const domainCount = await session.verify(creds, c.get('clientIp'), c.get('userAgent'));
    return c.json({ success: true, domain_count: domainCount });
  });

  return accounts;
}

/**
 * Credential setup for the single-account flow.
 *
 * GET  /api/auth/status   Whether credentials resolve, and where they live
 * POST /api/auth/save     Verify and store a pair as the default account
 * POST /api/auth/delete   Remove every stored credential
 * POST /api/auth/migrate  Move file accounts into the OS keychain
 */

import {
  CredentialsMissingError,
  DEFAULT_ACCOUNT,
  ValidationFailedError,
  isValidCredentialFormat,
} from '@dshop/core';
import type { Credentials } from '@dshop/core';
import { Hono } from 'hono';
import { z } from 'zod';
import type { GuiEnv } from '../env.js';
import { readBody } from '../errors.js';
import type { SlidingWindowLimiter } from '../middleware/rate-limit.js';
import { rateLimit } from '../middleware/rate-limit.js';
import type { GuiSession } from '../session.js';

export const credentialsSchema = z.object({
  token: z.string().trim(),
  secret: z.string().trim(),
});

/**
 * Reject malformed pairs before they reach the API.
 */
export function checkCredentialFormat(creds: Credentials): Credentials {
  for (const field of ['token', 'secret'] as const) {
    if (!isValidCredentialFormat(creds[field])) {
      throw new ValidationFailedError(
        `${field} must be 10 to 200 characters of letters, digits, "_" or "-"`,
      );
    }
  }
  return creds;
}

export function authRoutes(session: GuiSession, limiter: SlidingWindowLimiter): Hono<GuiEnv> {
  const auth = new Hono<GuiEnv>();

  auth.get('/status', async (c) => {
    const storageInfo = await session.accounts.info(session.deps.env);
    try {
      const creds = await session.credentials();
      return c.json({
        authenticated: true,
        source: creds.source,
        active_account: creds.account ?? null,
        storage_info: storageInfo,
      });
    } catch (err) {
      if (!(err instanceof CredentialsMissingError)) throw err;
      return c.json({ authenticated: false, storage_info: storageInfo });
    }
  });

  auth.post('/save', rateLimit(session, limiter, { endpoint: 'auth/save', max: 5 }), async (c) => {
    const ip = c.get('clientIp');
    const creds = checkCredentialFormat(await readBody(c, credentialsSchema));

    await session.verify(creds, ip, c.get('userAgent'));
    const storage = await session.accounts.save(DEFAULT_ACCOUNT, creds);
    session.audit.credentialsSaved(storage, ip);
    session.activeAccount = DEFAULT_ACCOUNT;

    return c.json({ success: true, account: DEFAULT_ACCOUNT, storage });
  });

  auth.post(
    '/delete',
    rateLimit(session, limiter, { endpoint: 'auth/delete', max: 3 }),
    async (c) => {
      const deleted = await session.accounts.deleteAll();
      if (deleted) session.audit.credentialsDeleted(c.get('clientIp'));
      session.activeAccount = null;
      return c.json({ success: true, deleted });
    },
  );

  auth.post(
    '/migrate',
    rateLimit(session, limiter, { endpoint: 'auth/migrate', max: 3 }),
    async (c) => {
      const migrated = await session.accounts.migrateFileToKeychain();
      if (migrated > 0) session.audit.credentialsMigrated('file', 'keychain');
      return c.json({ success: true, migrated });
    },
  );

  return auth;
}

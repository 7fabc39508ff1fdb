/**
 * Credentials file (~/.domeneshop-credentials by default), chmod 600.
 *
 * Two layouts are understood:
 *   v2:     { "version": 2, "accounts": { "<name>": { "token", "secret" } } }
 *   legacy: { "token", "secret" }
 * Writes always produce v2 and replace the file atomically.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Credentials } from '../types.js';

export const CREDENTIAL_FILE_VERSION = 2;
const FILE_MODE = 0o600;

const credentialsSchema = z.object({
  token: z.string(),
  secret: z.string(),
});

const multiAccountSchema = z.object({
  version: z.literal(CREDENTIAL_FILE_VERSION),
  accounts: z.record(z.string(), credentialsSchema),
});

const legacySchema = credentialsSchema.extend({
  version: z.undefined(),
});

export type CredentialsFileData =
  | { kind: 'multi'; accounts: Record<string, Credentials> }
  | { kind: 'legacy'; credentials: Credentials }
  | { kind: 'empty' };

export class CredentialsFile {
  constructor(readonly path: string) {}

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Read and classify the file. Missing, unreadable or malformed files read as empty.
   */
  read(): CredentialsFileData {
    if (!this.exists()) return { kind: 'empty' };

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch {
      return { kind: 'empty' };
    }

    const multi = multiAccountSchema.safeParse(raw);
    if (multi.success) return { kind: 'multi', accounts: multi.data.accounts };

    const legacy = legacySchema.safeParse(raw);
    if (legacy.success) {
      return {
        kind: 'legacy',
        credentials: { token: legacy.data.token, secret: legacy.data.secret },
      };
    }

    return { kind: 'empty' };
  }

  /**
   * Accounts in v2 form; a legacy pair shows up under `legacyName`.
   */
  accounts(legacyName: string): Record<string, Credentials> {
    const data = this.read();
    if (data.kind === 'multi') return data.accounts;
    if (data.kind === 'legacy') return { [legacyName]: data.credentials };
    return {};
  }

  /**
   * Replace the file with the given accounts. Written to a temp file first,
   * then renamed over the original.
   */
  writeAccounts(accounts: Record<string, Credentials>): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    const body = JSON.stringify({ version: CREDENTIAL_FILE_VERSION, accounts }, null, 2);
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      // A leftover temp file would keep its old mode; start from a fresh one.
      rmSync(tmp, { force: true });
      writeFileSync(tmp, `${body}\n`, { mode: FILE_MODE, flag: 'wx' });
      renameSync(tmp, this.path);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw err;
    }
  }

  remove(): boolean {
    if (!this.exists()) return false;
    rmSync(this.path);
    return true;
  }
}

/**
 * dshop accounts list|add|remove|rename|test
 */

import type { Command } from 'commander';
import {
  AuthenticationRejectedError,
  ValidationFailedError,
  isValidCredentialFormat,
  normalizeAccountName,
} from '@dshop/core';
import type { Credentials, StorageType } from '@dshop/core';
import { confirmDestructive } from '../confirm.js';
import { contextFor } from '../context.js';
import type { CliRuntime, CommandContext } from '../context.js';
import { printJson, printTable, success } from '../output.js';

interface AccountRow {
  name: string;
  storage: StorageType;
}

const FORMAT_HINT = 'must be 10 to 200 characters of letters, digits, "_" or "-"';

/**
 * Verify a pair against the API, auditing the outcome.
 */
export async function verifyCredentials(ctx: CommandContext, creds: Credentials): Promise<void> {
  try {
    await ctx.verify(creds);
  } catch (err) {
    if (err instanceof AuthenticationRejectedError) ctx.audit.authFailure(err.message);
    throw err;
  }
  ctx.audit.authSuccess();
}

/**
 * Token and secret from flags, or prompted for when a terminal is attached.
 */
export async function collectCredentials(
  ctx: CommandContext,
  flags: { token?: string; secret?: string },
): Promise<Credentials> {
  let { token, secret } = flags;
  if ((!token || !secret) && !ctx.canPrompt) {
    throw new ValidationFailedError('--token and --secret are required when not prompting');
  }
  token ??= await ctx.prompter.ask('API token');
  secret ??= await ctx.prompter.askSecret('API secret');
  token = token.trim();
  secret = secret.trim();

  if (!isValidCredentialFormat(token)) throw new ValidationFailedError(`token ${FORMAT_HINT}`);
  if (!isValidCredentialFormat(secret)) throw new ValidationFailedError(`secret ${FORMAT_HINT}`);
  return { token, secret };
}

/**
 * Verify and store a new account.
 */
export async function addAccount(
  ctx: CommandContext,
  name: string,
  creds: Credentials,
  preferKeychain: boolean,
): Promise<StorageType> {
  await verifyCredentials(ctx, creds);
  const storage = await ctx.accounts.save(name, creds, { preferKeychain });
  ctx.audit.credentialsSaved(storage);
  ctx.audit.accountCreated(name, storage);
  return storage;
}

export function registerAccountsCommands(program: Command, runtime: CliRuntime): void {
  const accounts = program.command('accounts').description('Stored API accounts');

  accounts
    .command('list')
    .description('List stored accounts')
    .action(async (_opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);
      const names = await ctx.accounts.list();
      const inKeychain = await ctx.accounts.keychainAccounts();
      const rows = names.map(
        (name): AccountRow => ({
          name,
          storage: inKeychain.includes(name) ? 'keychain' : 'file',
        }),
      );

      if (ctx.json) {
        printJson({ accounts: rows, count: rows.length });
        return;
      }
      printTable<AccountRow>(
        [
          { header: 'Name', value: (r) => r.name },
          { header: 'Storage', value: (r) => r.storage },
        ],
        rows,
        'No accounts stored. Add one with "dshop accounts add <name>".',
      );
    });

  accounts
    .command('add')
    .description('Add an account (verified before it is saved)')
    .argument('<name>', 'Account name')
    .option('-t, --token <token>', 'API token')
    .option('-s, --secret <secret>', 'API secret')
    .option('--file', 'Store in the credentials file even if a keychain is available')
    .action(
      async (
        nameArg: string,
        opts: { token?: string; secret?: string; file?: boolean },
        command: Command,
      ) => {
        const ctx = contextFor(runtime, command);
        const name = normalizeAccountName(nameArg);
        if (await ctx.accounts.exists(name)) {
          throw new ValidationFailedError(`account "${name}" already exists`);
        }

        const creds = await collectCredentials(ctx, opts);
        const storage = await addAccount(ctx, name, creds, !opts.file);

        if (ctx.json) {
          printJson({ account: name, storage });
          return;
        }
        success(`Saved account "${name}" (${storage})`);
      },
    );

  accounts
    .command('remove')
    .description('Remove a stored account')
    .argument('<name>', 'Account name')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (name: string, opts: { yes?: boolean }, command: Command) => {
      const ctx = contextFor(runtime, command);
      if (!(await ctx.accounts.exists(name))) {
        throw new ValidationFailedError(`account "${name}" does not exist`);
      }

      await confirmDestructive(ctx, `Remove account "${name}"?`, 'accounts remove', opts.yes);

      await ctx.accounts.delete(name);
      ctx.audit.accountDeleted(name);

      if (ctx.json) {
        printJson({ deleted: true, account: name });
        return;
      }
      success(`Removed account "${name}"`);
    });

  accounts
    .command('rename')
    .description('Rename a stored account')
    .argument('<old>', 'Current name')
    .argument('<new>', 'New name')
    .action(async (oldName: string, newName: string, _opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);
      const target = normalizeAccountName(newName);

      const storage = await ctx.accounts.rename(oldName, target);
      ctx.audit.accountRenamed(oldName, target);

      if (ctx.json) {
        printJson({ from: oldName, to: target, storage });
        return;
      }
      success(`Renamed account "${oldName}" to "${target}"`);
    });

  accounts
    .command('test')
    .description('Check that an account can reach the API')
    .argument('[name]', 'Account name (default: the active credentials)')
    .action(async (name: string | undefined, _opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);

      let creds: Credentials;
      let label: string;
      if (name) {
        const stored = await ctx.accounts.load(name);
        if (!stored) throw new ValidationFailedError(`account "${name}" does not exist`);
        creds = stored;
        label = name;
      } else {
        const resolved = await ctx.credentials();
        creds = resolved;
        label = resolved.account ?? resolved.source;
      }

      let domainCount: number;
      try {
        domainCount = (await ctx.clientFor(creds).listDomains()).length;
      } catch (err) {
        if (err instanceof AuthenticationRejectedError) ctx.audit.authFailure(err.message);
        throw err;
      }
      ctx.audit.authSuccess();

      if (ctx.json) {
        printJson({ account: label, success: true, domain_count: domainCount });
        return;
      }
      success(`Account "${label}" works (${domainCount} domains)`);
    });
}

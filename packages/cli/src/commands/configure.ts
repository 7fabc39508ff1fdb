/**
 * dshop configure: Set up, inspect, migrate or delete stored credentials.
 *
 * Without flags this walks through adding an account interactively.
 */

import type { Command } from 'commander';
import { DEFAULT_ACCOUNT, ValidationFailedError, normalizeAccountName } from '@dshop/core';
import { confirmDestructive } from '../confirm.js';
import { contextFor } from '../context.js';
import type { CliRuntime, CommandContext } from '../context.js';
import { notice, printDetails, printJson, success, warn } from '../output.js';
import { addAccount, collectCredentials } from './accounts.js';

interface ConfigureOptions {
  status?: boolean;
  delete?: boolean;
  yes?: boolean;
  migrateToKeychain?: boolean;
  migrateLegacy?: string | boolean;
}

async function showStatus(ctx: CommandContext): Promise<void> {
  const info = await ctx.accounts.info(ctx.runtime.env);
  if (ctx.json) {
    printJson(info);
    return;
  }

  printDetails([
    ['Active storage', info.storageType],
    ['Keychain', info.keychainAvailable ? info.keychainBackend : 'not available'],
    ['Credentials file', `${info.filePath}${info.fileExists ? '' : ' (not present)'}`],
    ['Environment', info.envConfigured ? 'DOMENESHOP_TOKEN is set' : 'not set'],
    ['Accounts', info.accounts.length > 0 ? info.accounts.join(', ') : 'none'],
  ]);
  if (info.needsMigration) {
    warn('legacy single-account credentials found; run "dshop configure --migrate-legacy"');
  }
}

async function deleteAll(ctx: CommandContext, yes: boolean | undefined): Promise<void> {
  await confirmDestructive(ctx, 'Delete all stored credentials?', 'configure delete', yes);

  const deleted = await ctx.accounts.deleteAll();
  if (deleted) ctx.audit.credentialsDeleted();

  if (ctx.json) {
    printJson({ deleted });
    return;
  }
  if (deleted) success('Deleted all stored credentials');
  else notice('No stored credentials to delete');
}

async function migrateToKeychain(ctx: CommandContext): Promise<void> {
  const migrated = await ctx.accounts.migrateFileToKeychain();
  if (migrated > 0) ctx.audit.credentialsMigrated('file', 'keychain');

  if (ctx.json) {
    printJson({ migrated });
    return;
  }
  if (migrated > 0) success(`Moved ${migrated} account(s) to ${ctx.accounts.keychainName}`);
  else notice('No file accounts to migrate');
}

async function migrateLegacy(ctx: CommandContext, name: string): Promise<void> {
  const from = await ctx.accounts.migrateLegacy(name);
  if (from) ctx.audit.credentialsMigrated(`legacy ${from}`, `account ${name}`);

  if (ctx.json) {
    printJson({ migrated: from !== null, account: name, storage: from });
    return;
  }
  if (from) success(`Legacy credentials are now the account "${name}" (${from})`);
  else notice('No legacy credentials found');
}

async function setup(ctx: CommandContext): Promise<void> {
  if (!ctx.canPrompt) {
    throw new ValidationFailedError(
      'configure needs a terminal; use "dshop accounts add <name> --token ... --secret ..." instead',
    );
  }

  const name = normalizeAccountName(await ctx.prompter.ask('Account name', DEFAULT_ACCOUNT));
  if (await ctx.accounts.exists(name)) {
    throw new ValidationFailedError(`account "${name}" already exists`);
  }
  const creds = await collectCredentials(ctx, {});

  const keychain = ctx.accounts.keychainName;
  const preferKeychain =
    keychain !== null && (await ctx.accounts.keychainAvailable())
      ? await ctx.prompter.confirm(`Store in ${keychain}?`, true)
      : false;

  const storage = await addAccount(ctx, name, creds, preferKeychain);
  if (ctx.json) {
    printJson({ account: name, storage });
    return;
  }
  success(`Saved account "${name}" (${storage})`);
}

export function registerConfigureCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('configure')
    .description('Set up or manage stored credentials')
    .option('--status', 'Show where credentials are stored')
    .option('--delete', 'Delete every stored account and legacy entry')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('--migrate-to-keychain', 'Move file accounts into the OS keychain')
    .option('--migrate-legacy [name]', 'Turn single-account credentials into a named account')
    .action(async (opts: ConfigureOptions, command: Command) => {
      const ctx = contextFor(runtime, command);

      if (opts.status) return showStatus(ctx);
      if (opts.delete) return deleteAll(ctx, opts.yes);
      if (opts.migrateToKeychain) return migrateToKeychain(ctx);
      if (opts.migrateLegacy !== undefined) {
        const name = typeof opts.migrateLegacy === 'string' ? opts.migrateLegacy : DEFAULT_ACCOUNT;
        return migrateLegacy(ctx, normalizeAccountName(name));
      }
      return setup(ctx);
    });
}

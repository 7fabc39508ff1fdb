/**
 * The dshop command tree.
 *
 * Usage:
 *   dshop [--json] [-a <account>] [--no-input] <group> <command> [args]
 *
 *   dshop domains list|show           Domains on the account
 *   dshop dns list|show|add|update|delete
 *   dshop forwards list|show|add|update|delete
 *   dshop invoices list|show
 *   dshop ddns <hostnames> [--ip]     Dynamic DNS update
 *   dshop accounts list|add|remove|rename|test
 *   dshop configure [--status|--delete|--migrate-to-keychain]
 *   dshop audit [-n count]
 */

import { Command, CommanderError } from 'commander';
import { toErrorBody } from '@dshop/core';
import pc from 'picocolors';
import { registerAccountsCommands } from './commands/accounts.js';
import { registerAuditCommand } from './commands/audit.js';
import { registerConfigureCommand } from './commands/configure.js';
import { registerDdnsCommand } from './commands/ddns.js';
import { registerDnsCommands } from './commands/dns.js';
import { registerDomainsCommands } from './commands/domains.js';
import { registerForwardsCommands } from './commands/forwards.js';
import { registerInvoicesCommands } from './commands/invoices.js';
import { ExitStatus } from './context.js';
import type { CliRuntime, GlobalOptions } from './context.js';

export const VERSION = '0.1.0';

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  // Set before subcommands are added so they inherit it.
  program.exitOverride();

  program
    .name('dshop')
    .description('Manage Domeneshop domains, DNS, forwards and invoices')
    .version(VERSION)
    .option('--json', 'Machine-readable JSON output')
    .option('-a, --account <name>', 'Stored account to use')
    .option('--no-input', 'Never prompt; fail instead');

  registerDomainsCommands(program, runtime);
  registerDnsCommands(program, runtime);
  registerForwardsCommands(program, runtime);
  registerInvoicesCommands(program, runtime);
  registerDdnsCommand(program, runtime);
  registerAccountsCommands(program, runtime);
  registerConfigureCommand(program, runtime);
  registerAuditCommand(program, runtime);

  return program;
}

function reportError(err: unknown, json: boolean): void {
  if (json) {
    console.error(JSON.stringify(toErrorBody(err), null, 2));
    return;
  }
  const { message } = toErrorBody(err).error;
  console.error(`${pc.red('Error:')} ${message}`);
}

/**
 * Run one invocation and return its exit status. `args` excludes the
 * node binary and script path.
 */
export async function runCli(args: string[], runtime: CliRuntime): Promise<number> {
  const program = createProgram(runtime);
  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (err) {
    // Usage errors, --help and --version: commander has already printed.
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof ExitStatus) return err.code;
    reportError(err, program.opts<GlobalOptions>().json === true);
    return 1;
  }
}

/**
 * dshop domains list|show
 */

import type { Command } from 'commander';
import { parseId } from '@dshop/core';
import type { Domain } from '@dshop/core';
import { contextFor } from '../context.js';
import type { CliRuntime } from '../context.js';
import { printDetails, printJson, printTable } from '../output.js';

export function registerDomainsCommands(program: Command, runtime: CliRuntime): void {
  const domains = program.command('domains').description('Domains on the account');

  domains
    .command('list')
    .description('List domains')
    .option('-f, --filter <text>', 'Only domains containing this text (e.g. ".no")')
    .action(async (opts: { filter?: string }, command: Command) => {
      const ctx = contextFor(runtime, command);
      const list = await (await ctx.client()).listDomains(opts.filter);

      if (ctx.json) {
        printJson(list);
        return;
      }
      printTable<Domain>(
        [
          { header: 'ID', value: (d) => d.id },
          { header: 'Domain', value: (d) => d.domain },
          { header: 'Status', value: (d) => d.status },
          { header: 'Expires', value: (d) => d.expiry_date },
          { header: 'Renew', value: (d) => d.renew },
        ],
        list,
        'No domains found.',
      );
    });

  domains
    .command('show')
    .description('Show one domain')
    .argument('<domainId>', 'Domain id')
    .action(async (domainId: string, _opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);
      const id = parseId(domainId, 'domain id');
      const domain = await (await ctx.client()).getDomain(id);

      if (ctx.json) {
        printJson(domain);
        return;
      }
      printDetails([
        ['ID', domain.id],
        ['Domain', domain.domain],
        ['Status', domain.status],
        ['Registrant', domain.registrant],
        ['Registered', domain.registered_date],
        ['Expires', domain.expiry_date],
        ['Renew', domain.renew],
        ['Nameservers', domain.nameservers?.join(', ')],
        ['Registrar', domain.services?.registrar],
        ['DNS', domain.services?.dns],
        ['Email', domain.services?.email],
        ['Webhotel', domain.services?.webhotel],
      ]);
    });
}

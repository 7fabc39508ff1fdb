/**
 * dshop forwards list|show|add|update|delete
 *
 * A forward sends HTTP requests for a host under the domain to another URL,
 * optionally inside a frame.
 */

import type { Command } from 'commander';
import { parseId, validateForward } from '@dshop/core';
import type { Forward } from '@dshop/core';
import { confirmDestructive } from '../confirm.js';
import { contextFor } from '../context.js';
import type { CliRuntime } from '../context.js';
import { printDetails, printJson, printTable, success } from '../output.js';

export function registerForwardsCommands(program: Command, runtime: CliRuntime): void {
  const forwards = program.command('forwards').description('HTTP forwards of a domain');

  forwards
    .command('list')
    .description('List forwards')
    .argument('<domainId>', 'Domain id')
    .action(async (domainId: string, _opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);
      const id = parseId(domainId, 'domain id');

      const list = await (await ctx.client()).listForwards(id);
      if (ctx.json) {
        printJson(list);
        return;
      }
      printTable<Forward>(
        [
          { header: 'Host', value: (f) => f.host },
          { header: 'Frame', value: (f) => f.frame },
          { header: 'URL', value: (f) => f.url },
        ],
        list,
        'No forwards found.',
      );
    });

  forwards
    .command('show')
    .description('Show one forward')
    .argument('<domainId>', 'Domain id')
    .argument('<host>', 'Forwarded host')
    .action(async (domainId: string, host: string, _opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);
      const id = parseId(domainId, 'domain id');

      const forward = await (await ctx.client()).getForward(id, host);
      if (ctx.json) {
        printJson(forward);
        return;
      }
      printDetails([
        ['Host', forward.host],
        ['URL', forward.url],
        ['Frame', forward.frame],
      ]);
    });

  forwards
    .command('add')
    .description('Create a forward')
    .argument('<domainId>', 'Domain id')
    .option('-H, --host <host>', 'Host to forward, @ for the zone apex')
    .option('-u, --url <url>', 'Target URL')
    .option('--frame', 'Show the target inside a frame', false)
    .action(
      async (
        domainId: string,
        opts: { host?: string; url?: string; frame: boolean },
        command: Command,
      ) => {
        const ctx = contextFor(runtime, command);
        const id = parseId(domainId, 'domain id');
        const forward = validateForward(opts);

        await (await ctx.client()).createForward(id, forward);
        ctx.audit.forwardChange('create', id, forward.host);

        if (ctx.json) {
          printJson(forward);
          return;
        }
        success(`Created forward ${forward.host} to ${forward.url}`);
      },
    );

  forwards
    .command('update')
    .description('Change the target or framing of a forward')
    .argument('<domainId>', 'Domain id')
    .argument('<host>', 'Forwarded host')
    .option('-u, --url <url>', 'New target URL')
    .option('--frame', 'Show the target inside a frame')
    .option('--no-frame', 'Redirect instead of framing')
    .action(
      async (
        domainId: string,
        host: string,
        opts: { url?: string; frame?: boolean },
        command: Command,
      ) => {
        const ctx = contextFor(runtime, command);
        const id = parseId(domainId, 'domain id');

        const client = await ctx.client();
        const existing = await client.getForward(id, host);
        const forward = validateForward({
          host: existing.host,
          url: opts.url ?? existing.url,
          frame: opts.frame ?? existing.frame,
        });

        await client.updateForward(id, host, forward);
        ctx.audit.forwardChange('update', id, host);

        if (ctx.json) {
          printJson(forward);
          return;
        }
        success(`Updated forward ${host}`);
      },
    );

  forwards
    .command('delete')
    .description('Delete a forward')
    .argument('<domainId>', 'Domain id')
    .argument('<host>', 'Forwarded host')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (domainId: string, host: string, opts: { yes?: boolean }, command: Command) => {
      const ctx = contextFor(runtime, command);
      const id = parseId(domainId, 'domain id');

      await confirmDestructive(
        ctx,
        `Delete forward ${host} from domain ${id}?`,
        'forwards delete',
        opts.yes,
      );

      await (await ctx.client()).deleteForward(id, host);
      ctx.audit.forwardChange('delete', id, host);

      if (ctx.json) {
        printJson({ deleted: true, domain_id: id, host });
        return;
      }
      success(`Deleted forward ${host}`);
    });
}

/**
 * dshop dns list|show|add|update|delete
 */

import type { Command } from 'commander';
import {
  DEFAULT_TTL,
  parseDnsRecordType,
  parseId,
  parseIntOption,
  validateDnsRecord,
} from '@dshop/core';
import type { DnsRecord, DnsRecordDraft } from '@dshop/core';
import { confirmDestructive } from '../confirm.js';
import { contextFor } from '../context.js';
import type { CliRuntime } from '../context.js';
import { printDetails, printJson, printTable, success } from '../output.js';

interface RecordFlags {
  type?: string;
  host?: string;
  data?: string;
  ttl?: string;
  priority?: string;
  weight?: string;
  port?: string;
}

function recordOptions(command: Command, ttlDefault?: string): Command {
  return command
    .option('-t, --type <type>', 'Record type (A, AAAA, CNAME, MX, TXT, SRV)')
    .option('-H, --host <host>', 'Host name, @ for the zone apex')
    .option('-d, --data <data>', 'Record data (address, target, text)')
    .option('--ttl <seconds>', 'Time to live', ttlDefault)
    .option('-p, --priority <n>', 'Priority (MX, SRV)')
    .option('-w, --weight <n>', 'Weight (SRV)')
    .option('--port <n>', 'Port (SRV)');
}

type NumericFields = Pick<DnsRecordDraft, 'ttl' | 'priority' | 'weight' | 'port'>;

function numericFlags(flags: RecordFlags): NumericFields {
  return {
    ttl: parseIntOption(flags.ttl, 'ttl'),
    priority: parseIntOption(flags.priority, 'priority'),
    weight: parseIntOption(flags.weight, 'weight'),
    port: parseIntOption(flags.port, 'port'),
  };
}

function printRecord(record: DnsRecord): void {
  printDetails([
    ['ID', record.id],
    ['Host', record.host],
    ['Type', record.type],
    ['Data', record.data],
    ['TTL', record.ttl],
    ['Priority', record.priority],
    ['Weight', record.weight],
    ['Port', record.port],
  ]);
}

export function registerDnsCommands(program: Command, runtime: CliRuntime): void {
  const dns = program.command('dns').description('DNS records of a domain');

  dns
    .command('list')
    .description('List DNS records')
    .argument('<domainId>', 'Domain id')
    .option('--host <host>', 'Only records for this host')
    .option('--type <type>', 'Only records of this type')
    .action(async (domainId: string, opts: { host?: string; type?: string }, command: Command) => {
      const ctx = contextFor(runtime, command);
      const id = parseId(domainId, 'domain id');
      const type = parseDnsRecordType(opts.type);

      const records = await (await ctx.client()).listDnsRecords(id, { host: opts.host, type });
      if (ctx.json) {
        printJson(records);
        return;
      }
      printTable<DnsRecord>(
        [
          { header: 'ID', value: (r) => r.id },
          { header: 'Host', value: (r) => r.host },
          { header: 'Type', value: (r) => r.type },
          { header: 'TTL', value: (r) => r.ttl },
          { header: 'Priority', value: (r) => r.priority },
          { header: 'Data', value: (r) => r.data },
        ],
        records,
        'No DNS records found.',
      );
    });

  dns
    .command('show')
    .description('Show one DNS record')
    .argument('<domainId>', 'Domain id')
    .argument('<recordId>', 'Record id')
    .action(async (domainId: string, recordId: string, _opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);
      const id = parseId(domainId, 'domain id');
      const rid = parseId(recordId, 'record id');

      const record = await (await ctx.client()).getDnsRecord(id, rid);
      if (ctx.json) {
        printJson(record);
        return;
      }
      printRecord(record);
    });

  recordOptions(
    dns.command('add').description('Create a DNS record').argument('<domainId>', 'Domain id'),
    String(DEFAULT_TTL),
  ).action(async (domainId: string, flags: RecordFlags, command: Command) => {
    const ctx = contextFor(runtime, command);
    const id = parseId(domainId, 'domain id');
    const record = validateDnsRecord({
      type: flags.type,
      host: flags.host,
      data: flags.data,
      ...numericFlags(flags),
    });

    const created = await (await ctx.client()).createDnsRecord(id, record);
    ctx.audit.dnsChange('create', id, created.id, record.type);

    if (ctx.json) {
      printJson({ id: created.id, ...record });
      return;
    }
    success(`Created ${record.type} record ${created.id} for ${record.host}`);
  });

  recordOptions(
    dns
      .command('update')
      .description('Change fields of a DNS record')
      .argument('<domainId>', 'Domain id')
      .argument('<recordId>', 'Record id'),
  ).action(async (domainId: string, recordId: string, flags: RecordFlags, command: Command) => {
    const ctx = contextFor(runtime, command);
    const id = parseId(domainId, 'domain id');
    const rid = parseId(recordId, 'record id');
    const numbers = numericFlags(flags);
    parseDnsRecordType(flags.type);

    const client = await ctx.client();
    const existing = await client.getDnsRecord(id, rid);
    const record = validateDnsRecord({
      type: flags.type ?? existing.type,
      host: flags.host ?? existing.host,
      data: flags.data ?? existing.data,
      ttl: numbers.ttl ?? existing.ttl,
      priority: numbers.priority ?? existing.priority,
      weight: numbers.weight ?? existing.weight,
      port: numbers.port ?? existing.port,
    });

    await client.updateDnsRecord(id, rid, record);
    ctx.audit.dnsChange('update', id, rid, record.type);

    if (ctx.json) {
      printJson({ id: rid, ...record });
      return;
    }
    success(`Updated ${record.type} record ${rid}`);
  });

  dns
    .command('delete')
    .description('Delete a DNS record')
    .argument('<domainId>', 'Domain id')
    .argument('<recordId>', 'Record id')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(
      async (domainId: string, recordId: string, opts: { yes?: boolean }, command: Command) => {
        const ctx = contextFor(runtime, command);
        const id = parseId(domainId, 'domain id');
        const rid = parseId(recordId, 'record id');

        await confirmDestructive(
          ctx,
          `Delete DNS record ${rid} from domain ${id}?`,
          'dns delete',
          opts.yes,
        );

        await (await ctx.client()).deleteDnsRecord(id, rid);
        ctx.audit.dnsChange('delete', id, rid);

        if (ctx.json) {
          printJson({ deleted: true, domain_id: id, record_id: rid });
          return;
        }
        success(`Deleted DNS record ${rid}`);
      },
    );
}

/**
 * dshop invoices list|show
 */

import type { Command } from 'commander';
import { parseId, parseInvoiceStatus } from '@dshop/core';
import type { Invoice } from '@dshop/core';
import { contextFor } from '../context.js';
import type { CliRuntime } from '../context.js';
import { printDetails, printJson, printTable } from '../output.js';

function amount(invoice: Invoice): string {
  return `${invoice.amount} ${invoice.currency}`;
}

export function registerInvoicesCommands(program: Command, runtime: CliRuntime): void {
  const invoices = program.command('invoices').description('Invoices (read-only)');

  invoices
    .command('list')
    .description('List invoices')
    .option('-s, --status <status>', 'Only invoices with this status (unpaid, paid, settled)')
    .action(async (opts: { status?: string }, command: Command) => {
      const ctx = contextFor(runtime, command);
      const status = parseInvoiceStatus(opts.status);

      const list = await (await ctx.client()).listInvoices(status);
      if (ctx.json) {
        printJson(list);
        return;
      }
      printTable<Invoice>(
        [
          { header: 'ID', value: (i) => i.id },
          { header: 'Type', value: (i) => i.type },
          { header: 'Amount', value: amount },
          { header: 'Status', value: (i) => i.status },
          { header: 'Issued', value: (i) => i.issued_date },
          { header: 'Due', value: (i) => i.due_date },
          { header: 'Paid', value: (i) => i.paid_date },
        ],
        list,
        'No invoices found.',
      );
    });

  invoices
    .command('show')
    .description('Show one invoice')
    .argument('<invoiceId>', 'Invoice id')
    .action(async (invoiceId: string, _opts: unknown, command: Command) => {
      const ctx = contextFor(runtime, command);
      const id = parseId(invoiceId, 'invoice id');

      const invoice = await (await ctx.client()).getInvoice(id);
      if (ctx.json) {
        printJson(invoice);
        return;
      }
      printDetails([
        ['ID', invoice.id],
        ['Type', invoice.type],
        ['Amount', amount(invoice)],
        ['Status', invoice.status],
        ['Issued', invoice.issued_date],
        ['Due', invoice.due_date],
        ['Paid', invoice.paid_date],
        ['URL', invoice.url],
      ]);
    });
}

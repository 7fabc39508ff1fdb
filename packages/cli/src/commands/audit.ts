/**
 * dshop audit [-n count]: Most recent audit log entries, newest first.
 */

import type { Command } from 'commander';
import { ValidationFailedError, parseIntOption } from '@dshop/core';
import { contextFor } from '../context.js';
import type { CliRuntime } from '../context.js';
import { printJson } from '../output.js';

export function registerAuditCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('audit')
    .description('Show the local audit log')
    .option('-n, --count <n>', 'Number of entries', '50')
    .action((opts: { count: string }, command: Command) => {
      const ctx = contextFor(runtime, command);
      const count = parseIntOption(opts.count, 'count') ?? 50;
      if (count < 1) throw new ValidationFailedError('count must be at least 1');

      const entries = ctx.audit.recent(count);
      if (ctx.json) {
        printJson({ file: ctx.audit.file, entries });
        return;
      }
      if (entries.length === 0) {
        console.log(`No audit entries in ${ctx.audit.file}.`);
        return;
      }
      for (const line of entries) console.log(line);
    });
}

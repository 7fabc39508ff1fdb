/**
 * dshop ddns <hostnames> [--ip <ips>]
 */

import type { Command } from 'commander';
import { lookupPublicIp, parseHostnames, parseIpList, updateDynamicDns } from '@dshop/core';
import { ExitStatus, contextFor } from '../context.js';
import type { CliRuntime } from '../context.js';
import { failure, notice, printJson, success } from '../output.js';

export function registerDdnsCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('ddns')
    .description('Point hostnames at this machine (dynamic DNS)')
    .argument('<hostnames>', 'Comma-separated hostnames')
    .option('--ip <ips>', 'Comma-separated IPv4/IPv6 addresses (default: detected public IP)')
    .action(async (hostnamesArg: string, opts: { ip?: string }, command: Command) => {
      const ctx = contextFor(runtime, command);
      const hostnames = parseHostnames(hostnamesArg);
      const ips = parseIpList(opts.ip);
      const { config } = runtime;

      const result = await updateDynamicDns(await ctx.client(), {
        hostnames,
        ips,
        lookupPublicIp: () =>
          lookupPublicIp(config.ipEchoUrl, { timeoutMs: config.timeoutMs, fetch: runtime.fetch }),
      });
      const failed = result.results.filter((r) => !r.ok).length;

      if (ctx.json) {
        printJson(result);
      } else {
        notice(
          result.ips.length > 0
            ? `IP: ${result.ips.join(', ')} (${result.ipSource})`
            : 'IP: address of this connection, as seen by the API',
        );
        for (const r of result.results) {
          if (r.ok) success(r.hostname);
          else failure(`${r.hostname}: ${r.error?.message ?? 'failed'}`);
        }
      }

      if (failed > 0) throw new ExitStatus(1);
    });
}

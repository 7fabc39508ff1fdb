/**
 * Dynamic DNS updates.
 *
 * One update call per hostname, all issued together. A failing hostname
 * never stops the others; the caller gets one outcome per hostname.
 */

import { isIP } from 'node:net';
import type { DomeneshopClient } from './client.js';
import type { ErrorBody } from './errors.js';
import { toErrorBody } from './errors.js';
import type { FetchFn } from './http.js';

export type IpSource = 'explicit' | 'detected' | 'remote';

export interface DynDnsOutcome {
  hostname: string;
  ok: boolean;
  error?: ErrorBody['error'];
}

export interface DynDnsResult {
  ips: string[];
  /** Where the submitted addresses came from. `remote` means the API used our source address. */
  ipSource: IpSource;
  results: DynDnsOutcome[];
}

export interface DynDnsOptions {
  hostnames: string[];
  ips: string[];
  /** Called only when no IPs were given. Resolves to null when the lookup fails. */
  lookupPublicIp?: () => Promise<string | null>;
}

/**
 * Ask an IP-echo service for our public address.
 * Accepts `{ "ip": "..." }` JSON or a bare address in the body.
 */
export async function lookupPublicIp(
  url: string,
  options: { timeoutMs: number; fetch?: FetchFn },
): Promise<string | null> {
  const doFetch = options.fetch ?? fetch;
  let text: string;
  try {
    const res = await doFetch(url, { signal: AbortSignal.timeout(options.timeoutMs) });
    if (!res.ok) return null;
    text = (await res.text()).trim();
  } catch {
    return null;
  }

  let candidate = text;
  if (text.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(text);
      const ip: unknown = parsed && typeof parsed === 'object' ? Reflect.get(parsed, 'ip') : null;
      candidate = typeof ip === 'string' ? ip : '';
    } catch {
      return null;
    }
  }

  return isIP(candidate) === 0 ? null : candidate;
}

export async function updateDynamicDns(
  client: Pick<DomeneshopClient, 'updateDynDns'>,
  options: DynDnsOptions,
): Promise<DynDnsResult> {
  let ips = options.ips;
  let ipSource: IpSource = 'explicit';

  if (ips.length === 0) {
    const detected = options.lookupPublicIp ? await options.lookupPublicIp() : null;
    ips = detected ? [detected] : [];
    ipSource = detected ? 'detected' : 'remote';
  }

  const myip = ips.length > 0 ? ips.join(',') : undefined;

  const settled = await Promise.allSettled(
    options.hostnames.map((hostname) => client.updateDynDns(hostname, myip)),
  );

  const results = settled.map((outcome, i): DynDnsOutcome => {
    const hostname = options.hostnames[i] ?? '';
    if (outcome.status === 'fulfilled') return { hostname, ok: true };
    return { hostname, ok: false, error: toErrorBody(outcome.reason).error };
  });

  return { ips, ipSource, results };
}

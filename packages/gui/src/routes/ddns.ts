/**
 * POST /api/ddns: Point one or more hostnames at an address.
 *
 * Body: `{ hostname: "a.example.com,b.example.com", ip?: "203.0.113.7" }`.
 * Without `ip` the public address is looked up; if that fails the API uses
 * the address the request came from.
 */

import { parseHostnames, parseIpList, updateDynamicDns } from '@dshop/core';
import { Hono } from 'hono';
import { z } from 'zod';
import type { GuiEnv } from '../env.js';
import { readBody } from '../errors.js';
import type { GuiSession } from '../session.js';

const ddnsSchema = z.object({
  hostname: z.string(),
  ip: z
    .string()
    .nullish()
    .transform((v) => v || undefined),
});

export function ddnsRoutes(session: GuiSession): Hono<GuiEnv> {
  const ddns = new Hono<GuiEnv>();

  ddns.post('/', async (c) => {
    const body = await readBody(c, ddnsSchema);
    const hostnames = parseHostnames(body.hostname);
    const ips = parseIpList(body.ip);

    const result = await updateDynamicDns(await session.client(), {
      hostnames,
      ips,
      lookupPublicIp: () => session.publicIp(),
    });

    return c.json({
      success: result.results.every((r) => r.ok),
      ips: result.ips,
      ip_source: result.ipSource,
      results: result.results,
    });
  });

  return ddns;
}

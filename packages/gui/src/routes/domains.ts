/**
 * Domains and their DNS records and forwards.
 *
 * Bodies are validated with the same rules as the CLI flags before any
 * call to the API.
 */

import { parseDnsRecordType, parseId, validateDnsRecord, validateForward } from '@dshop/core';
import { Hono } from 'hono';
import { z } from 'zod';
import type { GuiEnv } from '../env.js';
import { readBody } from '../errors.js';
import type { GuiSession } from '../session.js';

const optionalNumber = z
  .number()
  .nullish()
  .transform((v) => v ?? undefined);

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const recordSchema = z.object({
  type: optionalString,
  host: optionalString,
  data: optionalString,
  ttl: optionalNumber,
  priority: optionalNumber,
  weight: optionalNumber,
  port: optionalNumber,
});

const forwardSchema = z.object({
  host: optionalString,
  url: optionalString,
  frame: z.boolean().optional(),
});

export function domainRoutes(session: GuiSession): Hono<GuiEnv> {
  const domains = new Hono<GuiEnv>();

  domains.get('/', async (c) => {
    const list = await (await session.client()).listDomains(c.req.query('domain'));
    return c.json(list);
  });

  domains.get('/:id', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    return c.json(await (await session.client()).getDomain(id));
  });

  // DNS

  domains.get('/:id/dns', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    const type = parseDnsRecordType(c.req.query('type'));
    const records = await (await session.client()).listDnsRecords(id, {
      host: c.req.query('host'),
      type,
    });
    return c.json(records);
  });

  domains.post('/:id/dns', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    const record = validateDnsRecord(await readBody(c, recordSchema));

    const created = await (await session.client()).createDnsRecord(id, record);
    session.audit.dnsChange('create', id, created.id, record.type, c.get('clientIp'));

    return c.json({ id: created.id, ...record }, 201);
  });

  domains.put('/:id/dns/:recordId', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    const rid = parseId(c.req.param('recordId'), 'record id');
    const record = validateDnsRecord(await readBody(c, recordSchema));

    await (await session.client()).updateDnsRecord(id, rid, record);
    session.audit.dnsChange('update', id, rid, record.type, c.get('clientIp'));

    return c.json({ id: rid, ...record });
  });

  domains.delete('/:id/dns/:recordId', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    const rid = parseId(c.req.param('recordId'), 'record id');

    await (await session.client()).deleteDnsRecord(id, rid);
    session.audit.dnsChange('delete', id, rid, undefined, c.get('clientIp'));

    return c.body(null, 204);
  });

  // Forwards

  domains.get('/:id/forwards', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    return c.json(await (await session.client()).listForwards(id));
  });

  domains.post('/:id/forwards', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    const forward = validateForward(await readBody(c, forwardSchema));

    await (await session.client()).createForward(id, forward);
    session.audit.forwardChange('create', id, forward.host, c.get('clientIp'));

    return c.json(forward, 201);
  });

  domains.put('/:id/forwards/:host', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    const host = c.req.param('host');
    const body = await readBody(c, forwardSchema);
    const forward = validateForward({ ...body, host });

    await (await session.client()).updateForward(id, host, forward);
    session.audit.forwardChange('update', id, host, c.get('clientIp'));

    return c.json(forward);
  });

  domains.delete('/:id/forwards/:host', async (c) => {
    const id = parseId(c.req.param('id'), 'domain id');
    const host = c.req.param('host');

    await (await session.client()).deleteForward(id, host);
    session.audit.forwardChange('delete', id, host, c.get('clientIp'));

    return c.body(null, 204);
  });

  return domains;
}

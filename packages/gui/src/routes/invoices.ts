import { parseId, parseInvoiceStatus } from '@dshop/core';
import { Hono } from 'hono';
import type { GuiEnv } from '../env.js';
import type { GuiSession } from '../session.js';

/**
 * Invoices are read-only.
 */
export function invoiceRoutes(session: GuiSession): Hono<GuiEnv> {
  const invoices = new Hono<GuiEnv>();

  invoices.get('/', async (c) => {
    const status = parseInvoiceStatus(c.req.query('status'));
    return c.json(await (await session.client()).listInvoices(status));
  });

  invoices.get('/:id', async (c) => {
    const id = parseId(c.req.param('id'), 'invoice id');
    return c.json(await (await session.client()).getInvoice(id));
  });

  return invoices;
}

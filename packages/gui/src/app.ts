/**
 * Local web GUI: a JSON API over the same core the CLI uses, plus a page
 * shell. Bound to the loopback interface only (see index.ts).
 */

import { Hono } from 'hono';
import { html } from 'hono/html';
import type { GuiEnv } from './env.js';
import { errorHandler } from './errors.js';
import { clientInfo } from './middleware/client-info.js';
import { csrfProtection } from './middleware/csrf.js';
import { requestLogger } from './middleware/logger.js';
import { SlidingWindowLimiter } from './middleware/rate-limit.js';
import { accountRoutes } from './routes/accounts.js';
import { authRoutes } from './routes/auth.js';
import { ddnsRoutes } from './routes/ddns.js';
import { domainRoutes } from './routes/domains.js';
import { invoiceRoutes } from './routes/invoices.js';
import { GuiSession } from './session.js';
import type { GuiDeps } from './session.js';

export type { GuiDeps } from './session.js';
export { GuiSession } from './session.js';

export function createApp(deps: GuiDeps): Hono<GuiEnv> {
  const session = new GuiSession(deps);
  const limiter = new SlidingWindowLimiter(deps.now);
  const app = new Hono<GuiEnv>();

  app.use('*', clientInfo);
  app.use('*', requestLogger(deps.log ?? ((line) => console.log(line))));
  app.use('/api/*', csrfProtection(session));
  app.onError(errorHandler(session));

  app.get('/', (c) =>
    c.html(html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="csrf-token" content="${session.csrfToken}" />
    <title>Domeneshop</title>
  </head>
  <body>
    <main id="app"></main>
  </body>
</html>`),
  );

  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.get('/api/csrf-token', (c) => c.json({ csrf_token: session.csrfToken }));

  app.route('/api/auth', authRoutes(session, limiter));
  app.route('/api/accounts', accountRoutes(session, limiter));
  app.route('/api/domains', domainRoutes(session));
  app.route('/api/invoices', invoiceRoutes(session));
  app.route('/api/ddns', ddnsRoutes(session));

  return app;
}

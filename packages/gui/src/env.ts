import type { HttpBindings } from '@hono/node-server';

/**
 * Hono environment for every GUI route. Bindings are partial because
 * `app.request()` in tests runs without a Node socket.
 */
export interface GuiEnv {
  Bindings: Partial<HttpBindings>;
  Variables: {
    clientIp: string;
    userAgent: string | undefined;
  };
}

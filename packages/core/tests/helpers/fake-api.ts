import type { FetchFn } from '../../src/http.js';

export const API_BASE_URL = 'https://api.example.test/v0';

export interface RecordedCall {
  method: string;
  /** API path without the version prefix, or the full URL for other hosts. */
  path: string;
  body: unknown;
  authorization: string | null;
}

interface Route {
  status: number;
  body?: unknown;
}

/**
 * Stand-in for the remote API behind an injected fetch. Unrouted requests
 * answer 404.
 */
export class FakeApi {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, Route>();

  on(method: string, path: string, status: number, body?: unknown): this {
    this.routes.set(`${method} ${path}`, { status, body });
    return this;
  }

  readonly fetch: FetchFn = async (input, init = {}) => {
    const url = new URL(input);
    const path =
      url.origin === new URL(API_BASE_URL).origin
        ? `${url.pathname.replace(/^\/v0/, '')}${url.search}`
        : url.href;
    const method = init.method ?? 'GET';
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
    this.calls.push({
      method,
      path,
      body,
      authorization: new Headers(init.headers).get('authorization'),
    });

    const route = this.routes.get(`${method} ${path}`) ?? {
      status: 404,
      body: { code: 'not_found', help: `no route for ${method} ${path}` },
    };
    if (route.status === 204) return new Response(null, { status: 204 });
    return new Response(JSON.stringify(route.body ?? null), {
      status: route.status,
      headers: { 'Content-Type': 'application/json' },
    });
  };
}

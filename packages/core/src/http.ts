/**
 * Authenticated HTTP client for the Domeneshop API.
 *
 * Wraps fetch with HTTP Basic auth (token as user, secret as password)
 * and turns every failure into one of the DshopError kinds. One attempt
 * per call; nothing is retried.
 */

import {
  AuthenticationRejectedError,
  RemoteUnavailableError,
  ValidationFailedError,
} from './errors.js';
import type { Credentials } from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiFetchConfig {
  baseUrl: string;
  credentials: Credentials;
  timeoutMs: number;
  /** Defaults to the global fetch. */
  fetch?: FetchFn;
}

export interface ApiRequest {
  body?: unknown;
  query?: Record<string, string | undefined>;
}

export function basicAuthHeader(credentials: Credentials): string {
  const raw = `${credentials.token}:${credentials.secret}`;
  return `Basic ${Buffer.from(raw, 'utf-8').toString('base64')}`;
}

export function buildUrl(baseUrl: string, path: string, query?: ApiRequest['query']): string {
  const url = `${baseUrl}${path}`;
  if (!query) return url;

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== '') params.set(key, value);
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Pick the human-readable message out of a remote error payload.
 * The API answers with `{ code, help }`; other shapes are tolerated.
 */
export function remoteMessage(payload: unknown): string | undefined {
  if (typeof payload === 'string') {
    const trimmed = payload.trim();
    return trimmed ? trimmed.slice(0, 300) : undefined;
  }
  if (payload && typeof payload === 'object') {
    for (const key of ['help', 'error', 'message', 'code']) {
      const value: unknown = Reflect.get(payload, key);
      if (typeof value === 'string' && value) return value;
    }
  }
  return undefined;
}

function statusError(status: number, payload: unknown): Error {
  const message = remoteMessage(payload);
  const options = { status, payload };

  if (status === 401 || status === 403) {
    return new AuthenticationRejectedError(
      message ?? `authentication rejected (HTTP ${status}); check token and secret`,
      options,
    );
  }
  if (status >= 500) {
    return new RemoteUnavailableError(message ?? `remote server error (HTTP ${status})`, options);
  }
  if (status === 404) {
    return new ValidationFailedError(message ?? 'resource not found (HTTP 404)', options);
  }
  return new ValidationFailedError(message ?? `request rejected (HTTP ${status})`, options);
}

function transportError(err: unknown, url: string, timeoutMs: number): RemoteUnavailableError {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new RemoteUnavailableError(`request timed out after ${timeoutMs} ms`);
  }
  const host = new URL(url).host;
  const cause = err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined;
  const detail = cause ?? (err instanceof Error ? err.message : String(err));
  return new RemoteUnavailableError(`could not connect to ${host}: ${detail}`);
}

/**
 * Make an authenticated request to the API.
 *
 * Resolves with the parsed JSON body, or null for 204 and empty bodies.
 */
export async function apiFetch(
  method: HttpMethod,
  path: string,
  request: ApiRequest,
  config: ApiFetchConfig,
): Promise<unknown> {
  const url = buildUrl(config.baseUrl, path, request.query);
  const headers: Record<string, string> = {
    Authorization: basicAuthHeader(config.credentials),
    Accept: 'application/json',
  };

  let body: string | undefined;
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.body);
  }

  const doFetch = config.fetch ?? fetch;
  let res: Response;
  try {
    res = await doFetch(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (err) {
    throw transportError(err, url, config.timeoutMs);
  }

  let text: string;
  try {
    text = res.status === 204 ? '' : await res.text();
  } catch (err) {
    throw transportError(err, url, config.timeoutMs);
  }
  const payload = parseBody(text);

  if (!res.ok) {
    throw statusError(res.status, payload);
  }

  return payload;
}

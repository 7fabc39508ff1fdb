/**
 * Mapping of error kinds onto HTTP responses.
 */

import { DshopError, ValidationFailedError, toErrorBody } from '@dshop/core';
import type { Context, ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { z } from 'zod';
import type { GuiEnv } from './env.js';
import type { GuiSession } from './session.js';

const CLIENT_ERRORS: readonly ContentfulStatusCode[] = [
  400, 401, 402, 403, 404, 405, 406, 407, 408, 409, 410, 411, 412, 413, 414, 415,
  416, 417, 418, 421, 422, 423, 424, 425, 426, 428, 429, 431, 451,
];

export function statusFor(err: unknown): ContentfulStatusCode {
  if (!(err instanceof DshopError)) return 500;
  switch (err.kind) {
    case 'CredentialsMissing':
    case 'AuthenticationRejected':
      return 401;
    case 'ValidationFailed': {
      // A 4xx from the API is passed through as is.
      const remote = err.status;
      return CLIENT_ERRORS.find((code) => code === remote) ?? 400;
    }
    case 'RemoteUnavailable':
      return 502;
    case 'UserCancelled':
      return 409;
  }
}

export function errorHandler(session: GuiSession): ErrorHandler<GuiEnv> {
  return (err, c) => {
    const status = statusFor(err);
    if (err instanceof ValidationFailedError && err.status === undefined) {
      session.audit.invalidInput(c.req.path, err.message, c.get('clientIp'));
    }
    if (status === 500) console.error(`${c.req.method} ${c.req.path} failed:`, err);
    return c.json(toErrorBody(err), { status });
  };
}

/**
 * Parse a JSON request body against a schema. Every failure is a
 * ValidationFailedError naming the first offending field.
 */
export async function readBody<T>(
  c: Context<GuiEnv>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new ValidationFailedError('request body must be a JSON object');
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'body';
    throw new ValidationFailedError(`${field}: ${issue?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}

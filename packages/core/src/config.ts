/**
 * Runtime configuration, read from the environment.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export const DEFAULT_API_BASE_URL = 'https://api.domeneshop.no/v0';
export const DEFAULT_IP_ECHO_URL = 'https://api.ipify.org?format=json';

export interface DshopConfig {
  apiBaseUrl: string;
  timeoutMs: number;
  credentialsFile: string;
  auditLogFile: string;
  auditEnabled: boolean;
  keychainEnabled: boolean;
  ipEchoUrl: string;
  gui: {
    host: string;
    port: number;
  };
}

/** Unset, non-numeric or non-positive values fall back to the default. */
function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DshopConfig {
  const home = homedir();

  return Object.freeze({
    apiBaseUrl: (env.DOMENESHOP_API_URL ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ''),
    timeoutMs: positiveInt(env.DOMENESHOP_TIMEOUT_MS, 15000),
    credentialsFile: env.DOMENESHOP_CREDENTIALS_FILE ?? join(home, '.domeneshop-credentials'),
    auditLogFile: env.DOMENESHOP_AUDIT_LOG ?? join(home, '.domeneshop-audit.log'),
    auditEnabled: env.DOMENESHOP_AUDIT !== 'off',
    keychainEnabled: env.DOMENESHOP_KEYCHAIN !== 'off',
    ipEchoUrl: env.DOMENESHOP_IP_ECHO_URL ?? DEFAULT_IP_ECHO_URL,
    // Loopback only.
    gui: Object.freeze({
      host: '127.0.0.1',
      port: positiveInt(env.PORT, 5050),
    }),
  });
}

import { serve } from '@hono/node-server';
import { AccountStore, AuditLog, CredentialsFile, loadConfig, platformKeychain } from '@dshop/core';
import { createApp } from './app.js';

const config = loadConfig();

const app = createApp({
  config,
  env: process.env,
  audit: new AuditLog({ file: config.auditLogFile, enabled: config.auditEnabled }),
  accounts: new AccountStore({
    file: new CredentialsFile(config.credentialsFile),
    keychain: config.keychainEnabled ? platformKeychain() : null,
  }),
});

serve({ fetch: app.fetch, hostname: config.gui.host, port: config.gui.port }, (info) => {
  console.log(`Domeneshop GUI running on http://${config.gui.host}:${info.port}`);
});

import { describe, expect, it } from 'vitest';
import { DEFAULT_API_BASE_URL, loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.apiBaseUrl).toBe(DEFAULT_API_BASE_URL);
    expect(config.timeoutMs).toBe(15000);
    expect(config.gui).toEqual({ host: '127.0.0.1', port: 5050 });
  });

  it('reads numeric settings', () => {
    const config = loadConfig({ DOMENESHOP_TIMEOUT_MS: '2500', PORT: '8080' });
    expect(config.timeoutMs).toBe(2500);
    expect(config.gui.port).toBe(8080);
  });

  it('falls back to the defaults for unusable numbers', () => {
    expect(loadConfig({ DOMENESHOP_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(15000);
    expect(loadConfig({ DOMENESHOP_TIMEOUT_MS: '0' }).timeoutMs).toBe(15000);
    expect(loadConfig({ PORT: 'http' }).gui.port).toBe(5050);
  });

  it('trims trailing slashes from the API URL', () => {
    expect(loadConfig({ DOMENESHOP_API_URL: 'http://api.test/v0//' }).apiBaseUrl).toBe(
      'http://api.test/v0',
    );
  });
});

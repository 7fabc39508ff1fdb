/**
 * OS keychain access.
 *
 * Optional: when no backend is usable the keychain simply holds nothing.
 * macOS goes through `security` (login keychain, generic passwords),
 * Linux through `secret-tool` (libsecret / Secret Service).
 */

import { spawn } from 'node:child_process';

export const KEYCHAIN_SERVICE = 'domeneshop-cli';

export interface KeychainBackend {
  /** Human-readable backend name, e.g. "macOS Keychain". */
  readonly name: string;
  isAvailable(): Promise<boolean>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  /** Resolves to false when there was nothing to delete. */
  delete(key: string): Promise<boolean>;
}

export interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

/** Runs a command to completion, feeding `input` on stdin. */
export type CommandRunner = (command: string, args: string[], input?: string) => Promise<RunResult>;

const spawnCommand: CommandRunner = (command, args, input) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on('error', reject);
    child.on('close', (code) => resolve({ code: code ?? 1, stdout, stderr }));
    child.stdin.end(input ?? '');
  });
};

function commandFailed(command: string, result: RunResult): Error {
  return new Error(`${command} exited with ${result.code}: ${result.stderr.trim()}`);
}

/** Quotes one argument for a `security -i` command line. */
export function securityQuote(arg: string): string {
  return `"${arg.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}

export class MacKeychain implements KeychainBackend {
  readonly name = 'macOS Keychain';

  constructor(
    private readonly service: string = KEYCHAIN_SERVICE,
    private readonly run: CommandRunner = spawnCommand,
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run('security', ['default-keychain']);
      return result.code === 0;
    } catch {
      return false;
    }
  }

  async get(key: string): Promise<string | null> {
    const result = await this.run('security', [
      'find-generic-password',
      '-s',
      this.service,
      '-a',
      key,
      '-w',
    ]);
    // 44: item not found
    if (result.code === 44) return null;
    if (result.code !== 0) throw commandFailed('security', result);
    return result.stdout.replace(/\n$/, '');
  }

  async set(key: string, value: string): Promise<void> {
    // `security -i` reads the command from stdin, keeping the value out of the process list.
    const command = ['add-generic-password', '-U', '-s', this.service, '-a', key, '-w', value]
      .map(securityQuote)
      .join(' ');
    const result = await this.run('security', ['-i'], `${command}\n`);
    // Interactive mode exits 0 even when the command fails; failures show on stderr.
    if (result.code !== 0 || result.stderr.trim() !== '') throw commandFailed('security', result);
  }

  async delete(key: string): Promise<boolean> {
    const result = await this.run('security', [
      'delete-generic-password',
      '-s',
      this.service,
      '-a',
      key,
    ]);
    if (result.code === 44) return false;
    if (result.code !== 0) throw commandFailed('security', result);
    return true;
  }
}

export class SecretToolKeychain implements KeychainBackend {
  readonly name = 'Secret Service (libsecret)';

  constructor(
    private readonly service: string = KEYCHAIN_SERVICE,
    private readonly run: CommandRunner = spawnCommand,
  ) {}

  private attributes(key: string): string[] {
    return ['service', this.service, 'account', key];
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run('secret-tool', ['search', 'service', this.service]);
      // Exit 1 with no output means "nothing stored", which still proves the daemon answers.
      return result.code === 0 || (result.code === 1 && result.stderr.trim() === '');
    } catch {
      return false;
    }
  }

  async get(key: string): Promise<string | null> {
    const result = await this.run('secret-tool', ['lookup', ...this.attributes(key)]);
    if (result.code !== 0) {
      if (result.stderr.trim() === '') return null;
      throw commandFailed('secret-tool', result);
    }
    return result.stdout.replace(/\n$/, '');
  }

  async set(key: string, value: string): Promise<void> {
    // The secret travels on stdin, never on the command line.
    const label = `${this.service} ${key}`;
    const result = await this.run(
      'secret-tool',
      ['store', `--label=${label}`, ...this.attributes(key)],
      value,
    );
    if (result.code !== 0) throw commandFailed('secret-tool', result);
  }

  async delete(key: string): Promise<boolean> {
    const existing = await this.get(key);
    if (existing === null) return false;
    const result = await this.run('secret-tool', ['clear', ...this.attributes(key)]);
    if (result.code !== 0) throw commandFailed('secret-tool', result);
    return true;
  }
}

/**
 * Pick the keychain backend for this platform, or null when there is none.
 * Availability is checked lazily by the account store.
 */
export function platformKeychain(
  platform: NodeJS.Platform = process.platform,
  service: string = KEYCHAIN_SERVICE,
): KeychainBackend | null {
  if (platform === 'darwin') return new MacKeychain(service);
  if (platform === 'linux') return new SecretToolKeychain(service);
  return null;
}

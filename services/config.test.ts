import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { applyEnvironment, loadConfig, parseConfig, resolveConfigPath } from './config.js';
import { ConfigurationLoadError } from './errors.js';

const minimal = {
  address: '10.0.0.1',
  credentials: { apiKey: 'test-key' },
  ciphers: { mgmt: 'aes256-gcm', ha: ['aes128-ctr', 'aes128-ctr', 'aes256-ctr'] },
};

describe('parseConfig', () => {
  it('fills in defaults and normalises cipher selections', () => {
    expect(parseConfig(minimal)).toEqual({
      address: '10.0.0.1',
      protocol: 'https',
      credentials: { apiKey: 'test-key' },
      ciphers: { mgmt: ['aes256-gcm'], ha: ['aes128-ctr', 'aes256-ctr'] },
      requestTimeoutMs: 30000,
      commit: { description: 'SSH Ciphers Commit', pollIntervalMs: 2000, timeoutMs: 600000 },
      skipIfApplied: false,
    });
  });

  it('accepts username and password credentials', () => {
    const config = parseConfig({ ...minimal, credentials: { username: 'admin', password: 'test-password' } });

    expect(config.credentials).toEqual({ username: 'admin', password: 'test-password' });
  });

  it('rejects an address that is not a host', () => {
    expect(() => parseConfig({ ...minimal, address: 'https://10.0.0.1/api' })).toThrow(
      'Invalid configuration: address: must be a hostname or IP address, optionally with :port'
    );
  });

  it('rejects a cipher name that cannot be an element name', () => {
    expect(() => parseConfig({ ...minimal, ciphers: { mgmt: 'aes<256>', ha: 'aes256-gcm' } })).toThrow(
      'ciphers.mgmt: must be a cipher name such as aes256-gcm'
    );
  });

  it('rejects a cipher name that starts with a digit', () => {
    expect(() => parseConfig({ ...minimal, ciphers: { mgmt: 'aes256-gcm', ha: '3des-cbc' } })).toThrow(
      'ciphers.ha: must be a cipher name such as aes256-gcm'
    );
  });

  it('names every missing field', () => {
    let error: unknown;
    try {
      parseConfig({ credentials: { apiKey: 'test-key' }, ciphers: { mgmt: 'aes256-gcm' } });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigurationLoadError);
    expect(error).toMatchObject({ kind: 'configuration' });
    expect(String(error)).toContain('address: Required');
    expect(String(error)).toContain('ciphers.ha:');
  });

  it('rejects a file that is not an object', () => {
    expect(() => parseConfig(['10.0.0.1'])).toThrow(ConfigurationLoadError);
  });
});

describe('applyEnvironment', () => {
  it('lets an API key from the environment replace file credentials', () => {
    const merged = applyEnvironment(
      { ...minimal, credentials: { username: 'admin', password: 'test-password' } },
      { PANOS_API_KEY: 'env-key', PANOS_ADDRESS: 'fw.example.test' }
    );

    expect(merged.credentials).toEqual({ apiKey: 'env-key' });
    expect(merged.address).toBe('fw.example.test');
  });

  it('merges username and password from the environment', () => {
    const config = parseConfig(
      { ...minimal, credentials: { username: 'admin' } },
      { PANOS_PASSWORD: 'env-password' }
    );

    expect(config.credentials).toEqual({ username: 'admin', password: 'env-password' });
  });

  it('drops a file API key when a password comes from the environment', () => {
    const config = parseConfig(minimal, { PANOS_USERNAME: 'operator', PANOS_PASSWORD: 'env-password' });

    expect(config.credentials).toEqual({ username: 'operator', password: 'env-password' });
  });
});

describe('resolveConfigPath', () => {
  it('defaults to config.json', () => {
    expect(resolveConfigPath({})).toBe('config.json');
    expect(resolveConfigPath({ PANOS_CIPHERS_CONFIG: '/etc/ciphers.json' })).toBe('/etc/ciphers.json');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ssh-ciphers-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a JSON file', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ ...minimal, skipIfApplied: true }));

    const config = await loadConfig(path);

    expect(config.address).toBe('10.0.0.1');
    expect(config.skipIfApplied).toBe(true);
  });

  it('reports a missing file', async () => {
    const path = join(dir, 'missing.json');

    await expect(loadConfig(path)).rejects.toMatchObject({
      name: 'ConfigurationLoadError',
      message: `Cannot read configuration file ${path}: file not found`,
    });
  });

  it('reports a file that is not JSON', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, 'address = 10.0.0.1');

    await expect(loadConfig(path)).rejects.toThrow(`Configuration file ${path} is not valid JSON`);
  });
});

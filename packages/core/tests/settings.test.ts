import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadSettings, resolveSettings } from '../src/settings/settings.js';
import { ParseError, ValidationError } from '../src/errors.js';

let dir: string;
let settingsPath: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'nodeconf-settings-'));
  settingsPath = join(dir, 'settings.yaml');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('resolveSettings', () => {
  it('should apply every default', () => {
    expect(resolveSettings()).toEqual({
      configPath: '/etc/nodeconf.toml',
      stateDir: '/var/lib/nodeconf',
      systemRoot: '/',
      adapterTimeoutMs: 15000,
      commandTimeoutMs: 10000,
      lockRetries: 10,
      watchclock: { thresholdDays: 7, intervalSeconds: 30, service: 'meshtasticd' },
    });
  });

  it('should reject non-positive timeouts', () => {
    expect(() => resolveSettings({ adapterTimeoutMs: 0 })).toThrow(ValidationError);
  });
});

describe('loadSettings', () => {
  it('should use defaults when the settings file is missing', async () => {
    const settings = await loadSettings({ settingsPath, env: {} });
    expect(settings).toEqual(resolveSettings());
  });

  it('should read the YAML file', async () => {
    await fs.writeFile(
      settingsPath,
      ['stateDir: /run/nodeconf', 'adapterTimeoutMs: 5000', 'watchclock:', '  thresholdDays: 1', ''].join('\n'),
    );

    const settings = await loadSettings({ settingsPath, env: {} });

    expect(settings.stateDir).toBe('/run/nodeconf');
    expect(settings.adapterTimeoutMs).toBe(5000);
    expect(settings.watchclock).toEqual({ thresholdDays: 1, intervalSeconds: 30, service: 'meshtasticd' });
  });

  it('should let the environment override the file', async () => {
    await fs.writeFile(settingsPath, 'adapterTimeoutMs: 5000\nconfigPath: /etc/other.toml\n');

    const settings = await loadSettings({
      settingsPath,
      env: { NODECONF_ADAPTER_TIMEOUT_MS: '2000', NODECONF_CONFIG_PATH: '/tmp/node.toml' },
    });

    expect(settings.adapterTimeoutMs).toBe(2000);
    expect(settings.configPath).toBe('/tmp/node.toml');
  });

  it('should find the settings file through NODECONF_SETTINGS', async () => {
    await fs.writeFile(settingsPath, 'lockRetries: 2\n');
    const settings = await loadSettings({ env: { NODECONF_SETTINGS: settingsPath } });
    expect(settings.lockRetries).toBe(2);
  });

  it('should throw ParseError for malformed YAML', async () => {
    await fs.writeFile(settingsPath, 'configPath: [unclosed\n');
    await expect(loadSettings({ settingsPath, env: {} })).rejects.toBeInstanceOf(ParseError);
  });

  it('should throw ValidationError for values of the wrong type', async () => {
    await fs.writeFile(settingsPath, 'commandTimeoutMs: soon\n');
    await expect(loadSettings({ settingsPath, env: {} })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject a document that is not a mapping', async () => {
    await fs.writeFile(settingsPath, '- a\n- b\n');
    await expect(loadSettings({ settingsPath, env: {} })).rejects.toBeInstanceOf(ValidationError);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { listInterfaces, requireInterface, selectInterface, InterfaceSelectionError } from '../../src/system/interfaces.js';
import type { SystemPaths } from '../../src/system/paths.js';
import { createSystemRoot, removeSystemRoot } from '../helpers/fake-system.js';

let paths: SystemPaths;

beforeEach(async () => {
  paths = await createSystemRoot();
});

afterEach(async () => {
  await removeSystemRoot(paths);
});

describe('listInterfaces', () => {
  it('should split physical interfaces into wireless and wired', async () => {
    await fs.mkdir(join(paths.netClass, 'wlan1', 'device'), { recursive: true });
    await fs.mkdir(join(paths.netClass, 'docker0'), { recursive: true });

    expect(await listInterfaces(paths)).toEqual({ wifi: ['wlan0', 'wlan1'], ethernet: ['eth0'] });
  });

  it('should return nothing when /sys/class/net is missing', async () => {
    await fs.rm(paths.netClass, { recursive: true });
    expect(await listInterfaces(paths)).toEqual({ wifi: [], ethernet: [] });
  });
});

describe('selectInterface', () => {
  it('should pick the only interface', () => {
    expect(selectInterface('Wi-Fi', ['wlan0'])).toEqual({ ok: true, name: 'wlan0' });
  });

  it('should honour an available preference', () => {
    expect(selectInterface('Wi-Fi', ['wlan0', 'wlan1'], 'wlan1')).toEqual({ ok: true, name: 'wlan1' });
  });

  it('should explain why no interface was chosen', () => {
    expect(selectInterface('Wi-Fi', [])).toEqual({ ok: false, reason: 'No Wi-Fi interface detected.' });
    expect(selectInterface('Wi-Fi', ['wlan0', 'wlan1'])).toEqual({
      ok: false,
      reason: 'Multiple Wi-Fi interfaces detected: wlan0, wlan1. Select one.',
    });
    expect(selectInterface('ethernet', ['eth0'], 'eth1')).toEqual({
      ok: false,
      reason: "ethernet interface 'eth1' not found. Available: eth0.",
    });
  });

  it('should throw from requireInterface on a failed selection', () => {
    expect(() => requireInterface(selectInterface('Wi-Fi', []))).toThrow(InterfaceSelectionError);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventType, getClockStampPath, queryEvents, resolveSettings } from '@nodeconf/core';
import { Watchclock } from '../../src/daemons/watchclock.js';
import { FakeRunner } from '../helpers/fake-system.js';

const DAY = 24 * 60 * 60;
const START = 1_700_000_000;

let stateDir: string;
let runner: FakeRunner;
let clock: number;

function watchclock(): Watchclock {
  return new Watchclock({
    settings: resolveSettings().watchclock,
    stateDir,
    runner,
    now: () => clock,
  });
}

beforeEach(() => {
  stateDir = mkdtempSync(join(tmpdir(), 'nodeconf-watchclock-'));
  runner = new FakeRunner();
  runner.units.set('meshtasticd', { enabled: true, running: true });
  clock = START;
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(stateDir, { recursive: true, force: true });
});

describe('Watchclock.runOnce', () => {
  it('should do nothing while the service is not running', async () => {
    runner.units.set('meshtasticd', { enabled: true, running: false });

    expect(await watchclock().runOnce()).toEqual({ checked: false, deltaSeconds: 0, restarted: false });
    await expect(fs.access(getClockStampPath(stateDir))).rejects.toThrow();
  });

  it('should record the first stamp without restarting', async () => {
    expect(await watchclock().runOnce()).toEqual({ checked: true, deltaSeconds: 0, restarted: false });
    expect(await fs.readFile(getClockStampPath(stateDir), 'utf-8')).toBe(`${START}\n`);
  });

  it('should leave the service alone for small drifts', async () => {
    const daemon = watchclock();
    await daemon.runOnce();
    clock = START + 6 * DAY;

    expect(await daemon.runOnce()).toEqual({ checked: true, deltaSeconds: 6 * DAY, restarted: false });
    expect(runner.mutations()).toEqual([]);
  });

  it('should restart the service after a forward jump', async () => {
    const daemon = watchclock();
    await daemon.runOnce();
    clock = START + 8 * DAY;

    expect(await daemon.runOnce()).toEqual({ checked: true, deltaSeconds: 8 * DAY, restarted: true });
    expect(runner.mutations()).toEqual(['systemctl restart meshtasticd']);

    const events = await queryEvents(stateDir, { eventType: EventType.ClockJumped });
    expect(events.map((e) => e.data)).toEqual([{ delta_seconds: 8 * DAY, service: 'meshtasticd' }]);
  });

  it('should restart the service after a backward jump', async () => {
    await fs.writeFile(getClockStampPath(stateDir), `${START + 30 * DAY}\n`);

    const result = await watchclock().runOnce();

    expect(result).toEqual({ checked: true, deltaSeconds: -30 * DAY, restarted: true });
  });

  it('should treat an unreadable stamp as no stamp', async () => {
    await fs.writeFile(getClockStampPath(stateDir), 'garbage');
    expect(await watchclock().runOnce()).toEqual({ checked: true, deltaSeconds: 0, restarted: false });
  });
});

describe('Watchclock.start', () => {
  it('should run the first check immediately and stop cleanly', () => {
    const daemon = watchclock();
    const runOnce = vi.spyOn(daemon, 'runOnce').mockResolvedValue({ checked: false, deltaSeconds: 0, restarted: false });

    daemon.start();
    daemon.start();
    daemon.stop();

    expect(runOnce).toHaveBeenCalledTimes(1);
  });
});

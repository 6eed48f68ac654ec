import path from 'node:path';

/**
 * Well-known locations of the engine's own files. System files the
 * adapters manage are resolved by @nodeconf/reconcile.
 */

export const DEFAULT_CONFIG_PATH = '/etc/nodeconf.toml';
export const DEFAULT_SETTINGS_PATH = '/etc/nodeconf/settings.yaml';
export const DEFAULT_STATE_DIR = '/var/lib/nodeconf';

/** @returns Path to the events.jsonl journal */
export function getEventsPath(stateDir: string): string {
  return path.join(stateDir, 'events.jsonl');
}

/** @returns Path to the file recording the last observed wall-clock time */
export function getClockStampPath(stateDir: string): string {
  return path.join(stateDir, 'watchclock.last');
}

import { join } from 'node:path';
import { listDirectory, pathExists } from './files.js';
import type { SystemPaths } from './paths.js';

/** Physical network interfaces found under /sys/class/net. */
export interface InterfaceInventory {
  wifi: string[];
  ethernet: string[];
}

export type InterfaceSelection = { ok: true; name: string } | { ok: false; reason: string };

/** No single interface could be chosen for an operation. */
export class InterfaceSelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InterfaceSelectionError';
  }
}

export async function listInterfaces(paths: SystemPaths): Promise<InterfaceInventory> {
  const inventory: InterfaceInventory = { wifi: [], ethernet: [] };
  for (const name of await listDirectory(paths.netClass)) {
    if (name === 'lo') continue;
    const dir = join(paths.netClass, name);
    if (!(await pathExists(join(dir, 'device')))) continue;
    const wireless = name.startsWith('wl') || (await pathExists(join(dir, 'wireless')));
    (wireless ? inventory.wifi : inventory.ethernet).push(name);
  }
  return inventory;
}

/**
 * Pick the interface to act on: the preferred one when it exists,
 * otherwise the only one available.
 */
export function selectInterface(
  kind: string,
  available: readonly string[],
  preferred?: string,
): InterfaceSelection {
  if (preferred !== undefined) {
    return available.includes(preferred)
      ? { ok: true, name: preferred }
      : {
          ok: false,
          reason: `${kind} interface '${preferred}' not found. Available: ${available.join(', ') || 'none'}.`,
        };
  }
  if (available.length === 1) return { ok: true, name: available[0] };
  if (available.length === 0) return { ok: false, reason: `No ${kind} interface detected.` };
  return { ok: false, reason: `Multiple ${kind} interfaces detected: ${available.join(', ')}. Select one.` };
}

/** @throws {InterfaceSelectionError} */
export function requireInterface(selection: InterfaceSelection): string {
  if (!selection.ok) throw new InterfaceSelectionError(selection.reason);
  return selection.name;
}

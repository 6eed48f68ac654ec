import { isDeepStrictEqual } from 'node:util';
import type { ConfigModel, PartialConfigModel } from './schema.js';

/** Networking fields that are reconciled, in declaration order. */
export const NETWORKING_FIELDS = ['hostname', 'wifi_enabled', 'country_code', 'wifi'] as const;
export type NetworkingField = (typeof NETWORKING_FIELDS)[number];

export interface FieldDiff {
  /** Dotted field path, e.g. `networking.hostname` or `services.meshtasticd` */
  field: string;
  desired: unknown;
  /** `undefined` when the field is missing from the current snapshot */
  current: unknown;
}

/**
 * Per-field differences between a desired and a current model, in schema
 * declaration order. Only fields present in `desired` are compared; a
 * service or peripheral missing from `desired` is unmanaged.
 */
export function diffModels(desired: ConfigModel, current: PartialConfigModel): FieldDiff[] {
  const diffs: FieldDiff[] = [];

  if (current.networking) {
    for (const key of NETWORKING_FIELDS) {
      const want = desired.networking[key];
      const have = current.networking[key];
      if (!isDeepStrictEqual(want, have)) {
        diffs.push({ field: `networking.${key}`, desired: want, current: have });
      }
    }
  } else {
    for (const key of NETWORKING_FIELDS) {
      diffs.push({ field: `networking.${key}`, desired: desired.networking[key], current: undefined });
    }
  }

  for (const [name, want] of Object.entries(desired.services)) {
    const have = current.services?.[name];
    if (!isDeepStrictEqual(want, have)) {
      diffs.push({ field: `services.${name}`, desired: want, current: have });
    }
  }

  for (const [name, want] of Object.entries(desired.hardware)) {
    const have = current.hardware?.[name];
    if (!isDeepStrictEqual(want, have)) {
      diffs.push({ field: `hardware.${name}`, desired: want, current: have });
    }
  }

  return diffs;
}

/** True when the two models agree on every reconciled field. */
export function modelsConverged(desired: ConfigModel, current: PartialConfigModel): boolean {
  return diffModels(desired, current).length === 0;
}

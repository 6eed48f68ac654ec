/**
 * Conversions between plain (TOML-shaped) data and the frozen ConfigModel.
 */

import type { ZodIssue } from 'zod';
import { ValidationError } from '../errors.js';
import type { Violation } from '../errors.js';
import { getPeripheral } from './catalog.js';
import type { PeripheralFamily } from './catalog.js';
import {
  BusSettingsSchema,
  LedSettingsSchema,
  RawConfigSchema,
  ServiceSchema,
} from './schema.js';
import type {
  ConfigModel,
  ModelPatch,
  NetworkingConfig,
  PeripheralSettings,
  ServiceState,
} from './schema.js';

/** Plain data as it appears in (or goes into) a TOML document. */
export type PlainValue = string | number | boolean | PlainValue[] | PlainTable;
export interface PlainTable {
  [key: string]: PlainValue;
}

const FAMILY_KEYS: Readonly<Record<PeripheralFamily, readonly string[]>> = {
  led: ['mode'],
  bus: ['enabled', 'speed'],
};

/** Render a zod/violation path as `networking.wifi[1].ssid`. */
export function formatPath(segments: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out || '(root)';
}

function toViolations(issues: ZodIssue[], prefix: ReadonlyArray<string | number> = []): Violation[] {
  return issues.map((issue) => ({
    path: formatPath([...prefix, ...issue.path]),
    message: issue.message,
  }));
}

/** Recursively freeze a freshly built value. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function decodePeripheral(
  name: string,
  raw: Record<string, unknown>,
  violations: Violation[],
): PeripheralSettings | undefined {
  const family: PeripheralFamily =
    getPeripheral(name)?.family ?? ('mode' in raw ? 'led' : 'bus');

  const otherFamily: PeripheralFamily = family === 'led' ? 'bus' : 'led';
  for (const key of FAMILY_KEYS[otherFamily]) {
    if (key in raw && !FAMILY_KEYS[family].includes(key)) {
      violations.push({
        path: formatPath(['hardware', name, key]),
        message: `"${key}" is not a setting of ${family} peripherals`,
      });
    }
  }

  const parsed =
    family === 'led' ? LedSettingsSchema.safeParse(raw) : BusSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    violations.push(...toViolations(parsed.error.issues, ['hardware', name]));
    return undefined;
  }
  return parsed.data;
}

/**
 * Decode plain data (a parsed TOML table or an object built in memory)
 * into a frozen ConfigModel, filling defaults.
 *
 * @throws {ValidationError} listing every value with the wrong type
 */
export function decodeModel(raw: unknown): ConfigModel {
  const parsed = RawConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw ValidationError.fromViolations(toViolations(parsed.error.issues));
  }

  const violations: Violation[] = [];
  const hardware: Record<string, PeripheralSettings> = {};
  for (const [name, settings] of Object.entries(parsed.data.hardware)) {
    const decoded = decodePeripheral(name, settings, violations);
    if (decoded) hardware[name] = decoded;
  }
  if (violations.length > 0) {
    throw ValidationError.fromViolations(violations);
  }

  const { networking, services } = parsed.data;
  return deepFreeze({
    networking: withoutUndefined(networking),
    services,
    hardware,
  });
}

/** Build a model from partial input; `createModel()` is the all-defaults model. */
export function createModel(input: unknown = {}): ConfigModel {
  return decodeModel(input);
}

export function defaultModel(): ConfigModel {
  return decodeModel({});
}

function withoutUndefined(networking: NetworkingConfig): NetworkingConfig {
  const { wifi_interface, ethernet_interface, ...rest } = networking;
  return {
    ...rest,
    wifi: networking.wifi.map((network) => ({ ssid: network.ssid, psk: network.psk })),
    ...(wifi_interface !== undefined ? { wifi_interface } : {}),
    ...(ethernet_interface !== undefined ? { ethernet_interface } : {}),
  };
}

// ─── Encoding ────────────────────────────────────────────────────────────

export function encodeNetworking(networking: NetworkingConfig): PlainTable {
  const table: PlainTable = {
    hostname: networking.hostname,
    wifi_enabled: networking.wifi_enabled,
    country_code: networking.country_code,
  };
  if (networking.wifi_interface !== undefined) table['wifi_interface'] = networking.wifi_interface;
  if (networking.ethernet_interface !== undefined) {
    table['ethernet_interface'] = networking.ethernet_interface;
  }
  if (networking.wifi.length > 0) {
    table['wifi'] = networking.wifi.map((n) => ({ ssid: n.ssid, psk: n.psk }));
  }
  return table;
}

export function encodeService(state: ServiceState): PlainTable {
  return { enabled: state.enabled, running: state.running };
}

export function encodePeripheral(settings: PeripheralSettings): PlainTable {
  if (settings.family === 'led') return { mode: settings.mode };
  return settings.speed === undefined
    ? { enabled: settings.enabled }
    : { enabled: settings.enabled, speed: settings.speed };
}

/** Plain TOML-ready representation; family tags are implied by the catalog. */
export function encodeModel(model: ConfigModel): PlainTable {
  const services: PlainTable = {};
  for (const [name, state] of Object.entries(model.services)) {
    services[name] = encodeService(state);
  }
  const hardware: PlainTable = {};
  for (const [name, settings] of Object.entries(model.hardware)) {
    hardware[name] = encodePeripheral(settings);
  }
  return {
    networking: encodeNetworking(model.networking),
    services,
    hardware,
  };
}

// ─── Derivation ──────────────────────────────────────────────────────────

function normalizePeripheral(settings: PeripheralSettings): PeripheralSettings {
  if (settings.family === 'led') return { family: 'led', mode: settings.mode };
  return settings.speed === undefined
    ? { family: 'bus', enabled: settings.enabled }
    : { family: 'bus', enabled: settings.enabled, speed: settings.speed };
}

function mergeService(base: ServiceState | undefined, patch: Partial<ServiceState>): ServiceState {
  if (!base) return ServiceSchema.parse(patch);
  const enabled = patch.enabled ?? base.enabled;
  const running = patch.running ?? (patch.enabled !== undefined ? patch.enabled : base.running);
  return { enabled, running };
}

/**
 * Derive a new frozen model from `base`. The base is never mutated.
 * A service without an explicit `running` in the patch follows the
 * patched `enabled`.
 */
export function mergeModel(base: ConfigModel, patch: ModelPatch): ConfigModel {
  const networking: NetworkingConfig = withoutUndefined({
    ...base.networking,
    ...patch.networking,
  });

  const services: Record<string, ServiceState> = { ...base.services };
  for (const [name, servicePatch] of Object.entries(patch.services ?? {})) {
    if (servicePatch === null) {
      delete services[name];
    } else {
      services[name] = mergeService(base.services[name], servicePatch);
    }
  }

  const hardware: Record<string, PeripheralSettings> = { ...base.hardware };
  for (const [name, settings] of Object.entries(patch.hardware ?? {})) {
    if (settings === null) {
      delete hardware[name];
    } else {
      hardware[name] = normalizePeripheral(settings);
    }
  }

  return deepFreeze({ networking, services, hardware });
}

/**
 * Rendering a ConfigModel to TOML text.
 *
 * The model is overlaid on the existing document: only the leaves the
 * model owns and whose effective value changed are rewritten, so comments,
 * unknown keys and unknown tables survive a save. When the overlay cannot
 * be located in the existing text (owned data written as inline tables,
 * for instance) the file is rendered canonically instead, which keeps
 * unknown data but not comments.
 */

import { isDeepStrictEqual } from 'node:util';
import { ParseError, ValidationError } from '../errors.js';
import {
  decodeModel,
  defaultModel,
  encodeNetworking,
  encodePeripheral,
  encodeService,
} from '../model/decode.js';
import type { PlainTable, PlainValue } from '../model/decode.js';
import type { ConfigModel, PeripheralSettings } from '../model/schema.js';
import { DocumentError, TomlDocument } from './document.js';
import type { KeyPath } from './document.js';
import { isTable, parseToml, renderKey, renderKeyPath, renderValue, tableAt } from './toml.js';
import type { TomlTable, TomlValue } from './toml.js';

const NETWORKING_SCALARS = [
  'hostname',
  'wifi_enabled',
  'country_code',
  'wifi_interface',
  'ethernet_interface',
] as const;
const NETWORKING_OWNED: readonly string[] = [...NETWORKING_SCALARS, 'wifi'];
const SERVICE_KEYS = ['enabled', 'running'] as const;
/** Keys of both peripheral families; a key of the other family is dropped. */
const PERIPHERAL_KEYS = ['mode', 'enabled', 'speed'] as const;

type Effective = Partial<Record<string, TomlValue>>;

/**
 * Render `model` as TOML, overlaying it on `existingText` when given.
 *
 * @throws {ParseError} if `existingText` is not valid TOML
 */
export function renderModel(model: ConfigModel, existingText?: string): string {
  if (existingText === undefined || existingText.trim() === '') {
    return renderCanonical(model);
  }
  const existing = parseToml(existingText, '<existing>');
  try {
    const overlaid = overlayModel(model, existingText, existing);
    if (describesModel(overlaid, model)) return overlaid;
  } catch (err) {
    if (!(err instanceof DocumentError)) throw err;
  }
  return renderCanonical(model, existing);
}

/** Whether `text` decodes to exactly `model`. */
export function describesModel(text: string, model: ConfigModel): boolean {
  try {
    return isDeepStrictEqual(decodeModel(parseToml(text, '<rendered>')), model);
  } catch (err) {
    if (err instanceof ParseError || err instanceof ValidationError) return false;
    throw err;
  }
}

// ─── Overlay ─────────────────────────────────────────────────────────────

function setOrRemove(doc: TomlDocument, path: KeyPath, value: PlainValue | undefined): void {
  if (value === undefined) {
    doc.removePath(path);
  } else {
    doc.setValue(path, renderValue(value));
  }
}

function overlayLeaves(
  doc: TomlDocument,
  path: KeyPath,
  keys: readonly string[],
  desired: PlainTable,
  effective: Effective,
): void {
  for (const key of keys) {
    const want = desired[key];
    if (!isDeepStrictEqual(want, effective[key])) {
      setOrRemove(doc, [...path, key], want);
    }
  }
}

function effectiveWifi(raw: TomlValue | undefined): unknown {
  if (raw === undefined) return [];
  if (!Array.isArray(raw) || !raw.every(isTable)) return raw;
  return raw.map((network) => ({ ssid: network['ssid'], psk: network['psk'] ?? '' }));
}

function effectiveService(raw: TomlTable | undefined): Effective {
  if (!raw) return {};
  const enabled = raw['enabled'] ?? false;
  return { enabled, running: raw['running'] ?? enabled };
}

function effectivePeripheral(settings: PeripheralSettings, raw: TomlTable | undefined): Effective {
  if (!raw) return {};
  return settings.family === 'led'
    ? { mode: raw['mode'] ?? 'enable', enabled: raw['enabled'], speed: raw['speed'] }
    : { mode: raw['mode'], enabled: raw['enabled'] ?? false, speed: raw['speed'] };
}

function overlayModel(model: ConfigModel, text: string, existing: TomlTable): string {
  const doc = TomlDocument.parse(text);

  const rawNetworking = tableAt(existing, 'networking');
  const defaults = encodeNetworking(defaultModel().networking);
  overlayLeaves(doc, ['networking'], NETWORKING_SCALARS, encodeNetworking(model.networking), {
    ...defaults,
    ...rawNetworking,
  });

  const wifi = model.networking.wifi;
  if (!isDeepStrictEqual(wifi.map((n) => ({ ssid: n.ssid, psk: n.psk })), effectiveWifi(rawNetworking?.['wifi']))) {
    doc.removePath(['networking', 'wifi']);
    doc.insertArrayTables(
      ['networking', 'wifi'],
      wifi.map((n) => [`ssid = ${renderValue(n.ssid)}`, `psk = ${renderValue(n.psk)}`]),
    );
  }

  const rawServices = tableAt(existing, 'services');
  for (const name of Object.keys(rawServices ?? {})) {
    if (!Object.hasOwn(model.services, name)) doc.removePath(['services', name]);
  }
  for (const [name, state] of Object.entries(model.services)) {
    overlayLeaves(
      doc,
      ['services', name],
      SERVICE_KEYS,
      encodeService(state),
      effectiveService(tableAt(rawServices, name)),
    );
  }

  const rawHardware = tableAt(existing, 'hardware');
  for (const name of Object.keys(rawHardware ?? {})) {
    if (!Object.hasOwn(model.hardware, name)) doc.removePath(['hardware', name]);
  }
  for (const [name, settings] of Object.entries(model.hardware)) {
    overlayLeaves(
      doc,
      ['hardware', name],
      PERIPHERAL_KEYS,
      encodePeripheral(settings),
      effectivePeripheral(settings, tableAt(rawHardware, name)),
    );
  }

  return doc.toString();
}

// ─── Canonical render ────────────────────────────────────────────────────

function withoutKeys(table: TomlTable | undefined, keys: readonly string[]): TomlTable {
  const out: TomlTable = {};
  for (const [key, value] of Object.entries(table ?? {})) {
    if (!keys.includes(key)) out[key] = value;
  }
  return out;
}

/**
 * Render the model from scratch. Unknown keys and tables of `existing`
 * are kept; comments and formatting are not.
 */
export function renderCanonical(model: ConfigModel, existing: TomlTable = {}): string {
  const tree: TomlTable = {
    networking: {
      ...encodeNetworking(model.networking),
      ...withoutKeys(tableAt(existing, 'networking'), NETWORKING_OWNED),
    },
  };

  const rawServices = tableAt(existing, 'services');
  const services: TomlTable = {};
  for (const [name, state] of Object.entries(model.services)) {
    services[name] = { ...encodeService(state), ...withoutKeys(tableAt(rawServices, name), SERVICE_KEYS) };
  }
  if (Object.keys(services).length > 0) tree['services'] = services;

  const rawHardware = tableAt(existing, 'hardware');
  const hardware: TomlTable = {};
  for (const [name, settings] of Object.entries(model.hardware)) {
    hardware[name] = {
      ...encodePeripheral(settings),
      ...withoutKeys(tableAt(rawHardware, name), PERIPHERAL_KEYS),
    };
  }
  if (Object.keys(hardware).length > 0) tree['hardware'] = hardware;

  for (const [key, value] of Object.entries(existing)) {
    if (!['networking', 'services', 'hardware'].includes(key)) tree[key] = value;
  }
  return writeToml(tree);
}

function isTableArray(value: TomlValue): value is TomlTable[] {
  return Array.isArray(value) && value.length > 0 && value.every(isTable);
}

function writeTable(
  path: string[],
  table: TomlTable,
  out: string[],
  header: 'none' | 'table' | 'array',
): void {
  const entries = Object.entries(table);
  const values = entries.filter(([, v]) => !isTable(v) && !isTableArray(v));

  if (header === 'array' || (header === 'table' && (values.length > 0 || entries.length === 0))) {
    if (out.length > 0) out.push('');
    const keyPath = renderKeyPath(path);
    out.push(header === 'array' ? `[[${keyPath}]]` : `[${keyPath}]`);
  }
  for (const [key, value] of values) {
    out.push(`${renderKey(key)} = ${renderValue(value)}`);
  }
  for (const [key, value] of entries) {
    if (isTable(value)) {
      writeTable([...path, key], value, out, 'table');
    } else if (isTableArray(value)) {
      for (const item of value) writeTable([...path, key], item, out, 'array');
    }
  }
}

/** Serialize a plain tree: values first, then sub-tables in key order. */
export function writeToml(tree: TomlTable): string {
  const out: string[] = [];
  writeTable([], tree, out, 'none');
  return out.length === 0 ? '' : `${out.join('\n')}\n`;
}

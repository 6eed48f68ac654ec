/**
 * Semantic validation of a ConfigModel.
 *
 * Pure: collects every violated invariant instead of stopping at the first,
 * so callers can report all problems at once.
 */

import { z } from 'zod';
import countryCodeList from '../../data/iso-3166-alpha2.json' with { type: 'json' };
import { ValidationError } from '../errors.js';
import type { Violation } from '../errors.js';
import { getPeripheral } from './catalog.js';
import { formatPath } from './decode.js';
import { LED_MODES } from './schema.js';
import type { ConfigModel, NetworkingConfig, PeripheralSettings, ServiceState } from './schema.js';

export interface ValidationResult {
  valid: boolean;
  violations: Violation[];
}

const DNS_LABEL = /^(?!-)[A-Za-z0-9-]{1,63}(?<!-)$/;
const INTERFACE_NAME = /^[A-Za-z0-9_.:-]{1,15}$/;
const UNIT_NAME = /^[A-Za-z0-9:_.\\@-]+$/;
const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;
const HEX_PSK = /^[0-9a-fA-F]{64}$/;
const MAX_SSID_BYTES = 32;

const CountryCodesSchema = z.array(z.string().length(2));

let countryCodes: ReadonlySet<string> | undefined;

/** ISO 3166-1 alpha-2 codes, imported from data/iso-3166-alpha2.json. */
export function getCountryCodes(): ReadonlySet<string> {
  if (!countryCodes) {
    countryCodes = new Set(CountryCodesSchema.parse(countryCodeList));
  }
  return countryCodes;
}

function validateNetworking(networking: NetworkingConfig, out: Violation[]): void {
  if (!DNS_LABEL.test(networking.hostname)) {
    out.push({
      path: 'networking.hostname',
      message: `"${networking.hostname}" is not a valid DNS label (1-63 letters, digits or hyphens, no leading/trailing hyphen)`,
    });
  }

  if (!getCountryCodes().has(networking.country_code)) {
    out.push({
      path: 'networking.country_code',
      message: `"${networking.country_code}" is not an ISO 3166-1 alpha-2 country code`,
    });
  }

  const seen = new Map<string, number>();
  networking.wifi.forEach((network, index) => {
    const at = (field: string): string => formatPath(['networking', 'wifi', index, field]);

    if (network.ssid.length === 0) {
      out.push({ path: at('ssid'), message: 'SSID must not be empty' });
    } else if (Buffer.byteLength(network.ssid, 'utf-8') > MAX_SSID_BYTES) {
      out.push({ path: at('ssid'), message: `SSID exceeds ${MAX_SSID_BYTES} bytes` });
    }

    const first = seen.get(network.ssid);
    if (first !== undefined) {
      out.push({
        path: at('ssid'),
        message: `duplicate SSID "${network.ssid}" (already used by networking.wifi[${first}])`,
      });
    } else {
      seen.set(network.ssid, index);
    }

    const psk = network.psk;
    const passphraseOk = psk.length >= 8 && psk.length <= 63 && PRINTABLE_ASCII.test(psk);
    if (psk.length > 0 && !passphraseOk && !HEX_PSK.test(psk)) {
      out.push({
        path: at('psk'),
        message: 'PSK must be empty, 8-63 printable ASCII characters, or 64 hex digits',
      });
    }
  });

  for (const key of ['wifi_interface', 'ethernet_interface'] as const) {
    const value = networking[key];
    if (value !== undefined && !INTERFACE_NAME.test(value)) {
      out.push({ path: `networking.${key}`, message: `"${value}" is not a valid interface name` });
    }
  }
}

function validateServices(services: Readonly<Record<string, ServiceState>>, out: Violation[]): void {
  for (const name of Object.keys(services)) {
    if (!UNIT_NAME.test(name)) {
      out.push({ path: `services.${name}`, message: `"${name}" is not a valid systemd unit name` });
    }
  }
}

function validateHardware(
  hardware: Readonly<Record<string, PeripheralSettings>>,
  out: Violation[],
): void {
  for (const [name, settings] of Object.entries(hardware)) {
    const descriptor = getPeripheral(name);
    if (!descriptor) {
      out.push({ path: `hardware.${name}`, message: `unknown peripheral "${name}"` });
      continue;
    }
    if (descriptor.family !== settings.family) {
      out.push({
        path: `hardware.${name}`,
        message: `"${name}" is a ${descriptor.family} peripheral, got ${settings.family} settings`,
      });
      continue;
    }

    if (settings.family === 'led') {
      if (!LED_MODES.includes(settings.mode)) {
        out.push({ path: `hardware.${name}.mode`, message: `unknown LED mode "${settings.mode}"` });
      }
      continue;
    }

    if (settings.speed !== undefined) {
      if (descriptor.family === 'bus' && descriptor.speedKey === undefined) {
        out.push({ path: `hardware.${name}.speed`, message: `"${name}" has no configurable speed` });
      } else if (!Number.isInteger(settings.speed) || settings.speed <= 0) {
        out.push({ path: `hardware.${name}.speed`, message: 'speed must be a positive integer' });
      }
    }
  }
}

/** Check every model invariant. Never throws. */
export function validateModel(model: ConfigModel): ValidationResult {
  const violations: Violation[] = [];
  validateNetworking(model.networking, violations);
  validateServices(model.services, violations);
  validateHardware(model.hardware, violations);
  return { valid: violations.length === 0, violations };
}

/**
 * @throws {ValidationError} with the full list of violations
 */
export function assertValidModel(model: ConfigModel): void {
  const result = validateModel(model);
  if (!result.valid) {
    throw ValidationError.fromViolations(result.violations);
  }
}

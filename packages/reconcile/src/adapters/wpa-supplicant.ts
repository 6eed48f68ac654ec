/**
 * Reader and writer for wpa_supplicant.conf.
 *
 * Global settings other than `country` are carried over; `network={}`
 * blocks are regenerated from the model on every write.
 */

import type { WifiNetwork } from '@nodeconf/core';

export interface WpaSupplicantConfig {
  country: string | undefined;
  networks: WifiNetwork[];
}

const DEFAULT_GLOBALS = ['ctrl_interface=DIR=/var/run/wpa_supplicant GROUP=netdev', 'update_config=1'];
const HEX_PSK = /^[0-9a-fA-F]{64}$/;
const HEX_SSID = /^(?:[0-9a-fA-F]{2})+$/;

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function unquote(value: string): string | undefined {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : undefined;
}

function decodeSsid(value: string): string {
  const quoted = unquote(value);
  if (quoted !== undefined) return quoted;
  return HEX_SSID.test(value) ? Buffer.from(value, 'hex').toString('utf-8') : value;
}

/** Parse the country code and every network block. */
export function parseWpaSupplicant(text: string): WpaSupplicantConfig {
  let country: string | undefined;
  const networks: WifiNetwork[] = [];
  let block: Map<string, string> | undefined;

  for (const raw of splitLines(text)) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) continue;

    if (block) {
      if (line === '}') {
        const ssid = block.get('ssid');
        if (ssid !== undefined) {
          const psk = block.get('psk');
          networks.push({
            ssid: decodeSsid(ssid),
            psk: psk === undefined ? '' : (unquote(psk) ?? psk),
          });
        }
        block = undefined;
        continue;
      }
      const eq = line.indexOf('=');
      if (eq > 0) block.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
      continue;
    }

    if (/^network\s*=\s*\{$/.test(line)) {
      block = new Map();
    } else if (line.startsWith('country=')) {
      country = line.slice('country='.length).trim();
    }
  }

  return { country, networks };
}

function needsHex(ssid: string): boolean {
  return ssid.includes('"') || /[^\x20-\x7e]/.test(ssid);
}

function renderNetwork(network: WifiNetwork): string[] {
  const ssid = needsHex(network.ssid)
    ? Buffer.from(network.ssid, 'utf-8').toString('hex')
    : `"${network.ssid}"`;
  const lines = ['network={', `\tssid=${ssid}`];
  if (network.psk === '') {
    lines.push('\tkey_mgmt=NONE');
  } else if (HEX_PSK.test(network.psk)) {
    lines.push(`\tpsk=${network.psk}`);
  } else {
    lines.push(`\tpsk="${network.psk}"`);
  }
  lines.push('}');
  return lines;
}

/**
 * Render the file for `config`, keeping the global lines of `existing`
 * (everything outside network blocks except `country=`).
 */
export function renderWpaSupplicant(config: WpaSupplicantConfig, existing = ''): string {
  const globals: string[] = [];
  let inBlock = false;
  for (const raw of splitLines(existing)) {
    const line = raw.trim();
    if (inBlock) {
      if (line === '}') inBlock = false;
      continue;
    }
    if (/^network\s*=\s*\{$/.test(line)) {
      inBlock = true;
      continue;
    }
    if (line === '' || line.startsWith('country=')) continue;
    globals.push(raw);
  }

  const out = globals.length > 0 ? globals : [...DEFAULT_GLOBALS];
  if (config.country !== undefined) out.push(`country=${config.country}`);
  for (const network of config.networks) {
    out.push('', ...renderNetwork(network));
  }
  return `${out.join('\n')}\n`;
}

import { isDeepStrictEqual } from 'node:util';
import {
  DEFAULT_COUNTRY_CODE,
  DEFAULT_HOSTNAME,
  ReadError,
  defaultModel,
  describeError,
} from '@nodeconf/core';
import type { ConfigModel, NetworkingConfig, PartialConfigModel } from '@nodeconf/core';
import { runOrThrow } from '../system/executor.js';
import type { CommandRunner } from '../system/executor.js';
import { readOptional, writeSystemFile } from '../system/files.js';
import { listInterfaces, requireInterface, selectInterface } from '../system/interfaces.js';
import type { InterfaceSelection } from '../system/interfaces.js';
import { displayPath } from '../system/paths.js';
import type { SystemPaths } from '../system/paths.js';
import { emptyOutcome, followUp, recordStep } from './outcome.js';
import type { FieldChange, StepResult } from './outcome.js';
import type { ApplyOutcome, SystemAdapter } from './types.js';
import { parseWpaSupplicant, renderWpaSupplicant } from './wpa-supplicant.js';

export interface AdapterDeps {
  runner: CommandRunner;
  paths: SystemPaths;
}

const WIFI_KIND = 'Wi-Fi';
const ETHERNET_KIND = 'ethernet';

/**
 * Replace `previous` as a whole host name in an /etc/hosts document and
 * make sure `next` resolves locally.
 */
export function updateHostsFile(content: string, previous: string, next: string): string {
  let updated = previous ? content.replace(wholeName(previous, 'g'), next) : content;
  if (!wholeName(next).test(updated)) {
    updated = `${updated.trimEnd()}\n127.0.1.1 ${next}\n`;
  }
  return updated;
}

function wholeName(name: string, flags = ''): RegExp {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?<![A-Za-z0-9-])${escaped}(?![A-Za-z0-9-])`, flags);
}

/**
 * Hostname, Wi-Fi radio state, regulatory country and saved networks.
 */
export class NetworkingAdapter implements SystemAdapter {
  readonly name = 'networking';
  readonly stage = 'networking';

  constructor(private readonly deps: AdapterDeps) {}

  owns(field: string): boolean {
    return field.startsWith('networking.');
  }

  defaults(): PartialConfigModel {
    return { networking: defaultModel().networking };
  }

  async read(scope: ConfigModel): Promise<PartialConfigModel> {
    const { paths } = this.deps;
    try {
      const [hostnameText, wpaText, stateText, inventory] = await Promise.all([
        readOptional(paths.hostname),
        readOptional(paths.wpaSupplicant),
        readOptional(paths.wifiState),
        listInterfaces(paths),
      ]);
      const wpa = wpaText === undefined ? { country: undefined, networks: [] } : parseWpaSupplicant(wpaText);
      const wifiInterface = selectInterface(WIFI_KIND, inventory.wifi, scope.networking.wifi_interface);
      const ethernetInterface = selectInterface(
        ETHERNET_KIND,
        inventory.ethernet,
        scope.networking.ethernet_interface,
      );

      const networking: NetworkingConfig = {
        hostname: hostnameText?.trim() || DEFAULT_HOSTNAME,
        wifi_enabled: await this.readWifiEnabled(stateText, wifiInterface),
        country_code: wpa.country ?? DEFAULT_COUNTRY_CODE,
        wifi: wpa.networks,
        ...(wifiInterface.ok ? { wifi_interface: wifiInterface.name } : {}),
        ...(ethernetInterface.ok ? { ethernet_interface: ethernetInterface.name } : {}),
      };
      return { networking };
    } catch (err) {
      throw new ReadError(`Cannot read networking state: ${describeError(err)}`, this.name, err);
    }
  }

  async apply(
    desired: PartialConfigModel,
    current: PartialConfigModel,
    signal?: AbortSignal,
  ): Promise<ApplyOutcome> {
    const outcome = emptyOutcome();
    const want = desired.networking;
    if (!want) return outcome;
    const have = current.networking ?? defaultModel().networking;

    if (want.hostname !== have.hostname) {
      await recordStep(
        outcome,
        [{ field: 'networking.hostname', from: have.hostname, to: want.hostname }],
        () => this.applyHostname(have.hostname, want.hostname),
        signal,
      );
    }

    if (want.wifi_enabled !== have.wifi_enabled) {
      await recordStep(
        outcome,
        [{ field: 'networking.wifi_enabled', from: have.wifi_enabled, to: want.wifi_enabled }],
        () => this.applyWifiState(want),
        signal,
      );
    }

    // country and networks share one file
    const supplicantChanges: FieldChange[] = [];
    if (want.country_code !== have.country_code) {
      supplicantChanges.push({ field: 'networking.country_code', from: have.country_code, to: want.country_code });
    }
    if (!isDeepStrictEqual(want.wifi, have.wifi)) {
      supplicantChanges.push({ field: 'networking.wifi', from: have.wifi, to: want.wifi });
    }
    if (supplicantChanges.length > 0) {
      await recordStep(outcome, supplicantChanges, () => this.applySupplicant(want), signal);
    }

    return outcome;
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  private async readWifiEnabled(stateText: string | undefined, selection: InterfaceSelection): Promise<boolean> {
    const state = stateText?.trim();
    if (state === 'up' || state === 'down') return state === 'up';
    if (!selection.ok) return false;
    const link = await this.deps.runner.run('ip', ['link', 'show', selection.name]);
    return link.exitCode === 0 && link.stdout.includes('state UP');
  }

  // ─── Mutations ─────────────────────────────────────────────────────────

  private async applyHostname(previous: string, next: string): Promise<StepResult> {
    const { runner, paths } = this.deps;
    await runOrThrow(runner, 'hostnamectl', ['set-hostname', next]);
    const actions = [`hostnamectl set-hostname ${next}`];

    await writeSystemFile(paths.hostname, `${next}\n`);
    actions.push(`write ${displayPath(paths, paths.hostname)}`);

    const hosts = await readOptional(paths.hosts);
    if (hosts !== undefined) {
      const updated = updateHostsFile(hosts, previous, next);
      if (updated !== hosts) {
        await writeSystemFile(paths.hosts, updated);
        actions.push(`update ${displayPath(paths, paths.hosts)}`);
      }
    }

    const warnings = await followUp(runner, 'systemctl', ['restart', 'avahi-daemon']);
    actions.push('systemctl restart avahi-daemon');
    return { actions, warnings };
  }

  private async applyWifiState(want: NetworkingConfig): Promise<StepResult> {
    const { runner, paths } = this.deps;
    const inventory = await listInterfaces(paths);
    const iface = requireInterface(selectInterface(WIFI_KIND, inventory.wifi, want.wifi_interface));
    const state = want.wifi_enabled ? 'up' : 'down';

    await runOrThrow(runner, 'ip', ['link', 'set', iface, state]);
    await writeSystemFile(paths.wifiState, `${state}\n`);
    return {
      actions: [`ip link set ${iface} ${state}`, `write ${displayPath(paths, paths.wifiState)}`],
    };
  }

  private async applySupplicant(want: NetworkingConfig): Promise<StepResult> {
    const { runner, paths } = this.deps;
    const existing = (await readOptional(paths.wpaSupplicant)) ?? '';
    const content = renderWpaSupplicant({ country: want.country_code, networks: [...want.wifi] }, existing);
    await writeSystemFile(paths.wpaSupplicant, content, 0o600);
    const actions = [`write ${displayPath(paths, paths.wpaSupplicant)}`];
    const warnings: string[] = [];

    if (want.wifi_enabled) {
      const inventory = await listInterfaces(paths);
      const selection = selectInterface(WIFI_KIND, inventory.wifi, want.wifi_interface);
      if (selection.ok) {
        warnings.push(...(await followUp(runner, 'wpa_cli', ['-i', selection.name, 'reconfigure'])));
        actions.push(`wpa_cli -i ${selection.name} reconfigure`);
      } else {
        warnings.push(selection.reason);
      }
    }
    return { actions, warnings };
  }
}

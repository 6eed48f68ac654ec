import { isDeepStrictEqual } from 'node:util';
import { ReadError, describeError, getPeripheral, peripheralsOf } from '@nodeconf/core';
import type {
  BusPeripheral,
  BusSettings,
  ConfigModel,
  PartialConfigModel,
  PeripheralSettings,
} from '@nodeconf/core';
import { readOptional, writeSystemFile } from '../../system/files.js';
import { parseKeyValues, updateKeyValues } from '../../system/key-values.js';
import { displayPath } from '../../system/paths.js';
import type { SystemPaths } from '../../system/paths.js';
import { emptyOutcome, recordStep } from '../outcome.js';
import type { FieldChange } from '../outcome.js';
import type { ApplyOutcome, SystemAdapter } from '../types.js';

export const REBOOT_WARNING = 'bus changes take effect after a reboot';

function busesInScope(scope: ConfigModel): Array<[string, BusPeripheral]> {
  return peripheralsOf('bus').filter(([name]) => name in scope.hardware);
}

/** Decode one bus from the board config values. */
export function readBus(values: ReadonlyMap<string, string>, bus: BusPeripheral): BusSettings {
  const enabled = values.get(bus.statusKey) === '1';
  const rawSpeed = bus.speedKey === undefined ? undefined : values.get(bus.speedKey);
  const speed = rawSpeed === undefined ? Number.NaN : Number.parseInt(rawSpeed, 10);
  return Number.isInteger(speed) && speed > 0 ? { family: 'bus', enabled, speed } : { family: 'bus', enabled };
}

/**
 * Serial buses (SPI, I2C, UART) switched through the board overlay
 * config. Changes are written together and need a reboot.
 */
export class BusAdapter implements SystemAdapter {
  readonly name = 'hardware.bus';
  readonly stage = 'hardware';

  constructor(private readonly deps: { paths: SystemPaths }) {}

  owns(field: string): boolean {
    return field.startsWith('hardware.') && getPeripheral(field.slice('hardware.'.length))?.family === 'bus';
  }

  defaults(scope: ConfigModel): PartialConfigModel {
    const hardware: Record<string, PeripheralSettings> = {};
    for (const [name] of busesInScope(scope)) {
      hardware[name] = { family: 'bus', enabled: false };
    }
    return { hardware };
  }

  async read(scope: ConfigModel): Promise<PartialConfigModel> {
    const hardware: Record<string, PeripheralSettings> = {};
    try {
      const values = parseKeyValues((await readOptional(this.deps.paths.boardConfig)) ?? '');
      for (const [name, bus] of busesInScope(scope)) {
        hardware[name] = readBus(values, bus);
      }
    } catch (err) {
      throw new ReadError(`Cannot read board config: ${describeError(err)}`, this.name, err);
    }
    return { hardware };
  }

  async apply(
    desired: PartialConfigModel,
    current: PartialConfigModel,
    signal?: AbortSignal,
  ): Promise<ApplyOutcome> {
    const outcome = emptyOutcome();
    const changes: FieldChange[] = [];
    const updates: Record<string, string | null> = {};
    const actions: string[] = [];

    for (const [name, want] of Object.entries(desired.hardware ?? {})) {
      const bus = getPeripheral(name);
      if (want.family !== 'bus' || bus?.family !== 'bus') continue;
      const have = current.hardware?.[name];
      if (isDeepStrictEqual(want, have)) continue;

      changes.push({ field: `hardware.${name}`, from: have, to: want });
      updates[bus.statusKey] = want.enabled ? '1' : '0';
      actions.push(`set ${bus.statusKey}=${updates[bus.statusKey]}`);
      if (bus.speedKey !== undefined) {
        updates[bus.speedKey] = want.speed === undefined ? null : String(want.speed);
        actions.push(want.speed === undefined ? `remove ${bus.speedKey}` : `set ${bus.speedKey}=${want.speed}`);
      }
    }

    if (changes.length === 0) return outcome;

    const { paths } = this.deps;
    await recordStep(outcome, changes, async () => {
      const text = (await readOptional(paths.boardConfig)) ?? '';
      await writeSystemFile(paths.boardConfig, updateKeyValues(text, updates));
      return {
        actions: [...actions, `write ${displayPath(paths, paths.boardConfig)}`],
        warnings: [REBOOT_WARNING],
      };
    }, signal);
    return outcome;
  }
}

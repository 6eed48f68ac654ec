import { join } from 'node:path';
import { LED_MODES, ReadError, describeError, getPeripheral, peripheralsOf } from '@nodeconf/core';
import type {
  ConfigModel,
  LedMode,
  LedPeripheral,
  LedSettings,
  PartialConfigModel,
  PeripheralSettings,
} from '@nodeconf/core';
import { pathExists, readOptional, writeInPlace, writeSystemFile } from '../../system/files.js';
import { parseKeyValues, updateKeyValues } from '../../system/key-values.js';
import { displayPath } from '../../system/paths.js';
import type { SystemPaths } from '../../system/paths.js';
import { emptyOutcome, recordStep } from '../outcome.js';
import type { StepResult } from '../outcome.js';
import type { ApplyOutcome, SystemAdapter } from '../types.js';

const TRIGGER_FOR_MODE: Readonly<Record<LedMode, string>> = {
  enable: 'activity',
  disable: 'none',
  heartbeat: 'heartbeat',
};

/** Map the active trigger (the bracketed entry of a sysfs trigger file) to a mode. */
export function modeFromTrigger(text: string): LedMode {
  const active = /\[([^\]]+)\]/.exec(text)?.[1] ?? text.trim();
  if (active === 'none') return 'disable';
  if (active === 'heartbeat') return 'heartbeat';
  return 'enable';
}

function isLedMode(value: string | undefined): value is LedMode {
  return LED_MODES.some((mode) => mode === value);
}

/**
 * The mode to report for one LED. A live trigger that matches `wanted`
 * still reads as a stored boot state that differs from it, so a stale
 * boot file shows up as drift. Without a trigger file the boot state
 * stands in for the live state; an absent boot key is not drift.
 */
export function observedMode(live: LedMode | undefined, boot: LedMode | undefined, wanted?: LedMode): LedMode {
  if (live === undefined) return boot ?? 'enable';
  if (live !== wanted) return live;
  return boot ?? live;
}

function ledsInScope(scope: ConfigModel): Array<[string, LedPeripheral]> {
  return peripheralsOf('led').filter(([name]) => name in scope.hardware);
}

/**
 * Status LEDs. The trigger under /sys/class/leds is the live state; the
 * boot-state file restores it after a reboot.
 */
export class LedAdapter implements SystemAdapter {
  readonly name = 'hardware.led';
  readonly stage = 'hardware';

  constructor(private readonly deps: { paths: SystemPaths }) {}

  owns(field: string): boolean {
    return field.startsWith('hardware.') && getPeripheral(field.slice('hardware.'.length))?.family === 'led';
  }

  defaults(scope: ConfigModel): PartialConfigModel {
    const hardware: Record<string, PeripheralSettings> = {};
    for (const [name] of ledsInScope(scope)) {
      hardware[name] = { family: 'led', mode: 'enable' };
    }
    return { hardware };
  }

  async read(scope: ConfigModel): Promise<PartialConfigModel> {
    const { paths } = this.deps;
    const hardware: Record<string, PeripheralSettings> = {};
    try {
      const bootState = parseKeyValues((await readOptional(paths.bootState)) ?? '');
      for (const [name, led] of ledsInScope(scope)) {
        const trigger = await readOptional(this.triggerPath(led));
        const bootMode = bootState.get(led.bootKey);
        const wanted = scope.hardware[name];
        hardware[name] = {
          family: 'led',
          mode: observedMode(
            trigger === undefined ? undefined : modeFromTrigger(trigger),
            isLedMode(bootMode) ? bootMode : undefined,
            wanted?.family === 'led' ? wanted.mode : undefined,
          ),
        };
      }
    } catch (err) {
      throw new ReadError(`Cannot read LED state: ${describeError(err)}`, this.name, err);
    }
    return { hardware };
  }

  async apply(
    desired: PartialConfigModel,
    current: PartialConfigModel,
    signal?: AbortSignal,
  ): Promise<ApplyOutcome> {
    const outcome = emptyOutcome();
    for (const [name, want] of Object.entries(desired.hardware ?? {})) {
      const led = getPeripheral(name);
      if (want.family !== 'led' || led?.family !== 'led') continue;
      const have = current.hardware?.[name];
      if (have?.family === 'led' && have.mode === want.mode) continue;
      await recordStep(
        outcome,
        [{ field: `hardware.${name}`, from: have, to: want }],
        () => this.applyLed(led, want),
        signal,
      );
    }
    return outcome;
  }

  private triggerPath(led: LedPeripheral): string {
    return join(this.deps.paths.leds, led.sysfsName, 'trigger');
  }

  private async applyLed(led: LedPeripheral, want: LedSettings): Promise<StepResult> {
    const { paths } = this.deps;
    const trigger = TRIGGER_FOR_MODE[want.mode];
    const triggerPath = this.triggerPath(led);
    const actions: string[] = [];
    const warnings: string[] = [];

    if (await pathExists(triggerPath)) {
      await writeInPlace(triggerPath, trigger);
      actions.push(`set ${displayPath(paths, triggerPath)} to ${trigger}`);
    } else {
      warnings.push(`LED ${led.sysfsName} is not present; the mode applies at next boot`);
    }

    const bootText = (await readOptional(paths.bootState)) ?? '';
    await writeSystemFile(paths.bootState, updateKeyValues(bootText, { [led.bootKey]: want.mode }));
    actions.push(`set ${led.bootKey}=${want.mode} in ${displayPath(paths, paths.bootState)}`);
    return { actions, warnings };
  }
}

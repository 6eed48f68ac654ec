import { isDeepStrictEqual } from 'node:util';
import { ReadError, describeError } from '@nodeconf/core';
import type { ConfigModel, PartialConfigModel, ServiceState } from '@nodeconf/core';
import { runOrThrow } from '../system/executor.js';
import type { AdapterDeps } from './networking.js';
import { emptyOutcome, recordStep } from './outcome.js';
import type { StepResult } from './outcome.js';
import type { ApplyOutcome, SystemAdapter } from './types.js';

const STOPPED: ServiceState = { enabled: false, running: false };

/** Enablement and run state of systemd units, via systemctl. */
export class ServicesAdapter implements SystemAdapter {
  readonly name = 'services';
  readonly stage = 'services';

  constructor(private readonly deps: Pick<AdapterDeps, 'runner'>) {}

  owns(field: string): boolean {
    return field.startsWith('services.');
  }

  defaults(scope: ConfigModel): PartialConfigModel {
    return { services: Object.fromEntries(Object.keys(scope.services).map((name) => [name, STOPPED])) };
  }

  async read(scope: ConfigModel): Promise<PartialConfigModel> {
    const { runner } = this.deps;
    const services: Record<string, ServiceState> = {};
    try {
      for (const name of Object.keys(scope.services)) {
        // Unknown units report non-zero from both queries
        const enabled = await runner.run('systemctl', ['is-enabled', name]);
        const active = await runner.run('systemctl', ['is-active', name]);
        services[name] = { enabled: enabled.exitCode === 0, running: active.exitCode === 0 };
      }
    } catch (err) {
      throw new ReadError(`Cannot query systemd: ${describeError(err)}`, this.name, err);
    }
    return { services };
  }

  async apply(
    desired: PartialConfigModel,
    current: PartialConfigModel,
    signal?: AbortSignal,
  ): Promise<ApplyOutcome> {
    const outcome = emptyOutcome();
    for (const [name, want] of Object.entries(desired.services ?? {})) {
      const have = current.services?.[name] ?? STOPPED;
      if (isDeepStrictEqual(want, have)) continue;
      await recordStep(
        outcome,
        [{ field: `services.${name}`, from: have, to: want }],
        () => this.applyService(name, want, have),
        signal,
      );
    }
    return outcome;
  }

  private async applyService(name: string, want: ServiceState, have: ServiceState): Promise<StepResult> {
    const actions: string[] = [];
    if (want.enabled !== have.enabled) {
      const verb = want.enabled ? 'enable' : 'disable';
      await runOrThrow(this.deps.runner, 'systemctl', [verb, name]);
      actions.push(`systemctl ${verb} ${name}`);
    }
    if (want.running !== have.running) {
      const verb = want.running ? 'start' : 'stop';
      await runOrThrow(this.deps.runner, 'systemctl', [verb, name]);
      actions.push(`systemctl ${verb} ${name}`);
    }
    return { actions };
  }
}

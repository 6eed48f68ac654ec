import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ServiceState } from '@nodeconf/core';
import type { CommandResult, CommandRunner } from '../../src/system/executor.js';
import { resolveSystemPaths } from '../../src/system/paths.js';
import type { SystemPaths } from '../../src/system/paths.js';

const QUERIES = [/^systemctl is-/, /^ip link show /];

function ok(stdout = ''): CommandResult {
  return { stdout, stderr: '', exitCode: 0 };
}

/**
 * In-process stand-in for the programs the adapters call. systemctl is
 * simulated against `units`; everything else succeeds unless overridden.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: string[] = [];
  readonly units = new Map<string, ServiceState>();
  private readonly overrides = new Map<string, CommandResult | Error>();

  /** Answer `commandLine` with a fixed result. */
  respond(commandLine: string, result: Partial<CommandResult>): this {
    this.overrides.set(commandLine, { stdout: '', stderr: '', exitCode: 0, ...result });
    return this;
  }

  /** Reject `commandLine` with `error`. */
  throwOn(commandLine: string, error: Error): this {
    this.overrides.set(commandLine, error);
    return this;
  }

  /** Calls that change system state. */
  mutations(): string[] {
    return this.calls.filter((line) => !QUERIES.some((query) => query.test(line)));
  }

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    const line = [command, ...args].join(' ');
    this.calls.push(line);
    const override = this.overrides.get(line);
    if (override instanceof Error) throw override;
    if (override) return override;
    return command === 'systemctl' ? this.systemctl(args) : ok();
  }

  private systemctl(args: readonly string[]): CommandResult {
    const verb = args[0];
    const name = args[args.length - 1];
    const unit = this.units.get(name) ?? { enabled: false, running: false };
    switch (verb) {
      case 'is-enabled':
        return unit.enabled ? ok('enabled') : { stdout: 'disabled', stderr: '', exitCode: 1 };
      case 'is-active':
        return unit.running ? ok('active') : { stdout: 'inactive', stderr: '', exitCode: 3 };
      case 'enable':
      case 'disable':
        this.units.set(name, { ...unit, enabled: verb === 'enable' });
        return ok();
      case 'start':
      case 'restart':
      case 'stop':
        this.units.set(name, { ...unit, running: verb !== 'stop' });
        return ok();
      default:
        return ok();
    }
  }
}

/**
 * Scratch system root: one wireless and one wired interface, the
 * activity LED, and a fresh hostname.
 */
export async function createSystemRoot(): Promise<SystemPaths> {
  const root = await fs.mkdtemp(join(tmpdir(), 'nodeconf-root-'));
  const paths = resolveSystemPaths(root);

  await fs.mkdir(join(paths.netClass, 'wlan0', 'device'), { recursive: true });
  await fs.mkdir(join(paths.netClass, 'wlan0', 'wireless'), { recursive: true });
  await fs.mkdir(join(paths.netClass, 'eth0', 'device'), { recursive: true });
  await fs.mkdir(join(paths.netClass, 'lo'), { recursive: true });
  await fs.mkdir(join(paths.leds, 'work'), { recursive: true });
  await fs.writeFile(join(paths.leds, 'work', 'trigger'), 'none rc-feedback [activity] heartbeat\n');

  await fs.mkdir(dirname(paths.hostname), { recursive: true });
  await fs.writeFile(paths.hostname, 'meshnode\n');
  await fs.writeFile(paths.hosts, '127.0.0.1\tlocalhost\n127.0.1.1\tmeshnode\n');
  return paths;
}

export async function removeSystemRoot(paths: SystemPaths): Promise<void> {
  await fs.rm(paths.root, { recursive: true, force: true });
}

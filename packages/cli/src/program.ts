import { Command } from 'commander';
import { registerApplyCommand } from './commands/apply.js';
import { registerInitCommand } from './commands/init.js';
import { registerShowCommand } from './commands/show.js';
import { registerStatusCommand } from './commands/status.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerWatchclockCommand } from './commands/watchclock.js';
import type { ProgramDeps } from './context.js';

export const VERSION = '0.1.0';

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();
  program
    .name('nodeconf')
    .description('Canonical node configuration and system reconciliation')
    .version(VERSION)
    .option('-c, --config <path>', 'Configuration file (default from settings)')
    .option('-s, --settings <path>', 'Engine settings file')
    .option('-v, --verbose', 'Log every command the engine runs');

  registerInitCommand(program, deps);
  registerShowCommand(program, deps);
  registerValidateCommand(program, deps);
  registerStatusCommand(program, deps);
  registerApplyCommand(program, deps);
  registerWatchclockCommand(program, deps);

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}

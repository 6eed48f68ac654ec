import type { Command } from 'commander';
import { buildContext } from '../context.js';
import type { ProgramDeps } from '../context.js';
import { logger } from '../utils/logger.js';

export function registerInitCommand(program: Command, deps: ProgramDeps): void {
  program
    .command('init')
    .description('Write a default configuration file')
    .option('-f, --force', 'Replace an existing configuration file')
    .action(async (opts: { force?: boolean }, command: Command) => {
      const { engine } = await buildContext(command, deps);
      const result = await engine.initModel(undefined, { force: opts.force === true });
      if (result.written) {
        logger.success(`Created ${result.path}`);
      } else {
        logger.warn(`${result.path} already exists; use --force to replace it`);
      }
    });
}

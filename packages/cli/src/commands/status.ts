import type { Command } from 'commander';
import { diffModels } from '@nodeconf/core';
import { buildContext } from '../context.js';
import type { ProgramDeps } from '../context.js';
import { renderStatus } from '../report.js';
import { logger } from '../utils/logger.js';

export function registerStatusCommand(program: Command, deps: ProgramDeps): void {
  program
    .command('status')
    .description('Compare the stored configuration with the live system')
    .action(async (_opts: Record<string, never>, command: Command) => {
      const { engine } = await buildContext(command, deps);
      const desired = await engine.loadModelOrDefaults();
      const { current, readFailures } = await engine.inspect(desired);
      logger.report(renderStatus(diffModels(desired, current), readFailures));
    });
}

import type { Command } from 'commander';
import { renderCanonical } from '@nodeconf/core';
import { buildContext } from '../context.js';
import type { ProgramDeps } from '../context.js';
import { redactModel } from '../report.js';
import { logger } from '../utils/logger.js';

export function registerShowCommand(program: Command, deps: ProgramDeps): void {
  program
    .command('show')
    .description('Print the stored configuration')
    .option('--live', 'Print the state read from the system instead')
    .option('--show-secrets', 'Print wifi passphrases in clear')
    .action(async (opts: { live?: boolean; showSecrets?: boolean }, command: Command) => {
      const { engine } = await buildContext(command, deps);
      const model = opts.live ? await engine.currentState() : await engine.loadModel();
      logger.info(renderCanonical(opts.showSecrets ? model : redactModel(model)).trimEnd());
    });
}

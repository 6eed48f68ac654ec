import type { Command } from 'commander';
import { ValidationError } from '@nodeconf/core';
import { buildContext } from '../context.js';
import type { ProgramDeps } from '../context.js';
import { logger } from '../utils/logger.js';

export function registerValidateCommand(program: Command, deps: ProgramDeps): void {
  program
    .command('validate')
    .description('Check the stored configuration without touching the system')
    .action(async (_opts: Record<string, never>, command: Command) => {
      const { engine, settings } = await buildContext(command, deps);
      const model = await engine.loadModel();
      const result = engine.validateModel(model);
      if (!result.valid) {
        throw new ValidationError(`${settings.configPath} is invalid`, result.violations);
      }
      logger.success(`${settings.configPath} is valid`);
    });
}

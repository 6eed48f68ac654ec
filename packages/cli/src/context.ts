import type { Command } from 'commander';
import { loadSettings } from '@nodeconf/core';
import type { EngineSettings } from '@nodeconf/core';
import { ExecaRunner, createConfigEngine } from '@nodeconf/reconcile';
import type { CommandRunner, ConfigEngine } from '@nodeconf/reconcile';
import { logger, setVerbose } from './utils/logger.js';

/** Hooks for embedding the program; tests pass a scratch environment and a fake runner. */
export interface ProgramDeps {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
}

export interface GlobalOptions {
  config?: string;
  settings?: string;
  verbose?: boolean;
}

export interface CommandContext {
  settings: EngineSettings;
  runner: CommandRunner;
  engine: ConfigEngine;
}

export async function buildContext(command: Command, deps: ProgramDeps): Promise<CommandContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();
  if (opts.verbose) setVerbose(true);

  const loaded = await loadSettings({ settingsPath: opts.settings, env: deps.env ?? process.env });
  const settings = opts.config ? { ...loaded, configPath: opts.config } : loaded;
  logger.debug(`config ${settings.configPath}, state ${settings.stateDir}, root ${settings.systemRoot}`);

  const runner = deps.runner ?? new ExecaRunner(settings.commandTimeoutMs, logger);
  const engine = createConfigEngine({ settings, runner, logger });
  return { settings, runner, engine };
}

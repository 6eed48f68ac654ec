import type { Command } from 'commander';
import { Watchclock } from '@nodeconf/reconcile';
import { buildContext } from '../context.js';
import type { ProgramDeps } from '../context.js';
import { logger } from '../utils/logger.js';

export function registerWatchclockCommand(program: Command, deps: ProgramDeps): void {
  program
    .command('watchclock')
    .description('Restart the radio service when the system clock jumps')
    .option('--once', 'Run a single check and exit')
    .action(async (opts: { once?: boolean }, command: Command) => {
      const { settings, runner } = await buildContext(command, deps);
      const watchclock = new Watchclock({
        settings: settings.watchclock,
        stateDir: settings.stateDir,
        runner,
        logger,
      });

      if (opts.once) {
        const check = await watchclock.runOnce();
        logger.info(
          check.checked
            ? `clock delta ${check.deltaSeconds}s${check.restarted ? `, restarted ${settings.watchclock.service}` : ''}`
            : `${settings.watchclock.service} is not running`,
        );
        return;
      }

      logger.info(
        `Watching the clock every ${settings.watchclock.intervalSeconds}s for ${settings.watchclock.service}`,
      );
      watchclock.start();
      await new Promise<void>((resolve) => {
        const stop = (): void => {
          watchclock.stop();
          resolve();
        };
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
      });
    });
}

import type { Command } from 'commander';
import type { ReconcileResult } from '@nodeconf/reconcile';
import { buildContext } from '../context.js';
import type { ProgramDeps } from '../context.js';
import { renderReconcileReport } from '../report.js';
import { CLIError, ExitCode } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export function partialFailureSummary(result: ReconcileResult): string {
  const parts: string[] = [];
  if (result.failures.length > 0) {
    parts.push(`${result.failures.length} change(s) could not be applied`);
  }
  if (result.readFailures.length > 0) {
    parts.push(`${result.readFailures.length} adapter(s) could not be read`);
  }
  return parts.join('; ');
}

export function registerApplyCommand(program: Command, deps: ProgramDeps): void {
  program
    .command('apply')
    .description('Reconcile the live system with the stored configuration')
    .option('--persist', 'Rewrite the configuration file in canonical form after applying')
    .action(async (opts: { persist?: boolean }, command: Command) => {
      const { engine, settings } = await buildContext(command, deps);
      const desired = await engine.loadModel();

      // Ctrl-C stops before the next adapter; the one running finishes.
      const controller = new AbortController();
      const onSignal = (): void => {
        logger.warn('Interrupted; stopping after the current step');
        controller.abort();
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      try {
        const result = await engine.reconcile(desired, {
          signal: controller.signal,
          persist: opts.persist ? { path: settings.configPath } : undefined,
        });
        logger.report(renderReconcileReport(result));
        if (result.phase === 'partially_failed') {
          throw new CLIError(partialFailureSummary(result), ExitCode.PartialFailure);
        }
      } finally {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
      }
    });
}

import chalk from 'chalk';
import type { ReportLine } from '../report.js';

const VERBOSE_ENV = 'NODECONF_VERBOSE';

let verbose = process.env[VERBOSE_ENV] === '1';

/**
 * Enable or disable verbose logging. Exported to the environment so the
 * error handler prints stack traces too.
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
  if (enabled) {
    process.env[VERBOSE_ENV] = '1';
  } else {
    delete process.env[VERBOSE_ENV];
  }
}

export function isVerbose(): boolean {
  return verbose;
}

/** Terminal logger. Results go to stdout; diagnostics go to stderr. */
export const logger = {
  debug(message: string): void {
    if (verbose) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  },

  info(message: string): void {
    console.log(message);
  },

  warn(message: string): void {
    console.error(chalk.yellow(`Warning: ${message}`));
  },

  error(message: string): void {
    console.error(chalk.red(`Error: ${message}`));
  },

  success(message: string): void {
    console.log(chalk.green(message));
  },

  /** Print report lines, each through the method of its level. */
  report(lines: readonly ReportLine[]): void {
    for (const line of lines) {
      switch (line.level) {
        case 'success':
          console.log(chalk.green(line.text));
          break;
        case 'warn':
          console.error(chalk.yellow(`Warning: ${line.text}`));
          break;
        case 'error':
          console.error(chalk.red(`Error: ${line.text}`));
          break;
        default:
          console.log(line.text);
      }
    }
  },
};

/**
 * @nodeconf/cli: the nodeconf command line.
 */

export { createProgram, runCli, VERSION } from './program.js';
export type { ProgramDeps, GlobalOptions, CommandContext } from './context.js';
export { buildContext } from './context.js';
export {
  formatValue,
  redactModel,
  renderReconcileReport,
  renderStatus,
} from './report.js';
export type { ReportLine } from './report.js';
export { logger, setVerbose, isVerbose } from './utils/logger.js';
export { ExitCode, CLIError, exitCodeFor, describeFailure, handleError } from './utils/error-handler.js';

// Entry points
export { createConfigEngine } from './api.js';
export type { ConfigEngine, ConfigEngineOptions, InitOptions } from './api.js';

// Engine
export { Reconciler, ReconcileAbortedError, RECONCILE_PHASES, subsetFor } from './engine/reconciler.js';
export type {
  ReconcileOptions,
  ReconcileResult,
  ReconcilePhase,
  ReconcilerOptions,
  StateSnapshot,
} from './engine/reconciler.js';
export { withTimeout } from './engine/timeout.js';

// Adapters
export * from './adapters/index.js';

// System access
export {
  ExecaRunner,
  CommandUnavailableError,
  CommandTimeoutError,
  CommandFailedError,
  runOrThrow,
} from './system/executor.js';
export type { CommandRunner, CommandResult } from './system/executor.js';
export { resolveSystemPaths, displayPath } from './system/paths.js';
export type { SystemPaths } from './system/paths.js';
export { listInterfaces, selectInterface, InterfaceSelectionError } from './system/interfaces.js';
export type { InterfaceInventory, InterfaceSelection } from './system/interfaces.js';
export { parseKeyValues, updateKeyValues } from './system/key-values.js';

// Consumers
export { Watchclock } from './daemons/watchclock.js';
export type { WatchclockOptions, ClockCheck } from './daemons/watchclock.js';

// Logging
export { logReconcileEvent, redactSecrets, silentLogger, REDACTED } from './utils/reconcile-logger.js';
export type { EngineLogger } from './utils/reconcile-logger.js';

/**
 * @nodeconf/core: the config model, its TOML store and the utilities
 * shared by the reconciler and the CLI.
 */

// ── Config Model ────────────────────────────────────────────────────
export * from './model/index.js';

// ── Store ───────────────────────────────────────────────────────────
export * from './store/index.js';

// ── Settings ────────────────────────────────────────────────────────
export * from './settings/index.js';

// ── Events Subsystem ────────────────────────────────────────────────
export { SystemEventSchema, EventType, appendEvent, createEvent, queryEvents } from './events/index.js';
export type { SystemEvent, EventFilters } from './events/index.js';

// ── Error Classes ───────────────────────────────────────────────────
export {
  ValidationError,
  ParseError,
  NotFoundError,
  FileSystemError,
  LockTimeoutError,
  ReadError,
  ApplyError,
  TimeoutError,
  describeError,
} from './errors.js';
export type { Violation } from './errors.js';

// ── Utility Functions ───────────────────────────────────────────────
export { withFileLock } from './utils/file-lock.js';
export type { LockOptions } from './utils/file-lock.js';
export { atomicWrite } from './utils/atomic-write.js';
export type { AtomicWriteOptions } from './utils/atomic-write.js';
export { hasErrnoCode } from './utils/errno.js';
export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_SETTINGS_PATH,
  DEFAULT_STATE_DIR,
  getEventsPath,
  getClockStampPath,
} from './utils/paths.js';

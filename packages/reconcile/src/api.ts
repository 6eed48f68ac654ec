/**
 * Entry points shared by the CLI, the TUI and the systemd consumers.
 */

import {
  NotFoundError,
  ReadError,
  deepFreeze,
  defaultModel,
  loadModel,
  resolveSettings,
  saveModel,
  validateModel,
} from '@nodeconf/core';
import type { ConfigModel, EngineSettings, SaveResult, ValidationResult } from '@nodeconf/core';
import { createDefaultAdapters } from './adapters/index.js';
import type { SystemAdapter } from './adapters/types.js';
import { Reconciler } from './engine/reconciler.js';
import type { ReconcileOptions, ReconcileResult, StateSnapshot } from './engine/reconciler.js';
import { ExecaRunner } from './system/executor.js';
import type { CommandRunner } from './system/executor.js';
import { pathExists } from './system/files.js';
import { resolveSystemPaths } from './system/paths.js';
import { silentLogger } from './utils/reconcile-logger.js';
import type { EngineLogger } from './utils/reconcile-logger.js';

export interface ConfigEngineOptions {
  /** Resolved engine settings (default: built-in defaults) */
  settings?: EngineSettings;
  /** Runs external programs (default: execa with the command timeout) */
  runner?: CommandRunner;
  /** Replaces the default adapter set */
  adapters?: readonly SystemAdapter[];
  logger?: EngineLogger;
}

export interface InitOptions {
  /** Replace an existing store file */
  force?: boolean;
}

export interface ConfigEngine {
  readonly settings: EngineSettings;
  loadModel(path?: string): Promise<ConfigModel>;
  /** Like loadModel, but a missing store yields the default model. */
  loadModelOrDefaults(path?: string): Promise<ConfigModel>;
  validateModel(model: ConfigModel): ValidationResult;
  saveModel(model: ConfigModel, path?: string): Promise<SaveResult>;
  /** Write the default model; an existing file is kept unless `force` is set. */
  initModel(path?: string, options?: InitOptions): Promise<SaveResult>;
  reconcile(desired: ConfigModel, options?: ReconcileOptions): Promise<ReconcileResult>;
  /** Current state with read failures reported alongside. */
  inspect(scope?: ConfigModel): Promise<StateSnapshot>;
  /**
   * Read-only snapshot of the live system for the fields of `scope`
   * (default: the stored model).
   *
   * @throws {ReadError} when any adapter could not read
   */
  currentState(scope?: ConfigModel): Promise<ConfigModel>;
}

class DefaultConfigEngine implements ConfigEngine {
  private readonly reconciler: Reconciler;

  constructor(
    readonly settings: EngineSettings,
    adapters: readonly SystemAdapter[],
    logger: EngineLogger,
  ) {
    this.reconciler = new Reconciler({
      adapters,
      adapterTimeoutMs: settings.adapterTimeoutMs,
      stateDir: settings.stateDir,
      logger,
    });
  }

  loadModel(path = this.settings.configPath): Promise<ConfigModel> {
    return loadModel(path);
  }

  async loadModelOrDefaults(path = this.settings.configPath): Promise<ConfigModel> {
    try {
      return await loadModel(path);
    } catch (err) {
      if (err instanceof NotFoundError) return defaultModel();
      throw err;
    }
  }

  validateModel(model: ConfigModel): ValidationResult {
    return validateModel(model);
  }

  saveModel(model: ConfigModel, path = this.settings.configPath): Promise<SaveResult> {
    return saveModel(path, model, { lock: { retries: this.settings.lockRetries } });
  }

  async initModel(path = this.settings.configPath, options: InitOptions = {}): Promise<SaveResult> {
    if (!options.force && (await pathExists(path))) {
      return { written: false, path };
    }
    return saveModel(path, defaultModel(), { lock: { retries: this.settings.lockRetries }, overwrite: true });
  }

  reconcile(desired: ConfigModel, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const persist = options.persist
      ? { lock: { retries: this.settings.lockRetries }, ...options.persist }
      : undefined;
    return this.reconciler.reconcile(desired, { ...options, persist });
  }

  async inspect(scope?: ConfigModel): Promise<StateSnapshot> {
    return this.reconciler.inspect(scope ?? (await this.loadModelOrDefaults()));
  }

  async currentState(scope?: ConfigModel): Promise<ConfigModel> {
    const { current, readFailures } = await this.inspect(scope);
    if (readFailures.length > 0) {
      throw new ReadError(
        readFailures.map((f) => f.message).join('; '),
        readFailures.map((f) => f.adapter).join(', '),
        readFailures,
      );
    }
    return deepFreeze({
      networking: current.networking ?? defaultModel().networking,
      services: { ...current.services },
      hardware: { ...current.hardware },
    });
  }
}

/**
 * Build an engine from settings. Tests pass a fake runner and a scratch
 * `systemRoot`.
 */
export function createConfigEngine(options: ConfigEngineOptions = {}): ConfigEngine {
  const settings = options.settings ?? resolveSettings();
  const logger = options.logger ?? silentLogger;
  const runner = options.runner ?? new ExecaRunner(settings.commandTimeoutMs, logger);
  const adapters =
    options.adapters ?? createDefaultAdapters({ runner, paths: resolveSystemPaths(settings.systemRoot) });
  return new DefaultConfigEngine(settings, adapters, logger);
}

import { v4 as uuidv4 } from 'uuid';
import {
  ApplyError,
  EventType,
  NETWORKING_FIELDS,
  ReadError,
  TimeoutError,
  assertValidModel,
  describeError,
  diffModels,
  saveModel,
} from '@nodeconf/core';
import type {
  ConfigModel,
  FieldDiff,
  LockOptions,
  NetworkingConfig,
  PartialConfigModel,
  PeripheralSettings,
  SaveResult,
  ServiceState,
} from '@nodeconf/core';
import { ADAPTER_STAGES } from '../adapters/types.js';
import type { AppliedChange, ApplyOutcome, SystemAdapter } from '../adapters/types.js';
import { logReconcileEvent, silentLogger } from '../utils/reconcile-logger.js';
import type { EngineLogger } from '../utils/reconcile-logger.js';
import { withTimeout } from './timeout.js';

// ─── Types ───────────────────────────────────────────────────────────────

export const RECONCILE_PHASES = [
  'loaded',
  'diffed',
  'applying',
  'converged',
  'partially_failed',
  'aborted',
] as const;
export type ReconcilePhase = (typeof RECONCILE_PHASES)[number];

export interface ReconcileOptions {
  /** Checked before each adapter starts; an adapter already applying finishes */
  signal?: AbortSignal;
  /** Save the desired model to this store file once the run has applied */
  persist?: { path: string; lock?: LockOptions };
  runId?: string;
}

export interface ReconcileResult {
  runId: string;
  phase: 'converged' | 'partially_failed';
  /** Fields that differed when the run started */
  diff: FieldDiff[];
  applied: AppliedChange[];
  failures: ApplyError[];
  readFailures: ReadError[];
  saved?: SaveResult;
}

/** Current-state snapshot assembled from every adapter's read. */
export interface StateSnapshot {
  current: PartialConfigModel;
  readFailures: ReadError[];
}

/** A run stopped early. Carries whatever had been applied before it stopped. */
export class ReconcileAbortedError extends Error {
  constructor(
    message: string,
    public readonly phase: ReconcilePhase,
    public readonly applied: AppliedChange[],
    public readonly failures: ApplyError[],
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ReconcileAbortedError';
  }
}

export interface ReconcilerOptions {
  adapters: readonly SystemAdapter[];
  /** Bound on each adapter read and apply */
  adapterTimeoutMs: number;
  /** Where events.jsonl lives; no journal when omitted */
  stateDir?: string;
  logger?: EngineLogger;
}

// ─── Snapshot helpers ────────────────────────────────────────────────────

interface MutableSnapshot {
  networking?: NetworkingConfig;
  services: Record<string, ServiceState>;
  hardware: Record<string, PeripheralSettings>;
}

function mergeInto(target: MutableSnapshot, part: PartialConfigModel): void {
  if (part.networking) target.networking = part.networking;
  Object.assign(target.services, part.services);
  Object.assign(target.hardware, part.hardware);
}

function ownedEntries<T>(
  adapter: SystemAdapter,
  section: 'services' | 'hardware',
  entries: Readonly<Record<string, T>> | undefined,
): Record<string, T> | undefined {
  if (!entries) return undefined;
  const owned = Object.entries(entries).filter(([name]) => adapter.owns(`${section}.${name}`));
  return owned.length > 0 ? Object.fromEntries(owned) : undefined;
}

/** The part of `model` that `adapter` owns. */
export function subsetFor(adapter: SystemAdapter, model: PartialConfigModel): PartialConfigModel {
  const networking =
    model.networking && NETWORKING_FIELDS.some((key) => adapter.owns(`networking.${key}`))
      ? model.networking
      : undefined;
  const services = ownedEntries(adapter, 'services', model.services);
  const hardware = ownedEntries(adapter, 'hardware', model.hardware);
  return {
    ...(networking ? { networking } : {}),
    ...(services ? { services } : {}),
    ...(hardware ? { hardware } : {}),
  };
}

// ─── Reconciler ──────────────────────────────────────────────────────────

/**
 * Drives one desired model through loaded → diffed → applying →
 * converged | partially_failed. Adapters run one at a time in stage order.
 */
export class Reconciler {
  private readonly adapters: SystemAdapter[];
  private readonly logger: EngineLogger;

  constructor(private readonly options: ReconcilerOptions) {
    this.adapters = [...options.adapters].sort(
      (a, b) => ADAPTER_STAGES.indexOf(a.stage) - ADAPTER_STAGES.indexOf(b.stage),
    );
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Read every adapter for the fields of `scope`. A failed read is
   * recorded and the adapter's defaults are used in its place.
   */
  async inspect(scope: ConfigModel, signal?: AbortSignal): Promise<StateSnapshot> {
    const snapshot: MutableSnapshot = { services: {}, hardware: {} };
    const readFailures: ReadError[] = [];

    for (const adapter of this.adapters) {
      signal?.throwIfAborted();
      try {
        mergeInto(
          snapshot,
          await withTimeout(adapter.read(scope), this.options.adapterTimeoutMs, `${adapter.name} read`),
        );
      } catch (err) {
        if (err instanceof ReadError) {
          readFailures.push(err);
        } else if (err instanceof TimeoutError) {
          readFailures.push(new ReadError(err.message, adapter.name, err));
        } else {
          throw err;
        }
        mergeInto(snapshot, adapter.defaults(scope));
      }
    }

    return { current: snapshot, readFailures };
  }

  /**
   * Bring the system to `desired`.
   *
   * @throws {ValidationError} Before any read or write when `desired` is invalid
   * @throws {ReconcileAbortedError} On abort or on a fatal error
   */
  async reconcile(desired: ConfigModel, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    assertValidModel(desired);

    const runId = options.runId ?? uuidv4();
    const applied: AppliedChange[] = [];
    const failures: ApplyError[] = [];
    let phase: ReconcilePhase = 'loaded';

    const journal = (type: EventType, details: Record<string, unknown> = {}): Promise<void> =>
      logReconcileEvent(this.options.stateDir, runId, type, details, this.logger);
    const enter = async (next: ReconcilePhase): Promise<void> => {
      phase = next;
      this.logger.debug(`reconcile ${runId}: ${next}`);
      await journal(EventType.PhaseChanged, { phase: next });
    };
    const checkAborted = (): void => {
      if (options.signal?.aborted) {
        throw new ReconcileAbortedError('Reconciliation aborted', phase, applied, failures, options.signal.reason);
      }
    };

    await journal(EventType.ReconcileStarted, { adapters: this.adapters.map((a) => a.name) });

    try {
      await enter('loaded');
      checkAborted();

      const { current, readFailures } = await this.inspect(desired, options.signal);
      for (const failure of readFailures) {
        this.logger.warn(failure.message);
        await journal(EventType.ReadFailed, { adapter: failure.adapter, message: failure.message });
      }
      const diff = diffModels(desired, current);
      await enter('diffed');

      await enter('applying');
      for (const adapter of this.adapters) {
        const changed = diff.filter((d) => adapter.owns(d.field));
        if (changed.length === 0) continue;
        checkAborted();

        const outcome = await this.applyAdapter(adapter, desired, current, changed);
        for (const change of outcome.applied) {
          applied.push(change);
          await journal(EventType.ChangeApplied, { ...change });
        }
        for (const failure of outcome.failures) {
          failures.push(failure);
          this.logger.warn(failure.message);
          await journal(EventType.ApplyFailed, { field: failure.field, message: failure.message });
        }
      }

      let saved: SaveResult | undefined;
      if (options.persist) {
        saved = await saveModel(options.persist.path, desired, { lock: options.persist.lock });
        await journal(EventType.StoreSaved, { ...saved });
      }

      const outcome = failures.length > 0 || readFailures.length > 0 ? 'partially_failed' : 'converged';
      await enter(outcome);
      await journal(EventType.ReconcileCompleted, {
        phase: outcome,
        applied: applied.length,
        failures: failures.length,
        read_failures: readFailures.length,
      });

      return {
        runId,
        phase: outcome,
        diff,
        applied,
        failures,
        readFailures,
        ...(saved ? { saved } : {}),
      };
    } catch (err) {
      const aborted =
        err instanceof ReconcileAbortedError
          ? err
          : new ReconcileAbortedError(
              options.signal?.aborted
                ? 'Reconciliation aborted'
                : `Reconciliation aborted during ${phase}: ${describeError(err)}`,
              phase,
              applied,
              failures,
              err,
            );
      await journal(EventType.ReconcileAborted, { phase: aborted.phase, message: aborted.message });
      await enter('aborted');
      throw aborted;
    }
  }

  /**
   * Apply one adapter's changes within `adapterTimeoutMs`. On timeout the
   * adapter is told to stop and gets one more timeout window to finish the
   * step it is in, so no two adapters ever mutate the system at once. An
   * adapter that still has not settled ends the run.
   */
  private async applyAdapter(
    adapter: SystemAdapter,
    desired: ConfigModel,
    current: PartialConfigModel,
    changed: readonly FieldDiff[],
  ): Promise<ApplyOutcome> {
    const { adapterTimeoutMs } = this.options;
    const controller = new AbortController();
    this.logger.debug(`${adapter.name}: applying ${changed.map((d) => d.field).join(', ')}`);

    const work = adapter.apply(subsetFor(adapter, desired), subsetFor(adapter, current), controller.signal);
    try {
      return await withTimeout(work, adapterTimeoutMs, `${adapter.name} apply`);
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      controller.abort(err);
      this.logger.warn(`${err.message}; waiting for the step in progress`);

      const late = await withTimeout(work, adapterTimeoutMs, `${adapter.name} apply after cancellation`);
      const reported = new Set([...late.applied, ...late.failures].map((entry) => entry.field));
      const missing = changed
        .filter((d) => !reported.has(d.field))
        .map((d) => ApplyError.forField(d.field, err));
      return { applied: late.applied, failures: [...late.failures, ...missing] };
    }
  }
}

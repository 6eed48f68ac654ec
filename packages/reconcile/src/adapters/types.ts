import type { ApplyError, ConfigModel, PartialConfigModel } from '@nodeconf/core';

/** Adapters run in this order; within a stage, in registration order. */
export const ADAPTER_STAGES = ['networking', 'services', 'hardware'] as const;
export type AdapterStage = (typeof ADAPTER_STAGES)[number];

/** One field brought to its desired value. */
export interface AppliedChange {
  /** Dotted model path, e.g. `services.meshtasticd` */
  field: string;
  from: unknown;
  to: unknown;
  /** Human-readable mutations performed, in order */
  actions: string[];
  /** Follow-up steps that failed without undoing the change */
  warnings?: string[];
}

export interface ApplyOutcome {
  applied: AppliedChange[];
  failures: ApplyError[];
}

/**
 * Bridge between one domain of the model and the live system.
 *
 * `read` throws ReadError when the domain cannot be inspected at all.
 * `apply` reports per-field failures in its outcome instead of throwing,
 * and leaves fields that already match untouched.
 */
export interface SystemAdapter {
  readonly name: string;
  readonly stage: AdapterStage;
  /** Whether a dotted field (as produced by diffModels) belongs to this adapter */
  owns(field: string): boolean;
  /** Observe the fields of `scope` this adapter owns. */
  read(scope: ConfigModel): Promise<PartialConfigModel>;
  /** The snapshot to assume when `read` fails. */
  defaults(scope: ConfigModel): PartialConfigModel;
  /**
   * Once `signal` aborts, the step in progress finishes and every field
   * not yet started is reported as failed with the abort reason.
   */
  apply(desired: PartialConfigModel, current: PartialConfigModel, signal?: AbortSignal): Promise<ApplyOutcome>;
}

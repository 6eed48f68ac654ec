import { ApplyError, describeError } from '@nodeconf/core';
import { runOrThrow } from '../system/executor.js';
import type { CommandRunner } from '../system/executor.js';
import type { ApplyOutcome } from './types.js';

export interface StepResult {
  actions: string[];
  warnings?: string[];
}

export interface FieldChange {
  field: string;
  from: unknown;
  to: unknown;
}

export function emptyOutcome(): ApplyOutcome {
  return { applied: [], failures: [] };
}

/**
 * Run one mutation that brings `fields` to their desired values, recording
 * a change per field on success or an ApplyError per field on failure.
 * An aborted `signal` skips the mutation and fails the fields with its reason.
 */
export async function recordStep(
  outcome: ApplyOutcome,
  fields: readonly FieldChange[],
  run: () => Promise<StepResult>,
  signal?: AbortSignal,
): Promise<void> {
  if (signal?.aborted) {
    for (const { field } of fields) {
      outcome.failures.push(ApplyError.forField(field, signal.reason));
    }
    return;
  }
  try {
    const { actions, warnings = [] } = await run();
    for (const { field, from, to } of fields) {
      outcome.applied.push({ field, from, to, actions, ...(warnings.length > 0 ? { warnings } : {}) });
    }
  } catch (err) {
    for (const { field } of fields) {
      outcome.failures.push(ApplyError.forField(field, err));
    }
  }
}

/**
 * Run a follow-up command whose failure does not undo the change.
 *
 * @returns Warnings describing the failure, empty on success
 */
export async function followUp(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
): Promise<string[]> {
  try {
    await runOrThrow(runner, command, args);
    return [];
  } catch (err) {
    return [describeError(err)];
  }
}

/**
 * Reconciliation event logger.
 *
 * Wraps @nodeconf/core appendEvent so every journal line of a run carries
 * the run id and never a wifi passphrase.
 */

import { appendEvent, createEvent, describeError } from '@nodeconf/core';
import type { EventType } from '@nodeconf/core';

/** Minimal logging surface the engine reports through. */
export interface EngineLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const silentLogger: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

const SECRET_KEYS = new Set(['psk']);
export const REDACTED = '[redacted]';

/** Deep copy of `value` with every non-empty passphrase replaced. */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = SECRET_KEYS.has(key) && typeof inner === 'string' && inner !== '' ? REDACTED : redactSecrets(inner);
    }
    return out;
  }
  return value;
}

function redactDetails(details: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    out[key] = redactSecrets(value);
  }
  return out;
}

/**
 * Journal one reconciliation event to events.jsonl.
 * Journal failures are reported through the logger and do not stop a run.
 */
export async function logReconcileEvent(
  stateDir: string | undefined,
  runId: string,
  type: EventType,
  details: Record<string, unknown> = {},
  logger: EngineLogger = silentLogger,
): Promise<void> {
  if (stateDir === undefined) return;
  try {
    await appendEvent(stateDir, createEvent(type, redactDetails(details), runId));
  } catch (err) {
    logger.warn(`Could not write event journal: ${describeError(err)}`);
  }
}

/**
 * Event journal: one JSON object per line in <stateDir>/events.jsonl.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import fs from 'graceful-fs';
import { v4 as uuidv4 } from 'uuid';
import { hasErrnoCode } from '../utils/errno.js';
import { getEventsPath } from '../utils/paths.js';
import { SystemEventSchema } from './types.js';
import type { EventFilters, EventType, SystemEvent } from './types.js';

/** Build an event with a fresh id and the current time. */
export function createEvent(
  eventType: EventType,
  data?: Record<string, unknown>,
  runId?: string,
): SystemEvent {
  return {
    event_id: uuidv4(),
    timestamp: new Date().toISOString(),
    event_type: eventType,
    run_id: runId ?? null,
    ...(data ? { data } : {}),
  };
}

/**
 * Append an event to the journal.
 *
 * Uses synchronous append for atomicity on single lines (POSIX guarantees
 * atomic writes for small payloads under PIPE_BUF / 4096 bytes).
 *
 * @param stateDir - Directory holding the engine's state files
 * @param event - The event to append
 */
export async function appendEvent(stateDir: string, event: SystemEvent): Promise<void> {
  const eventsPath = getEventsPath(stateDir);
  mkdirSync(dirname(eventsPath), { recursive: true });
  appendFileSync(eventsPath, JSON.stringify(event) + '\n', 'utf-8');
}

/**
 * Read journal events, oldest first. Lines that are not valid events
 * are skipped.
 */
export async function queryEvents(stateDir: string, filters: EventFilters = {}): Promise<SystemEvent[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(getEventsPath(stateDir), 'utf-8');
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return [];
    throw err;
  }

  const events: SystemEvent[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = SystemEventSchema.safeParse(json);
    if (!parsed.success) continue;
    const event = parsed.data;
    if (filters.runId && event.run_id !== filters.runId) continue;
    if (filters.eventType && event.event_type !== filters.eventType) continue;
    if (filters.startTime && event.timestamp < filters.startTime) continue;
    if (filters.endTime && event.timestamp > filters.endTime) continue;
    events.push(event);
  }
  return events;
}

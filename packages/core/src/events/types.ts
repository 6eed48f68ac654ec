import { z } from 'zod';

/** Event type values written to events.jsonl. */
export const EventType = {
  ReconcileStarted: 'reconcile_started',
  PhaseChanged: 'phase_changed',
  ReadFailed: 'read_failed',
  ChangeApplied: 'change_applied',
  ApplyFailed: 'apply_failed',
  ReconcileCompleted: 'reconcile_completed',
  ReconcileAborted: 'reconcile_aborted',
  StoreSaved: 'store_saved',
  ClockJumped: 'clock_jumped',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

/** Zod schema for one journal line. */
export const SystemEventSchema = z.object({
  event_id: z.string().uuid(),
  timestamp: z.string().datetime(),
  event_type: z.enum([
    'reconcile_started', 'phase_changed', 'read_failed', 'change_applied',
    'apply_failed', 'reconcile_completed', 'reconcile_aborted', 'store_saved',
    'clock_jumped',
  ]),
  /** Reconciliation run the event belongs to, when any */
  run_id: z.string().nullable().optional(),
  data: z.record(z.unknown()).optional(),
});

/** TypeScript type for a journal event. */
export type SystemEvent = z.infer<typeof SystemEventSchema>;

/** Filters for querying events. */
export interface EventFilters {
  runId?: string;
  eventType?: EventType;
  startTime?: string;
  endTime?: string;
}

export { SystemEventSchema, EventType } from './types.js';
export type { SystemEvent, EventFilters } from './types.js';
export { appendEvent, createEvent, queryEvents } from './append.js';

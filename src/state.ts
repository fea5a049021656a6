import { z } from 'zod';

import { WAYBILL_PATTERN } from './features/waybills.js';
import { JsonStorage } from './utils/storage.js';

export interface TrackingEvent {
  readonly location: string;
  readonly details: string;
  readonly date: string;
  readonly time: string;
}

export interface TrackedEntry {
  lastEvent: TrackingEvent | null;
  delivered: boolean;
}

export type TrackingState = Record<string, TrackedEntry>;

export const DELIVERED_MARKER = 'Delivered';

export const createEvent = (fields: TrackingEvent): TrackingEvent =>
  Object.freeze({
    location: fields.location,
    details: fields.details,
    date: fields.date,
    time: fields.time
  });

export const eventsEqual = (a: TrackingEvent | null, b: TrackingEvent | null): boolean => {
  if (!a || !b) {
    return a === b;
  }
  return a.location === b.location && a.details === b.details && a.date === b.date && a.time === b.time;
};

export const isDeliveryEvent = (event: TrackingEvent) => event.details.includes(DELIVERED_MARKER);

export const createEntry = (): TrackedEntry => ({ lastEvent: null, delivered: false });

export const defaultState = (): TrackingState => ({});

const eventSchema = z.union([
  z.object({
    location: z.string(),
    details: z.string(),
    date: z.string(),
    time: z.string()
  }),
  // files written before the lowercase keys were introduced
  z
    .object({
      Location: z.string(),
      Details: z.string(),
      Date: z.string(),
      Time: z.string()
    })
    .transform((legacy) => ({
      location: legacy.Location,
      details: legacy.Details,
      date: legacy.Date,
      time: legacy.Time
    }))
]);

const entrySchema = z
  .object({
    last_event: eventSchema.nullable().default(null),
    delivered: z.boolean().default(false)
  })
  .transform(
    (stored): TrackedEntry => ({
      lastEvent: stored.last_event ? createEvent(stored.last_event) : null,
      delivered: stored.delivered
    })
  );

export const stateSchema = z.record(z.string().regex(WAYBILL_PATTERN), entrySchema);

export interface StoredEntry {
  last_event: TrackingEvent | null;
  delivered: boolean;
}

export const serializeState = (state: TrackingState): Record<string, StoredEntry> =>
  Object.fromEntries(
    Object.entries(state).map(([waybill, entry]) => [
      waybill,
      { last_event: entry.lastEvent, delivered: entry.delivered }
    ])
  );

export type StateStorage = Pick<JsonStorage<TrackingState>, 'read' | 'write'>;

export const createStateStorage = (filePath: string) =>
  new JsonStorage<TrackingState>(filePath, defaultState, {
    schema: stateSchema,
    serialize: serializeState
  });

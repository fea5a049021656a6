import { createEntry, type TrackingState } from '../state.js';
import { extractWaybills, isWaybill } from '../features/waybills.js';
import type { MessageSource } from '../types.js';
import { logger } from '../utils/logger.js';

export const discoverWaybills = async (source: MessageSource): Promise<Set<string>> => {
  const waybills = new Set<string>();
  try {
    const messages = await source.fetchUnreadMessages();
    for (const text of messages) {
      for (const waybill of extractWaybills(text)) {
        waybills.add(waybill);
      }
    }
  } catch (error) {
    logger.error('Mailbox discovery failed, continuing with tracked waybills', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
  return waybills;
};

/**
 * Adds unseen waybills as fresh entries. Entries already present, delivered
 * or not, are left exactly as they are.
 */
export const mergeDiscoveries = (state: TrackingState, waybills: Iterable<string>): string[] => {
  const added: string[] = [];
  for (const waybill of waybills) {
    if (!isWaybill(waybill)) {
      logger.warn('Ignoring malformed tracking ID', { waybill });
      continue;
    }
    if (Object.hasOwn(state, waybill)) {
      continue;
    }
    state[waybill] = createEntry();
    added.push(waybill);
    logger.info('Added new tracking ID', { waybill });
  }
  return added;
};

import {
  eventsEqual,
  isDeliveryEvent,
  type TrackedEntry,
  type TrackingEvent,
  type TrackingState
} from '../state.js';
import type { MessageFormatter, NotificationMessage, Notifier, StatusLookup } from '../types.js';
import { logger } from '../utils/logger.js';

interface TrackingEngineOptions {
  lookup: StatusLookup;
  notifier: Notifier;
  formatter: MessageFormatter;
}

export type TrackingOutcome = 'skipped' | 'failed' | 'unchanged' | 'updated' | 'delivered';

export interface TrackingReport {
  checked: number;
  skipped: number;
  failed: number;
  unchanged: number;
  updated: number;
  delivered: number;
  notificationFailures: number;
}

export const deliveredSubject = (waybill: string) => `✅ DELIVERED: Waybill ${waybill}`;
export const updateSubject = (waybill: string) => `📦 Update for Waybill ${waybill}`;

const emptyReport = (): TrackingReport => ({
  checked: 0,
  skipped: 0,
  failed: 0,
  unchanged: 0,
  updated: 0,
  delivered: 0,
  notificationFailures: 0
});

export const createTrackingEngine = ({ lookup, notifier, formatter }: TrackingEngineOptions) => {
  const notify = async (waybill: string, subject: string, event: TrackingEvent): Promise<boolean> => {
    const message: NotificationMessage = { subject, ...formatter(waybill, event) };
    try {
      const result = await notifier.send(message);
      if (!result.success) {
        logger.error('Notification not sent, state change kept', { waybill, error: result.error });
      }
      return result.success;
    } catch (error) {
      logger.error('Notification not sent, state change kept', {
        waybill,
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  };

  const track = async (
    waybill: string,
    entry: TrackedEntry
  ): Promise<{ outcome: TrackingOutcome; notified?: boolean }> => {
    if (entry.delivered) {
      return { outcome: 'skipped' };
    }

    let event: TrackingEvent;
    try {
      event = await lookup.fetchLatestEvent(waybill);
    } catch (error) {
      logger.warn('Could not fetch event, will retry next run', {
        waybill,
        error: error instanceof Error ? error.message : String(error)
      });
      return { outcome: 'failed' };
    }

    if (isDeliveryEvent(event)) {
      entry.delivered = true;
      entry.lastEvent = event;
      logger.info('Package delivered, tracking deactivated', { waybill, details: event.details });
      return { outcome: 'delivered', notified: await notify(waybill, deliveredSubject(waybill), event) };
    }

    if (eventsEqual(event, entry.lastEvent)) {
      logger.info('No new update', { waybill, details: event.details });
      return { outcome: 'unchanged' };
    }

    entry.lastEvent = event;
    logger.info('New update found', { waybill, details: event.details });
    return { outcome: 'updated', notified: await notify(waybill, updateSubject(waybill), event) };
  };

  return async (state: TrackingState): Promise<TrackingReport> => {
    const report = emptyReport();

    // snapshot the keys so the sweep only covers entries present when it starts
    for (const waybill of Object.keys(state)) {
      const entry = state[waybill];
      if (!entry) {
        continue;
      }

      const { outcome, notified } = await track(waybill, entry);
      report[outcome] += 1;
      if (outcome !== 'skipped') {
        report.checked += 1;
      }
      if (notified === false) {
        report.notificationFailures += 1;
      }
    }

    logger.info('Tracking sweep finished', { ...report });
    return report;
  };
};

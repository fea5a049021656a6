import type { StateStorage } from '../state.js';
import type { MessageFormatter, MessageSource, Notifier, StatusLookup } from '../types.js';
import { logger } from '../utils/logger.js';
import { discoverWaybills, mergeDiscoveries } from './discovery.js';
import { createTrackingEngine, type TrackingReport } from './trackingEngine.js';

interface TrackerRunContext {
  stateStorage: StateStorage;
  /** `null` when mail discovery is disabled; only already tracked waybills are checked. */
  messageSource: MessageSource | null;
  lookup: StatusLookup;
  notifier: Notifier;
  formatter: MessageFormatter;
}

export interface RunSummary {
  added: string[];
  tracked: number;
  report: TrackingReport | null;
}

export const createTrackerRun = ({ stateStorage, messageSource, lookup, notifier, formatter }: TrackerRunContext) => {
  const runTracking = createTrackingEngine({ lookup, notifier, formatter });

  return async (): Promise<RunSummary> => {
    logger.info('Starting tracking run');

    const state = await stateStorage.read();
    const summary: RunSummary = { added: [], tracked: 0, report: null };

    try {
      if (messageSource) {
        const discovered = await discoverWaybills(messageSource);
        summary.added = mergeDiscoveries(state, discovered);
      } else {
        logger.info('Mail discovery disabled via configuration');
      }

      summary.report = await runTracking(state);
    } finally {
      await stateStorage.write(state);
      summary.tracked = Object.keys(state).length;
    }

    logger.info('Tracking run finished', { added: summary.added.length, tracked: summary.tracked });
    return summary;
  };
};

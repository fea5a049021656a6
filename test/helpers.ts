import { createEvent, type TrackingEvent, type TrackingState, type StateStorage } from '../src/state.js';
import type { MessageSource, NotificationMessage, NotificationResult, Notifier, StatusLookup } from '../src/types.js';
import { TrackingFetchError } from '../src/services/trackingClient.js';

export const inTransit = createEvent({
  location: 'Mumbai',
  details: 'In Transit',
  date: '2024-01-01',
  time: '10:00'
});

export const deliveredEvent = createEvent({
  location: 'Pune',
  details: 'Delivered to consignee',
  date: '2024-01-03',
  time: '14:30'
});

/** Answers lookups from a table; waybills without an answer fail to fetch. */
export class FakeLookup implements StatusLookup {
  readonly calls: string[] = [];

  constructor(private readonly answers: Record<string, TrackingEvent | Error> = {}) {}

  set(waybill: string, answer: TrackingEvent | Error) {
    this.answers[waybill] = answer;
  }

  async fetchLatestEvent(waybill: string): Promise<TrackingEvent> {
    this.calls.push(waybill);
    const answer = this.answers[waybill];
    if (!answer) {
      throw new TrackingFetchError(waybill, 'connect ECONNREFUSED');
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return createEvent(answer);
  }
}

export class FakeNotifier implements Notifier {
  readonly sent: NotificationMessage[] = [];

  constructor(private readonly result: NotificationResult = { success: true, messageId: 'test-message' }) {}

  async send(message: NotificationMessage): Promise<NotificationResult> {
    this.sent.push(message);
    return this.result;
  }
}

export class FakeMessageSource implements MessageSource {
  calls = 0;

  constructor(private readonly messages: string[] | Error) {}

  async fetchUnreadMessages(): Promise<string[]> {
    this.calls += 1;
    if (this.messages instanceof Error) {
      throw this.messages;
    }
    return this.messages;
  }
}

export class MemoryStateStorage implements StateStorage {
  writes: TrackingState[] = [];

  constructor(private stored: TrackingState = {}) {}

  async read(): Promise<TrackingState> {
    return structuredClone(this.stored);
  }

  async write(state: TrackingState): Promise<void> {
    this.stored = structuredClone(state);
    this.writes.push(this.stored);
  }

  get current(): TrackingState {
    return this.stored;
  }
}

export const plainFormatter = (waybill: string, event: TrackingEvent) => ({
  html: `<p>${waybill}: ${event.details}</p>`,
  text: `${waybill}: ${event.details}`
});

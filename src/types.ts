import type { TrackingEvent } from './state.js';

export interface StatusLookup {
  /**
   * Resolves the most recent event for a waybill. Rejects with a
   * `TrackingLookupError` when the page cannot be fetched or parsed.
   */
  fetchLatestEvent(waybill: string): Promise<TrackingEvent>;
}

export interface MessageSource {
  /** Text of every unread message; consumed messages are marked read. */
  fetchUnreadMessages(): Promise<string[]>;
}

export interface NotificationBody {
  html: string;
  text: string;
}

export interface NotificationMessage extends NotificationBody {
  subject: string;
}

export interface NotificationResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface Notifier {
  send(message: NotificationMessage): Promise<NotificationResult>;
}

export type MessageFormatter = (waybill: string, event: TrackingEvent) => NotificationBody;

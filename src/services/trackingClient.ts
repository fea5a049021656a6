import axios from 'axios';
import { load } from 'cheerio';

import type { Env } from '../utils/env.js';
import { createEvent, type TrackingEvent } from '../state.js';
import type { StatusLookup } from '../types.js';

export class TrackingLookupError extends Error {
  constructor(
    message: string,
    readonly waybill: string
  ) {
    super(message);
    this.name = 'TrackingLookupError';
  }
}

/** Network failure, timeout or non-2xx answer from the tracking page. */
export class TrackingFetchError extends TrackingLookupError {
  constructor(
    waybill: string,
    message: string,
    readonly status?: number
  ) {
    super(message, waybill);
    this.name = 'TrackingFetchError';
  }
}

/** The page loaded but did not contain the expected scan table. */
export class TrackingParseError extends TrackingLookupError {
  constructor(waybill: string, message = 'Tracking page structure not recognised') {
    super(message, waybill);
    this.name = 'TrackingParseError';
  }
}

export interface HttpGetter {
  get(url: string): Promise<{ data: unknown }>;
}

interface TrackingClientOptions {
  env: Pick<Env, 'TRACKING_URL' | 'LOOKUP_TIMEOUT_MS'>;
  http?: HttpGetter;
}

export const buildTrackingUrl = (baseUrl: string, waybill: string) => {
  const url = new URL(baseUrl);
  url.searchParams.set('trackFor', '0');
  url.searchParams.set('trackNo', waybill);
  return url.toString();
};

/**
 * Reads the newest scan row. The carrier lists scans newest first, one
 * `<tr>` per scan with location, details, date and time cells.
 */
export const parseLatestEvent = (html: string, waybill: string): TrackingEvent => {
  const $ = load(html);
  const container = $(`#SCAN${waybill}`);
  if (container.length === 0) {
    throw new TrackingParseError(waybill, `Scan table for ${waybill} not found`);
  }

  const cells = container.find('table').first().find('tbody tr').first().find('td');
  if (cells.length < 4) {
    throw new TrackingParseError(waybill, `Latest scan row for ${waybill} has ${cells.length} cells`);
  }

  const cell = (index: number) => cells.eq(index).text().trim();
  return createEvent({
    location: cell(0),
    details: cell(1),
    date: cell(2),
    time: cell(3)
  });
};

export class TrackingClient implements StatusLookup {
  private readonly baseUrl: string;
  private readonly http: HttpGetter;

  constructor({ env, http }: TrackingClientOptions) {
    this.baseUrl = env.TRACKING_URL;
    this.http =
      http ??
      axios.create({
        timeout: env.LOOKUP_TIMEOUT_MS,
        headers: { 'User-Agent': 'Mozilla/5.0' },
        responseType: 'text'
      });
  }

  trackingUrl(waybill: string): string {
    return buildTrackingUrl(this.baseUrl, waybill);
  }

  async fetchLatestEvent(waybill: string): Promise<TrackingEvent> {
    const html = await this.fetchPage(waybill);
    return parseLatestEvent(html, waybill);
  }

  private async fetchPage(waybill: string): Promise<string> {
    try {
      const { data } = await this.http.get(this.trackingUrl(waybill));
      if (typeof data !== 'string') {
        throw new TrackingParseError(waybill, 'Tracking page did not return HTML');
      }
      return data;
    } catch (error) {
      if (error instanceof TrackingLookupError) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const reason = status ? `${status} ${error.response?.statusText ?? ''}`.trim() : error.message;
        throw new TrackingFetchError(waybill, `Failed to fetch tracking page: ${reason}`, status);
      }
      throw new TrackingFetchError(
        waybill,
        `Failed to fetch tracking page: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

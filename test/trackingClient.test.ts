import { readFileSync } from 'node:fs';
import { createServer } from 'node:http';

import { describe, expect, it, vi } from 'vitest';

import {
  TrackingClient,
  TrackingFetchError,
  TrackingParseError,
  buildTrackingUrl,
  parseLatestEvent
} from '../src/services/trackingClient.js';

const page = readFileSync(new URL('./fixtures/tracking-page.html', import.meta.url), 'utf8');

const env = { TRACKING_URL: 'https://tracking.example.com/track', LOOKUP_TIMEOUT_MS: 1_000 };

describe('parseLatestEvent', () => {
  it('reads the first scan row', () => {
    expect(parseLatestEvent(page, '12345678901')).toEqual({
      location: 'Pune Hub',
      details: 'Shipment Out For Delivery',
      date: '03 Jan 2024',
      time: '09:15'
    });
  });

  it('fails when the scan container for the waybill is missing', () => {
    expect(() => parseLatestEvent(page, '99999999999')).toThrow(TrackingParseError);
  });

  it('fails when the latest row is incomplete', () => {
    const html = '<div id="SCAN12345678901"><table><tbody><tr><td>Pune</td><td>Booked</td></tr></tbody></table></div>';
    expect(() => parseLatestEvent(html, '12345678901')).toThrow('Latest scan row for 12345678901 has 2 cells');
  });
});

describe('buildTrackingUrl', () => {
  it('adds the waybill query parameters', () => {
    expect(buildTrackingUrl(env.TRACKING_URL, '12345678901')).toBe(
      'https://tracking.example.com/track?trackFor=0&trackNo=12345678901'
    );
  });
});

describe('TrackingClient', () => {
  it('fetches the tracking page and parses the latest event', async () => {
    const get = vi.fn(async (_url: string) => ({ data: page }));
    const client = new TrackingClient({ env, http: { get } });

    const event = await client.fetchLatestEvent('12345678901');

    expect(get).toHaveBeenCalledWith('https://tracking.example.com/track?trackFor=0&trackNo=12345678901');
    expect(event.details).toBe('Shipment Out For Delivery');
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('wraps network failures in TrackingFetchError', async () => {
    const client = new TrackingClient({
      env,
      http: {
        get: async () => {
          throw new Error('timeout of 1000ms exceeded');
        }
      }
    });

    const failure = client.fetchLatestEvent('12345678901');
    await expect(failure).rejects.toBeInstanceOf(TrackingFetchError);
    await expect(failure).rejects.toThrow('Failed to fetch tracking page: timeout of 1000ms exceeded');
  });

  it('rejects non-HTML bodies as parse failures', async () => {
    const client = new TrackingClient({ env, http: { get: async () => ({ data: { error: 'gone' } }) } });

    await expect(client.fetchLatestEvent('12345678901')).rejects.toBeInstanceOf(TrackingParseError);
  });

  it('gives up on a silent tracking page after the configured timeout', async () => {
    const server = createServer(() => {
      // never answers
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('test server is not listening on a TCP port');
    }
    const { port } = address;

    try {
      const client = new TrackingClient({
        env: { TRACKING_URL: `http://127.0.0.1:${port}/track`, LOOKUP_TIMEOUT_MS: 200 }
      });

      const startedAt = Date.now();
      const failure = client.fetchLatestEvent('12345678901');
      await expect(failure).rejects.toBeInstanceOf(TrackingFetchError);
      await expect(failure).rejects.toThrow('Failed to fetch tracking page: timeout of 200ms exceeded');
      expect(Date.now() - startedAt).toBeLessThan(2_000);
    } finally {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

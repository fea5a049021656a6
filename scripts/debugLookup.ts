import 'dotenv/config';

import { TrackingClient } from '../src/services/trackingClient.js';
import { isWaybill } from '../src/features/waybills.js';
import { DEFAULT_TRACKING_URL } from '../src/utils/env.js';

const run = async () => {
  const waybill = process.argv[2];
  if (!waybill || !isWaybill(waybill)) {
    console.error('Usage: debugLookup <11-digit waybill>');
    process.exit(1);
  }

  const client = new TrackingClient({
    env: {
      TRACKING_URL: process.env.TRACKING_URL ?? DEFAULT_TRACKING_URL,
      LOOKUP_TIMEOUT_MS: 10_000
    }
  });

  console.log(client.trackingUrl(waybill));
  const event = await client.fetchLatestEvent(waybill);
  console.log(JSON.stringify(event, null, 2));
};

run().catch((error) => {
  console.error(error);
  process.exit(1);
});

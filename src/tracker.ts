import { getEnv } from './utils/env.js';
import { configureLogger, logger } from './utils/logger.js';
import { createStateStorage } from './state.js';
import { createTrackerRun } from './tasks/index.js';
import { TrackingClient } from './services/trackingClient.js';
import { MailboxClient } from './services/mailboxClient.js';
import { Mailer } from './services/mailer.js';
import { createMessageFormatter } from './features/notificationTemplate.js';

const bootstrap = async () => {
  const env = getEnv();
  configureLogger({ level: env.LOG_LEVEL, file: env.LOG_FILE });

  const trackingClient = new TrackingClient({ env });
  const run = createTrackerRun({
    stateStorage: createStateStorage(env.STATE_FILE),
    messageSource: env.ENABLE_MAIL_DISCOVERY ? new MailboxClient({ env }) : null,
    lookup: trackingClient,
    notifier: new Mailer({ env }),
    formatter: createMessageFormatter((waybill) => trackingClient.trackingUrl(waybill))
  });

  await run();
};

bootstrap().catch((error) => {
  logger.error('Fatal tracking run error', {
    error: error instanceof Error ? error.stack : String(error)
  });
  process.exit(1);
});

import 'dotenv/config';

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
  .optional()
  .default('true' as const)
  .transform((value) => ['true', '1', 'yes', 'on'].includes(value));

export const DEFAULT_TRACKING_URL = 'https://www.bluedart.com/trackdartresultthirdparty';

const envSchema = z
  .object({
    IMAP_SERVER: z.string().optional(),
    IMAP_PORT: z.coerce.number().int().positive().default(993),
    IMAP_MAILBOX: z.string().min(1).default('INBOX'),
    EMAIL_ADDRESS: z.string().email(),
    EMAIL_PASSWORD: z.string().min(1, 'EMAIL_PASSWORD is required'),
    SMTP_SERVER: z.string().min(1, 'SMTP_SERVER is required'),
    SMTP_PORT: z.coerce.number().int().positive().default(587),
    RECIPIENT_EMAIL: z.string().email(),
    TRACKING_URL: z.string().url().default(DEFAULT_TRACKING_URL),
    LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    STATE_FILE: z.string().min(1).default('data/active_ids.json'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_FILE: z.string().default('tracker.log'),
    ENABLE_MAIL_DISCOVERY: booleanFlag
  })
  .superRefine((env, ctx) => {
    if (env.ENABLE_MAIL_DISCOVERY && !env.IMAP_SERVER) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['IMAP_SERVER'],
        message: 'IMAP_SERVER is required while ENABLE_MAIL_DISCOVERY is on'
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }
  return parsed.data;
};

let cached: Env | null = null;

export const getEnv = (): Env => {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
};

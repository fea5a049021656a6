import { createTransport, type SendMailOptions } from 'nodemailer';

import type { Env } from '../utils/env.js';
import { logger } from '../utils/logger.js';
import type { NotificationMessage, NotificationResult, Notifier } from '../types.js';

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
}

type MailerEnv = Pick<Env, 'SMTP_SERVER' | 'SMTP_PORT' | 'EMAIL_ADDRESS' | 'EMAIL_PASSWORD' | 'RECIPIENT_EMAIL'>;

interface MailerOptions {
  env: MailerEnv;
  transport?: MailTransport;
}

const createSmtpTransport = (env: MailerEnv): MailTransport =>
  createTransport({
    host: env.SMTP_SERVER,
    port: env.SMTP_PORT,
    secure: env.SMTP_PORT === 465,
    requireTLS: env.SMTP_PORT !== 465,
    auth: { user: env.EMAIL_ADDRESS, pass: env.EMAIL_PASSWORD },
    connectionTimeout: 20_000,
    greetingTimeout: 20_000
  });

export class Mailer implements Notifier {
  private readonly from: string;
  private readonly to: string;
  private readonly transport: MailTransport;

  constructor({ env, transport }: MailerOptions) {
    this.from = env.EMAIL_ADDRESS;
    this.to = env.RECIPIENT_EMAIL;
    this.transport = transport ?? createSmtpTransport(env);
  }

  async send({ subject, html, text }: NotificationMessage): Promise<NotificationResult> {
    try {
      const info = await this.transport.sendMail({ from: this.from, to: this.to, subject, html, text });
      logger.info('Email alert sent', { to: this.to, messageId: info.messageId });
      return { success: true, messageId: info.messageId };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to send email', { to: this.to, subject, error: message });
      return { success: false, error: message };
    }
  }
}

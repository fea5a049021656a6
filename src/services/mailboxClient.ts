import { ImapFlow } from 'imapflow';
import { simpleParser } from 'mailparser';

import type { Env } from '../utils/env.js';
import { logger } from '../utils/logger.js';
import type { MessageSource } from '../types.js';

type MailboxEnv = Pick<Env, 'IMAP_SERVER' | 'IMAP_PORT' | 'IMAP_MAILBOX' | 'EMAIL_ADDRESS' | 'EMAIL_PASSWORD'>;

/** The slice of an imapflow client the mailbox reader drives. */
export interface ImapSession {
  connect(): Promise<void>;
  getMailboxLock(path: string): Promise<{ release(): void }>;
  search(query: { seen: boolean }, options: { uid: true }): Promise<number[] | false>;
  fetch(range: number[], query: { source: true }, options: { uid: true }): AsyncIterable<{ source?: Buffer }>;
  messageFlagsAdd(range: number[], flags: string[], options: { uid: true }): Promise<boolean>;
  logout(): Promise<void>;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

interface MailboxClientOptions {
  env: MailboxEnv;
  createSession?: (env: MailboxEnv & { IMAP_SERVER: string }) => ImapSession;
}

const createImapSession = (env: MailboxEnv & { IMAP_SERVER: string }): ImapSession =>
  new ImapFlow({
    host: env.IMAP_SERVER,
    port: env.IMAP_PORT,
    secure: true,
    auth: { user: env.EMAIL_ADDRESS, pass: env.EMAIL_PASSWORD },
    logger: false
  });

/** Plain-text and HTML bodies of a raw RFC 822 message, concatenated. */
export const readMessageText = async (source: Buffer | string): Promise<string> => {
  const parsed = await simpleParser(source);
  const parts: string[] = [];
  if (parsed.text) {
    parts.push(parsed.text);
  }
  if (parsed.html) {
    parts.push(parsed.html);
  }
  return parts.join('\n');
};

export class MailboxClient implements MessageSource {
  private readonly env: MailboxEnv;
  private readonly createSession: (env: MailboxEnv & { IMAP_SERVER: string }) => ImapSession;

  constructor({ env, createSession }: MailboxClientOptions) {
    this.env = env;
    this.createSession = createSession ?? createImapSession;
  }

  async fetchUnreadMessages(): Promise<string[]> {
    const { IMAP_SERVER } = this.env;
    if (!IMAP_SERVER) {
      throw new Error('IMAP_SERVER is not configured');
    }

    const client = this.createSession({ ...this.env, IMAP_SERVER });
    // connection drops after login are emitted, not thrown; the pending command rejects on its own
    client.on('error', (error) => {
      logger.error('IMAP connection error', { error: error.message });
    });

    await client.connect();
    try {
      const lock = await client.getMailboxLock(this.env.IMAP_MAILBOX);
      try {
        return await this.consumeUnseen(client);
      } finally {
        lock.release();
      }
    } finally {
      await client.logout().catch((error: unknown) => {
        logger.warn('IMAP logout failed', {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    }
  }

  private async consumeUnseen(client: ImapSession): Promise<string[]> {
    const uids = await client.search({ seen: false }, { uid: true });
    if (!uids || uids.length === 0) {
      logger.info('No new unread emails found');
      return [];
    }

    logger.info('Found unread emails to process', { count: uids.length });

    const sources: Buffer[] = [];
    for await (const message of client.fetch(uids, { source: true }, { uid: true })) {
      if (message.source) {
        sources.push(message.source);
      }
    }

    const texts: string[] = [];
    for (const source of sources) {
      try {
        texts.push(await readMessageText(source));
      } catch (error) {
        logger.warn('Skipping unparseable email', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    // flags are set after the fetch stream is drained; imapflow cannot run commands inside it
    await client.messageFlagsAdd(uids, ['\\Seen'], { uid: true });
    return texts;
  }
}

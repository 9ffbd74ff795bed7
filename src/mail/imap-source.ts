import { ImapFlow } from 'imapflow';
import { ImapSettings } from '../types';
import { BridgeError } from '../bridge/errors';
import { MailSource } from '../bridge/ports';

/** The parts of an ImapFlow session the mail source uses */
export interface ImapClient {
  on(event: 'error', listener: (error: Error) => void): unknown;
  connect(): Promise<void>;
  mailboxOpen(path: string): Promise<unknown>;
  search(query: { seen: boolean }, options: { uid: boolean }): Promise<number[] | false>;
  fetchOne(range: string, query: { source: boolean }, options: { uid: boolean }): Promise<{ source?: Buffer } | false>;
  messageFlagsAdd(range: string, flags: string[], options: { uid: boolean }): Promise<unknown>;
  logout(): Promise<void>;
}

export function createImapClient(settings: ImapSettings): ImapClient {
  return new ImapFlow({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    logger: false,
    auth: {
      user: settings.user,
      pass: settings.password,
    },
  });
}

/**
 * MailSource over an IMAP mailbox.
 *
 * Message identifiers are UIDs. Fetching a message sets its \Seen flag.
 */
export class ImapMailSource implements MailSource {
  private client: ImapClient | null = null;

  constructor(
    private readonly settings: ImapSettings,
    private readonly createClient: (settings: ImapSettings) => ImapClient = createImapClient
  ) {}

  async connect(): Promise<void> {
    const client = this.createClient(this.settings);

    // Socket errors arrive as events; without a listener they crash the process
    client.on('error', (error: Error) => {
      console.error(`[ImapMailSource] Connection error on ${this.settings.host}: ${error.message}`);
    });

    await client.connect();
    await client.mailboxOpen(this.settings.mailbox);
    this.client = client;
    console.log(`[ImapMailSource] Connected to ${this.settings.host}, mailbox ${this.settings.mailbox}`);
  }

  async listUnread(): Promise<string[]> {
    const client = this.requireClient();
    const uids = await client.search({ seen: false }, { uid: true });
    if (!Array.isArray(uids)) {
      return [];
    }
    return [...uids].sort((a, b) => a - b).map((uid) => String(uid));
  }

  async fetch(messageId: string): Promise<Buffer | null> {
    const client = this.requireClient();
    const message = await client.fetchOne(messageId, { source: true }, { uid: true });
    if (!message || !message.source) {
      return null;
    }

    await client.messageFlagsAdd(messageId, ['\\Seen'], { uid: true });
    return message.source;
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.logout();
    } finally {
      this.client = null;
    }
  }

  private requireClient(): ImapClient {
    if (!this.client) {
      throw new BridgeError('MailFetchFailed', 'IMAP session not established. Call connect() first.');
    }
    return this.client;
  }
}

import Imap from 'imap';
import { simpleParser, type AddressObject } from 'mailparser';
import type { EmailConfig, EmailMessage, Mailbox } from '../types/email.js';
import { ConnectionError, FetchError, MarkReadError, describeError } from '../utils/errors.js';

function firstAddress(addressObj?: AddressObject): { address: string; name?: string } {
  const first = addressObj?.value[0];
  if (!first || !first.address) return { address: 'unknown' };
  return {
    address: first.address.toLowerCase(),
    name: first.name || undefined,
  };
}

function allAddresses(addressObj?: AddressObject | AddressObject[]): string[] {
  if (!addressObj) return [];
  const objects = Array.isArray(addressObj) ? addressObj : [addressObj];
  return objects
    .flatMap((obj) => obj.value)
    .map((entry) => entry.address || '')
    .filter(Boolean);
}

/**
 * Parse raw RFC 822 bytes into an EmailMessage. Encoded headers
 * (=?UTF-8?B?...?=) and transfer encodings are decoded by mailparser.
 */
export async function parseRawMessage(uid: number, raw: Buffer | string): Promise<EmailMessage> {
  const parsed = await simpleParser(raw);

  return {
    uid,
    messageId: parsed.messageId || `uid-${uid}`,
    from: firstAddress(parsed.from),
    to: allAddresses(parsed.to),
    subject: parsed.subject || '(No Subject)',
    text: parsed.text || '',
    html: typeof parsed.html === 'string' ? parsed.html : undefined,
    date: parsed.date || new Date(),
    attachments: parsed.attachments.map((att) => ({
      filename: att.filename || 'unknown',
      contentType: att.contentType.toLowerCase(),
      size: att.size,
      content: att.content,
      related: att.related === true,
    })),
  };
}

export class MailboxClient implements Mailbox {
  private imap: Imap;
  private connected: boolean = false;

  constructor(private config: EmailConfig) {
    this.imap = this.createImap();
  }

  private createImap(): Imap {
    const imap = new Imap({
      user: this.config.user,
      password: this.config.password,
      host: this.config.host,
      port: this.config.port,
      tls: this.config.tls,
      tlsOptions: { servername: this.config.host },
      connTimeout: this.config.connTimeoutMs,
      authTimeout: this.config.authTimeoutMs,
    });

    imap.on('error', (err: Error) => {
      console.error('❌ IMAP connection error:', err.message);
      this.connected = false;
    });

    imap.once('end', () => {
      console.log('📪 IMAP connection ended');
      this.connected = false;
    });

    return imap;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Connect, authenticate and open the configured mailbox read-write.
   */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    if (this.imap.state === 'disconnected') {
      this.imap = this.createImap();
    }

    try {
      await new Promise<void>((resolve, reject) => {
        this.imap.once('ready', () => resolve());
        this.imap.once('error', reject);
        this.imap.connect();
      });
    } catch (error) {
      throw new ConnectionError(
        `Could not connect to ${this.config.host}:${this.config.port}: ${describeError(error)}`,
        { host: this.config.host, port: this.config.port }
      );
    }

    this.connected = true;
    console.log('✅ IMAP connection ready');

    try {
      await new Promise<void>((resolve, reject) => {
        this.imap.openBox(this.config.mailbox, false, (err: Error) => {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    } catch (error) {
      this.disconnect();
      throw new ConnectionError(`Could not open mailbox "${this.config.mailbox}": ${describeError(error)}`, {
        mailbox: this.config.mailbox,
      });
    }
  }

  /**
   * Log out and close the socket. Safe to call more than once.
   */
  disconnect(): void {
    if (this.connected) {
      this.connected = false;
      this.imap.end();
    }
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new ConnectionError('IMAP not connected. Call connect() first.');
    }
  }

  /**
   * Every unread UID, oldest first. Batching is left to the caller.
   */
  async listUnread(): Promise<number[]> {
    this.ensureConnected();

    const uids = await new Promise<number[]>((resolve, reject) => {
      this.imap.search(['UNSEEN'], (err: Error, results: number[]) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(results || []);
      });
    });

    if (uids.length === 0) {
      console.log('📭 No unread emails found');
      return [];
    }

    console.log(`📬 Found ${uids.length} unread email(s)`);
    return [...uids].sort((a, b) => a - b);
  }

  /**
   * Fetch and parse one message without setting \Seen.
   * Rejects with FetchError when the UID is gone or the message cannot be parsed.
   */
  async fetch(uid: number): Promise<EmailMessage> {
    this.ensureConnected();

    const raw = await new Promise<Buffer | null>((resolve, reject) => {
      let body: Promise<Buffer> | null = null;
      const fetch = this.imap.fetch([uid], { bodies: '', markSeen: false });

      fetch.on('message', (msg: Imap.ImapMessage) => {
        msg.on('body', (stream: NodeJS.ReadableStream) => {
          body = new Promise<Buffer>((resolveBody, rejectBody) => {
            const chunks: Buffer[] = [];
            stream.on('data', (chunk: Buffer) => chunks.push(chunk));
            stream.once('error', rejectBody);
            stream.once('end', () => resolveBody(Buffer.concat(chunks)));
          });
        });
      });

      fetch.once('error', (fetchErr: Error) => {
        reject(new FetchError(`Failed to fetch UID ${uid}: ${fetchErr.message}`, uid));
      });

      fetch.once('end', () => {
        if (!body) {
          resolve(null);
          return;
        }
        body.then(resolve, (streamErr: unknown) =>
          reject(new FetchError(`Failed to read UID ${uid}: ${describeError(streamErr)}`, uid))
        );
      });
    });

    if (!raw) {
      throw new FetchError(`Message UID ${uid} no longer exists in ${this.config.mailbox}`, uid);
    }

    try {
      const email = await parseRawMessage(uid, raw);
      console.log(`  ✓ Parsed email UID ${uid}: ${email.subject}`);
      return email;
    } catch (error) {
      throw new FetchError(`Error parsing email UID ${uid}: ${describeError(error)}`, uid);
    }
  }

  async markRead(uid: number): Promise<void> {
    this.ensureConnected();

    try {
      await new Promise<void>((resolve, reject) => {
        this.imap.addFlags([uid], ['\\Seen'], (flagErr: Error) => {
          if (flagErr) {
            reject(flagErr);
          } else {
            resolve();
          }
        });
      });
    } catch (error) {
      throw new MarkReadError(`Failed to mark UID ${uid} as read: ${describeError(error)}`, uid);
    }
  }
}

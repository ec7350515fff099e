import type { EmailMessage, Mailbox } from '../../src/types/email.js';
import { FetchError, MarkReadError } from '../../src/utils/errors.js';

/**
 * In-memory mailbox. Messages are unread until markRead succeeds; UIDs in
 * failMarkRead reject markRead, UIDs in vanished reject fetch as if another
 * client had moved them.
 */
export class FakeMailbox implements Mailbox {
  private messages = new Map<number, EmailMessage>();
  private seen = new Set<number>();
  readonly failMarkRead = new Set<number>();
  readonly vanished = new Set<number>();
  readonly markReadCalls: number[] = [];

  add(message: EmailMessage): this {
    this.messages.set(message.uid, message);
    return this;
  }

  isSeen(uid: number): boolean {
    return this.seen.has(uid);
  }

  async listUnread(): Promise<number[]> {
    return [...this.messages.keys()].filter((uid) => !this.seen.has(uid)).sort((a, b) => a - b);
  }

  async fetch(uid: number): Promise<EmailMessage> {
    const message = this.messages.get(uid);
    if (!message || this.vanished.has(uid)) {
      throw new FetchError(`Message UID ${uid} no longer exists in INBOX`, uid);
    }
    return message;
  }

  async markRead(uid: number): Promise<void> {
    this.markReadCalls.push(uid);
    if (this.failMarkRead.has(uid)) {
      throw new MarkReadError(`Failed to mark UID ${uid} as read: NO STORE failed`, uid);
    }
    this.seen.add(uid);
  }
}

export function buildEmail(overrides: Partial<EmailMessage> & { uid: number }): EmailMessage {
  return {
    messageId: `<msg-${overrides.uid}@vendor.com>`,
    from: { address: 'alice@vendor.com', name: 'Alice' },
    to: ['invoices@example.com'],
    subject: 'Hello',
    text: '',
    date: new Date('2026-03-02T09:30:00.000Z'),
    attachments: [],
    ...overrides,
  };
}

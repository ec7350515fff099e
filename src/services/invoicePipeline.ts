import type { EmailMessage, Mailbox } from '../types/email.js';
import type { InvoiceRecord } from '../types/invoice.js';
import { describeError } from '../utils/errors.js';
import type { LogLevel } from '../config/index.js';
import type { InvoiceExtractor } from './invoiceExtractor.js';
import type { InvoiceStore } from './invoiceStore.js';
import type { WeChatNotifier } from './notifier.js';

/**
 * Where a message ended up. Only 'marked_read' and 'read_pending' follow a
 * successful store; every other state leaves the message unread.
 */
export type MessageState =
  | 'marked_read'
  | 'read_pending'
  | 'skipped'
  | 'fetch_failed'
  | 'extraction_failed'
  | 'store_failed';

export type NotificationState = 'sent' | 'disabled' | 'failed' | 'not_attempted';

export interface MessageOutcome {
  uid: number;
  state: MessageState;
  messageId?: string;
  subject?: string;
  storedId?: number;
  duplicate?: boolean;
  notification?: NotificationState;
  error?: string;
}

export interface BatchSummary {
  total: number;
  stored: number;
  duplicates: number;
  markedRead: number;
  readPending: number;
  skipped: number;
  fetchFailed: number;
  extractionFailed: number;
  storeFailed: number;
  notifyFailed: number;
  durationMs: number;
  outcomes: MessageOutcome[];
}

export interface PipelineDeps {
  mailbox: Mailbox;
  extractor: InvoiceExtractor;
  store: InvoiceStore;
  notifier: WeChatNotifier;
  // 0 or unset handles every unread message
  maxMessagesPerRun?: number;
  logLevel?: LogLevel;
}

const CURSOR_KEY = 'unread';

/**
 * Pick the UIDs for one capped run. Starts after the cursor and wraps
 * around, so messages left unread (skipped or failed) cannot hold back
 * newer mail across runs.
 */
export function selectBatch(uids: number[], maxMessages: number, cursor: number): number[] {
  const sorted = [...uids].sort((a, b) => a - b);
  if (maxMessages <= 0 || sorted.length <= maxMessages) {
    return sorted;
  }

  const after = sorted.filter((uid) => uid > cursor);
  const wrapped = sorted.filter((uid) => uid <= cursor);
  return [...after, ...wrapped].slice(0, maxMessages);
}

export class InvoicePipeline {
  private readonly logLevel: LogLevel;
  private readonly maxMessages: number;

  constructor(private deps: PipelineDeps) {
    this.logLevel = deps.logLevel ?? 'info';
    this.maxMessages = deps.maxMessagesPerRun ?? 0;
  }

  /**
   * Process every unread message once: fetch, extract, store, notify,
   * mark read. A failure on one message never stops the batch.
   */
  async run(): Promise<BatchSummary> {
    const startTime = Date.now();
    const { mailbox, store } = this.deps;
    const unread = await mailbox.listUnread();
    const capped = this.maxMessages > 0 && unread.length > this.maxMessages;
    const uids = capped ? selectBatch(unread, this.maxMessages, store.getCursor(CURSOR_KEY)) : unread;
    if (capped) {
      console.log(`📬 ${unread.length} unread, handling ${uids.length} this run (MAX_EMAILS_PER_RUN)`);
    }
    const outcomes: MessageOutcome[] = [];

    for (const [index, uid] of uids.entries()) {
      if (this.logLevel !== 'minimal') {
        console.log(`\n📧 Email ${index + 1}/${uids.length} (UID: ${uid})`);
      }
      outcomes.push(await this.processMessage(uid));
    }

    if (capped && uids.length > 0) {
      store.saveCursor(CURSOR_KEY, uids[uids.length - 1]);
    }

    return summarize(outcomes, Date.now() - startTime);
  }

  async processMessage(uid: number): Promise<MessageOutcome> {
    const { mailbox, extractor, store, notifier } = this.deps;

    let email: EmailMessage;
    try {
      email = await mailbox.fetch(uid);
    } catch (error) {
      console.error(`❌ Could not fetch UID ${uid}: ${describeError(error)}`);
      return { uid, state: 'fetch_failed', error: describeError(error) };
    }

    const base = { uid, messageId: email.messageId, subject: email.subject };
    if (this.logLevel !== 'minimal') {
      console.log(`From:    ${email.from.address}`);
      console.log(`Subject: ${email.subject}`);
    }

    const extraction = await extractor.extract(email);
    if (extraction.kind === 'no_invoice') {
      console.log(`⏭️  Skipped: ${extraction.reason}`);
      return { ...base, state: 'skipped' };
    }
    if (extraction.kind === 'error') {
      console.error(`❌ Extraction failed (${extraction.error.kind}): ${extraction.error.message}`);
      return { ...base, state: 'extraction_failed', error: extraction.error.message };
    }

    const record: InvoiceRecord = extraction.record;
    for (const attachmentError of extraction.attachmentErrors) {
      console.warn(`⚠️ Attachment skipped (${attachmentError.kind}): ${attachmentError.message}`);
    }
    if (this.logLevel === 'debug') {
      console.log(`Fields:  ${JSON.stringify(record.fields)}`);
    }

    let storedId: number;
    let duplicate: boolean;
    try {
      const result = store.store(record);
      storedId = result.id;
      duplicate = !result.created;
      record.status = 'stored';
    } catch (error) {
      console.error(`❌ Store failed: ${describeError(error)}`);
      return { ...base, state: 'store_failed', error: describeError(error) };
    }

    let notification: NotificationState = 'not_attempted';
    if (duplicate) {
      console.log(`♻️  Already stored as #${storedId}, not notifying again`);
    } else {
      console.log(`💾 Stored invoice #${storedId}`);
      const delivery = await notifier.notify(record);
      if (!delivery.ok) {
        notification = 'failed';
        record.status = 'notify_failed';
      } else {
        notification = delivery.skipped ? 'disabled' : 'sent';
      }
    }

    try {
      await mailbox.markRead(uid);
    } catch (error) {
      console.warn(`⚠️ Stored but could not mark as read, will be retried: ${describeError(error)}`);
      return { ...base, state: 'read_pending', storedId, duplicate, notification, error: describeError(error) };
    }

    return { ...base, state: 'marked_read', storedId, duplicate, notification };
  }
}

export function summarize(outcomes: MessageOutcome[], durationMs: number): BatchSummary {
  const count = (predicate: (outcome: MessageOutcome) => boolean) => outcomes.filter(predicate).length;

  return {
    total: outcomes.length,
    stored: count((o) => o.storedId !== undefined && !o.duplicate),
    duplicates: count((o) => o.duplicate === true),
    markedRead: count((o) => o.state === 'marked_read'),
    readPending: count((o) => o.state === 'read_pending'),
    skipped: count((o) => o.state === 'skipped'),
    fetchFailed: count((o) => o.state === 'fetch_failed'),
    extractionFailed: count((o) => o.state === 'extraction_failed'),
    storeFailed: count((o) => o.state === 'store_failed'),
    notifyFailed: count((o) => o.notification === 'failed'),
    durationMs,
    outcomes,
  };
}

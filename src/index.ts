#!/usr/bin/env node
import { loadConfig, validateConfig } from './config/index.js';
import { MailboxClient } from './services/mailboxClient.js';
import { InvoiceExtractor } from './services/invoiceExtractor.js';
import { InvoiceStore } from './services/invoiceStore.js';
import { WeChatNotifier } from './services/notifier.js';
import { InvoicePipeline, type BatchSummary } from './services/invoicePipeline.js';
import { describeError } from './utils/errors.js';

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';

function printSummary(summary: BatchSummary): void {
  const failed = summary.fetchFailed + summary.extractionFailed + summary.storeFailed;

  console.log(`\n${RULE}`);
  console.log('📊 Processing Summary');
  console.log(RULE);
  console.log(`Total Unread:        ${summary.total}`);
  console.log(`Stored:              ${summary.stored} ✅`);
  console.log(`Already Stored:      ${summary.duplicates} ♻️`);
  console.log(`Skipped:             ${summary.skipped} ⏭️`);
  console.log(`Failed:              ${failed} ❌`);
  console.log(`  fetch / extract / store: ${summary.fetchFailed} / ${summary.extractionFailed} / ${summary.storeFailed}`);
  console.log(`Notify Failed:       ${summary.notifyFailed} 🔕`);
  console.log(`Marked as Read:      ${summary.markedRead} 📖`);
  console.log(`Read Pending:        ${summary.readPending}`);
  console.log(`Duration:            ${(summary.durationMs / 1000).toFixed(1)}s ⏱️`);
  console.log(RULE);
}

/**
 * One batch run:
 * - Opens the invoice database
 * - Connects to the mailbox
 * - Stores invoices from unread emails and notifies the webhook
 * - Marks stored emails as read
 */
async function main(): Promise<number> {
  console.log(RULE);
  console.log('🧾 Invoice Mail Processor - Started');
  console.log(`⏰ ${new Date().toISOString()}`);
  console.log(`${RULE}\n`);

  let store: InvoiceStore | null = null;
  let mailbox: MailboxClient | null = null;

  try {
    const config = loadConfig();
    validateConfig(config);
    console.log('✅ Configuration validated');
    console.log(`🔔 Notifications: ${config.notification.webhookUrl ? 'ENABLED' : 'DISABLED'}\n`);

    store = InvoiceStore.open(config.storage.dbPath);
    console.log(`🗄️  Database ready: ${config.storage.dbPath}`);

    mailbox = new MailboxClient(config.email);
    console.log(`🔌 Connecting to ${config.email.host}:${config.email.port}...`);
    await mailbox.connect();

    const notifier = new WeChatNotifier({
      webhookUrl: config.notification.webhookUrl,
      timeoutMs: config.notification.timeoutMs,
    });

    const pipeline = new InvoicePipeline({
      mailbox,
      extractor: new InvoiceExtractor(),
      store,
      notifier,
      maxMessagesPerRun: config.processing.maxEmailsPerRun,
      logLevel: config.processing.logLevel,
    });

    const summary = await pipeline.run();
    printSummary(summary);

    if (config.notification.notifySummary && summary.total > 0) {
      await notifier.notifySummary([
        { label: 'Stored', count: summary.stored },
        { label: 'Skipped', count: summary.skipped },
        { label: 'Failed', count: summary.fetchFailed + summary.extractionFailed + summary.storeFailed },
      ]);
    }

    console.log('✅ Processing completed');
    return 0;
  } catch (error) {
    console.error(`\n❌ Fatal error: ${describeError(error)}`);
    return 1;
  } finally {
    if (mailbox) {
      mailbox.disconnect();
      console.log('📪 Disconnected from IMAP server');
    }
    if (store) {
      store.close();
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Unhandled error:', error);
    process.exitCode = 1;
  });

import { loadConfig } from './config/index.js';
import { InvoiceStore } from './services/invoiceStore.js';
import { formatInvoiceMessage } from './services/notifier.js';
import { describeError } from './utils/errors.js';

const DEFAULT_LIMIT = 10;

async function invoiceStats(): Promise<number> {
  console.log('📊 Checking stored invoices...\n');

  let store: InvoiceStore | null = null;

  try {
    const config = loadConfig();
    const limitArg = process.argv[2];
    const limit = limitArg ? Number.parseInt(limitArg, 10) : DEFAULT_LIMIT;
    if (!Number.isInteger(limit) || limit <= 0) {
      console.error(`❌ Invalid limit "${limitArg}". Expected a positive integer.`);
      return 1;
    }

    store = InvoiceStore.open(config.storage.dbPath);
    console.log(`🗄️  Database: ${config.storage.dbPath}`);
    console.log(`Total invoices: ${store.count()}\n`);

    for (const invoice of store.listRecent(limit)) {
      console.log(`#${invoice.id}  ${invoice.storedAt}  ${invoice.messageId}`);
      console.log(formatInvoiceMessage(invoice).split('\n').slice(1).map((line) => `  ${line}`).join('\n'));
      console.log('');
    }

    return 0;
  } catch (error) {
    console.error(`❌ Error: ${describeError(error)}`);
    return 1;
  } finally {
    store?.close();
  }
}

invoiceStats()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Unhandled error:', error);
    process.exitCode = 1;
  });

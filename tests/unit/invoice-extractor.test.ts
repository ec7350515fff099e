import { describe, it, expect } from 'vitest';
import { InvoiceExtractor, cleanText } from '../../src/services/invoiceExtractor.js';
import {
  StrategyRegistry,
  createDefaultRegistry,
  type AttachmentExtractionStrategy,
  type AttachmentInput,
  type StrategyResult,
} from '../../src/services/extractionStrategies.js';
import type { EmailAttachment } from '../../src/types/email.js';
import { buildEmail } from '../helpers/fake-mailbox.js';

function attachment(overrides: Partial<EmailAttachment> = {}): EmailAttachment {
  return {
    filename: 'invoice.pdf',
    contentType: 'application/pdf',
    size: 4,
    content: Buffer.from('%PDF'),
    related: false,
    ...overrides,
  };
}

class CsvStrategy implements AttachmentExtractionStrategy {
  readonly name = 'csv';
  readonly seen: AttachmentInput[] = [];

  async extract(input: AttachmentInput): Promise<StrategyResult> {
    this.seen.push(input);
    return { ok: true, fields: { invoice_number: 'CSV-1', line_items: 3 } };
  }
}

describe('InvoiceExtractor', () => {
  const extractor = new InvoiceExtractor();

  describe('body extraction', () => {
    it('extracts invoice number from the subject and amount from the body', async () => {
      const result = await extractor.extract(
        buildEmail({ uid: 1, subject: 'Invoice #123', text: 'Amount Due: $1,250.00' })
      );

      expect(result.kind).toBe('invoice');
      if (result.kind !== 'invoice') return;
      expect(result.record).toEqual({
        messageId: '<msg-1@vendor.com>',
        sender: 'alice@vendor.com',
        subject: 'Invoice #123',
        receivedAt: '2026-03-02T09:30:00.000Z',
        status: 'extracted',
        fields: {
          invoice_number: '123',
          amount: 1250,
          amount_raw: '$1,250.00',
          currency: 'USD',
          source: 'body',
        },
      });
    });

    it('reads labelled vendor and dates', () => {
      const fields = extractor.extractFields(
        [
          'Invoice Number: INV-2026-007',
          'Vendor: Acme Supplies Ltd',
          'Invoice Date: 2026-02-28',
          'Due Date: 2026-03-30',
          'Total: 1.250,00 €',
        ].join('\n')
      );

      expect(fields).toEqual({
        invoice_number: 'INV-2026-007',
        vendor: 'Acme Supplies Ltd',
        invoice_date: '2026-02-28',
        due_date: '2026-03-30',
        amount: 1250,
        amount_raw: '1.250,00 €',
        currency: 'EUR',
      });
    });

    it('prefers "amount due" over a plain total', () => {
      const fields = extractor.extractFields('Total: $10.00\nAmount due: $7.50');
      expect(fields.amount).toBe(7.5);
      expect(fields.amount_raw).toBe('$7.50');
    });

    it('ignores subtotal lines and labels without a number', () => {
      const fields = extractor.extractFields('Subtotal: $80.00\nThe total is listed below\nTotal: USD 96.00');
      expect(fields.amount).toBe(96);
      expect(fields.currency).toBe('USD');
    });

    it('does not read words after "Invoice No" as a number when there is none', () => {
      const fields = extractor.extractFields('Invoice Notice for your account');
      expect(fields.invoice_number).toBeUndefined();
    });

    it('requires a digit in the invoice number', async () => {
      const result = await extractor.extract(
        buildEmail({ uid: 11, subject: 'Question', text: 'could you tell me the invoice number for my order?' })
      );

      expect(result).toEqual({ kind: 'no_invoice', reason: 'No invoice fields, attachments or PDF links found' });
    });

    it('reads "invoice number is" and ignores payment terms that are not an amount', () => {
      const fields = extractor.extractFields('Your invoice number is 4711.\nAmount due: NET 30');
      expect(fields).toEqual({ invoice_number: '4711' });
    });

    it('only accepts known currency codes', () => {
      expect(extractor.extractFields('Total: JPY 5000')).toEqual({
        amount: 5000,
        amount_raw: 'JPY 5000',
        currency: 'JPY',
      });
      expect(extractor.extractFields('Total: ABC 40')).toEqual({});
    });

    it('keeps ambiguous amounts with the raw string and a flag', () => {
      const fields = extractor.extractFields('Amount: 1,250');
      expect(fields).toEqual({ amount: 1250, amount_raw: '1,250', currency: null, amount_ambiguous: true });
    });

    it('falls back to the HTML part when there is no plain text', async () => {
      const result = await extractor.extract(
        buildEmail({
          uid: 2,
          subject: 'Your bill',
          html: '<html><body><p>Invoice No. A-7</p><table><tr><td>Total due:</td><td>&pound;</td></tr></table><p>Total Due: £42.10</p></body></html>',
        })
      );

      expect(result.kind).toBe('invoice');
      if (result.kind !== 'invoice') return;
      expect(result.record.fields.invoice_number).toBe('A-7');
      expect(result.record.fields.amount).toBe(42.1);
      expect(result.record.fields.currency).toBe('GBP');
    });
  });

  describe('no invoice', () => {
    it('returns no_invoice for a plain message without attachments', async () => {
      const result = await extractor.extract(
        buildEmail({ uid: 3, subject: 'Lunch on Friday?', text: 'Are you free at noon?' })
      );

      expect(result).toEqual({ kind: 'no_invoice', reason: 'No invoice fields, attachments or PDF links found' });
    });

    it('ignores inline images related to the HTML body', async () => {
      const result = await extractor.extract(
        buildEmail({
          uid: 4,
          subject: 'Newsletter',
          html: '<p>Hello</p><img src="cid:logo">',
          attachments: [attachment({ filename: 'logo.png', contentType: 'image/png', related: true })],
        })
      );

      expect(result.kind).toBe('no_invoice');
    });
  });

  describe('attachments', () => {
    it('returns a not_implemented error for a PDF-only message', async () => {
      const result = await extractor.extract(
        buildEmail({ uid: 5, subject: 'Documents', text: 'Please find attached.', attachments: [attachment()] })
      );

      expect(result.kind).toBe('error');
      if (result.kind !== 'error') return;
      expect(result.error.kind).toBe('not_implemented');
      expect(result.error.message).toBe('PDF extraction is not implemented (invoice.pdf)');
    });

    it('returns a not_implemented error for an unsupported attachment type', async () => {
      const result = await extractor.extract(
        buildEmail({
          uid: 6,
          subject: 'Files',
          attachments: [attachment({ filename: 'archive.zip', contentType: 'application/zip' })],
        })
      );

      expect(result.kind).toBe('error');
      if (result.kind !== 'error') return;
      expect(result.error.kind).toBe('not_implemented');
      expect(result.error.message).toBe('No extractor for application/zip attachment archive.zip');
    });

    it('keeps body fields and lists attachments the strategies could not read', async () => {
      const result = await extractor.extract(
        buildEmail({ uid: 7, subject: 'Invoice #88', text: 'Total: $5.00', attachments: [attachment()] })
      );

      expect(result.kind).toBe('invoice');
      if (result.kind !== 'invoice') return;
      expect(result.record.fields.attachments_skipped).toEqual(['invoice.pdf']);
      expect(result.record.fields.source).toBe('body');
      expect(result.attachmentErrors.map((error) => [error.kind, error.message])).toEqual([
        ['not_implemented', 'PDF extraction is not implemented (invoice.pdf)'],
      ]);
    });

    it('records PDF links from the HTML part and dispatches them to the PDF strategy', async () => {
      const result = await extractor.extract(
        buildEmail({
          uid: 8,
          subject: 'Invoice #9001',
          text: 'Your invoice is ready.',
          html: '<a href="https://billing.example.com/files/inv-9001.pdf?sig=abc&amp;v=2">Download</a>',
        })
      );

      expect(result.kind).toBe('invoice');
      if (result.kind !== 'invoice') return;
      expect(result.record.fields.pdf_links).toEqual(['https://billing.example.com/files/inv-9001.pdf?sig=abc&v=2']);
      expect(result.record.fields.attachments_skipped).toEqual(['inv-9001.pdf']);
    });

    it('merges fields from a registered strategy without overriding body fields', async () => {
      const csv = new CsvStrategy();
      const custom = new InvoiceExtractor(createDefaultRegistry().register('text/csv', csv));

      const result = await custom.extract(
        buildEmail({
          uid: 9,
          subject: 'Statement',
          text: 'Amount: $12.00',
          attachments: [attachment({ filename: 'lines.csv', contentType: 'text/csv; charset=utf-8' })],
        })
      );

      expect(result.kind).toBe('invoice');
      if (result.kind !== 'invoice') return;
      expect(result.record.fields.invoice_number).toBe('CSV-1');
      expect(result.record.fields.line_items).toBe(3);
      expect(result.record.fields.amount).toBe(12);
      expect(csv.seen[0].messageId).toBe('<msg-9@vendor.com>');
    });

    it('builds a record from attachment fields alone', async () => {
      const custom = new InvoiceExtractor(new StrategyRegistry().register('text/csv', new CsvStrategy()));

      const result = await custom.extract(
        buildEmail({ uid: 10, subject: 'Export', attachments: [attachment({ filename: 'a.csv', contentType: 'text/csv' })] })
      );

      expect(result.kind).toBe('invoice');
      if (result.kind !== 'invoice') return;
      expect(result.record.fields.source).toBe('attachment');
      expect(result.record.fields.invoice_number).toBe('CSV-1');
    });
  });
});

describe('cleanText', () => {
  it('strips tags, scripts and entities and collapses whitespace', () => {
    const html = '<style>p { color: red; }</style><p>Amount&nbsp;Due:   <b>$5</b></p><p>Tom &amp; Co</p>';
    expect(cleanText(html)).toBe('Amount Due: $5\nTom & Co');
  });
});

import type { EmailMessage } from '../types/email.js';
import type { ExtractedFields, ExtractionResult } from '../types/invoice.js';
import { ExtractionError, describeError } from '../utils/errors.js';
import { ISO_CURRENCY_CODES, parseAmount } from './amountParser.js';
import { StrategyRegistry, createDefaultRegistry, type AttachmentInput } from './extractionStrategies.js';

// Checked in order; the first label followed by a number on the same line wins
const AMOUNT_LABELS = [
  /amount\s+due/gi,
  /total\s+due/gi,
  /balance\s+due/gi,
  /grand\s+total/gi,
  /total\s+amount/gi,
  /\btotal\b/gi,
  /\bamount\b/gi,
];

const CURRENCY_CODE = `(?:${ISO_CURRENCY_CODES.join('|')})`;

// Anchored at the start of the value after a label. Case-sensitive so that
// only upper-case currency codes count.
const AMOUNT_VALUE = new RegExp(
  `^(?:(?:US\\$|CA\\$|HK\\$|A\\$|RMB|${CURRENCY_CODE})\\s?|[$€£¥￥₹₩]\\s?)?` +
    `[-+]?\\d(?:[\\d.,' ]*\\d)?` +
    `(?:\\s?(?:${CURRENCY_CODE}\\b|[€£¥￥₹₩元]))?`
);

// The captured token must contain a digit, so "invoice number for ..." is not a number
const INVOICE_NUMBER =
  /invoice\s*(?:#|no\b\.?|number\b|num\b\.?)\s*(?:is\s+)?[:#]?\s*((?=[A-Z\-/]*\d)[A-Z0-9][A-Z0-9\-/]*)/i;
const VENDOR = /^[ \t]*(?:vendor|supplier|billed\s+by|seller)[ \t]*[:：][ \t]*(.+)$/im;
const INVOICE_DATE = /^[ \t]*(?:invoice\s+date|issue\s+date|date\s+of\s+issue)[ \t]*[:：][ \t]*(.+)$/im;
const DUE_DATE = /^[ \t]*(?:due\s+date|payment\s+due)[ \t]*[:：][ \t]*(.+)$/im;
const PDF_LINK = /https?:\/\/[^\s'"<>]+\.pdf(?:\?[^\s'"<>]*)?/gi;

const MAX_FIELD_LENGTH = 120;

export class InvoiceExtractor {
  constructor(private registry: StrategyRegistry = createDefaultRegistry()) {}

  /**
   * Turn one parsed email into an invoice record, a "no invoice" verdict or
   * an extraction error. Never throws.
   */
  async extract(email: EmailMessage): Promise<ExtractionResult> {
    try {
      return await this.extractOrThrow(email);
    } catch (error) {
      return {
        kind: 'error',
        error: new ExtractionError(`Could not extract invoice from ${email.messageId}: ${describeError(error)}`, 'parse_failed', {
          messageId: email.messageId,
        }),
      };
    }
  }

  private async extractOrThrow(email: EmailMessage): Promise<ExtractionResult> {
    const body = this.bodyText(email);
    const fields = this.extractFields(`${email.subject}\n${body}`);
    const hasBodyFields = 'invoice_number' in fields || 'amount_raw' in fields;

    const pdfLinks = this.findPdfLinks(email.html);
    if (pdfLinks.length > 0) {
      fields.pdf_links = pdfLinks;
    }

    const inputs = this.attachmentInputs(email, pdfLinks);
    if (!hasBodyFields && inputs.length === 0) {
      return { kind: 'no_invoice', reason: 'No invoice fields, attachments or PDF links found' };
    }

    const errors: ExtractionError[] = [];
    const skipped: string[] = [];
    let attachmentFields = false;

    for (const input of inputs) {
      const result = await this.registry.run(input);
      if (result.ok) {
        attachmentFields = true;
        for (const [key, value] of Object.entries(result.fields)) {
          if (!(key in fields)) {
            fields[key] = value;
          }
        }
      } else {
        errors.push(result.error);
        skipped.push(input.filename);
      }
    }

    if (!hasBodyFields && !attachmentFields) {
      return { kind: 'error', error: errors[0] };
    }

    if (skipped.length > 0) {
      fields.attachments_skipped = skipped;
    }
    fields.source = hasBodyFields ? 'body' : 'attachment';

    return {
      kind: 'invoice',
      record: {
        messageId: email.messageId,
        sender: email.from.address,
        subject: email.subject,
        receivedAt: email.date.toISOString(),
        fields,
        status: 'extracted',
      },
      attachmentErrors: errors,
    };
  }

  /**
   * Plain text part, or the HTML part reduced to text when there is none.
   */
  private bodyText(email: EmailMessage): string {
    const source = email.text.trim() !== '' ? email.text : email.html || '';
    return cleanText(source);
  }

  extractFields(text: string): ExtractedFields {
    const fields: ExtractedFields = {};

    const invoiceNumber = text.match(INVOICE_NUMBER);
    if (invoiceNumber) {
      fields.invoice_number = invoiceNumber[1];
    }

    const amount = findAmount(text);
    if (amount) {
      const parsed = parseAmount(amount);
      fields.amount = parsed.value;
      fields.amount_raw = parsed.raw;
      fields.currency = parsed.currency;
      if (parsed.ambiguous) {
        fields.amount_ambiguous = true;
      }
    }

    const labelled: Array<[string, RegExp]> = [
      ['vendor', VENDOR],
      ['invoice_date', INVOICE_DATE],
      ['due_date', DUE_DATE],
    ];
    for (const [name, pattern] of labelled) {
      const match = text.match(pattern);
      if (match) {
        fields[name] = match[1].trim().slice(0, MAX_FIELD_LENGTH);
      }
    }

    return fields;
  }

  private findPdfLinks(html?: string): string[] {
    if (!html) return [];
    const links = html.match(PDF_LINK) || [];
    return [...new Set(links.map((link) => link.replace(/&amp;/g, '&')))];
  }

  private attachmentInputs(email: EmailMessage, pdfLinks: string[]): AttachmentInput[] {
    const attachments: AttachmentInput[] = email.attachments
      .filter((att) => !att.related)
      .map((att) => ({
        messageId: email.messageId,
        filename: att.filename,
        contentType: att.contentType,
        content: att.content,
      }));

    const links: AttachmentInput[] = pdfLinks.map((url) => ({
      messageId: email.messageId,
      filename: url.split('?')[0].split('/').pop() || url,
      contentType: 'application/pdf',
      url,
    }));

    return [...attachments, ...links];
  }
}

function findAmount(text: string): string | null {
  for (const label of AMOUNT_LABELS) {
    for (const match of text.matchAll(label)) {
      const start = (match.index ?? 0) + match[0].length;
      const lineEnd = text.indexOf('\n', start);
      const rest = text.slice(start, lineEnd === -1 ? undefined : lineEnd);
      const value = rest.replace(/^\s*[:：]?\s*/, '').match(AMOUNT_VALUE);
      if (value) {
        return value[0].trim();
      }
    }
  }
  return null;
}

/**
 * Strip tags and entities and normalize whitespace.
 */
export function cleanText(text: string): string {
  let cleaned = text;

  // Drop <style>/<script> bodies before removing tags
  cleaned = cleaned.replace(/<(style|script)[^>]*>[\s\S]*?<\/\1>/gi, ' ');
  cleaned = cleaned.replace(/<br\s*\/?>|<\/(p|div|tr|li|h[1-6])>/gi, '\n');
  cleaned = cleaned.replace(/<[^>]*>/g, ' ');

  cleaned = cleaned
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');

  cleaned = cleaned.replace(/\r\n/g, '\n');
  cleaned = cleaned.replace(/[ \t]+/g, ' ');
  cleaned = cleaned.replace(/ *\n */g, '\n');
  cleaned = cleaned.replace(/\n{3,}/g, '\n\n');

  return cleaned.trim();
}

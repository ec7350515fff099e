import type { ExtractionError } from '../utils/errors.js';

export type InvoiceStatus = 'extracted' | 'extraction_failed' | 'stored' | 'notify_failed';

export type FieldValue = string | number | boolean | string[] | null;

/**
 * Extracted fields vary by vendor, so they are kept as an open mapping and
 * persisted as JSON. Known keys: invoice_number, vendor, amount, amount_raw,
 * amount_ambiguous, currency, invoice_date, due_date, source, pdf_links,
 * attachments_skipped.
 */
export type ExtractedFields = Record<string, FieldValue>;

export interface InvoiceRecord {
  messageId: string;
  sender: string;
  subject: string;
  receivedAt: string; // ISO-8601
  fields: ExtractedFields;
  status: InvoiceStatus;
}

export type ExtractionResult =
  // attachmentErrors: strategies that failed while other fields were found
  | { kind: 'invoice'; record: InvoiceRecord; attachmentErrors: ExtractionError[] }
  | { kind: 'no_invoice'; reason: string }
  | { kind: 'error'; error: ExtractionError };

export interface StoredInvoice extends InvoiceRecord {
  id: number;
  storedAt: string;
}

export interface StoreResult {
  id: number;
  // false when a row for the same message_id already existed
  created: boolean;
}

export interface ParsedAmount {
  raw: string;
  value: number | null;
  currency: string | null;
  ambiguous: boolean;
}

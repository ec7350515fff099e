import type { InvoiceRecord } from '../types/invoice.js';
import { NotifyError, describeError } from '../utils/errors.js';

export interface NotifierOptions {
  webhookUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// skipped: no webhook configured, nothing was sent
export type DeliveryResult = { ok: true; skipped: boolean } | { ok: false; error: NotifyError };

interface WeChatTextMessage {
  msgtype: 'text';
  text: {
    content: string;
  };
}

interface WeChatResponse {
  errcode?: number;
  errmsg?: string;
}

export interface RunSummaryLine {
  label: string;
  count: number;
}

function formatAmount(record: InvoiceRecord): string | null {
  const { amount, amount_raw: raw, currency } = record.fields;
  if (typeof amount === 'number') {
    const value = amount.toFixed(2);
    return typeof currency === 'string' ? `${value} ${currency}` : value;
  }
  return typeof raw === 'string' ? raw : null;
}

/**
 * Short human-readable summary of a stored invoice.
 */
export function formatInvoiceMessage(record: InvoiceRecord): string {
  const lines = ['📄 New invoice received', `From: ${record.sender}`, `Subject: ${record.subject}`];

  const amount = formatAmount(record);
  if (amount) {
    lines.push(`Amount: ${amount}`);
  }

  const invoiceNumber = record.fields.invoice_number;
  if (typeof invoiceNumber === 'string') {
    lines.push(`Invoice #: ${invoiceNumber}`);
  }

  return lines.join('\n');
}

/**
 * Posts text messages to a WeChat Work group robot webhook. Without a URL
 * every call is a successful no-op reported as skipped.
 */
export class WeChatNotifier {
  private readonly webhookUrl?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: NotifierOptions = {}) {
    this.webhookUrl = options.webhookUrl;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isEnabled(): boolean {
    return Boolean(this.webhookUrl);
  }

  async notify(record: InvoiceRecord): Promise<DeliveryResult> {
    return this.send(formatInvoiceMessage(record));
  }

  async notifySummary(lines: RunSummaryLine[]): Promise<DeliveryResult> {
    const content = ['📊 Invoice run summary', ...lines.map((line) => `${line.label}: ${line.count}`)].join('\n');
    return this.send(content);
  }

  private async send(content: string): Promise<DeliveryResult> {
    if (!this.webhookUrl) {
      return { ok: true, skipped: true };
    }

    const payload: WeChatTextMessage = { msgtype: 'text', text: { content } };
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new NotifyError(`Webhook responded ${response.status}: ${text.slice(0, 200)}`, response.status);
      }

      // WeChat reports errors in the body with HTTP 200
      const text = await response.text();
      const body = parseWeChatResponse(text);
      if (body.errcode !== undefined && body.errcode !== 0) {
        throw new NotifyError(`Webhook rejected message: ${body.errcode} ${body.errmsg ?? ''}`.trim(), response.status);
      }

      return { ok: true, skipped: false };
    } catch (error) {
      const notifyError =
        error instanceof NotifyError
          ? error
          : new NotifyError(
              controller.signal.aborted
                ? `Webhook request timed out after ${this.timeoutMs}ms`
                : `Webhook request failed: ${describeError(error)}`
            );
      console.warn(`⚠️ Failed to send WeChat notification: ${notifyError.message}`);
      return { ok: false, error: notifyError };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseWeChatResponse(text: string): WeChatResponse {
  if (!text.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object') {
      const errcode = 'errcode' in parsed && typeof parsed.errcode === 'number' ? parsed.errcode : undefined;
      const errmsg = 'errmsg' in parsed && typeof parsed.errmsg === 'string' ? parsed.errmsg : undefined;
      return { errcode, errmsg };
    }
    return {};
  } catch {
    // Non-JSON 2xx bodies are treated as accepted
    return {};
  }
}

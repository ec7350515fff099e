/**
 * Error taxonomy for the invoice pipeline.
 *
 * Fatal errors (configuration, mailbox connection, database open) end the
 * run with a non-zero exit code. Everything else is per message: the
 * pipeline records it and moves on to the next message.
 */

export class InvoiceProcessorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InvoiceProcessorError';
  }
}

export class ConfigError extends InvoiceProcessorError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

/** Mailbox unreachable or login rejected. */
export class ConnectionError extends InvoiceProcessorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MAILBOX_CONNECTION', false, context);
    this.name = 'ConnectionError';
  }
}

/** A single message could not be fetched, e.g. moved by another client. */
export class FetchError extends InvoiceProcessorError {
  constructor(message: string, public readonly uid: number) {
    super(message, 'MESSAGE_FETCH', true, { uid });
    this.name = 'FetchError';
  }
}

export class MarkReadError extends InvoiceProcessorError {
  constructor(message: string, public readonly uid: number) {
    super(message, 'MARK_READ', true, { uid });
    this.name = 'MarkReadError';
  }
}

export type ExtractionErrorKind = 'not_implemented' | 'strategy_failed' | 'parse_failed';

export class ExtractionError extends InvoiceProcessorError {
  constructor(
    message: string,
    public readonly kind: ExtractionErrorKind,
    context?: Record<string, unknown>
  ) {
    super(message, `EXTRACTION_${kind.toUpperCase()}`, true, context);
    this.name = 'ExtractionError';
  }
}

export class StoreError extends InvoiceProcessorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORE', true, context);
    this.name = 'StoreError';
  }
}

export class NotifyError extends InvoiceProcessorError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'NOTIFY', true, status === undefined ? undefined : { status });
    this.name = 'NotifyError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

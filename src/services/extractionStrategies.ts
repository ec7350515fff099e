import type { ExtractedFields } from '../types/invoice.js';
import { ExtractionError, describeError } from '../utils/errors.js';

/**
 * Input handed to an attachment strategy. Linked documents found in the
 * HTML body carry a url and no content; nothing is downloaded.
 */
export interface AttachmentInput {
  messageId: string;
  filename: string;
  contentType: string;
  content?: Buffer;
  url?: string;
}

export type StrategyResult =
  | { ok: true; fields: ExtractedFields }
  | { ok: false; error: ExtractionError };

/**
 * Extracts invoice fields from one attachment. Implementations return
 * errors as values; the registry converts anything thrown.
 */
export interface AttachmentExtractionStrategy {
  readonly name: string;
  extract(input: AttachmentInput): Promise<StrategyResult>;
}

/**
 * Placeholder for PDF parsing. A real implementation (text layer, OCR,
 * vendor layouts) replaces this class in the registry.
 */
export class PdfExtractionStrategy implements AttachmentExtractionStrategy {
  readonly name = 'pdf';

  async extract(input: AttachmentInput): Promise<StrategyResult> {
    return {
      ok: false,
      error: new ExtractionError(`PDF extraction is not implemented (${input.filename})`, 'not_implemented', {
        filename: input.filename,
        url: input.url,
      }),
    };
  }
}

export class UnsupportedAttachmentStrategy implements AttachmentExtractionStrategy {
  readonly name = 'unsupported';

  async extract(input: AttachmentInput): Promise<StrategyResult> {
    return {
      ok: false,
      error: new ExtractionError(
        `No extractor for ${input.contentType} attachment ${input.filename}`,
        'not_implemented',
        { filename: input.filename, contentType: input.contentType }
      ),
    };
  }
}

function baseMimeType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export class StrategyRegistry {
  private strategies: Map<string, AttachmentExtractionStrategy> = new Map();

  constructor(private fallback: AttachmentExtractionStrategy = new UnsupportedAttachmentStrategy()) {}

  register(mimeType: string, strategy: AttachmentExtractionStrategy): this {
    this.strategies.set(baseMimeType(mimeType), strategy);
    return this;
  }

  resolve(contentType: string): AttachmentExtractionStrategy {
    return this.strategies.get(baseMimeType(contentType)) ?? this.fallback;
  }

  async run(input: AttachmentInput): Promise<StrategyResult> {
    const strategy = this.resolve(input.contentType);
    try {
      return await strategy.extract(input);
    } catch (error) {
      return {
        ok: false,
        error: new ExtractionError(
          `Strategy "${strategy.name}" failed on ${input.filename}: ${describeError(error)}`,
          'strategy_failed',
          { filename: input.filename, strategy: strategy.name }
        ),
      };
    }
  }
}

export function createDefaultRegistry(): StrategyRegistry {
  return new StrategyRegistry().register('application/pdf', new PdfExtractionStrategy());
}

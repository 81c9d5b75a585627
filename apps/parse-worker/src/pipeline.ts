import {
  ExtractionEngine,
  type EntityRecognizer,
  type OcrSideChannel,
} from '../../../shared/extraction/index.js';
import type { Logger } from '../../../shared/lib/logger.js';
import defaultLogger from './lib/logger.js';
import type { DocumentInput, OcrPage, ProcessorConfig, StructuredOutput, ValidationRules } from './types.js';
import { average, normaliseLineEndings } from './utils.js';
import { validateFields } from './validation.js';

export const DEFAULT_LOW_CONFIDENCE_THRESHOLD = 80;

export interface DocumentProcessorOptions {
  recognizer?: EntityRecognizer | null;
  lowConfidenceThreshold?: number;
  logger?: Logger;
}

export function combineOcrPages(pages: OcrPage[]): { text: string; ocr: OcrSideChannel } {
  const text = normaliseLineEndings(pages.map((page) => page.text).join('\n')).trim();
  return {
    text,
    ocr: {
      confidence: average(pages.map((page) => page.confidence)),
      boundingBoxes: pages.flatMap((page) => page.boundingBoxes ?? []),
    },
  };
}

function resolveDocumentText(document: DocumentInput): { text: string; ocr: OcrSideChannel } {
  if (document.pages?.length) return combineOcrPages(document.pages);
  if (typeof document.text === 'string') {
    return {
      text: normaliseLineEndings(document.text).trim(),
      ocr: { confidence: document.confidence ?? 0, boundingBoxes: [] },
    };
  }
  throw new Error(`Document ${document.filename} has neither text nor OCR pages`);
}

function errorOutput(filename: string, error: unknown): StructuredOutput {
  const message = error instanceof Error ? error.message : String(error);
  return {
    filename,
    rawText: `Processing failed: ${message}`,
    extractedFields: [],
    lowConfidenceFields: [],
    overallConfidence: 0,
    validation: null,
  };
}

/**
 * Turns OCR output for one document into a structured record: extraction,
 * low-confidence flags and business-rule validation.
 */
export class DocumentProcessor {
  private engine: ExtractionEngine;
  private validation: ValidationRules | null;
  private readonly lowConfidenceThreshold: number;
  private readonly logger: Logger;

  constructor(config: ProcessorConfig, options: DocumentProcessorOptions = {}, engine?: ExtractionEngine) {
    this.logger = options.logger ?? defaultLogger;
    this.engine = engine ?? ExtractionEngine.create(config.extraction, { recognizer: options.recognizer, logger: this.logger });
    this.validation = config.validation;
    this.lowConfidenceThreshold = options.lowConfidenceThreshold ?? DEFAULT_LOW_CONFIDENCE_THRESHOLD;
  }

  get config(): ProcessorConfig {
    return { extraction: this.engine.config, validation: this.validation };
  }

  /** A processor for another rule set that reuses this one's recognizer. */
  withConfig(config: ProcessorConfig): DocumentProcessor {
    return new DocumentProcessor(
      config,
      { lowConfidenceThreshold: this.lowConfidenceThreshold, logger: this.logger },
      this.engine.withConfig(config.extraction)
    );
  }

  updateConfig(update: Partial<ProcessorConfig>): void {
    if (update.extraction) this.engine = this.engine.withConfig(update.extraction);
    if (update.validation !== undefined) this.validation = update.validation;
  }

  process(document: DocumentInput): StructuredOutput {
    const { text, ocr } = resolveDocumentText(document);
    const extractedFields = this.engine.extract(text, ocr);
    const lowConfidenceFields = extractedFields
      .filter((field) => field.confidence < this.lowConfidenceThreshold)
      .map((field) => field.name);
    return {
      filename: document.filename,
      rawText: text,
      extractedFields,
      lowConfidenceFields,
      overallConfidence: ocr.confidence,
      validation: this.validation ? validateFields(extractedFields, this.validation) : null,
    };
  }

  processBatch(documents: DocumentInput[]): StructuredOutput[] {
    return documents.map((document) => {
      try {
        return this.process(document);
      } catch (err) {
        this.logger.error({ err, filename: document.filename }, 'Document processing failed');
        return errorOutput(document.filename, err);
      }
    });
  }
}

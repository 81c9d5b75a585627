import { createLogger, type Logger } from '../lib/logger.js';
import { AdaptiveFieldDiscoverer, ADAPTIVE_MIN_TEXT_LENGTH } from './adaptive.js';
import { createEntityRecognizerAdapter, type EntityRecognizerAdapter } from './entities.js';
import { FieldResolver } from './resolver.js';
import type { EntityRecognizer, ExtractedField, ExtractionConfig, OcrSideChannel } from './types.js';

function fieldKey(field: ExtractedField): string {
  return `${field.name}\u0000${field.value ?? ''}`;
}

export interface ExtractionEngineOptions {
  recognizer?: EntityRecognizer | null;
  logger?: Logger;
}

/**
 * Resolves every declared field (one result per rule, in declaration order) and
 * appends adaptive discoveries that do not repeat a declared (name, value) pair.
 * Holds no per-call state, so a single instance can serve concurrent documents.
 */
export class ExtractionEngine {
  private readonly resolver: FieldResolver;
  private readonly discoverer: AdaptiveFieldDiscoverer;

  private constructor(
    readonly config: ExtractionConfig,
    private readonly recognizer: EntityRecognizerAdapter | null,
    private readonly logger: Logger
  ) {
    this.resolver = new FieldResolver(recognizer, logger.child({ component: 'resolver' }));
    this.discoverer = new AdaptiveFieldDiscoverer(recognizer, logger.child({ component: 'adaptive' }));
  }

  static create(config: ExtractionConfig, options: ExtractionEngineOptions = {}): ExtractionEngine {
    const logger = options.logger ?? createLogger('extraction');
    const recognizer = createEntityRecognizerAdapter(options.recognizer, logger);
    return new ExtractionEngine(config, recognizer, logger);
  }

  get entityRecognitionAvailable(): boolean {
    return this.recognizer !== null;
  }

  /** Same recognizer, new rules. The current engine is left untouched. */
  withConfig(config: ExtractionConfig): ExtractionEngine {
    return new ExtractionEngine(config, this.recognizer, this.logger);
  }

  extract(text: string, ocr?: OcrSideChannel): ExtractedField[] {
    const declared = this.config.fields.map((rule) => this.resolver.resolve(rule, text));
    const declaredKeys = new Set(declared.map((field) => fieldKey(field)));
    const adaptive =
      this.config.enableAdaptiveFields && text.trim().length >= ADAPTIVE_MIN_TEXT_LENGTH
        ? this.discoverer.discover(text).filter((field) => !declaredKeys.has(fieldKey(field)))
        : [];
    this.logger.debug(
      {
        declared: declared.length,
        resolved: declared.filter((item) => item.value !== null).length,
        adaptive: adaptive.length,
        ocrConfidence: ocr?.confidence ?? null,
      },
      'Extraction complete'
    );
    return [...declared, ...adaptive];
  }
}

export { AdaptiveFieldDiscoverer, ADAPTIVE_MIN_TEXT_LENGTH, MAX_ADAPTIVE_FIELDS } from './adaptive.js';
export {
  ExtractionConfigError,
  ExtractionConfigSchema,
  loadExtractionConfig,
  parseExtractionConfig,
  parseExtractionConfigJson,
} from './config.js';
export { ExtractionEngine, type ExtractionEngineOptions } from './engine.js';
export { createEntityRecognizerAdapter, EntityRecognizerAdapter, ENTITY_CONFIDENCE } from './entities.js';
export { applyPostProcess, normalizeAmount, normalizeDate } from './normalize.js';
export { PatternEntityRecognizer } from './recognizers/patternRecognizer.js';
export { cleanExtractedValue, FieldResolver, KEYWORD_CONFIDENCE, REGEX_CONFIDENCE } from './resolver.js';
export { extractByType, VALUE_WINDOW_LENGTH } from './valueTypes.js';
export type {
  BoundingBox,
  EntityRecognizer,
  EntityType,
  ExtractedField,
  ExtractionConfig,
  FieldRule,
  OcrSideChannel,
  RecognizedEntity,
  ResolvedValue,
  ValueTypeHint,
} from './types.js';
export { ENTITY_TYPES, VALUE_TYPE_HINTS } from './types.js';

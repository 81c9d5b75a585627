export const ENTITY_TYPES = ['DATE', 'MONEY', 'PERSON', 'ORG', 'LOCATION', 'GPE'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const VALUE_TYPE_HINTS = ['amount', 'date', 'license-plate', 'name', 'company', 'address', 'phone'] as const;

export type ValueTypeHint = (typeof VALUE_TYPE_HINTS)[number];

export interface FieldRule {
  name: string;
  /** Literal anchors, tried in order. Empty when the rule relies on regex or entities only. */
  pattern: string[];
  description?: string;
  entityType?: EntityType;
  regexPatterns: string[];
  valueTypeHint?: ValueTypeHint;
  /** Normaliser name such as `amount-normalize`; unknown names leave the value untouched. */
  postProcess?: string;
}

export interface ExtractionConfig {
  fields: FieldRule[];
  enableAdaptiveFields: boolean;
}

export type BoundingBox = [number, number, number, number];

export interface ExtractedField {
  name: string;
  value: string | null;
  /** 0–100, reflects the strategy that produced the value. */
  confidence: number;
  boundingBox: BoundingBox | null;
}

export interface OcrSideChannel {
  confidence: number;
  boundingBoxes: BoundingBox[];
}

export interface RecognizedEntity {
  text: string;
  label: string;
}

/**
 * A named-entity backend. Implementations must be safe to call repeatedly with
 * different inputs; the engine shares one instance across documents.
 */
export interface EntityRecognizer {
  readonly name: string;
  findEntities(text: string): RecognizedEntity[];
  findKeyTerms?(text: string): string[];
}

export type ResolvedValue = { value: string; confidence: number };

import type { BoundingBox, ExtractedField, ExtractionConfig } from '../../../shared/extraction/index.js';

export interface OcrPage {
  text: string;
  /** Engine-level average for the page, 0–100. */
  confidence: number;
  boundingBoxes?: BoundingBox[];
}

export interface DocumentInput {
  filename: string;
  pages?: OcrPage[];
  text?: string | null;
  confidence?: number;
}

export interface ParseJob extends DocumentInput {
  docId: string;
  profile?: string | null;
  dedupeKey?: string | null;
  attempts?: number;
  source?: string | null;
}

export interface AmountLimits {
  maxAmount: number;
  currency?: string;
  /** Field names to check; defaults to fields whose name looks like an amount. */
  fields?: string[];
}

export interface ValidationRules {
  /** 0–1, compared against field confidence / 100. */
  confidenceThreshold: number;
  requiredFields: string[];
  amountLimits?: AmountLimits;
  checks: string[];
}

export interface ProcessorConfig {
  extraction: ExtractionConfig;
  validation: ValidationRules | null;
}

export interface ValidationReport {
  passed: boolean;
  missingFields: string[];
  lowConfidenceFields: string[];
  issues: string[];
}

export interface StructuredOutput {
  filename: string;
  rawText: string;
  extractedFields: ExtractedField[];
  lowConfidenceFields: string[];
  overallConfidence: number;
  validation: ValidationReport | null;
}

export interface ParseResultPayload {
  ok: boolean;
  docId: string;
  profile: string | null;
  output: StructuredOutput;
  processedAt: string;
  metrics: {
    latencyMs: number;
  };
}

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ExtractionConfigError, ExtractionConfigSchema } from '../../../shared/extraction/index.js';
import type { ProcessorConfig } from './types.js';

const SNAKE_CASE_KEYS: Record<string, string> = {
  confidence_threshold: 'confidenceThreshold',
  required_fields: 'requiredFields',
  amount_limits: 'amountLimits',
  max_amount: 'maxAmount',
  validation_checks: 'checks',
};

function camelizeKeys(value: unknown): unknown {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [SNAKE_CASE_KEYS[key] ?? key, entry]));
}

const AmountLimitsSchema = z.preprocess(
  camelizeKeys,
  z.object({
    maxAmount: z.number().positive(),
    currency: z.string().optional(),
    fields: z.array(z.string()).optional(),
  })
);

export const ValidationRulesSchema = z.preprocess(
  camelizeKeys,
  z.object({
    confidenceThreshold: z.number().min(0).max(1).default(0.8),
    requiredFields: z.array(z.string()).default([]),
    amountLimits: AmountLimitsSchema.optional(),
    checks: z.array(z.string()).default([]),
  })
);

const ProcessorConfigSchema = z.object({
  extraction: ExtractionConfigSchema,
  validation: ValidationRulesSchema.nullable().optional(),
});

export function parseProcessorConfig(raw: unknown): ProcessorConfig {
  const result = ProcessorConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ExtractionConfigError(`Invalid processor config: ${detail}`, result.error.issues);
  }
  return {
    extraction: result.data.extraction,
    validation: result.data.validation ?? null,
  };
}

export function parseProcessorConfigJson(json: string): ProcessorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ExtractionConfigError(
      `Processor config is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseProcessorConfig(parsed);
}

export async function loadProcessorConfig(path: string): Promise<ProcessorConfig> {
  return parseProcessorConfigJson(await readFile(path, 'utf-8'));
}

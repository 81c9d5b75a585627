import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ENTITY_TYPES, VALUE_TYPE_HINTS, type ExtractionConfig, type FieldRule } from './types.js';

const SNAKE_CASE_KEYS: Record<string, string> = {
  entity_type: 'entityType',
  regex_patterns: 'regexPatterns',
  value_type_hint: 'valueTypeHint',
  post_process: 'postProcess',
  enable_adaptive_fields: 'enableAdaptiveFields',
};

function camelizeKeys(value: unknown): unknown {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [SNAKE_CASE_KEYS[key] ?? key, entry]));
}

const StringList = z.union([z.string(), z.array(z.string())]).transform((value) => (Array.isArray(value) ? value : [value]));

const FieldRuleSchema = z.preprocess(
  camelizeKeys,
  z.object({
    name: z.string().trim().min(1),
    pattern: StringList.optional().default([]),
    description: z.string().optional(),
    entityType: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
      z.enum(ENTITY_TYPES).optional()
    ),
    regexPatterns: StringList.optional().default([]),
    valueTypeHint: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase().replace(/_/g, '-') : value),
      z.enum(VALUE_TYPE_HINTS).optional()
    ),
    postProcess: z.string().optional(),
  })
);

export const ExtractionConfigSchema = z.preprocess(
  camelizeKeys,
  z.object({
    enableAdaptiveFields: z.boolean().default(true),
    fields: z.array(FieldRuleSchema).default([]),
  })
);

export class ExtractionConfigError extends Error {
  constructor(
    message: string,
    readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ExtractionConfigError';
  }
}

function describeIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseExtractionConfig(raw: unknown): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ExtractionConfigError(
      `Invalid extraction config: ${describeIssues(result.error.issues)}`,
      result.error.issues
    );
  }
  const fields: FieldRule[] = result.data.fields;
  return { enableAdaptiveFields: result.data.enableAdaptiveFields, fields };
}

export function parseExtractionConfigJson(json: string): ExtractionConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ExtractionConfigError(`Extraction config is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseExtractionConfig(parsed);
}

export async function loadExtractionConfig(path: string): Promise<ExtractionConfig> {
  const contents = await readFile(path, 'utf-8');
  return parseExtractionConfigJson(contents);
}

import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { normalizeAmount, type ExtractedField } from '../../../shared/extraction/index.js';
import type { ValidationReport, ValidationRules } from './types.js';

dayjs.extend(customParseFormat);

const AMOUNT_FIELD = /amount|total|金额|总计|报酬/i;
const DATE_FIELD = /date|日期/i;

function valueOf(fields: ExtractedField[], name: string): string | null {
  const match = fields.find((field) => field.name === name && field.value !== null && field.value.trim() !== '');
  return match?.value ?? null;
}

function checkAmounts(fields: ExtractedField[], rules: ValidationRules): string[] {
  const limits = rules.amountLimits;
  const named = limits?.fields ?? [];
  const targets = named.length
    ? fields.filter((field) => named.includes(field.name))
    : fields.filter((field) => AMOUNT_FIELD.test(field.name));
  const issues: string[] = [];
  targets.forEach((field) => {
    if (field.value === null) return;
    const amount = Number(normalizeAmount(field.value));
    if (!Number.isFinite(amount)) {
      issues.push(`${field.name}: "${field.value}" is not a valid amount`);
      return;
    }
    if (amount < 0) {
      issues.push(`${field.name}: amount ${amount.toFixed(2)} is negative`);
      return;
    }
    if (limits && amount > limits.maxAmount) {
      const currency = limits.currency ? ` ${limits.currency}` : '';
      issues.push(`${field.name}: amount ${amount.toFixed(2)} exceeds limit of ${limits.maxAmount}${currency}`);
    }
  });
  return issues;
}

function checkDates(fields: ExtractedField[], today: Dayjs): string[] {
  const issues: string[] = [];
  fields
    .filter((field) => DATE_FIELD.test(field.name) && field.value !== null)
    .forEach((field) => {
      const parsed = dayjs(field.value, 'YYYY-MM-DD', true);
      if (!parsed.isValid()) return;
      if (parsed.isAfter(today, 'day')) {
        issues.push(`${field.name}: ${parsed.format('YYYY-MM-DD')} is in the future`);
      }
    });
  return issues;
}

/**
 * Applies business rules to a finished extraction. Checks that the rules name but
 * this module does not know are ignored.
 */
export function validateFields(
  fields: ExtractedField[],
  rules: ValidationRules,
  today: Dayjs = dayjs()
): ValidationReport {
  const missingFields = rules.requiredFields.filter((name) => valueOf(fields, name) === null);
  const lowConfidenceFields = fields
    .filter((field) => field.value !== null && field.confidence / 100 < rules.confidenceThreshold)
    .map((field) => field.name);

  const issues: string[] = [];
  if (rules.checks.includes('amount_reasonable')) issues.push(...checkAmounts(fields, rules));
  if (rules.checks.includes('date_not_future')) issues.push(...checkDates(fields, today));

  return {
    passed: missingFields.length === 0 && issues.length === 0,
    missingFields,
    lowConfidenceFields,
    issues,
  };
}

import { createLogger, type Logger } from '../lib/logger.js';
import type { EntityRecognizerAdapter } from './entities.js';
import { applyPostProcess } from './normalize.js';
import { widenWordClasses } from './patterns.js';
import type { ExtractedField, FieldRule, ResolvedValue } from './types.js';
import { extractByType, VALUE_WINDOW_LENGTH } from './valueTypes.js';

export const REGEX_CONFIDENCE = 90;
export const KEYWORD_CONFIDENCE = 85;

const STOP_CHARS = /[。；，,.;:：\n\t]/;
const TRAILING_PUNCTUATION = /[\s。；，,.;:：、!?！？]+$/;

/**
 * Values with digits keep their internal separators (`1,250.00`), so only trailing
 * punctuation goes. Anything else is cut at the first stop character.
 */
export function cleanExtractedValue(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return '';
  if (/\d/.test(trimmed)) {
    return trimmed.replace(TRAILING_PUNCTUATION, '').trim();
  }
  return trimmed.split(STOP_CHARS)[0].trim();
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function emptyField(name: string): ExtractedField {
  return { name, value: null, confidence: 0, boundingBox: null };
}

export class FieldResolver {
  constructor(
    private readonly recognizer: EntityRecognizerAdapter | null,
    private readonly logger: Logger = createLogger('field-resolver')
  ) {}

  resolve(rule: FieldRule, text: string): ExtractedField {
    const resolved =
      this.byRegex(rule, text) ?? this.byKeyword(rule, text) ?? this.byEntity(rule, text);
    if (!resolved) {
      this.logger.debug({ field: rule.name }, 'No value resolved');
      return emptyField(rule.name);
    }
    return {
      name: rule.name,
      value: applyPostProcess(rule.postProcess, resolved.value),
      confidence: resolved.confidence,
      boundingBox: null,
    };
  }

  /**
   * Rule patterns are compiled in unicode mode so `\w` covers CJK text. Patterns
   * that unicode mode rejects (identity escapes such as `\-` outside a class)
   * are compiled as written.
   */
  private compile(rule: FieldRule, source: string): RegExp | null {
    try {
      return new RegExp(widenWordClasses(source), 'iu');
    } catch (err) {
      this.logger.debug({ field: rule.name, pattern: source, err }, 'Pattern rejected in unicode mode');
    }
    try {
      return new RegExp(source, 'i');
    } catch (err) {
      this.logger.warn({ field: rule.name, pattern: source, err }, 'Skipping malformed field regex');
      return null;
    }
  }

  private byRegex(rule: FieldRule, text: string): ResolvedValue | null {
    for (const source of rule.regexPatterns) {
      const regex = this.compile(rule, source);
      if (!regex) continue;
      const match = regex.exec(text);
      if (!match) continue;
      const value = cleanExtractedValue(match[1] ?? match[0]);
      if (!value) continue;
      this.logger.debug({ field: rule.name, pattern: source }, 'Resolved by regex');
      return { value, confidence: REGEX_CONFIDENCE };
    }
    return null;
  }

  private byKeyword(rule: FieldRule, text: string): ResolvedValue | null {
    for (const keyword of rule.pattern) {
      if (!keyword.trim()) continue;
      const anchor = new RegExp(escapeRegex(keyword), 'gi');
      for (const match of text.matchAll(anchor)) {
        const start = (match.index ?? 0) + match[0].length;
        const trailing = text.slice(start, start + VALUE_WINDOW_LENGTH);
        const candidate = extractByType(trailing, rule.valueTypeHint);
        const value = candidate ? cleanExtractedValue(candidate) : '';
        if (!value) continue;
        this.logger.debug({ field: rule.name, keyword, offset: match.index }, 'Resolved by keyword window');
        return { value, confidence: KEYWORD_CONFIDENCE };
      }
    }
    return null;
  }

  private byEntity(rule: FieldRule, text: string): ResolvedValue | null {
    if (!rule.entityType || !this.recognizer) return null;
    const found = this.recognizer.findFirst(text, rule.entityType);
    if (!found) return null;
    const value = cleanExtractedValue(found.value);
    if (!value) return null;
    this.logger.debug({ field: rule.name, entityType: rule.entityType }, 'Resolved by entity');
    return { value, confidence: found.confidence };
  }
}

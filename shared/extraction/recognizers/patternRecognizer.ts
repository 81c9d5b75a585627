import * as chrono from 'chrono-node';
import type { EntityRecognizer, RecognizedEntity } from '../types.js';

interface Span extends RecognizedEntity {
  index: number;
}

type LabelledPattern = { label: string; pattern: RegExp; group?: number };

const CJK_DATE = /\d{4}年\d{1,2}月(?:\d{1,2}日)?/g;

const GAZETTEER = [
  'Beijing',
  'Shanghai',
  'Shenzhen',
  'Guangzhou',
  'Hong Kong',
  'Singapore',
  'Tokyo',
  'London',
  'Paris',
  'Berlin',
  'New York',
  'San Francisco',
  'China',
  'Japan',
  'Germany',
  'France',
  'Canada',
  'Australia',
  'India',
  'United States',
  'United Kingdom',
];

const PATTERNS: LabelledPattern[] = [
  {
    label: 'MONEY',
    pattern: /(?:[$€£¥￥]|\b(?:RMB|USD|CNY|EUR|GBP)\s?)\s?\d[\d,]*(?:\.\d+)?|\d[\d,]*(?:\.\d+)?\s?(?:元|USD|EUR|dollars\b)/gi,
  },
  {
    label: 'ORG',
    pattern: /\b[A-Z][\w&'.-]*(?:\s+[A-Z&][\w&'.-]*)*\s+(?:Inc|Corp|Corporation|Co|Ltd|LLC|LLP|Limited|GmbH|PLC)\b\.?/g,
  },
  { label: 'ORG', pattern: /[\u4e00-\u9fff]{2,20}?(?:股份有限公司|有限责任公司|有限公司|集团)/g },
  { label: 'PERSON', pattern: /\b(?:Mr|Mrs|Ms|Miss|Dr|Prof)\.?\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/g, group: 1 },
  { label: 'PERSON', pattern: /\bDear\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/g, group: 1 },
  {
    label: 'PERSON',
    pattern: /(?:姓名|联系人|经办人|负责人|收款人|申请人)[:：]\s*([\u4e00-\u9fff]{2,4})/g,
    group: 1,
  },
  { label: 'GPE', pattern: /[\u4e00-\u9fff]{2,6}?(?:省|自治区|市|县)/g },
  { label: 'GPE', pattern: new RegExp(`\\b(?:${GAZETTEER.join('|')})\\b`, 'g') },
];

const STOPWORDS = new Set([
  'this',
  'that',
  'with',
  'from',
  'have',
  'will',
  'shall',
  'been',
  'were',
  'which',
  'their',
  'there',
  'these',
  'those',
  'other',
  'into',
  'upon',
  'such',
  'than',
  'then',
  'they',
  'your',
  'about',
  'after',
  'before',
]);

function collectPatterns(text: string): Span[] {
  const spans: Span[] = [];
  for (const { label, pattern, group } of PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const value = group ? match[group] : match[0];
      if (!value) continue;
      const offset = group ? match[0].indexOf(value) : 0;
      spans.push({ text: value.trim(), label, index: (match.index ?? 0) + Math.max(offset, 0) });
    }
  }
  return spans;
}

function removeOverlaps(spans: Span[]): Span[] {
  const accepted: Span[] = [];
  let cursor = -1;
  spans
    .slice()
    .sort((a, b) => a.index - b.index || b.text.length - a.text.length)
    .forEach((span) => {
      if (span.index < cursor) return;
      accepted.push(span);
      cursor = span.index + span.text.length;
    });
  return accepted;
}

/**
 * Recognizer built from chrono-node (dates and times) and hand-tuned patterns for
 * money, organisations, people and places. Stateless; one instance can serve every
 * document.
 */
export class PatternEntityRecognizer implements EntityRecognizer {
  readonly name = 'pattern';

  constructor(private readonly referenceDate: Date = new Date()) {}

  private collectDates(text: string): Span[] {
    const spans: Span[] = chrono.parse(text, this.referenceDate).map((result) => ({
      text: result.text,
      label: result.start.isCertain('day') || !result.start.isCertain('hour') ? 'DATE' : 'TIME',
      index: result.index,
    }));
    for (const match of text.matchAll(CJK_DATE)) {
      spans.push({ text: match[0], label: 'DATE', index: match.index ?? 0 });
    }
    return spans;
  }

  findEntities(text: string): RecognizedEntity[] {
    if (!text.trim()) return [];
    return removeOverlaps([...this.collectDates(text), ...collectPatterns(text)]).map(({ text: value, label }) => ({
      text: value,
      label,
    }));
  }

  /** Repeated content words, most frequent first. */
  findKeyTerms(text: string): string[] {
    const counts = new Map<string, { term: string; count: number; first: number }>();
    let position = 0;
    for (const match of text.matchAll(/[A-Za-z][A-Za-z-]{3,}/g)) {
      const key = match[0].toLowerCase();
      if (STOPWORDS.has(key)) continue;
      const entry = counts.get(key);
      if (entry) {
        entry.count += 1;
      } else {
        counts.set(key, { term: match[0], count: 1, first: position });
      }
      position += 1;
    }
    return Array.from(counts.values())
      .filter((entry) => entry.count > 1)
      .sort((a, b) => b.count - a.count || a.first - b.first)
      .map((entry) => entry.term);
  }
}

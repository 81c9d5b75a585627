import { createLogger, type Logger } from '../lib/logger.js';
import type { EntityRecognizerAdapter } from './entities.js';
import type { ExtractedField } from './types.js';
import { isPlausiblePlate } from './valueTypes.js';

/** Below this many trimmed characters the adaptive pass produces nothing. */
export const ADAPTIVE_MIN_TEXT_LENGTH = 50;
export const MAX_ADAPTIVE_FIELDS = 8;
export const MIN_ADAPTIVE_CONFIDENCE = 60;

const MAX_HITS_PER_CATEGORY = 3;
const MAX_SECTIONS = 3;
const MAX_CONCEPTS = 3;
const MAX_TERM_CANDIDATES = 3;
const MAX_TERMS = 2;

const MONTHS = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec';
const PROVINCES = '京津沪渝冀豫云辽黑湘皖鲁新苏浙赣鄂桂甘晋蒙陕吉闽贵粤青藏川宁琼';

type MiningCategory = {
  name: string;
  confidence: number;
  patterns: RegExp[];
  accept?: (value: string) => boolean;
};

const NAME_STOPWORDS = new Set([
  'Dear',
  'The',
  'This',
  'That',
  'Total',
  'Invoice',
  'Date',
  'Amount',
  'Section',
  'Page',
  'Thank',
  'Best',
  'Kind',
  'Yours',
  'Main',
]);

const KEY_VALUE_CATEGORIES: MiningCategory[] = [
  {
    name: 'Amount',
    confidence: 90,
    patterns: [/(?:RMB|¥|￥|¤|\$)\s*(\d[\d,]*(?:\.\d{1,2})?)/gi],
  },
  {
    name: 'Company',
    confidence: 85,
    patterns: [
      /\b([A-Z][\w&'-]*(?:\s+[A-Z&][\w&'-]*)*\s+(?:Inc|Corp|Corporation|Ltd|LLC|Limited|GmbH|PLC)\b)/g,
      /([\u4e00-\u9fff]{2,20}?(?:股份有限公司|有限责任公司|有限公司|集团))/g,
    ],
  },
  {
    name: 'Date',
    confidence: 80,
    patterns: [
      /(\d{4}年\d{1,2}月\d{1,2}日)/g,
      /\b(\d{4}[-/]\d{1,2}[-/]\d{1,2})\b/g,
      new RegExp(`\\b((?:${MONTHS})[a-z]*\\.?\\s+\\d{1,2},?\\s+\\d{4})`, 'g'),
    ],
  },
  {
    name: 'Name',
    confidence: 75,
    patterns: [/\bDear\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/g, /\b([A-Z][a-z]+\s[A-Z][a-z]+)\b/g],
    accept: (value) => !NAME_STOPWORDS.has(value.split(/\s+/)[0]),
  },
  {
    name: 'License Plate',
    confidence: 85,
    patterns: [
      new RegExp(`([${PROVINCES}][A-Z][·\\s-]?[A-Z0-9]{5,6})`, 'g'),
      /\b([A-Z]{1,3}[-\s]?\d{3,5}[A-Z]{0,2})\b/g,
    ],
    accept: isPlausiblePlate,
  },
];

const TOPIC_KEYWORDS = [
  'report',
  'agreement',
  'contract',
  'invoice',
  'notice',
  'proposal',
  'summary',
  'policy',
  'plan',
  'minutes',
  'announcement',
  'application',
  'statement',
  'receipt',
  '报告',
  '合同',
  '协议',
  '发票',
  '通知',
  '方案',
  '总结',
  '计划',
  '公告',
  '申请',
  '声明',
];

const CONCEPT_KEYWORDS = [
  'system',
  'platform',
  'technology',
  'service',
  'project',
  'management',
  'solution',
  'product',
  'strategy',
  'development',
  '系统',
  '平台',
  '技术',
  '服务',
  '项目',
  '管理',
  '产品',
  '战略',
];

const CONCEPT_LABELS = new Set(['PERSON', 'ORG', 'GPE', 'PRODUCT', 'EVENT']);

const LIST_LINE = /^(?:[-*•·▪]|\d+[.)、]|[一二三四五六七八九十]+[、.．]|[(（]\d+[)）])/;
const SENTENCE_BREAK = /[。！？!?\n]|\.(?=\s|$)/;
const CJK_SECTION = /^[ \t]*([一二三四五六七八九十]+)[、．.][ \t]*(.+)$/gm;
const LATIN_SECTION = /^[ \t]*(\d{1,2})[.)][ \t]+(.+)$/gm;

const CJK_DIGITS = '一二三四五六七八九';

function cjkNumeral(value: string): number {
  const digit = (char: string | undefined) => (char ? CJK_DIGITS.indexOf(char) + 1 : 0);
  const tenIndex = value.indexOf('十');
  if (tenIndex === -1) return digit(value[0]);
  const tens = tenIndex === 0 ? 1 : digit(value[0]);
  return tens * 10 + digit(value[tenIndex + 1]);
}

function field(name: string, value: string, confidence: number): ExtractedField {
  return { name, value, confidence, boundingBox: null };
}

class FieldPool {
  private readonly keys = new Set<string>();
  readonly fields: ExtractedField[] = [];

  add(candidate: ExtractedField): boolean {
    const key = `${candidate.name}\u0000${candidate.value ?? ''}`;
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    this.fields.push(candidate);
    return true;
  }

  hasValue(value: string): boolean {
    const needle = value.toLowerCase();
    return this.fields.some((existing) => existing.value?.toLowerCase() === needle);
  }

  get size(): number {
    return this.fields.length;
  }
}

/**
 * Schema-free discovery over the raw text: key/value patterns, a main topic,
 * numbered sections and recurring entities. Each later pass runs only while the
 * pool is still thin, and the final list is capped and ranked by confidence.
 */
export class AdaptiveFieldDiscoverer {
  constructor(
    private readonly recognizer: EntityRecognizerAdapter | null,
    private readonly logger: Logger = createLogger('adaptive-fields')
  ) {}

  discover(text: string): ExtractedField[] {
    if (text.trim().length < ADAPTIVE_MIN_TEXT_LENGTH) return [];

    const pool = new FieldPool();
    this.mineKeyValues(text, pool);
    const keyValueHits = pool.size;

    if (keyValueHits < 3) {
      const topic = extractMainTopic(text);
      if (topic) pool.add(topic);
    }
    if (pool.size < 5) {
      extractSections(text).forEach((section) => pool.add(section));
    }
    if (pool.size < 7 && this.recognizer) {
      this.extractKeyConcepts(text, pool, this.recognizer);
    }

    const ranked = pool.fields
      .filter((candidate) => candidate.value && candidate.confidence >= MIN_ADAPTIVE_CONFIDENCE)
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, MAX_ADAPTIVE_FIELDS);
    this.logger.debug({ keyValueHits, discovered: pool.size, kept: ranked.length }, 'Adaptive fields discovered');
    return ranked;
  }

  private mineKeyValues(text: string, pool: FieldPool): void {
    for (const category of KEY_VALUE_CATEGORIES) {
      let hits = 0;
      for (const pattern of category.patterns) {
        for (const match of text.matchAll(pattern)) {
          if (hits >= MAX_HITS_PER_CATEGORY) break;
          const value = (match[1] ?? match[0]).trim();
          if (!value || (category.accept && !category.accept(value))) continue;
          if (pool.add(field(category.name, value, category.confidence))) hits += 1;
        }
      }
    }
  }

  private extractKeyConcepts(text: string, pool: FieldPool, recognizer: EntityRecognizerAdapter): void {
    const frequency = new Map<string, number>();
    recognizer
      .findEntities(text)
      .filter((entity) => CONCEPT_LABELS.has(entity.label))
      .forEach((entity) => {
        const value = entity.text.trim();
        if (value) frequency.set(value, (frequency.get(value) ?? 0) + 1);
      });

    Array.from(frequency.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_CONCEPTS)
      .forEach(([value, count]) => {
        pool.add(field('Key Concept', value, Math.min(90, 60 + count * 10)));
      });

    const seen = new Set<string>();
    const candidates: string[] = [];
    const consider = (term: string) => {
      const key = term.toLowerCase();
      if (candidates.length >= MAX_TERM_CANDIDATES || seen.has(key)) return;
      seen.add(key);
      candidates.push(term);
    };
    recognizer.findKeyTerms(text).forEach(consider);
    for (const match of text.matchAll(/[A-Za-z][A-Za-z-]{2,}|[\u4e00-\u9fff]{2,8}/g)) {
      const token = match[0];
      if (CONCEPT_KEYWORDS.some((keyword) => token.toLowerCase().includes(keyword))) consider(token);
    }

    candidates
      .filter((term) => !pool.hasValue(term))
      .slice(0, MAX_TERMS)
      .forEach((term) => pool.add(field('Key Term', term, 70)));
  }
}

export function extractMainTopic(text: string): ExtractedField | null {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, 10);
  const titled = lines.find((line) => {
    if (line.length < 10 || line.length > 100 || LIST_LINE.test(line)) return false;
    const lower = line.toLowerCase();
    return TOPIC_KEYWORDS.some((keyword) => lower.includes(keyword));
  });
  if (titled) return field('Main Topic', titled, 85);

  const sentence = text
    .split(SENTENCE_BREAK)
    .map((part) => part.trim())
    .find((part) => part.length >= 20 && part.length <= 150);
  return sentence ? field('Main Topic', sentence, 75) : null;
}

export function extractSections(text: string): ExtractedField[] {
  const sections: ExtractedField[] = [];
  for (const match of text.matchAll(CJK_SECTION)) {
    const title = match[2].trim();
    if (title.length >= 2) sections.push(field(`Section ${cjkNumeral(match[1])}`, title, 80));
  }
  for (const match of text.matchAll(LATIN_SECTION)) {
    const title = match[2].trim();
    if (title.length >= 2) sections.push(field(`Section ${Number.parseInt(match[1], 10)}`, title, 75));
  }
  return sections.sort((a, b) => b.confidence - a.confidence).slice(0, MAX_SECTIONS);
}

import type { ValueTypeHint } from './types.js';

/** Characters scanned after an anchor; longer windows start picking up the next field. */
export const VALUE_WINDOW_LENGTH = 100;

const LEADING_SEPARATORS = /^(?:[\s:：,，;；.。、|=_–—>]|-(?!\d))+/;
const SEGMENT_BREAK = /[。！？!?；;\n\r]|\.(?=\s|$)/;

const MONTHS =
  'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const PROVINCES = '京津沪渝冀豫云辽黑湘皖鲁新苏浙赣鄂桂甘晋蒙陕吉闽贵粤青藏川宁琼';

const AMOUNT_PATTERNS = [
  /(?:RMB|CNY)\s*(\d[\d,]*(?:\.\d+)?)/i,
  /[$¥￥]\s*(\d[\d,]*(?:\.\d+)?)/,
  /(-?\d+(?:[,.]\d+)*)/,
];

const DATE_PATTERNS = [
  /(\d{4}年\d{1,2}月\d{1,2}日?)/,
  /(\d{4}[-/.]\d{1,2}[-/.]\d{1,2})/,
  /(\d{1,2}\/\d{1,2}\/\d{4})/,
  new RegExp(`\\b((?:${MONTHS})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4})`, 'i'),
  new RegExp(`\\b(\\d{1,2}(?:st|nd|rd|th)?\\s+(?:${MONTHS})\\.?,?\\s+\\d{4})`, 'i'),
];

const PLATE_PATTERNS = [
  new RegExp(`([${PROVINCES}][A-Z][·\\s-]?[A-Z0-9]{5,6})`, 'gi'),
  /\b([A-Z0-9]{2,3}[-\s][A-Z0-9]{3,5})\b/gi,
  /\b([A-Z0-9]{6,8})\b/gi,
];

const NAME_PATTERNS = [
  /(?:Mr|Mrs|Ms|Miss|Dr|Prof)\.?\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+){0,2})/,
  /\b([A-Z][a-z]+(?:\s+[A-Z]\.)?\s+[A-Z][a-z]+)\b/,
  /^([\u4e00-\u9fff]{2,4})(?=$|[\s,，。;；:：、(（])/,
];

const COMPANY_PATTERNS = [
  /([A-Z][\w&'.-]*(?:\s+[A-Z&][\w&'.-]*)*\s+(?:Inc|Corp|Corporation|Co|Ltd|LLC|LLP|Limited|GmbH|PLC)\b\.?)/,
  /([\u4e00-\u9fffA-Za-z0-9（）()]{2,40}?(?:股份有限公司|有限责任公司|有限公司|集团|公司))/,
];

const ADDRESS_PATTERNS = [
  /([\u4e00-\u9fff0-9]{2,}?(?:省|自治区|市|区|县|镇|路|街|道)[\u4e00-\u9fff0-9A-Za-z#\-]*)/,
  /(\d+\s+(?:[A-Za-z0-9.']+\s+){0,4}(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr|Way|Court|Ct)\b\.?)/i,
];

const PHONE_PATTERNS = [
  /(\+?\d{1,3}[-\s]?\(?\d{3,4}\)?[-\s]?\d{3,4}[-\s]?\d{4})/,
  /(\(?0\d{2,3}\)?[-\s]?\d{7,8})/,
  /\b(1[3-9]\d{9})\b/,
  /(\(?\d{3}\)?[-\s.]?\d{3}[-\s.]\d{4})/,
];

const PATTERNS_BY_TYPE: Record<Exclude<ValueTypeHint, 'license-plate'>, RegExp[]> = {
  amount: AMOUNT_PATTERNS,
  date: DATE_PATTERNS,
  name: NAME_PATTERNS,
  company: COMPANY_PATTERNS,
  address: ADDRESS_PATTERNS,
  phone: PHONE_PATTERNS,
};

export function isPlausiblePlate(candidate: string): boolean {
  return /\d/.test(candidate) && /[A-Za-z]/.test(candidate) && candidate.length >= 6 && candidate.length <= 10;
}

function firstCapture(text: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (!match) continue;
    const captured = (match[1] ?? match[0]).trim();
    if (captured) return captured;
  }
  return null;
}

function findPlate(text: string): string | null {
  for (const pattern of PLATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const candidate = match[1].trim();
      if (isPlausiblePlate(candidate)) return candidate;
    }
  }
  return null;
}

function firstSegment(text: string): string | null {
  const segment = text
    .split(SEGMENT_BREAK)
    .map((part) => part.trim())
    .find((part) => part.length > 1 && part.length < 50);
  if (segment) return segment;
  const head = text.slice(0, 30).trim();
  return head || null;
}

/**
 * Picks the most plausible value of the hinted type out of the text that follows an
 * anchor. Without a hint, or when no typed pattern matches, the first short segment
 * of the window is used.
 */
export function extractByType(windowText: string, typeHint?: ValueTypeHint | null): string | null {
  const text = windowText.replace(LEADING_SEPARATORS, '');
  if (!text.trim()) return null;

  if (typeHint === 'license-plate') {
    const plate = findPlate(text);
    if (plate) return plate;
  } else if (typeHint) {
    const typed = firstCapture(text, PATTERNS_BY_TYPE[typeHint]);
    if (typed) return typed;
  }

  return firstSegment(text);
}

const CURRENCY_GLYPHS = /[$¥￥€£¤\s]/g;
const NUMERIC = /^[-+]?(?:\d+\.?\d*|\.\d+)$/;

function applyDecimalSeparator(value: string, decimal: ',' | '.', thousands: ',' | '.' | null): string {
  const withoutThousands = thousands ? value.split(thousands).join('') : value;
  const index = withoutThousands.lastIndexOf(decimal);
  if (index === -1) return withoutThousands;
  const integerPart = withoutThousands.slice(0, index).split(decimal).join('');
  return `${integerPart}.${withoutThousands.slice(index + 1)}`;
}

/**
 * Canonical two-decimal amount. When both `,` and `.` appear the later one is the
 * decimal point; a lone `,` is a decimal point only when one or two digits follow it.
 * Input that still is not numeric after cleaning comes back cleaned but unparsed.
 */
export function normalizeAmount(raw: string): string {
  const cleaned = raw.trim().replace(CURRENCY_GLYPHS, '');
  const lastComma = cleaned.lastIndexOf(',');
  const lastDot = cleaned.lastIndexOf('.');

  let candidate = cleaned;
  if (lastComma >= 0 && lastDot >= 0) {
    candidate = lastComma > lastDot ? applyDecimalSeparator(cleaned, ',', '.') : applyDecimalSeparator(cleaned, '.', ',');
  } else if (lastComma >= 0) {
    const fraction = cleaned.slice(lastComma + 1);
    candidate = /^\d{1,2}$/.test(fraction) ? applyDecimalSeparator(cleaned, ',', null) : cleaned.split(',').join('');
  }

  if (!NUMERIC.test(candidate)) return candidate;
  const parsed = Number(candidate);
  return Number.isFinite(parsed) ? parsed.toFixed(2) : candidate;
}

type DatePattern = { regex: RegExp; year: number; month: number; day: number };

const DATE_PATTERNS: DatePattern[] = [
  { regex: /(\d{4})[-年](\d{1,2})[-月](\d{1,2})日?/, year: 1, month: 2, day: 3 },
  { regex: /(\d{1,2})\/(\d{1,2})\/(\d{4})/, year: 3, month: 1, day: 2 },
  { regex: /(\d{4})\/(\d{1,2})\/(\d{1,2})/, year: 1, month: 2, day: 3 },
];

export function normalizeDate(raw: string): string {
  const trimmed = raw.trim();
  for (const { regex, year, month, day } of DATE_PATTERNS) {
    const match = regex.exec(trimmed);
    if (!match) continue;
    return `${match[year]}-${match[month].padStart(2, '0')}-${match[day].padStart(2, '0')}`;
  }
  return trimmed;
}

const POST_PROCESSORS = new Map<string, (value: string) => string>([
  ['amount_normalize', normalizeAmount],
  ['date_normalize', normalizeDate],
]);

export function applyPostProcess(name: string | undefined, value: string): string {
  if (!name) return value;
  const processor = POST_PROCESSORS.get(name.trim().toLowerCase().replace(/-/g, '_'));
  return processor ? processor(value) : value;
}

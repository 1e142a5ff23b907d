/**
 * Locale-tolerant number parsing for OCR / AI output.
 *
 * Everything except digits, '.', ',' and '-' is dropped first, so currency
 * symbols and codes disappear ("$1,234.56", "USD 1.234,56").
 */
import { isAbsentValue } from './text.utils';

const PLAIN_NUMBER = /^-?(\d+\.?\d*|\.\d+)$/;

function toNumber(text: string): number | null {
  if (!PLAIN_NUMBER.test(text)) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function countOf(text: string, ch: string): number {
  return text.split(ch).length - 1;
}

/** Separator handling; returns text with '.' as the only (optional) decimal point. */
function normalizeSeparators(cleaned: string): string {
  const hasDot = cleaned.includes('.');
  const hasComma = cleaned.includes(',');

  if (hasDot && hasComma) {
    // The rightmost separator is the decimal point: 1.234,56 and 1,234.56
    const decimalSeparator = cleaned.lastIndexOf(',') > cleaned.lastIndexOf('.') ? ',' : '.';
    const thousandsSeparator = decimalSeparator === ',' ? '.' : ',';
    return cleaned.split(thousandsSeparator).join('').replace(decimalSeparator, '.');
  }

  if (hasComma && countOf(cleaned, ',') === 1 && cleaned.split(',')[1].length <= 2) {
    return cleaned.replace(',', '.');
  }

  if (hasDot && countOf(cleaned, '.') === 1) {
    return cleaned;
  }

  // Several separators of one kind (or one comma before 3+ digits):
  // a short trailing group is the decimal part, everything else is grouping.
  const groups = cleaned.split(/[.,]/);
  if (groups.length > 1 && groups[groups.length - 1].length <= 2) {
    return `${groups.slice(0, -1).join('')}.${groups[groups.length - 1]}`;
  }
  return groups.join('');
}

/**
 * Parses a loosely formatted number. Returns null when nothing numeric
 * remains or the result is not a well-formed number.
 *
 * parseLooseNumber('1.234,56') // 1234.56
 * parseLooseNumber('1,234,567') // 1234567
 */
export function parseLooseNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value.trim().replace(/[^\d.,-]/g, '');
  if (!/\d/.test(cleaned)) return null;

  return toNumber(normalizeSeparators(cleaned));
}

/** Number for arithmetic: absent or unparseable input counts as 0. */
export function safeNumber(value: unknown): number {
  if (isAbsentValue(value)) return 0;
  return parseLooseNumber(value) ?? 0;
}

import type { ParsedAmount } from '../types/invoice.js';

// Longest first so "US$" wins over "$"
const CURRENCY_SYMBOLS: Array<[string, string]> = [
  ['US$', 'USD'],
  ['CA$', 'CAD'],
  ['A$', 'AUD'],
  ['HK$', 'HKD'],
  ['RMB', 'CNY'],
  ['￥', 'CNY'],
  ['¥', 'CNY'],
  ['元', 'CNY'],
  ['$', 'USD'],
  ['€', 'EUR'],
  ['£', 'GBP'],
  ['₹', 'INR'],
  ['₩', 'KRW'],
];

// ISO-4217 codes accepted next to an amount; other three-letter words are not currencies
export const ISO_CURRENCY_CODES = [
  'USD', 'EUR', 'GBP', 'CNY', 'JPY', 'HKD', 'TWD', 'SGD', 'KRW', 'INR',
  'CAD', 'AUD', 'NZD', 'CHF', 'SEK', 'NOK', 'DKK', 'PLN', 'CZK', 'HUF',
  'MYR', 'THB', 'PHP', 'IDR', 'VND', 'AED', 'SAR', 'ZAR', 'MXN', 'BRL',
] as const;

const ISO_CODE = new RegExp(`\\b(${ISO_CURRENCY_CODES.join('|')})\\b`);
const NUMBER = /[-+]?\d(?:[\d.,'\s]*\d)?/;

function detectCurrency(text: string): string | null {
  for (const [symbol, code] of CURRENCY_SYMBOLS) {
    if (text.includes(symbol)) {
      return code;
    }
  }

  const iso = text.match(ISO_CODE);
  return iso ? iso[1] : null;
}

/**
 * Normalize "1.250,00", "1,250.00", "1 250,00" or "1'250.00" to a plain
 * decimal string. A lone separator followed by exactly three digits cannot
 * be told apart from a thousands separator, so the result is flagged.
 */
function normalizeNumber(numeric: string): { normalized: string; ambiguous: boolean } {
  const compact = numeric.replace(/[\s']/g, '');
  const lastDot = compact.lastIndexOf('.');
  const lastComma = compact.lastIndexOf(',');

  if (lastDot === -1 && lastComma === -1) {
    return { normalized: compact, ambiguous: false };
  }

  if (lastDot !== -1 && lastComma !== -1) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const thousands = decimal === '.' ? ',' : '.';
    const withoutThousands = compact.split(thousands).join('');
    return { normalized: withoutThousands.replace(decimal, '.'), ambiguous: false };
  }

  const separator = lastDot !== -1 ? '.' : ',';
  const parts = compact.split(separator);

  if (parts.length > 2) {
    // Repeated separator can only group thousands
    return { normalized: parts.join(''), ambiguous: false };
  }

  const [whole, fraction] = parts;
  if (fraction.length === 3) {
    return separator === ','
      ? { normalized: `${whole}${fraction}`, ambiguous: true }
      : { normalized: `${whole}.${fraction}`, ambiguous: true };
  }

  return { normalized: `${whole}.${fraction}`, ambiguous: false };
}

export function parseAmount(raw: string): ParsedAmount {
  const trimmed = raw.trim();
  const currency = detectCurrency(trimmed);
  const numberMatch = trimmed.match(NUMBER);

  if (!numberMatch) {
    return { raw: trimmed, value: null, currency, ambiguous: false };
  }

  const { normalized, ambiguous } = normalizeNumber(numberMatch[0].trim());
  const value = Number(normalized);

  return {
    raw: trimmed,
    value: Number.isFinite(value) ? Math.round(value * 100) / 100 : null,
    currency,
    ambiguous,
  };
}

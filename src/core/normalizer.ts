import type { FieldKind, MissingReason, Normalized, PeriodDate } from './types';

const MISSING_TOKENS = new Set(['', 'NA', 'N/A', '-', 'NAN', 'NULL']);

// Three-letter prefixes, English and Norwegian spellings
const MONTH_PREFIXES: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, mai: 5, jun: 6, jul: 7,
  aug: 8, sep: 9, oct: 10, okt: 10, nov: 11, dec: 12, des: 12
};

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const FULL_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const DOTTED_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const YEAR_MONTH = /^(\d{4})[-/](\d{1,2})$/;
const NAMED_MONTH = /^([a-zæøå]{3,})\.?[\s./-]*(\d{4}|\d{2})$/i;
const BARE_YEAR = /^(\d{4})$/;

const missing = <T>(reason: MissingReason): Normalized<T> => ({ missing: true, reason });
const present = <T>(value: T): Normalized<T> => ({ missing: false, value });

export function normalize(raw: string | null | undefined, kind: 'number'): Normalized<number>;
export function normalize(raw: string | null | undefined, kind: 'integer'): Normalized<number>;
export function normalize(raw: string | null | undefined, kind: 'date'): Normalized<PeriodDate>;
export function normalize(raw: string | null | undefined, kind: 'text'): Normalized<string>;
export function normalize(
  raw: string | null | undefined,
  kind: FieldKind
): Normalized<number | PeriodDate | string>;
export function normalize(
  raw: string | null | undefined,
  kind: FieldKind
): Normalized<number | PeriodDate | string> {
  switch (kind) {
    case 'number':
      return normalizeNumber(raw);
    case 'integer':
      return normalizeInteger(raw);
    case 'date':
      return normalizeDate(raw);
    case 'text':
      return normalizeText(raw);
  }
}

export function monthFromName(name: string): number | null {
  const token = name.trim().toLowerCase();
  if (token.length < 3) return null;
  return MONTH_PREFIXES[token.slice(0, 3)] ?? null;
}

function isMissingToken(value: string): boolean {
  return MISSING_TOKENS.has(value.toUpperCase());
}

function normalizeNumber(raw: string | null | undefined): Normalized<number> {
  if (raw == null) return missing('empty');
  let s = raw.replace(/[\s\u00a0\u2007\u2009\u202f\ufeff]/g, '').replace(/\u2212/g, '-');
  if (isMissingToken(s)) return missing('empty');

  const lastComma = s.lastIndexOf(',');
  const lastDot = s.lastIndexOf('.');
  if (lastComma >= 0 && lastDot >= 0) {
    s = lastComma > lastDot
      ? s.replace(/\./g, '').replace(',', '.')
      : s.replace(/,/g, '');
  } else if (lastComma >= 0) {
    if (s.indexOf(',') !== lastComma) return missing('invalid-format');
    s = s.replace(',', '.');
  }

  if (!NUMBER_PATTERN.test(s)) return missing('invalid-format');
  const value = Number(s);
  if (!Number.isFinite(value)) return missing('out-of-range');
  return present(value);
}

function normalizeInteger(raw: string | null | undefined): Normalized<number> {
  const result = normalizeNumber(raw);
  if (result.missing) return result;
  // 2023.5 must not turn into year 2023
  if (!Number.isInteger(result.value)) return missing('invalid-format');
  if (!Number.isSafeInteger(result.value)) return missing('out-of-range');
  return result;
}

function normalizeDate(raw: string | null | undefined): Normalized<PeriodDate> {
  if (raw == null) return missing('empty');
  const s = raw.replace(/[\u00a0\ufeff]/g, ' ').trim();
  if (isMissingToken(s)) return missing('empty');

  let match = FULL_DATE.exec(s);
  if (match) return buildDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = DOTTED_DATE.exec(s);
  if (match) return buildDate(Number(match[3]), Number(match[2]), Number(match[1]));

  match = YEAR_MONTH.exec(s);
  if (match) return buildDate(Number(match[1]), Number(match[2]), null);

  match = NAMED_MONTH.exec(s);
  if (match) {
    const month = monthFromName(match[1]);
    if (month === null) return missing('invalid-format');
    const year = match[2].length === 2 ? 2000 + Number(match[2]) : Number(match[2]);
    return buildDate(year, month, null);
  }

  match = BARE_YEAR.exec(s);
  if (match) return present({ year: Number(match[1]), month: null, day: null });

  return missing('invalid-format');
}

function buildDate(year: number, month: number, day: number | null): Normalized<PeriodDate> {
  if (month < 1 || month > 12) return missing('out-of-range');
  if (day !== null) {
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    if (day < 1 || day > daysInMonth) return missing('out-of-range');
  }
  return present({ year, month, day });
}

function normalizeText(raw: string | null | undefined): Normalized<string> {
  if (raw == null) return missing('empty');
  const s = raw
    .replace(/^\ufeff/, '')
    .trim()
    .replace(/^"(.*)"$/s, '$1')
    .replace(/\s+/g, ' ')
    .trim();
  if (isMissingToken(s)) return missing('empty');
  return present(s);
}

/**
 * Payment Terms
 * Terms codes, display labels and normalisation of free-form terms input
 */

import { ValidationError } from '../errors';

export enum TermsCode {
  NET_7 = 'net_7',
  NET_15 = 'net_15',
  NET_20 = 'net_20',
  NET_30 = 'net_30',
  NET_45 = 'net_45',
  COD = 'cod',
  BILL_TO_BILL = 'bill_to_bill',
  MONTH_TO_MONTH = 'month_to_month',
  WEEK_TO_WEEK = 'week_to_week',
}

export const DEFAULT_TERMS_CODE = TermsCode.NET_30;

/**
 * Fixed-offset terms: due date = ship date + N days
 */
export const TERM_DAYS: Partial<Record<TermsCode, number>> = {
  [TermsCode.NET_7]: 7,
  [TermsCode.NET_15]: 15,
  [TermsCode.NET_20]: 20,
  [TermsCode.NET_30]: 30,
  [TermsCode.NET_45]: 45,
  [TermsCode.COD]: 1,
};

export const TERM_LABELS: Record<TermsCode, string> = {
  [TermsCode.NET_7]: 'Net 7',
  [TermsCode.NET_15]: 'Net 15',
  [TermsCode.NET_20]: 'Net 20',
  [TermsCode.NET_30]: 'Net 30',
  [TermsCode.NET_45]: 'Net 45',
  [TermsCode.COD]: 'COD',
  [TermsCode.BILL_TO_BILL]: 'Bill to Bill',
  [TermsCode.MONTH_TO_MONTH]: 'Month to Month',
  [TermsCode.WEEK_TO_WEEK]: 'Week to Week',
};

const CODES = new Set<string>(Object.values(TermsCode));

const LABEL_TO_CODE = new Map<string, TermsCode>(
  Object.values(TermsCode).map((code) => [TERM_LABELS[code].toLowerCase(), code])
);

const COLLAPSED_FORMS = new Map<string, TermsCode>([
  ['cod', TermsCode.COD],
  ['c.o.d', TermsCode.COD],
  ['c.o.d.', TermsCode.COD],
  ['billtobill', TermsCode.BILL_TO_BILL],
  ['monthtomonth', TermsCode.MONTH_TO_MONTH],
  ['weektoweek', TermsCode.WEEK_TO_WEEK],
]);

export function isTermsCode(value: string): value is TermsCode {
  return CODES.has(value);
}

function fixedDayCode(days: number): TermsCode | null {
  const code = `net_${days}`;
  return isTermsCode(code) && TERM_DAYS[code] !== undefined ? code : null;
}

/**
 * Map a terms value (code, label, day count, "net 30" text) to a terms code
 *
 * @returns the code, or null when the value is empty or not recognised
 */
export function normalizeTermsCode(value: unknown): TermsCode | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? fixedDayCode(Math.trunc(value)) : null;
  }

  let v = String(value).trim().toLowerCase();
  if (!v) return null;
  if (isTermsCode(v)) return v;

  const byLabel = LABEL_TO_CODE.get(v);
  if (byLabel) return byLabel;

  if (/^\d+(\.\d+)?$/.test(v)) {
    return fixedDayCode(Math.trunc(Number(v)));
  }

  v = v.replace(/[_-]/g, ' ').replace(/\s+/g, ' ').trim();
  const bySpacedLabel = LABEL_TO_CODE.get(v);
  if (bySpacedLabel) return bySpacedLabel;

  if (v.startsWith('net')) {
    const digits = v.replace(/\D/g, '');
    if (digits) return fixedDayCode(Number(digits));
  }

  return COLLAPSED_FORMS.get(v.replace(/\s/g, '')) ?? null;
}

/**
 * Like normalizeTermsCode, but falls back instead of returning null
 */
export function getTermsCode(value: unknown, fallback: TermsCode = DEFAULT_TERMS_CODE): TermsCode {
  return normalizeTermsCode(value) ?? fallback;
}

/**
 * Strict variant for admin input: empty values take the default,
 * anything unrecognised is rejected.
 *
 * @throws ValidationError
 */
export function parseTermsCode(value: unknown): TermsCode {
  if (value === null || value === undefined || String(value).trim() === '') {
    return DEFAULT_TERMS_CODE;
  }
  const code = normalizeTermsCode(value);
  if (!code) {
    throw new ValidationError(`Unrecognised payment terms: ${String(value)}`);
  }
  return code;
}

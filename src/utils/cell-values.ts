/**
 * Spreadsheet cell helpers for row-based imports
 */

export type SheetRow = Record<string, unknown>;

/**
 * Import header form: trimmed, lower case, spaces as underscores
 *
 * @example
 * importHeader(' Group Name ') // => 'group_name'
 */
export function importHeader(header: string): string {
  return header.trim().toLowerCase().replace(/ /g, '_');
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * First non-blank value among the candidate columns
 */
export function cellValue(row: SheetRow, keys: string[]): unknown {
  for (const key of keys) {
    const value = row[key];
    if (value === null || value === undefined) continue;
    if (typeof value === 'string' && value.trim() === '') continue;
    if (typeof value === 'number' && Number.isNaN(value)) continue;
    return value;
  }
  return undefined;
}

/**
 * Integer cell, truncated and clamped; unreadable values give the fallback
 */
export function cellInt(value: unknown, fallback: number, min: number, max: number): number {
  if (value === null || value === undefined) return fallback;
  const parsed = typeof value === 'number' ? value : parseFloat(String(value));
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, Math.trunc(parsed)));
}

const FALSE_WORDS = new Set(['0', 'false', 'no', 'n', 'off']);
const TRUE_WORDS = new Set(['1', 'true', 'yes', 'y', 'on']);

/**
 * Yes/no cell: words, numbers and booleans; anything else gives the fallback
 */
export function cellBool(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isNaN(value) ? fallback : value !== 0;
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (FALSE_WORDS.has(word)) return false;
    if (TRUE_WORDS.has(word)) return true;
  }
  return fallback;
}

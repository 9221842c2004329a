/**
 * Value normalization for cells read from year sheets
 */

import { CellPrimitive, KeywordFrequencyCounts, Year } from './types';

export const STOCK_CODE_WIDTH = 6;

/** Code given to rows of a sheet that has no stock code column */
export const UNKNOWN_STOCK_CODE = '0'.repeat(STOCK_CODE_WIDTH);

/**
 * Canonical 6-digit stock code.
 * Strips the ".0" left by numeric coercion and exchange markers such as "SZ" or ".SH".
 * @returns null when the value has no digits or more than 6 of them
 */
export function normalizeStockCode(value: CellPrimitive): string | null {
  const text = value === null ? '' : String(value).trim().replace(/\.0+$/, '');
  const digits = text.replace(/\D/g, '');
  if (digits === '' || digits.length > STOCK_CODE_WIDTH) return null;
  return digits.padStart(STOCK_CODE_WIDTH, '0');
}

export function normalizeCompanyName(value: CellPrimitive): string {
  return value === null ? '' : String(value).trim();
}

/**
 * Parse a cell as a finite number, or null
 */
export function toOptionalNumber(value: CellPrimitive): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Keyword frequency count: a finite non-negative number, anything else is 0
 */
export function toCount(value: CellPrimitive): number {
  const parsed = toOptionalNumber(value);
  return parsed !== null && parsed > 0 ? parsed : 0;
}

/**
 * Digit-only years become numbers, other text is kept as a tag
 * @returns null for empty cells
 */
export function parseYear(value: CellPrimitive): Year | null {
  if (value === null || typeof value === 'boolean') return null;

  const text = String(value).trim().replace(/\.0+$/, '');
  if (text === '') return null;
  return /^\d+$/.test(text) ? Number(text) : text;
}

/**
 * Numeric years ascending, then text tags
 */
export function compareYears(a: Year, b: Year): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a.localeCompare(b);
}

export function emptyCounts(): KeywordFrequencyCounts {
  return {
    artificialIntelligence: 0,
    bigData: 0,
    cloudComputing: 0,
    blockchain: 0,
    digitalTechnologyUsage: 0
  };
}

/**
 * Transformation index scoring
 *
 * Two interchangeable policies:
 * - per-year-share: each record's keyword total relative to the largest total of its year,
 *   so every year with any activity has a leader at 100
 * - global-min-max: min-max scaling of the composite index column over all years combined
 */

import { buildTable } from './loader';
import {
  CompanyYearRecord,
  ConsolidatedTable,
  IndexOptions,
  IndexPolicy,
  KEYWORD_CATEGORIES,
  KeywordFrequencyCounts
} from './types';

export const DEFAULT_POLICY: IndexPolicy = 'per-year-share';

export const INDEX_POLICIES: readonly IndexPolicy[] = ['per-year-share', 'global-min-max'];

export function isIndexPolicy(value: string): value is IndexPolicy {
  return INDEX_POLICIES.some(policy => policy === value);
}

export function keywordTotal(counts: KeywordFrequencyCounts): number {
  return KEYWORD_CATEGORIES.reduce((sum, category) => sum + (counts[category] || 0), 0);
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clip(value: number): number {
  return Math.min(100, Math.max(0, value));
}

function yearKey(record: CompanyYearRecord): string {
  return `${typeof record.year}:${record.year}`;
}

function perYearShare(records: CompanyYearRecord[]): CompanyYearRecord[] {
  const totals = records.map(record => keywordTotal(record.keywordFrequencyCounts));

  const yearMax = new Map<string, number>();
  records.forEach((record, i) => {
    const key = yearKey(record);
    yearMax.set(key, Math.max(yearMax.get(key) ?? 0, totals[i]));
  });

  return records.map((record, i) => {
    const total = totals[i];
    const max = yearMax.get(yearKey(record)) ?? 0;

    let index = 0;
    if (max > 0 && total > 0) {
      index = clip(roundTo2((total / max) * 100));
    }
    return { ...record, transformationIndex: index };
  });
}

function globalMinMax(records: CompanyYearRecord[], zeroFill: boolean): CompanyYearRecord[] {
  const sources = records.map(record => {
    if (zeroFill && keywordTotal(record.keywordFrequencyCounts) === 0) {
      return 0;
    }
    // No composite column: scale the keyword total instead
    return record.compositeIndex ?? keywordTotal(record.keywordFrequencyCounts);
  });

  const nonzero = sources.filter(source => source !== 0);
  if (nonzero.length === 0) {
    return records.map(record => ({ ...record, transformationIndex: 0 }));
  }

  const min = nonzero.reduce((a, b) => Math.min(a, b));
  const max = nonzero.reduce((a, b) => Math.max(a, b));
  const range = max - min;

  return records.map((record, i) => {
    const index = range === 0 ? 0 : roundTo2(clip(((sources[i] - min) / range) * 100));
    return { ...record, transformationIndex: index };
  });
}

/**
 * Score every record under the selected policy
 * @param records - Consolidated records (left untouched)
 * @param options - Policy and zero-fill switch
 * @returns New records with transformationIndex set
 */
export function calculateIndex(records: CompanyYearRecord[], options: IndexOptions): CompanyYearRecord[] {
  if (options.policy === 'global-min-max') {
    return globalMinMax(records, options.zeroFill !== false);
  }
  return perYearShare(records);
}

/**
 * Score a consolidated table, returning a new table
 */
export function scoreTable(table: ConsolidatedTable, options: IndexOptions): ConsolidatedTable {
  return buildTable(calculateIndex(table.records, options));
}

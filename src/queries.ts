/**
 * Read-only views over a scored table: lookups, yearly averages and company series
 */

import { roundTo2 } from './calculator';
import { findClosestMatches } from './feedback';
import { compareYears, emptyCounts, normalizeStockCode } from './normalize';
import {
  CompanyYearRecord,
  ConsolidatedTable,
  KEYWORD_CATEGORIES,
  KeywordFrequencyCounts,
  Year
} from './types';

export interface RecordQuery {
  stockCode?: string;
  companyName?: string;
  year?: Year;
}

export interface YearlyAverage {
  year: Year;
  averageIndex: number;
  companyCount: number;
}

export type SeriesPoint = { year: Year; transformationIndex: number } & KeywordFrequencyCounts;

/**
 * Filter records; criteria combine with AND.
 * Stock codes are normalized before an exact match (an invalid code matches nothing), company names match case-insensitively as substrings.
 * @returns Matching records, empty when nothing matches
 */
export function filterRecords(records: CompanyYearRecord[], query: RecordQuery): CompanyYearRecord[] {
  const codeText = query.stockCode?.trim() ?? '';
  const code = codeText === '' ? null : normalizeStockCode(codeText);
  // A code that cannot be a stock code matches nothing
  if (codeText !== '' && code === null) return [];

  const name = query.companyName !== undefined && query.companyName.trim() !== ''
    ? query.companyName.trim().toLowerCase()
    : null;

  return records.filter(record => {
    if (code !== null && record.stockCode !== code) return false;
    if (name !== null && !record.companyName.toLowerCase().includes(name)) return false;
    if (query.year !== undefined && compareYears(record.year, query.year) !== 0) return false;
    return true;
  });
}

/**
 * Company names close to a search term that matched nothing
 */
export function suggestCompanyNames(table: ConsolidatedTable, term: string, maxSuggestions: number = 3): string[] {
  return findClosestMatches(term.trim(), table.companyNames, maxSuggestions);
}

/**
 * Average transformation index per year, for the industry trend view
 */
export function yearlyAverages(records: CompanyYearRecord[]): YearlyAverage[] {
  const groups = new Map<string, { year: Year; sum: number; count: number }>();

  for (const record of records) {
    const key = `${typeof record.year}:${record.year}`;
    const group = groups.get(key) ?? { year: record.year, sum: 0, count: 0 };
    group.sum += record.transformationIndex;
    group.count += 1;
    groups.set(key, group);
  }

  return Array.from(groups.values())
    .sort((a, b) => compareYears(a.year, b.year))
    .map(group => ({
      year: group.year,
      averageIndex: roundTo2(group.sum / group.count),
      companyCount: group.count
    }));
}

/**
 * One company's index and raw counts ordered by year
 * @param stockCode - Any form of the code; normalized before matching
 */
export function companySeries(records: CompanyYearRecord[], stockCode: string): SeriesPoint[] {
  return filterRecords(records, { stockCode })
    .sort((a, b) => compareYears(a.year, b.year))
    .map(record => {
      const point: SeriesPoint = {
        year: record.year,
        transformationIndex: record.transformationIndex,
        ...record.keywordFrequencyCounts
      };
      return point;
    });
}

/**
 * Average count per keyword category over a record set
 */
export function averageCounts(records: CompanyYearRecord[]): KeywordFrequencyCounts {
  const averages = emptyCounts();
  if (records.length === 0) return averages;

  for (const category of KEYWORD_CATEGORIES) {
    const sum = records.reduce((acc, record) => acc + record.keywordFrequencyCounts[category], 0);
    averages[category] = roundTo2(sum / records.length);
  }
  return averages;
}

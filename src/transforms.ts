/**
 * Flatten records and series into display rows for tables and Excel export
 */

import { SeriesPoint, YearlyAverage } from './queries';
import { CompanyYearRecord, KEYWORD_CATEGORIES, KeywordCategory } from './types';

export const CATEGORY_LABELS: Record<KeywordCategory, string> = {
  artificialIntelligence: 'Artificial Intelligence',
  bigData: 'Big Data',
  cloudComputing: 'Cloud Computing',
  blockchain: 'Blockchain',
  digitalTechnologyUsage: 'Digital Technology Usage'
};

export type DisplayRow = Record<string, string | number>;

/**
 * Flatten one record, spreading the keyword counts into labelled columns
 */
export function flattenRecord(record: CompanyYearRecord): DisplayRow {
  const row: DisplayRow = {
    'Stock Code': record.stockCode,
    'Company Name': record.companyName,
    'Year': record.year
  };

  for (const category of KEYWORD_CATEGORIES) {
    row[CATEGORY_LABELS[category]] = record.keywordFrequencyCounts[category];
  }

  row['Transformation Index'] = record.transformationIndex;
  return row;
}

/**
 * Full per-company history, ordered as given
 */
export function historyToRows(records: CompanyYearRecord[]): DisplayRow[] {
  return records.map(record => flattenRecord(record));
}

/**
 * Company trend series
 */
export function seriesToRows(series: SeriesPoint[]): DisplayRow[] {
  return series.map(point => {
    const row: DisplayRow = {
      'Year': point.year,
      'Transformation Index': point.transformationIndex
    };
    for (const category of KEYWORD_CATEGORIES) {
      row[CATEGORY_LABELS[category]] = point[category];
    }
    return row;
  });
}

/**
 * Industry-wide trend
 */
export function averagesToRows(averages: YearlyAverage[]): DisplayRow[] {
  return averages.map(average => ({
    'Year': average.year,
    'Average Index': average.averageIndex,
    'Companies': average.companyCount
  }));
}

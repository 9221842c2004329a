/**
 * Plain-text report for one company's record set
 */

import { roundTo2 } from './calculator';
import { averageCounts } from './queries';
import { compareYears } from './normalize';
import { CATEGORY_LABELS } from './transforms';
import { CompanyYearRecord, KEYWORD_CATEGORIES, Year } from './types';

export interface ReportOptions {
  /** Timestamp printed in the header; defaults to the current time */
  now?: Date;
}

export type TrendDirection = 'rising' | 'falling' | 'flat';

export interface CompanyStats {
  years: Year[];
  maxIndex: number;
  maxYear: Year;
  averageIndex: number;
  firstIndex: number;
  firstYear: Year;
  latestIndex: number;
  latestYear: Year;
  direction: TrendDirection;
  /** Percentage change since the first year; null when the first index is 0 */
  changePercent: number | null;
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Summary statistics over a company's years
 * @returns null for an empty record set
 */
export function companyStats(records: CompanyYearRecord[]): CompanyStats | null {
  if (records.length === 0) return null;

  const ordered = records.slice().sort((a, b) => compareYears(a.year, b.year));
  const first = ordered[0];
  const latest = ordered[ordered.length - 1];

  // Earliest year wins a tie for the maximum
  const best = ordered.reduce((top, record) =>
    record.transformationIndex > top.transformationIndex ? record : top
  );

  const sum = ordered.reduce((acc, record) => acc + record.transformationIndex, 0);

  let direction: TrendDirection = 'flat';
  if (latest.transformationIndex > first.transformationIndex) direction = 'rising';
  if (latest.transformationIndex < first.transformationIndex) direction = 'falling';

  const changePercent = first.transformationIndex === 0
    ? null
    : roundTo2(((latest.transformationIndex - first.transformationIndex) / first.transformationIndex) * 100);

  return {
    years: ordered.map(record => record.year),
    maxIndex: best.transformationIndex,
    maxYear: best.year,
    averageIndex: roundTo2(sum / ordered.length),
    firstIndex: first.transformationIndex,
    firstYear: first.year,
    latestIndex: latest.transformationIndex,
    latestYear: latest.year,
    direction,
    changePercent
  };
}

/**
 * Render the digital transformation report for one company
 * @param records - Every record of the company, any order
 */
export function generateReport(records: CompanyYearRecord[], options: ReportOptions = {}): string {
  const stats = companyStats(records);
  if (stats === null) {
    return 'No data available for this company.';
  }

  const now = options.now ?? new Date();
  const { stockCode, companyName } = records[0];
  const change = stats.changePercent === null
    ? 'n/a'
    : `${stats.changePercent > 0 ? '+' : ''}${stats.changePercent.toFixed(2)}%`;
  const averages = averageCounts(records);

  const lines = [
    'Digital Transformation Report',
    '='.repeat(40),
    `Company: ${companyName} (${stockCode})`,
    `Generated: ${formatTimestamp(now)}`,
    '',
    `Coverage: ${stats.years.join(', ')} (${stats.years.length} year(s))`,
    `Maximum index: ${stats.maxIndex.toFixed(2)} (${stats.maxYear})`,
    `Average index: ${stats.averageIndex.toFixed(2)}`,
    `Latest index: ${stats.latestIndex.toFixed(2)} (${stats.latestYear})`,
    `Trend: ${stats.direction}, ${change} since ${stats.firstYear}`,
    '',
    'Average keyword frequency:'
  ];

  for (const category of KEYWORD_CATEGORIES) {
    lines.push(`  ${CATEGORY_LABELS[category]}: ${averages[category].toFixed(2)}`);
  }

  return lines.join('\n');
}

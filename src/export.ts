/**
 * Excel snapshots of the trend series and company history
 */

import * as fs from 'fs';
import * as path from 'path';
import { SeriesPoint, YearlyAverage } from './queries';
import { averagesToRows, DisplayRow, historyToRows, seriesToRows } from './transforms';
import { CompanyYearRecord } from './types';
import { writeExcelData } from './utils';

async function writeRows(rows: DisplayRow[], sheetName: string, filePath: string): Promise<string> {
  const resolvedPath = path.resolve(filePath);
  const dir = path.dirname(resolvedPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const workbook = writeExcelData(rows, {
    sheetName,
    columnWidth: 20,
    boldHeaders: true
  });
  await workbook.xlsx.writeFile(resolvedPath);
  return resolvedPath;
}

/**
 * Write a company's trend series to a one-sheet workbook
 * @returns Absolute path of the written file
 */
export function exportSeries(series: SeriesPoint[], filePath: string): Promise<string> {
  return writeRows(seriesToRows(series), 'Trend', filePath);
}

/**
 * Write a company's full history to a one-sheet workbook
 * @returns Absolute path of the written file
 */
export function exportHistory(records: CompanyYearRecord[], filePath: string): Promise<string> {
  return writeRows(historyToRows(records), 'Company History', filePath);
}

export function exportYearlyAverages(averages: YearlyAverage[], filePath: string): Promise<string> {
  return writeRows(averagesToRows(averages), 'Industry Trend', filePath);
}

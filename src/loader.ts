/**
 * Workbook loading and sheet consolidation
 */

import * as fs from 'fs';
import ExcelJS from 'exceljs';
import { resolveColumns, ResolvedColumns } from './columns';
import {
  compareYears,
  emptyCounts,
  normalizeCompanyName,
  normalizeStockCode,
  parseYear,
  toCount,
  toOptionalNumber,
  UNKNOWN_STOCK_CODE
} from './normalize';
import {
  CompanyYearRecord,
  ConsolidatedTable,
  KEYWORD_CATEGORIES,
  KeywordFrequencyCounts,
  LoadOptions,
  LoadResult,
  RawRow,
  Year
} from './types';
import { readExcelData } from './utils';

const DIGITS_ONLY = /^\d+$/;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isBlank(value: RawRow[string] | undefined): boolean {
  return value === undefined || value === null || String(value).trim() === '';
}

/**
 * Sheets to consolidate under the given selection policy
 */
export function selectSheets(workbook: ExcelJS.Workbook, options: LoadOptions): ExcelJS.Worksheet[] {
  if (options.sheetSelection === 'all-sheets') {
    return workbook.worksheets;
  }
  return workbook.worksheets.filter(sheet => DIGITS_ONLY.test(sheet.name.trim()));
}

function sheetYear(sheetName: string): Year | null {
  const name = sheetName.trim();
  return DIGITS_ONLY.test(name) ? Number(name) : null;
}

type RowOutcome =
  | { status: 'record'; record: CompanyYearRecord }
  | { status: 'blank' }
  | { status: 'invalid-code' };

function rowToRecord(
  row: RawRow,
  columns: ResolvedColumns,
  year: Year
): RowOutcome {
  const rawCode = columns.stockCode === null ? null : row[columns.stockCode];
  const rawName = columns.companyName === null ? null : row[columns.companyName];

  const counts: KeywordFrequencyCounts = emptyCounts();
  for (const category of KEYWORD_CATEGORIES) {
    const header = columns.keywords[category];
    counts[category] = header === undefined ? 0 : toCount(row[header]);
  }

  const compositeIndex = columns.compositeIndex === null
    ? null
    : toOptionalNumber(row[columns.compositeIndex]);

  const hasCounts = KEYWORD_CATEGORIES.some(category => counts[category] !== 0);
  if (isBlank(rawCode) && isBlank(rawName) && !hasCounts && compositeIndex === null) {
    return { status: 'blank' };
  }

  let stockCode = UNKNOWN_STOCK_CODE;
  if (rawCode !== undefined && !isBlank(rawCode)) {
    const normalized = normalizeStockCode(rawCode);
    if (normalized === null) {
      return { status: 'invalid-code' };
    }
    stockCode = normalized;
  }

  return {
    status: 'record',
    record: {
      stockCode,
      companyName: normalizeCompanyName(rawName ?? null),
      year,
      keywordFrequencyCounts: counts,
      compositeIndex,
      transformationIndex: 0
    }
  };
}

function consolidateSheet(
  worksheet: ExcelJS.Worksheet,
  options: LoadOptions,
  warnings: string[]
): CompanyYearRecord[] | null {
  const { headers, rows } = readExcelData(worksheet);
  const columns = resolveColumns(headers);

  if (columns.stockCode === null && columns.companyName === null) {
    warnings.push(`Sheet "${worksheet.name}" has neither a stock code nor a company name column, skipped`);
    return null;
  }

  if (columns.stockCode === null) {
    warnings.push(`Sheet "${worksheet.name}" has no stock code column, codes set to ${UNKNOWN_STOCK_CODE}`);
  }

  if (columns.missingKeywords.length > 0) {
    warnings.push(
      `Sheet "${worksheet.name}" is missing keyword columns (${columns.missingKeywords.join(', ')}), filled with 0`
    );
  }

  const fixedYear = sheetYear(worksheet.name);
  const records: CompanyYearRecord[] = [];
  let invalidCodes = 0;

  for (const row of rows) {
    let year: Year = fixedYear ?? worksheet.name;
    if (fixedYear === null && options.sheetSelection === 'all-sheets' && columns.year !== null) {
      year = parseYear(row[columns.year]) ?? worksheet.name;
    }

    const outcome = rowToRecord(row, columns, year);
    if (outcome.status === 'record') {
      records.push(outcome.record);
    } else if (outcome.status === 'invalid-code') {
      invalidCodes++;
    }
  }

  if (invalidCodes > 0) {
    warnings.push(`Sheet "${worksheet.name}" skipped ${invalidCodes} row(s) with an invalid stock code`);
  }

  return records;
}

/**
 * Build the lookup indexes for a record list
 */
export function buildTable(records: CompanyYearRecord[]): ConsolidatedTable {
  const nameByCode: Record<string, string> = {};
  const names = new Set<string>();
  const years = new Map<string, Year>();

  for (const record of records) {
    if (!(record.stockCode in nameByCode)) {
      nameByCode[record.stockCode] = record.companyName;
    }
    if (record.companyName) {
      names.add(record.companyName);
    }
    years.set(`${typeof record.year}:${record.year}`, record.year);
  }

  return {
    records,
    stockCodes: Object.keys(nameByCode).sort(),
    companyNames: Array.from(names).sort(),
    years: Array.from(years.values()).sort(compareYears),
    nameByCode
  };
}

/**
 * Consolidate the selected sheets of an opened workbook into one table
 * @param workbook - ExcelJS workbook
 * @param options - Sheet selection policy
 */
export function consolidateWorkbook(workbook: ExcelJS.Workbook, options: LoadOptions): LoadResult {
  const warnings: string[] = [];
  const sheets = selectSheets(workbook, options);

  if (sheets.length === 0) {
    const reason = options.sheetSelection === 'year-sheets'
      ? 'No year sheets found (expected sheet names made of digits, e.g. "2020")'
      : 'Workbook contains no sheets';
    return { status: 'empty', reason, warnings };
  }

  const records: CompanyYearRecord[] = [];
  const sheetsLoaded: string[] = [];

  for (const worksheet of sheets) {
    try {
      const sheetRecords = consolidateSheet(worksheet, options, warnings);
      if (sheetRecords === null) continue;

      records.push(...sheetRecords);
      sheetsLoaded.push(worksheet.name);
    } catch (error) {
      warnings.push(`Sheet "${worksheet.name}" could not be read: ${errorMessage(error)}`);
    }
  }

  if (records.length === 0) {
    return { status: 'empty', reason: 'No data rows found in the selected sheets', warnings };
  }

  return { status: 'ok', table: buildTable(records), warnings, sheetsLoaded };
}

/**
 * Open a workbook file and consolidate it. Never rejects: failures become an empty result.
 * @param filePath - Path to the .xlsx file
 * @param options - Sheet selection policy
 */
export async function loadWorkbook(filePath: string, options: LoadOptions): Promise<LoadResult> {
  if (!fs.existsSync(filePath)) {
    return { status: 'empty', reason: `Workbook not found: ${filePath}`, warnings: [] };
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    return {
      status: 'empty',
      reason: `Workbook could not be opened: ${errorMessage(error)}`,
      warnings: []
    };
  }

  return consolidateWorkbook(workbook, options);
}

/**
 * Type definitions for the digital transformation index tool
 */

/**
 * Tracked keyword categories, in display order
 */
export const KEYWORD_CATEGORIES = [
  'artificialIntelligence',
  'bigData',
  'cloudComputing',
  'blockchain',
  'digitalTechnologyUsage'
] as const;

export type KeywordCategory = typeof KEYWORD_CATEGORIES[number];

export type KeywordFrequencyCounts = Record<KeywordCategory, number>;

/**
 * Digit-only years are numbers; anything else is kept as a literal tag
 */
export type Year = number | string;

/**
 * Primitive value of a spreadsheet cell after extraction
 */
export type CellPrimitive = string | number | boolean | null;

export type RawRow = Record<string, CellPrimitive>;

/**
 * One row per (company, year)
 */
export interface CompanyYearRecord {
  stockCode: string;
  companyName: string;
  year: Year;
  keywordFrequencyCounts: KeywordFrequencyCounts;
  /** Precomputed composite index column, only read by the global min-max policy */
  compositeIndex: number | null;
  transformationIndex: number;
}

export interface ConsolidatedTable {
  records: CompanyYearRecord[];
  stockCodes: string[];
  companyNames: string[];
  years: Year[];
  /** Stock code → company name of its first occurrence */
  nameByCode: Record<string, string>;
}

export type SheetSelection = 'year-sheets' | 'all-sheets';

export type IndexPolicy = 'per-year-share' | 'global-min-max';

export interface LoadOptions {
  sheetSelection: SheetSelection;
}

export type LoadResult =
  | { status: 'ok'; table: ConsolidatedTable; warnings: string[]; sheetsLoaded: string[] }
  | { status: 'empty'; reason: string; warnings: string[] };

export interface IndexOptions {
  policy: IndexPolicy;
  /** Force the source index of all-zero-frequency records to 0 (global min-max only) */
  zeroFill?: boolean;
}

/**
 * Summary of a CLI run
 */
export interface RunSummary {
  sheetCount: number;
  recordCount: number;
  companyCount: number;
  warningCount: number;
  outputDir: string;
}

/**
 * Options for Excel worksheet creation
 */
export interface ExcelWriteOptions {
  sheetName: string;
  columnWidth?: number;
  boldHeaders?: boolean;
}

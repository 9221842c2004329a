/**
 * Utility functions for file operations and Excel handling
 */

import * as fs from 'fs';
import * as path from 'path';
import ExcelJS from 'exceljs';
import { CellPrimitive, ExcelWriteOptions, RawRow, RunSummary } from './types';

/**
 * Find all files with a specific extension in a directory (non-recursive)
 * @param dirPath - Directory to search
 * @param extension - File extension (e.g., '.xlsx')
 * @returns Array of filenames, sorted
 */
export function findFilesWithExtension(dirPath: string, extension: string): string[] {
  const allFiles = fs.readdirSync(dirPath);
  return allFiles
    .filter(file => {
      const filePath = path.join(dirPath, file);
      const fileStats = fs.statSync(filePath);
      return fileStats.isFile() && file.toLowerCase().endsWith(extension);
    })
    .sort();
}

/**
 * Pick the workbook to load from an ordered list of candidate locations.
 * A file candidate is used as-is; a directory contributes its first .xlsx file.
 * Legacy .xls files are not considered, exceljs cannot open them.
 * @returns Absolute path, or null when no candidate holds a workbook
 */
export function resolveWorkbookPath(candidates: string[]): string | null {
  for (const candidate of candidates) {
    const resolvedPath = path.resolve(candidate);
    if (!fs.existsSync(resolvedPath)) continue;

    const stats = fs.statSync(resolvedPath);
    if (stats.isFile()) {
      return resolvedPath;
    }

    if (stats.isDirectory()) {
      const files = findFilesWithExtension(resolvedPath, '.xlsx')
        .filter(file => !file.startsWith('~$')); // Excel lock files
      if (files.length > 0) {
        return path.join(resolvedPath, files[0]);
      }
    }
  }
  return null;
}

/**
 * Extract a primitive from an Excel cell value
 * Handles richText, formula results, hyperlinks and error cells
 * @param cellValue - The cell value from ExcelJS
 */
export function extractCellValue(cellValue: ExcelJS.CellValue): CellPrimitive {
  if (cellValue === null || cellValue === undefined) {
    return null;
  }

  if (cellValue instanceof Date) {
    return cellValue.toISOString();
  }

  if (typeof cellValue !== 'object') {
    return cellValue;
  }

  // Handle richText objects (formatted cells in Excel)
  if ('richText' in cellValue) {
    return cellValue.richText.map(rt => rt.text || '').join('');
  }

  if ('hyperlink' in cellValue) {
    return cellValue.text;
  }

  if ('error' in cellValue) {
    return null;
  }

  // Formula cells carry their last computed result
  const result = cellValue.result;
  if (result === undefined) {
    return null;
  }
  return extractCellValue(result);
}

/**
 * Helper function to extract plain text from Excel cell value
 * @returns Plain text string, '' for empty cells
 */
export function extractCellText(cellValue: ExcelJS.CellValue): string {
  const value = extractCellValue(cellValue);
  return value === null ? '' : String(value);
}

/**
 * Read data from an Excel worksheet
 * @param worksheet - ExcelJS worksheet
 * @returns Object containing headers and data rows
 */
export function readExcelData(worksheet: ExcelJS.Worksheet): { headers: string[], rows: RawRow[] } {
  const headers: string[] = [];
  const rows: RawRow[] = [];

  // Get headers from first row
  const headerRow = worksheet.getRow(1);
  headerRow.eachCell({ includeEmpty: false }, (cell, colNumber) => {
    headers[colNumber - 1] = extractCellText(cell.value).trim();
  });

  const maxCol = headers.length;

  // Get data rows
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return; // Skip header row

    const rowData: RawRow = {};
    // Explicitly iterate over all column indices to catch empty cells
    for (let colIdx = 1; colIdx <= maxCol; colIdx++) {
      const header = headers[colIdx - 1];
      if (header) {
        rowData[header] = extractCellValue(row.getCell(colIdx).value);
      }
    }

    rows.push(rowData);
  });

  // Sparse assignment leaves holes for blank header cells
  return { headers: Array.from(headers, header => header ?? ''), rows };
}

/**
 * Format file size in bytes to KB string
 * @param bytes - Size in bytes
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatSize(bytes: number): string {
  return (bytes / 1024).toFixed(2) + ' KB';
}

/**
 * Write rows to a single-sheet Excel workbook
 * @param data - Array of flat rows to write
 * @param options - Excel writing options
 * @returns ExcelJS workbook
 */
export function writeExcelData(
  data: Record<string, string | number>[],
  options: ExcelWriteOptions
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(options.sheetName.substring(0, 31));

  // Get column headers
  const headers = Object.keys(data[0] || {});

  // Add header row with optional formatting
  worksheet.columns = headers.map(header => ({
    header: header,
    key: header,
    width: options.columnWidth || 20
  }));

  // Apply bold formatting to headers if requested
  if (options.boldHeaders !== false) {
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.commit();
  }

  // Add data rows
  data.forEach(row => {
    worksheet.addRow(row);
  });

  return workbook;
}

/**
 * Report load summary to console
 * @param summary - Summary information
 */
export function reportSummary(summary: RunSummary): void {
  console.log('─'.repeat(80));
  console.log(`\n📈 Summary:`);
  console.log(`   📄 Sheets loaded: ${summary.sheetCount}`);
  console.log(`   ✅ Records: ${summary.recordCount}`);
  console.log(`   🏢 Companies: ${summary.companyCount}`);
  console.log(`   ⚠️  Warnings: ${summary.warningCount}`);
  console.log(`   📁 Output directory: ${summary.outputDir}\n`);
}

#!/usr/bin/env node

import { program } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { isIndexPolicy, scoreTable } from './calculator';
import { DashboardConfig, isSheetSelection, loadConfig } from './config';
import { exportHistory, exportSeries, exportYearlyAverages } from './export';
import { reportLoadWarnings } from './feedback';
import { loadWorkbook } from './loader';
import { parseYear } from './normalize';
import { companySeries, filterRecords, RecordQuery, suggestCompanyNames, yearlyAverages } from './queries';
import { generateReport } from './report';
import { averagesToRows, DisplayRow, flattenRecord } from './transforms';
import { ConsolidatedTable, Year } from './types';
import { formatSize, reportSummary, resolveWorkbookPath } from './utils';

type CliOptions = {
  workbook?: string[];
  config?: string;
  sheets?: string;
  policy?: string;
  code?: string;
  name?: string;
  year?: string;
  report?: boolean;
  trend?: boolean;
  export?: boolean;
};

/**
 * Merge CLI flags over the config file; flags win
 */
function resolveConfig(options: CliOptions): DashboardConfig {
  const config = loadConfig(options.config ? path.resolve(options.config) : undefined);

  if (options.workbook && options.workbook.length > 0) {
    config.workbookCandidates = options.workbook;
  }

  if (options.sheets !== undefined) {
    if (!isSheetSelection(options.sheets)) {
      throw new Error(`Unknown sheet selection "${options.sheets}" (expected year-sheets or all-sheets)`);
    }
    config.sheetSelection = options.sheets;
  }

  if (options.policy !== undefined) {
    if (!isIndexPolicy(options.policy)) {
      throw new Error(`Unknown policy "${options.policy}" (expected per-year-share or global-min-max)`);
    }
    config.policy = options.policy;
  }

  return config;
}

function printRows(rows: DisplayRow[]): void {
  if (rows.length === 0) return;
  console.table(rows);
}

function companyFileName(table: ConsolidatedTable, stockCode: string, suffix: string): string {
  const name = (table.nameByCode[stockCode] || 'company').replace(/[\\/:*?"<>|\s]+/g, '_');
  return `${stockCode}_${name}_${suffix}.xlsx`;
}

/**
 * Query a company (or the whole table) and print, report and export the results
 */
async function showResults(table: ConsolidatedTable, options: CliOptions, outputDir: string): Promise<void> {
  let year: Year | undefined;
  if (options.year !== undefined) {
    year = parseYear(options.year) ?? undefined;
  }

  if (options.trend) {
    const averages = yearlyAverages(table.records);
    console.log('\n🏭 Industry trend (average index per year):');
    printRows(averagesToRows(averages));

    if (options.export) {
      const outputPath = await exportYearlyAverages(averages, path.join(outputDir, 'industry_trend.xlsx'));
      console.log(`💾 Industry trend → ${outputPath} (${formatSize(fs.statSync(outputPath).size)})`);
    }
  }

  const query: RecordQuery = { stockCode: options.code, companyName: options.name, year };
  if (query.stockCode === undefined && query.companyName === undefined && year === undefined) {
    return;
  }

  const matches = filterRecords(table.records, query);
  if (matches.length === 0) {
    console.log('\n🔍 No matching records found.');
    if (options.name) {
      const suggestions = suggestCompanyNames(table, options.name);
      if (suggestions.length > 0) {
        console.log('   Did you mean:');
        suggestions.forEach(sugg => console.log(`     → "${sugg}"`));
      }
    }
    return;
  }

  console.log(`\n🔍 Found ${matches.length} record(s):`);
  printRows(matches.map(record => flattenRecord(record)));

  const codes = Array.from(new Set(matches.map(record => record.stockCode)));
  for (const stockCode of codes) {
    const history = filterRecords(table.records, { stockCode });

    if (options.report) {
      console.log('');
      console.log(generateReport(history));
    }

    if (options.export) {
      const seriesPath = await exportSeries(
        companySeries(table.records, stockCode),
        path.join(outputDir, companyFileName(table, stockCode, 'trend'))
      );
      const historyPath = await exportHistory(
        history,
        path.join(outputDir, companyFileName(table, stockCode, 'history'))
      );
      console.log(`💾 ${stockCode} trend → ${seriesPath}`);
      console.log(`💾 ${stockCode} history → ${historyPath}`);
    }
  }
}

/**
 * Load, consolidate and score the workbook, then run the requested views
 * @returns Process exit code
 */
async function run(options: CliOptions): Promise<number> {
  try {
    console.log('\n📊 Digital Transformation Index\n');

    const config = resolveConfig(options);
    const workbookPath = resolveWorkbookPath(config.workbookCandidates);
    if (workbookPath === null) {
      console.log(`❌ No Excel workbook found in: ${config.workbookCandidates.join(', ')}`);
      return 1;
    }

    const fileName = path.basename(workbookPath);
    console.log(`📖 Reading ${fileName} (${formatSize(fs.statSync(workbookPath).size)})...`);

    const result = await loadWorkbook(workbookPath, { sheetSelection: config.sheetSelection });
    reportLoadWarnings(fileName, result.warnings);

    if (result.status === 'empty') {
      console.log(`❌ ${fileName} - ${result.reason}`);
      return 1;
    }

    const table = scoreTable(result.table, { policy: config.policy, zeroFill: config.zeroFill });
    console.log(`✅ ${fileName} - sheets: ${result.sheetsLoaded.join(', ')}`);
    console.log(`   📐 Policy: ${config.policy}`);
    console.log(`   📅 Years: ${table.years.join(', ')}`);

    const outputDir = path.resolve(config.outputDir);
    await showResults(table, options, outputDir);

    reportSummary({
      sheetCount: result.sheetsLoaded.length,
      recordCount: table.records.length,
      companyCount: table.stockCodes.length,
      warningCount: result.warnings.length,
      outputDir
    });
    return 0;
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    return 1;
  }
}

// Configure CLI
program
  .name('dtindex')
  .description('Look up digital transformation index scores from a keyword-frequency workbook')
  .version('1.0.0');

program
  .option('--workbook <paths...>', 'Workbook files or directories to search, in order')
  .option('--config <file>', 'Config file (default: dtindex.config.json)')
  .option('--sheets <mode>', 'Sheet selection: year-sheets or all-sheets')
  .option('--policy <policy>', 'Index policy: per-year-share or global-min-max')
  .option('--code <code>', 'Look up a stock code')
  .option('--name <name>', 'Search company names (case-insensitive substring)')
  .option('--year <year>', 'Restrict the lookup to one year')
  .option('--report', 'Print a text report for each matched company')
  .option('--trend', 'Print the industry-wide average index per year')
  .option('--export', 'Write Excel snapshots to the output directory')
  .action(async () => {
    process.exitCode = await run(program.opts<CliOptions>());
  });

// Only run CLI if this is the main module
if (require.main === module) {
  program.parseAsync(process.argv).catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { run, resolveConfig };

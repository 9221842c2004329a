/**
 * Runtime configuration loaded from dtindex.config.json
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_POLICY, isIndexPolicy } from './calculator';
import { IndexPolicy, SheetSelection } from './types';

export interface DashboardConfig {
  /** Files or directories searched for the workbook, in order */
  workbookCandidates: string[];
  sheetSelection: SheetSelection;
  policy: IndexPolicy;
  zeroFill: boolean;
  outputDir: string;
}

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../dtindex.config.json');

export const DEFAULT_CONFIG: DashboardConfig = {
  workbookCandidates: ['./data', '.'],
  sheetSelection: 'year-sheets',
  policy: DEFAULT_POLICY,
  zeroFill: true,
  outputDir: 'outputs'
};

export function isSheetSelection(value: string): value is SheetSelection {
  return value === 'year-sheets' || value === 'all-sheets';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed config object field by field, keeping defaults for anything invalid
 * @returns Config and one warning per rejected field
 */
export function parseConfig(raw: unknown): { config: DashboardConfig, warnings: string[] } {
  const config: DashboardConfig = { ...DEFAULT_CONFIG, workbookCandidates: [...DEFAULT_CONFIG.workbookCandidates] };
  const warnings: string[] = [];

  if (!isRecord(raw)) {
    warnings.push('Config must be a JSON object, using defaults');
    return { config, warnings };
  }

  const candidates = raw.workbookCandidates;
  if (candidates !== undefined) {
    if (Array.isArray(candidates) && candidates.every(c => typeof c === 'string')) {
      config.workbookCandidates = candidates.filter((c): c is string => typeof c === 'string');
    } else {
      warnings.push('workbookCandidates must be an array of paths, using default');
    }
  }

  const sheetSelection = raw.sheetSelection;
  if (sheetSelection !== undefined) {
    if (typeof sheetSelection === 'string' && isSheetSelection(sheetSelection)) {
      config.sheetSelection = sheetSelection;
    } else {
      warnings.push(`Unknown sheetSelection "${String(sheetSelection)}", using "${DEFAULT_CONFIG.sheetSelection}"`);
    }
  }

  const policy = raw.policy;
  if (policy !== undefined) {
    if (typeof policy === 'string' && isIndexPolicy(policy)) {
      config.policy = policy;
    } else {
      warnings.push(`Unknown policy "${String(policy)}", using "${DEFAULT_CONFIG.policy}"`);
    }
  }

  const zeroFill = raw.zeroFill;
  if (zeroFill !== undefined) {
    if (typeof zeroFill === 'boolean') {
      config.zeroFill = zeroFill;
    } else {
      warnings.push('zeroFill must be true or false, using default');
    }
  }

  const outputDir = raw.outputDir;
  if (outputDir !== undefined) {
    if (typeof outputDir === 'string' && outputDir.trim() !== '') {
      config.outputDir = outputDir;
    } else {
      warnings.push('outputDir must be a non-empty path, using default');
    }
  }

  return { config, warnings };
}

/**
 * Load configuration from dtindex.config.json, falling back to defaults
 * @param configPath - Explicit config file; the project root file when omitted
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): DashboardConfig {
  if (!fs.existsSync(configPath)) {
    return parseConfig({}).config;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️  Warning: Could not parse ${path.basename(configPath)} (${reason}). Using defaults.`);
    return parseConfig({}).config;
  }

  const { config, warnings } = parseConfig(raw);
  warnings.forEach(warning => console.warn(`⚠️  Warning: ${warning}`));
  return config;
}

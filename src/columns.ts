/**
 * Column-alias resolution for year sheets with drifting headers
 */

import { KEYWORD_CATEGORIES, KeywordCategory } from './types';

/**
 * Aliases per logical column, highest priority first
 */
export const COLUMN_ALIASES = {
  stockCode: ['股票代码', '证券代码', '代码', 'stockcode', 'stkcd', 'code'],
  companyName: ['企业名称', '公司名称', '公司简称', '证券简称', 'companyname', 'company', 'name'],
  year: ['年份', '会计年度', 'year'],
  compositeIndex: ['数字化转型综合指数', '数字化转型指数', 'compositeindex', 'dtindex', 'index']
} as const;

export const KEYWORD_ALIASES: Record<KeywordCategory, readonly string[]> = {
  artificialIntelligence: ['人工智能词频数', '人工智能技术', '人工智能', 'artificialintelligence', 'ai'],
  bigData: ['大数据词频数', '大数据技术', '大数据', 'bigdata'],
  cloudComputing: ['云计算词频数', '云计算技术', '云计算', 'cloudcomputing', 'cloud'],
  blockchain: ['区块链词频数', '区块链技术', '区块链', 'blockchain'],
  digitalTechnologyUsage: ['数字技术运用词频数', '数字技术运用', '数字技术应用', 'digitaltechnologyusage', 'digitaltechnology', 'digital']
};

export interface ResolvedColumns {
  stockCode: string | null;
  companyName: string | null;
  year: string | null;
  compositeIndex: string | null;
  keywords: Partial<Record<KeywordCategory, string>>;
  missingKeywords: KeywordCategory[];
}

/**
 * Normalize a header for alias comparison
 */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s_\-]+/g, '');
}

function findHeader(headers: string[], aliases: readonly string[]): string | null {
  const byNormalized = new Map<string, string>();
  for (const header of headers) {
    const key = normalizeHeader(header);
    // First header wins when two normalize to the same key
    if (key && !byNormalized.has(key)) {
      byNormalized.set(key, header);
    }
  }

  for (const alias of aliases) {
    const found = byNormalized.get(normalizeHeader(alias));
    if (found !== undefined) return found;
  }
  return null;
}

/**
 * Map each logical column to the sheet header that carries it
 * @param headers - Header row of a sheet
 */
export function resolveColumns(headers: string[]): ResolvedColumns {
  const keywords: Partial<Record<KeywordCategory, string>> = {};
  const missingKeywords: KeywordCategory[] = [];

  for (const category of KEYWORD_CATEGORIES) {
    const header = findHeader(headers, KEYWORD_ALIASES[category]);
    if (header === null) {
      missingKeywords.push(category);
    } else {
      keywords[category] = header;
    }
  }

  return {
    stockCode: findHeader(headers, COLUMN_ALIASES.stockCode),
    companyName: findHeader(headers, COLUMN_ALIASES.companyName),
    year: findHeader(headers, COLUMN_ALIASES.year),
    compositeIndex: findHeader(headers, COLUMN_ALIASES.compositeIndex),
    keywords,
    missingKeywords
  };
}

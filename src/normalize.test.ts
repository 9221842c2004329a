import { normalizeHeader, resolveColumns } from './columns';
import {
  compareYears,
  normalizeCompanyName,
  normalizeStockCode,
  parseYear,
  toCount,
  toOptionalNumber
} from './normalize';

describe('normalizeStockCode', () => {
  test.each([
    [1, '000001'],
    ['1.0', '000001'],
    ['600000', '600000'],
    [' 2 ', '000002'],
    ['000001.SZ', '000001'],
    ['SH600519', '600519'],
    [null, null],
    ['', null],
    ['abc', null],
    ['1000001', null],
    ['600000.SH.2', null]
  ])('%p → %p', (input, expected) => {
    expect(normalizeStockCode(input)).toBe(expected);
  });
});

describe('cell coercion', () => {
  test('company names are trimmed', () => {
    expect(normalizeCompanyName('  平安银行 ')).toBe('平安银行');
    expect(normalizeCompanyName(null)).toBe('');
  });

  test('numbers parse from numeric text with thousands separators', () => {
    expect(toOptionalNumber('1,250')).toBe(1250);
    expect(toOptionalNumber(' 3.5 ')).toBe(3.5);
    expect(toOptionalNumber('')).toBeNull();
    expect(toOptionalNumber('abc')).toBeNull();
    expect(toOptionalNumber(true)).toBeNull();
  });

  test('counts are non-negative', () => {
    expect(toCount(12)).toBe(12);
    expect(toCount(-1)).toBe(0);
    expect(toCount(null)).toBe(0);
  });

  test('years keep digit-only values as numbers and other text as tags', () => {
    expect(parseYear(2020)).toBe(2020);
    expect(parseYear('2021.0')).toBe(2021);
    expect(parseYear(' 2022H1 ')).toBe('2022H1');
    expect(parseYear('  ')).toBeNull();
    expect(parseYear(null)).toBeNull();
  });

  test('numeric years sort before text tags', () => {
    expect([2021, 'Panel', 2019, 'Archive'].sort(compareYears)).toEqual([2019, 2021, 'Archive', 'Panel']);
  });
});

describe('resolveColumns', () => {
  test('normalizes headers for comparison', () => {
    expect(normalizeHeader(' Stock_Code ')).toBe('stockcode');
    expect(normalizeHeader('Big-Data')).toBe('bigdata');
  });

  test('resolves Chinese headers', () => {
    const columns = resolveColumns(['股票代码', '企业名称', '年份', '人工智能词频数', '大数据词频数', '云计算词频数', '区块链词频数', '数字技术运用词频数', '数字化转型综合指数']);

    expect(columns).toEqual({
      stockCode: '股票代码',
      companyName: '企业名称',
      year: '年份',
      compositeIndex: '数字化转型综合指数',
      keywords: {
        artificialIntelligence: '人工智能词频数',
        bigData: '大数据词频数',
        cloudComputing: '云计算词频数',
        blockchain: '区块链词频数',
        digitalTechnologyUsage: '数字技术运用词频数'
      },
      missingKeywords: []
    });
  });

  test('prefers the higher-priority alias when several are present', () => {
    const columns = resolveColumns(['name', '公司名称', 'code', '股票代码']);
    expect(columns.companyName).toBe('公司名称');
    expect(columns.stockCode).toBe('股票代码');
  });

  test('lists keyword categories it could not find', () => {
    const columns = resolveColumns(['Stock Code', 'Company Name', 'Big Data', 'Cloud']);

    expect(columns.keywords).toEqual({ bigData: 'Big Data', cloudComputing: 'Cloud' });
    expect(columns.missingKeywords).toEqual(['artificialIntelligence', 'blockchain', 'digitalTechnologyUsage']);
    expect(columns.year).toBeNull();
    expect(columns.compositeIndex).toBeNull();
  });
});

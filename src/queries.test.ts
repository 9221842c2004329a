import { buildTable } from './loader';
import { averageCounts, companySeries, filterRecords, suggestCompanyNames, yearlyAverages } from './queries';
import { CompanyYearRecord, KeywordFrequencyCounts, Year } from './types';

function record(
  stockCode: string,
  companyName: string,
  year: Year,
  transformationIndex: number,
  counts: Partial<KeywordFrequencyCounts> = {}
): CompanyYearRecord {
  return {
    stockCode,
    companyName,
    year,
    keywordFrequencyCounts: {
      artificialIntelligence: 0,
      bigData: 0,
      cloudComputing: 0,
      blockchain: 0,
      digitalTechnologyUsage: 0,
      ...counts
    },
    compositeIndex: null,
    transformationIndex
  };
}

const records: CompanyYearRecord[] = [
  record('000001', 'Alpha Tech', 2021, 100, { artificialIntelligence: 8 }),
  record('000002', 'Beta Cloud', 2020, 0),
  record('000001', 'Alpha Tech', 2020, 100, { artificialIntelligence: 4, bigData: 2 }),
  record('000003', 'Gamma Data', 2021, 20, { bigData: 2 })
];

describe('filterRecords', () => {
  test('normalizes the stock code before matching', () => {
    const matches = filterRecords(records, { stockCode: '1' });
    expect(matches.map(r => [r.stockCode, r.year])).toEqual([['000001', 2021], ['000001', 2020]]);
  });

  test('matches company names as case-insensitive substrings', () => {
    const matches = filterRecords(records, { companyName: '  TECH ' });
    expect(matches).toHaveLength(2);
    expect(matches.every(r => r.companyName === 'Alpha Tech')).toBe(true);
  });

  test('combines criteria', () => {
    const matches = filterRecords(records, { stockCode: '000001', year: 2020 });
    expect(matches).toEqual([records[2]]);
  });

  test('an unknown stock code yields an empty result', () => {
    expect(filterRecords(records, { stockCode: '999999' })).toEqual([]);
  });

  test('a code that cannot be a stock code matches nothing', () => {
    const withUnknown = [...records, record('000000', 'Unlisted Co', 2020, 0)];

    expect(filterRecords(withUnknown, { stockCode: '7000001' })).toEqual([]);
    expect(filterRecords(withUnknown, { stockCode: 'abc' })).toEqual([]);
  });

  test('an empty query matches everything', () => {
    expect(filterRecords(records, { stockCode: ' ', companyName: '' })).toHaveLength(4);
  });
});

describe('suggestCompanyNames', () => {
  test('suggests close names for a misspelled search', () => {
    const table = buildTable(records);
    expect(suggestCompanyNames(table, 'Alpah Tech')).toEqual(['Alpha Tech']);
  });

  test('suggests nothing for an unrelated term', () => {
    const table = buildTable(records);
    expect(suggestCompanyNames(table, 'Zeta Mining Holdings')).toEqual([]);
  });
});

describe('yearlyAverages', () => {
  test('averages the index per year in year order', () => {
    expect(yearlyAverages(records)).toEqual([
      { year: 2020, averageIndex: 50, companyCount: 2 },
      { year: 2021, averageIndex: 60, companyCount: 2 }
    ]);
  });

  test('rounds averages to two decimals', () => {
    const averages = yearlyAverages([
      record('000001', 'A', 2020, 100),
      record('000002', 'B', 2020, 0),
      record('000003', 'C', 2020, 0)
    ]);
    expect(averages).toEqual([{ year: 2020, averageIndex: 33.33, companyCount: 3 }]);
  });

  test('is empty for an empty table', () => {
    expect(yearlyAverages([])).toEqual([]);
  });
});

describe('companySeries', () => {
  test('orders a company by year with its raw counts', () => {
    expect(companySeries(records, '000001')).toEqual([
      { year: 2020, transformationIndex: 100, artificialIntelligence: 4, bigData: 2, cloudComputing: 0, blockchain: 0, digitalTechnologyUsage: 0 },
      { year: 2021, transformationIndex: 100, artificialIntelligence: 8, bigData: 0, cloudComputing: 0, blockchain: 0, digitalTechnologyUsage: 0 }
    ]);
  });

  test('is empty for a code that is not in the table', () => {
    expect(companySeries(records, '123456')).toEqual([]);
  });
});

describe('averageCounts', () => {
  test('averages each category over the record set', () => {
    expect(averageCounts(records.filter(r => r.stockCode === '000001'))).toEqual({
      artificialIntelligence: 6,
      bigData: 1,
      cloudComputing: 0,
      blockchain: 0,
      digitalTechnologyUsage: 0
    });
  });
});

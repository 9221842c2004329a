import { companyStats, generateReport } from './report';
import { CompanyYearRecord, KeywordFrequencyCounts, Year } from './types';

function record(year: Year, transformationIndex: number, counts: Partial<KeywordFrequencyCounts> = {}): CompanyYearRecord {
  return {
    stockCode: '000001',
    companyName: 'Alpha Tech',
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

const now = new Date(2024, 0, 15, 9, 5, 3);

describe('generateReport', () => {
  test('summarizes coverage, index statistics, trend and keyword averages', () => {
    const report = generateReport([
      record(2020, 50, { artificialIntelligence: 10 }),
      record(2021, 80, { artificialIntelligence: 20, bigData: 4 }),
      record(2019, 40, { artificialIntelligence: 6 })
    ], { now });

    expect(report).toBe([
      'Digital Transformation Report',
      '========================================',
      'Company: Alpha Tech (000001)',
      'Generated: 2024-01-15 09:05:03',
      '',
      'Coverage: 2019, 2020, 2021 (3 year(s))',
      'Maximum index: 80.00 (2021)',
      'Average index: 56.67',
      'Latest index: 80.00 (2021)',
      'Trend: rising, +100.00% since 2019',
      '',
      'Average keyword frequency:',
      '  Artificial Intelligence: 12.00',
      '  Big Data: 1.33',
      '  Cloud Computing: 0.00',
      '  Blockchain: 0.00',
      '  Digital Technology Usage: 0.00'
    ].join('\n'));
  });

  test('reports a falling trend with a negative change', () => {
    const report = generateReport([record(2020, 80), record(2021, 60)], { now });
    expect(report.split('\n')[9]).toBe('Trend: falling, -25.00% since 2020');
  });

  test('shows n/a when the first year scored 0', () => {
    const report = generateReport([record(2020, 0), record(2021, 30)], { now });
    expect(report.split('\n')[9]).toBe('Trend: rising, n/a since 2020');
  });

  test('returns a no-data line for an empty record set', () => {
    expect(generateReport([])).toBe('No data available for this company.');
  });
});

describe('companyStats', () => {
  test('the earliest year wins a tie for the maximum', () => {
    const stats = companyStats([record(2021, 100), record(2020, 100), record(2022, 100)]);

    expect(stats).toEqual({
      years: [2020, 2021, 2022],
      maxIndex: 100,
      maxYear: 2020,
      averageIndex: 100,
      firstIndex: 100,
      firstYear: 2020,
      latestIndex: 100,
      latestYear: 2022,
      direction: 'flat',
      changePercent: 0
    });
  });

  test('is null for no records', () => {
    expect(companyStats([])).toBeNull();
  });
});

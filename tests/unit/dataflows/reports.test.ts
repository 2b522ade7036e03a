import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import {
  getInsiderSentimentReport,
  getInsiderTransactionsReport,
  getNewsReport,
} from '../../../src/dataflows/reports';
import {
  DataProvider,
  type DataProviderRegistry,
  type DateGroupedRecords,
  createDataProviderRegistry,
} from '../../../src/dataflows/providers';
import { createTestEventBus } from '../../../src/events';
import { staticConfig } from '../../helpers/greeters';

class StubProvider extends DataProvider {
  async getNews(): Promise<DateGroupedRecords> {
    return {};
  }

  async getInsiderSentiment(): Promise<DateGroupedRecords> {
    return {};
  }

  async getInsiderTransactions(): Promise<DateGroupedRecords> {
    return {};
  }
}

describe('data reports', () => {
  let registry: DataProviderRegistry;

  beforeEach(() => {
    registry = createDataProviderRegistry({
      config: staticConfig({ data_provider: 'stub' }),
      events: createTestEventBus(),
    });
    registry.register('stub', StubProvider);
  });

  describe('getNewsReport', () => {
    it('queries the configured provider over the look-back window', async () => {
      const getNews = vi.spyOn(StubProvider.prototype, 'getNews').mockResolvedValue({});

      await getNewsReport('AAPL', '2024-01-07', 7, { registry });

      expect(getNews).toHaveBeenCalledWith('AAPL', '2023-12-31', '2024-01-07');
    });

    it('computes the window start from the look-back days', async () => {
      const getNews = vi.spyOn(StubProvider.prototype, 'getNews').mockResolvedValue({});

      await getNewsReport('AAPL', '2024-01-15', 10, { registry });

      expect(getNews).toHaveBeenCalledWith('AAPL', '2024-01-05', '2024-01-15');
    });

    it('returns an empty string when there is no news', async () => {
      vi.spyOn(StubProvider.prototype, 'getNews').mockResolvedValue({});
      expect(await getNewsReport('AAPL', '2024-01-07', 7, { registry })).toBe('');
    });

    it('formats headlines in date order', async () => {
      vi.spyOn(StubProvider.prototype, 'getNews').mockResolvedValue({
        '2024-01-03': [{ headline: 'Later story', summary: 'Second.' }],
        '2024-01-01': [{ headline: 'Test news', summary: 'Test summary' }],
      });

      expect(await getNewsReport('AAPL', '2024-01-07', 7, { registry })).toBe(
        '## AAPL News, from 2023-12-31 to 2024-01-07:\n' +
          '### Test news (2024-01-01)\nTest summary\n\n' +
          '### Later story (2024-01-03)\nSecond.\n\n'
      );
    });
  });

  describe('getInsiderSentimentReport', () => {
    it('formats and de-duplicates monthly sentiment', async () => {
      const row = { year: 2024, month: 1, change: 100, mspr: 0.5 };
      const getInsiderSentiment = vi
        .spyOn(StubProvider.prototype, 'getInsiderSentiment')
        .mockResolvedValue({ '2024-01-01': [row], '2024-01-02': [{ ...row }] });

      const report = await getInsiderSentimentReport('AAPL', '2024-01-07', 7, { registry });

      expect(getInsiderSentiment).toHaveBeenCalledWith('AAPL', '2023-12-31', '2024-01-07');
      expect(report).toBe(
        '## AAPL Insider Sentiment Data for 2023-12-31 to 2024-01-07:\n' +
          '### 2024-1:\nChange: 100\nMonthly Share Purchase Ratio: 0.5\n\n' +
          "The change field refers to the net buying/selling from all insiders' transactions. " +
          'The mspr field refers to monthly share purchase ratio.'
      );
    });

    it('returns an empty string when there is no sentiment', async () => {
      vi.spyOn(StubProvider.prototype, 'getInsiderSentiment').mockResolvedValue({});
      expect(await getInsiderSentimentReport('AAPL', '2024-01-07', 7, { registry })).toBe('');
    });
  });

  describe('getInsiderTransactionsReport', () => {
    it('formats filings and marks missing fields', async () => {
      vi.spyOn(StubProvider.prototype, 'getInsiderTransactions').mockResolvedValue({
        '2024-01-01': [
          {
            name: 'John Doe',
            share: 1000,
            change: 500,
            filingDate: '2024-01-01',
            transactionPrice: 150.0,
            transactionCode: 'P',
          },
          { name: 'Jane Roe', filingDate: '2024-01-01' },
        ],
      });

      const report = await getInsiderTransactionsReport('AAPL', '2024-01-07', 7, { registry });

      expect(report.split('\n').slice(0, 13)).toEqual([
        '## AAPL insider transactions from 2023-12-31 to 2024-01-07:',
        '### Filing Date: 2024-01-01, John Doe:',
        'Change: 500',
        'Shares: 1000',
        'Transaction Price: 150',
        'Transaction Code: P',
        '',
        '### Filing Date: 2024-01-01, Jane Roe:',
        'Change: N/A',
        'Shares: N/A',
        'Transaction Price: N/A',
        'Transaction Code: N/A',
        '',
      ]);
    });

    it('returns an empty string when there are no filings', async () => {
      vi.spyOn(StubProvider.prototype, 'getInsiderTransactions').mockResolvedValue({
        '2024-01-02': [],
      });
      expect(await getInsiderTransactionsReport('AAPL', '2024-01-07', 7, { registry })).toBe('');
    });
  });
});

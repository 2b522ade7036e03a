/**
 * Twelve Data Provider
 *
 * Twelve Data exposes insider transactions but no company news or insider
 * sentiment feed, so those two resolve to no data. Transactions are fetched
 * from `<twelvedata_base_url>/insider_transactions` and grouped by the day
 * they were reported.
 *
 * @module dataflows/providers/twelvedata
 */

import axios from 'axios';
import { z } from 'zod';
import { DEFAULT_TWELVEDATA_BASE_URL } from '../../config';
import { readNonEmptySetting } from '../../providers/settings';
import type { ProviderSettings } from '../../providers/types';
import { isTimeoutError } from '../../utils/errors';
import { createLogger, extractError } from '../../utils/logger';
import { assertDateRange, isWithinRange } from '../dateRange';
import {
  type DateGroupedRecords,
  DataProvider,
  type FinancialDataType,
  type FinancialRecord,
} from './base';

const log = createLogger('DATA:TWELVEDATA');

const REQUEST_TIMEOUT_MS = 10000;

const InsiderTransactionSchema = z
  .object({
    full_name: z.string().optional(),
    position: z.string().optional(),
    date_reported: z.string(),
    is_direct: z.boolean().optional(),
    shares: z.number().optional(),
    value: z.number().optional(),
    description: z.string().optional(),
  })
  .passthrough();

const InsiderTransactionsResponseSchema = z.object({
  insider_transactions: z.array(z.unknown()).default([]),
});

export type TwelveDataInsiderTransaction = z.infer<typeof InsiderTransactionSchema>;

/**
 * Keep the upstream fields and add the names the Finnhub exports use, so
 * reports read both sources the same way
 */
function toFinancialRecord(transaction: TwelveDataInsiderTransaction): FinancialRecord {
  return {
    ...transaction,
    name: transaction.full_name,
    filingDate: transaction.date_reported,
    share: transaction.shares,
  };
}

export class TwelveDataProvider extends DataProvider {
  readonly baseUrl: string;
  private readonly apiKey: string | undefined;

  constructor(settings: ProviderSettings = {}) {
    super(settings);
    this.baseUrl = (
      readNonEmptySetting(settings, 'twelvedata_base_url') ?? DEFAULT_TWELVEDATA_BASE_URL
    ).replace(/\/+$/, '');
    this.apiKey = readNonEmptySetting(settings, 'twelvedata_api_key');
  }

  async getNews(_ticker: string, startDate: string, endDate: string): Promise<DateGroupedRecords> {
    assertDateRange(startDate, endDate);
    return {};
  }

  async getInsiderSentiment(
    _ticker: string,
    startDate: string,
    endDate: string
  ): Promise<DateGroupedRecords> {
    assertDateRange(startDate, endDate);
    return {};
  }

  async getInsiderTransactions(
    ticker: string,
    startDate: string,
    endDate: string
  ): Promise<DateGroupedRecords> {
    assertDateRange(startDate, endDate);

    if (!this.apiKey) {
      log.warn('twelvedata_api_key not configured, returning no insider transactions', { ticker });
      return {};
    }

    const transactions = await this.fetchInsiderTransactions(ticker);
    const grouped: DateGroupedRecords = {};

    for (const transaction of transactions) {
      const day = transaction.date_reported.slice(0, 10);
      if (!isWithinRange(day, startDate, endDate)) {
        continue;
      }
      (grouped[day] ??= []).push(toFinancialRecord(transaction));
    }

    return grouped;
  }

  isAvailable(): boolean {
    return this.apiKey !== undefined;
  }

  getSupportedDataTypes(): FinancialDataType[] {
    return ['insider_transactions'];
  }

  /**
   * Keep the filings that parse; one malformed filing does not discard the rest
   */
  private readFilings(ticker: string, filings: unknown[]): TwelveDataInsiderTransaction[] {
    const transactions: TwelveDataInsiderTransaction[] = [];
    for (const filing of filings) {
      const parsed = InsiderTransactionSchema.safeParse(filing);
      if (parsed.success) {
        transactions.push(parsed.data);
      }
    }

    if (transactions.length < filings.length) {
      log.warn('Skipped malformed insider transactions', {
        ticker,
        skipped: filings.length - transactions.length,
      });
    }
    return transactions;
  }

  private async fetchInsiderTransactions(ticker: string): Promise<TwelveDataInsiderTransaction[]> {
    const url = `${this.baseUrl}/insider_transactions`;

    try {
      const response = await axios.get<unknown>(url, {
        params: { symbol: ticker, apikey: this.apiKey },
        timeout: REQUEST_TIMEOUT_MS,
      });

      const result = InsiderTransactionsResponseSchema.safeParse(response.data);
      if (!result.success) {
        log.warn('Unexpected insider transactions response', {
          ticker,
          errors: result.error.issues.map((issue) => issue.message),
        });
        return [];
      }
      return this.readFilings(ticker, result.data.insider_transactions);
    } catch (error) {
      log.warn('Insider transactions request failed', {
        ticker,
        timeout: isTimeoutError(error),
        ...extractError(error),
      });
      return [];
    }
  }
}

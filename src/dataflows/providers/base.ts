/**
 * Financial Data Provider Contract
 *
 * Every data source (local file dumps, HTTP APIs) extends DataProvider and
 * answers the same three questions for a ticker over an inclusive date
 * range. Results are keyed by `YYYY-MM-DD`; a range with no data resolves to
 * an empty object, never an error.
 *
 * @module dataflows/providers/base
 */

import { deriveProviderName } from '../../providers/registry';
import { readStringSetting } from '../../providers/settings';
import type { AvailabilityAware, ProviderSettings } from '../../providers/types';

/**
 * One provider-specific JSON record (a headline, a sentiment row, a filing)
 */
export type FinancialRecord = Record<string, unknown>;

/**
 * Records grouped by calendar day, `YYYY-MM-DD` -> records
 */
export type DateGroupedRecords = Record<string, FinancialRecord[]>;

export type FinancialDataType = 'news' | 'insider_sentiment' | 'insider_transactions';

export const FINANCIAL_DATA_TYPES: readonly FinancialDataType[] = [
  'news',
  'insider_sentiment',
  'insider_transactions',
];

/**
 * Methods a registered data provider must implement
 */
export const DATA_PROVIDER_METHODS = [
  'getNews',
  'getInsiderSentiment',
  'getInsiderTransactions',
] as const;

export abstract class DataProvider implements AvailabilityAware {
  readonly settings: ProviderSettings;

  /**
   * Storage location from the `data_dir` setting; '' when unset
   */
  readonly dataDir: string;

  constructor(settings: ProviderSettings = {}) {
    this.settings = settings;
    this.dataDir = readStringSetting(settings, 'data_dir') ?? '';
  }

  abstract getNews(ticker: string, startDate: string, endDate: string): Promise<DateGroupedRecords>;

  abstract getInsiderSentiment(
    ticker: string,
    startDate: string,
    endDate: string
  ): Promise<DateGroupedRecords>;

  abstract getInsiderTransactions(
    ticker: string,
    startDate: string,
    endDate: string
  ): Promise<DateGroupedRecords>;

  /**
   * Optional readiness probe used by createWithFallback. Providers that do
   * not implement it are treated as always available.
   */
  isAvailable?(): boolean | Promise<boolean>;

  getSupportedDataTypes(): FinancialDataType[] {
    return [...FINANCIAL_DATA_TYPES];
  }

  /**
   * Short name for diagnostics, e.g. FinnhubProvider -> 'finnhub'
   */
  getProviderName(): string {
    return deriveProviderName(this.constructor.name, 'Provider');
  }
}

/**
 * Data Reports
 *
 * Turn date-grouped provider records into the Markdown blocks handed to
 * analysts. Each report looks back a number of days from the current date,
 * asks whichever data provider the registry resolves (configuration decides
 * which), and returns '' when the window holds no data.
 *
 * @module dataflows/reports
 */

import type { IProviderRegistry } from '../providers/types';
import { subtractDays } from './dateRange';
import type { DataProvider, DateGroupedRecords, FinancialRecord } from './providers/base';
import { dataProviders } from './providers/registry';

export interface ReportOptions {
  /**
   * Registry to resolve the data provider from
   * @default the process-wide data registry
   */
  registry?: IProviderRegistry<DataProvider>;
}

const SENTIMENT_FOOTNOTE =
  'The change field refers to the net buying/selling from all insiders\' transactions. ' +
  'The mspr field refers to monthly share purchase ratio.';

const TRANSACTIONS_FOOTNOTE =
  'The change field reflects the variation in share count, where a positive number is an ' +
  'increase in holdings and a negative number a decrease. The share field is the total ' +
  'number of shares held after the transaction.';

function field(record: FinancialRecord, key: string): string {
  const value = record[key];
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return 'N/A';
}

/**
 * Records of every day in chronological order, each paired with its day
 */
function flatten(data: DateGroupedRecords): Array<[string, FinancialRecord]> {
  return Object.keys(data)
    .sort()
    .flatMap((day) => data[day].map((record): [string, FinancialRecord] => [day, record]));
}

function dedupe(records: FinancialRecord[]): FinancialRecord[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = JSON.stringify(record);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

async function fetchWindow(
  query: (provider: DataProvider, startDate: string, endDate: string) => Promise<DateGroupedRecords>,
  currDate: string,
  lookBackDays: number,
  options: ReportOptions
): Promise<{ startDate: string; data: DateGroupedRecords }> {
  const startDate = subtractDays(currDate, lookBackDays);
  const provider = (options.registry ?? dataProviders).get();
  const data = await query(provider, startDate, currDate);
  return { startDate, data };
}

/**
 * Company news headlines and summaries over the look-back window
 *
 * @example
 * await getNewsReport('AAPL', '2024-01-07', 7); // window 2023-12-31 .. 2024-01-07
 */
export async function getNewsReport(
  ticker: string,
  currDate: string,
  lookBackDays: number,
  options: ReportOptions = {}
): Promise<string> {
  const { startDate, data } = await fetchWindow(
    (provider, start, end) => provider.getNews(ticker, start, end),
    currDate,
    lookBackDays,
    options
  );

  const entries = flatten(data);
  if (entries.length === 0) {
    return '';
  }

  const body = entries
    .map(([day, record]) => `### ${field(record, 'headline')} (${day})\n${field(record, 'summary')}\n\n`)
    .join('');

  return `## ${ticker} News, from ${startDate} to ${currDate}:\n${body}`;
}

/**
 * Monthly insider sentiment (net change and share purchase ratio)
 */
export async function getInsiderSentimentReport(
  ticker: string,
  currDate: string,
  lookBackDays: number,
  options: ReportOptions = {}
): Promise<string> {
  const { startDate, data } = await fetchWindow(
    (provider, start, end) => provider.getInsiderSentiment(ticker, start, end),
    currDate,
    lookBackDays,
    options
  );

  const records = dedupe(flatten(data).map(([, record]) => record));
  if (records.length === 0) {
    return '';
  }

  const body = records
    .map(
      (record) =>
        `### ${field(record, 'year')}-${field(record, 'month')}:\n` +
        `Change: ${field(record, 'change')}\n` +
        `Monthly Share Purchase Ratio: ${field(record, 'mspr')}\n\n`
    )
    .join('');

  return (
    `## ${ticker} Insider Sentiment Data for ${startDate} to ${currDate}:\n` +
    body +
    SENTIMENT_FOOTNOTE
  );
}

/**
 * Individual insider filings over the look-back window
 */
export async function getInsiderTransactionsReport(
  ticker: string,
  currDate: string,
  lookBackDays: number,
  options: ReportOptions = {}
): Promise<string> {
  const { startDate, data } = await fetchWindow(
    (provider, start, end) => provider.getInsiderTransactions(ticker, start, end),
    currDate,
    lookBackDays,
    options
  );

  const records = dedupe(flatten(data).map(([, record]) => record));
  if (records.length === 0) {
    return '';
  }

  const body = records
    .map(
      (record) =>
        `### Filing Date: ${field(record, 'filingDate')}, ${field(record, 'name')}:\n` +
        `Change: ${field(record, 'change')}\n` +
        `Shares: ${field(record, 'share')}\n` +
        `Transaction Price: ${field(record, 'transactionPrice')}\n` +
        `Transaction Code: ${field(record, 'transactionCode')}\n\n`
    )
    .join('');

  return (
    `## ${ticker} insider transactions from ${startDate} to ${currDate}:\n` +
    body +
    TRANSACTIONS_FOOTNOTE
  );
}

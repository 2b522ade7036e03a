/**
 * Finnhub Data Provider
 *
 * Reads pre-processed Finnhub exports from the local data directory:
 *
 *   <data_dir>/finnhub_data/news_data/<TICKER>_data_formatted.json
 *   <data_dir>/finnhub_data/insider_senti/<TICKER>_data_formatted.json
 *   <data_dir>/finnhub_data/insider_trans/<TICKER>_data_formatted.json
 *
 * Each file maps `YYYY-MM-DD` to an array of records. A missing or unreadable
 * file is logged and treated as "no data". Only days inside the requested
 * range are validated; entries that are not records are dropped one by one.
 *
 * @module dataflows/providers/finnhub
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { createLogger, extractError } from '../../utils/logger';
import { assertDateRange, isWithinRange } from '../dateRange';
import {
  type DateGroupedRecords,
  DataProvider,
  type FinancialDataType,
  type FinancialRecord,
} from './base';

const log = createLogger('DATA:FINNHUB');

const DATA_ROOT = 'finnhub_data';

const DATA_FOLDERS: Record<FinancialDataType, string> = {
  news: 'news_data',
  insider_sentiment: 'insider_senti',
  insider_transactions: 'insider_trans',
};

const DataFileSchema = z.record(z.string(), z.unknown());
const DayEntriesSchema = z.array(z.unknown());
const RecordSchema = z.record(z.string(), z.unknown());

type DataFile = z.infer<typeof DataFileSchema>;

export class FinnhubProvider extends DataProvider {
  async getNews(ticker: string, startDate: string, endDate: string): Promise<DateGroupedRecords> {
    return this.loadRange('news', ticker, startDate, endDate);
  }

  async getInsiderSentiment(
    ticker: string,
    startDate: string,
    endDate: string
  ): Promise<DateGroupedRecords> {
    return this.loadRange('insider_sentiment', ticker, startDate, endDate);
  }

  async getInsiderTransactions(
    ticker: string,
    startDate: string,
    endDate: string
  ): Promise<DateGroupedRecords> {
    return this.loadRange('insider_transactions', ticker, startDate, endDate);
  }

  /**
   * True when a data directory is configured and contains `finnhub_data/`
   */
  async isAvailable(): Promise<boolean> {
    if (!this.dataDir) {
      return false;
    }

    try {
      const stats = await fs.stat(path.join(this.dataDir, DATA_ROOT));
      return stats.isDirectory();
    } catch (error) {
      log.debug('Finnhub data directory not found', { dataDir: this.dataDir, ...extractError(error) });
      return false;
    }
  }

  /**
   * Absolute path of the export file for one ticker and data type
   */
  getDataFilePath(dataType: FinancialDataType, ticker: string): string {
    return path.join(
      this.dataDir,
      DATA_ROOT,
      DATA_FOLDERS[dataType],
      `${ticker}_data_formatted.json`
    );
  }

  private async loadRange(
    dataType: FinancialDataType,
    ticker: string,
    startDate: string,
    endDate: string
  ): Promise<DateGroupedRecords> {
    assertDateRange(startDate, endDate);

    if (!this.dataDir) {
      log.warn('No data directory configured, returning no data', { dataType, ticker });
      return {};
    }

    const all = await this.readDataFile(dataType, ticker);
    const filtered: DateGroupedRecords = {};

    for (const [date, entries] of Object.entries(all)) {
      if (!isWithinRange(date, startDate, endDate)) {
        continue;
      }
      const records = this.readDayRecords(entries, { dataType, ticker, date });
      if (records.length > 0) {
        filtered[date] = records;
      }
    }

    log.debug('Loaded Finnhub data', {
      dataType,
      ticker,
      days: Object.keys(filtered).length,
    });
    return filtered;
  }

  private readDayRecords(entries: unknown, context: Record<string, string>): FinancialRecord[] {
    const day = DayEntriesSchema.safeParse(entries);
    if (!day.success) {
      log.warn('Skipping Finnhub day that is not a list', context);
      return [];
    }

    const records: FinancialRecord[] = [];
    for (const entry of day.data) {
      const record = RecordSchema.safeParse(entry);
      if (record.success) {
        records.push(record.data);
      }
    }

    if (records.length < day.data.length) {
      log.warn('Dropped malformed Finnhub entries', {
        ...context,
        dropped: day.data.length - records.length,
      });
    }
    return records;
  }

  private async readDataFile(dataType: FinancialDataType, ticker: string): Promise<DataFile> {
    const filePath = this.getDataFilePath(dataType, ticker);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      log.warn('Finnhub data file unavailable', { path: filePath, ...extractError(error) });
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn('Finnhub data file is not valid JSON', { path: filePath, ...extractError(error) });
      return {};
    }

    const result = DataFileSchema.safeParse(parsed);
    if (!result.success) {
      log.warn('Finnhub data file is not keyed by date', {
        path: filePath,
        errors: result.error.issues.map((issue) => issue.message),
      });
      return {};
    }

    return result.data;
  }
}

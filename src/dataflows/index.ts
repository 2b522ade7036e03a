/**
 * Financial data layer: providers, their registry, and the reports built on them
 */

export * from './providers';
export { getNewsReport, getInsiderSentimentReport, getInsiderTransactionsReport } from './reports';
export type { ReportOptions } from './reports';
export { assertDateRange, parseIsoDate, formatIsoDate, isWithinRange, subtractDays } from './dateRange';

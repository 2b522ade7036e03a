export {
  DataProvider,
  DATA_PROVIDER_METHODS,
  FINANCIAL_DATA_TYPES,
  type DateGroupedRecords,
  type FinancialDataType,
  type FinancialRecord,
} from './base';
export { FinnhubProvider } from './finnhub';
export { TwelveDataProvider, type TwelveDataInsiderTransaction } from './twelvedata';
export {
  DataProviderRegistry,
  createDataProviderRegistry,
  dataProviders,
  type DataRegistryOptions,
} from './registry';

/**
 * Pluggable market-data and model providers.
 *
 * @example
 * import { dataProviders, llmProviders, createWithFallback } from 'market-provider-registry';
 *
 * const news = await dataProviders.get().getNews('AAPL', '2024-01-01', '2024-01-07');
 * const model = llmProviders.get('anthropic').getQuickThinkingLlm();
 * const { provider } = await createWithFallback(dataProviders, 'twelvedata', 'finnhub');
 */

export * from './providers';
export * from './dataflows';
export * from './llm';
export * from './errors';
export {
  getConfig,
  setConfig,
  resetConfig,
  loadDefaultConfig,
  configResolver,
  ProviderConfigSchema,
  validateConfigSchema,
  DEFAULT_DATA_PROVIDER,
  DEFAULT_LLM_PROVIDER,
  DEFAULT_BACKEND_URL,
  DEFAULT_TWELVEDATA_BASE_URL,
  type ConfigResolver,
  type ConfigSnapshot,
  type ProviderConfig,
  type ConfigValidationResult,
} from './config';
export { eventBus, createTestEventBus, TypedEventBus, type ProviderEvents } from './events';
export { createLogger, setLogLevel, LogLevel, type Logger } from './utils/logger';

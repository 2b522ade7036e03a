/**
 * Provider Configuration
 *
 * Process-wide configuration snapshot consulted by the registries when a
 * caller does not name a provider or pass settings explicitly.
 *
 * Defaults come from environment variables (a `.env` file at the project
 * root is loaded first). Runtime overrides go through setConfig(), which
 * merges and re-validates; getConfig() always hands out a copy.
 *
 * Environment Variables:
 *   DATA_PROVIDER, DATA_DIR, TWELVEDATA_BASE_URL, TWELVEDATA_API_KEY
 *   LLM_PROVIDER, DEEP_THINK_LLM, QUICK_THINK_LLM, BACKEND_URL
 *   EMBEDDING_MODEL, EMBEDDING_BACKEND_URL, ANTHROPIC_BASE_URL, GOOGLE_BASE_URL
 *   OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_API_KEY, OPENROUTER_API_KEY
 */

import dotenv from 'dotenv';
import path from 'path';
import { ConfigValidationError } from '../errors';
import { createLogger } from '../utils/logger';
import { type ProviderConfig, validateConfigSchema } from './schema';

dotenv.config({ path: path.join(__dirname, '../../.env') });

const log = createLogger('CONFIG');

export const DEFAULT_DATA_PROVIDER = 'finnhub';
export const DEFAULT_LLM_PROVIDER = 'openai';
export const DEFAULT_BACKEND_URL = 'https://api.openai.com/v1';
export const DEFAULT_TWELVEDATA_BASE_URL = 'https://api.twelvedata.com';

/**
 * Read-only view of the configuration consumed by the registries
 */
export type ConfigSnapshot = Readonly<Record<string, unknown>>;

/**
 * Anything that can hand the registries a configuration snapshot
 */
export interface ConfigResolver {
  getConfig(): ConfigSnapshot;
}

type OptionalSettingKey =
  | 'embedding_model'
  | 'embedding_backend_url'
  | 'anthropic_base_url'
  | 'google_base_url'
  | 'openai_api_key'
  | 'anthropic_api_key'
  | 'google_api_key'
  | 'openrouter_api_key'
  | 'twelvedata_api_key';

/**
 * Build the default configuration from environment variables
 */
export function loadDefaultConfig(env: NodeJS.ProcessEnv = process.env): ProviderConfig {
  const defaults: ProviderConfig = {
    data_provider: env.DATA_PROVIDER || DEFAULT_DATA_PROVIDER,
    data_dir: env.DATA_DIR || '',
    twelvedata_base_url: env.TWELVEDATA_BASE_URL || DEFAULT_TWELVEDATA_BASE_URL,

    llm_provider: env.LLM_PROVIDER || DEFAULT_LLM_PROVIDER,
    deep_think_llm: env.DEEP_THINK_LLM || 'o4-mini',
    quick_think_llm: env.QUICK_THINK_LLM || 'gpt-4o-mini',
    backend_url: env.BACKEND_URL || DEFAULT_BACKEND_URL,
  };

  const optional: Array<[OptionalSettingKey, string | undefined]> = [
    ['embedding_model', env.EMBEDDING_MODEL],
    ['embedding_backend_url', env.EMBEDDING_BACKEND_URL],
    ['anthropic_base_url', env.ANTHROPIC_BASE_URL],
    ['google_base_url', env.GOOGLE_BASE_URL],
    ['openai_api_key', env.OPENAI_API_KEY],
    ['anthropic_api_key', env.ANTHROPIC_API_KEY],
    ['google_api_key', env.GOOGLE_API_KEY],
    ['openrouter_api_key', env.OPENROUTER_API_KEY],
    ['twelvedata_api_key', env.TWELVEDATA_API_KEY],
  ];
  for (const [key, value] of optional) {
    if (value) {
      defaults[key] = value;
    }
  }

  return assertValidConfig(defaults);
}

/**
 * Validate configuration and throw if invalid
 */
export function assertValidConfig(config: unknown): ProviderConfig {
  const result = validateConfigSchema(config);

  if (!result.success) {
    log.error('Configuration validation failed', { errors: result.errors });
    throw new ConfigValidationError(result.errors);
  }

  return result.config;
}

// Lazily initialized so tests can adjust process.env before first use
let currentConfig: ProviderConfig | null = null;

/**
 * Get a copy of the current configuration
 */
export function getConfig(): ProviderConfig {
  if (currentConfig === null) {
    currentConfig = loadDefaultConfig();
  }
  return { ...currentConfig };
}

/**
 * Merge settings into the current configuration
 *
 * @example
 * setConfig({ data_provider: 'twelvedata' });
 * setConfig({ data_dir: '/srv/market-data', llm_provider: 'anthropic' });
 */
export function setConfig(update: Readonly<Record<string, unknown>>): ProviderConfig {
  const merged = assertValidConfig({ ...getConfig(), ...update });
  currentConfig = merged;
  log.debug('Configuration updated', { keys: Object.keys(update) });
  return { ...merged };
}

/**
 * Discard runtime overrides; the next getConfig() reloads from the environment
 */
export function resetConfig(): void {
  currentConfig = null;
}

/**
 * ConfigResolver backed by this module's process-wide state
 */
export const configResolver: ConfigResolver = {
  getConfig: () => getConfig(),
};

export { ProviderConfigSchema, validateConfigSchema } from './schema';
export type { ProviderConfig, ConfigValidationResult } from './schema';

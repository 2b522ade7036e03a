/**
 * Financial Data Provider Registry
 *
 * ProviderRegistry specialised for the data category. Besides a settings
 * object, `get()` accepts a bare string as the storage location, which is
 * merged over the configuration snapshot as `data_dir`.
 *
 * @module dataflows/providers/registry
 */

import { DEFAULT_DATA_PROVIDER } from '../../config';
import { ProviderRegistry } from '../../providers/registry';
import type { ProviderSettings, RegistryOptions } from '../../providers/types';
import { DATA_PROVIDER_METHODS, DataProvider } from './base';
import { FinnhubProvider } from './finnhub';
import { TwelveDataProvider } from './twelvedata';

export type DataRegistryOptions = Pick<RegistryOptions<DataProvider>, 'config' | 'events'>;

export class DataProviderRegistry extends ProviderRegistry<DataProvider> {
  constructor(options: DataRegistryOptions = {}) {
    super({
      category: 'data',
      contract: { base: DataProvider, requiredMethods: DATA_PROVIDER_METHODS },
      defaultProvider: DEFAULT_DATA_PROVIDER,
      nameKey: 'data_provider',
      builtins: {
        finnhub: FinnhubProvider,
        twelvedata: TwelveDataProvider,
      },
      ...options,
    });
  }

  /**
   * @param settings - settings object, or a storage location that overrides
   *   `data_dir` in the configuration snapshot
   */
  get(name?: string, settings?: ProviderSettings | string): DataProvider {
    if (typeof settings === 'string') {
      return super.get(name, { ...this.readConfig(), data_dir: settings });
    }
    return super.get(name, settings);
  }
}

/**
 * Build an isolated data registry holding the built-in providers
 */
export function createDataProviderRegistry(options: DataRegistryOptions = {}): DataProviderRegistry {
  return new DataProviderRegistry(options);
}

/**
 * Process-wide data registry
 */
export const dataProviders = createDataProviderRegistry();

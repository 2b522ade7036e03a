/**
 * Provider Fallback
 *
 * Builds a provider from a primary name and switches to a secondary name
 * when the primary cannot be constructed or reports itself unavailable.
 *
 * @module providers/fallback
 */

import { FallbackExhaustedError, ProviderUnavailableError } from '../errors';
import { type TypedEventBus, eventBus } from '../events';
import { createLogger, extractError } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { normalizeProviderName } from './registry';
import type { AvailabilityAware, FallbackResult, IProviderRegistry, ProviderSettings } from './types';

const log = createLogger('FALLBACK');

export interface FallbackOptions {
  /**
   * Bus receiving the provider:fallback event
   * @default the process-wide event bus
   */
  events?: TypedEventBus;
}

type Attempt<T> = { ok: true; provider: T } | { ok: false; error: unknown };

async function attempt<T extends AvailabilityAware>(
  registry: IProviderRegistry<T>,
  name: string,
  settings: ProviderSettings | undefined
): Promise<Attempt<T>> {
  try {
    const provider = registry.get(name, settings);
    const available = provider.isAvailable ? await provider.isAvailable() : true;
    if (!available) {
      const error = new ProviderUnavailableError(registry.category, normalizeProviderName(name));
      return { ok: false, error };
    }
    return { ok: true, provider };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Create the primary provider, or the fallback when the primary fails to
 * construct, reports itself unavailable, or its availability check throws.
 *
 * @throws FallbackExhaustedError when neither provider is usable
 *
 * @example
 * const { provider, usedFallback } = await createWithFallback(dataProviders, 'twelvedata', 'finnhub');
 */
export async function createWithFallback<T extends AvailabilityAware>(
  registry: IProviderRegistry<T>,
  primaryName: string,
  fallbackName: string,
  settings?: ProviderSettings,
  options: FallbackOptions = {}
): Promise<FallbackResult<T>> {
  const events = options.events ?? eventBus;

  const primary = await attempt(registry, primaryName, settings);
  if (primary.ok) {
    return {
      provider: primary.provider,
      providerName: normalizeProviderName(primaryName),
      usedFallback: false,
    };
  }

  log.warn('Primary provider unusable, falling back', {
    category: registry.category,
    primary: primaryName,
    fallback: fallbackName,
    ...extractError(primary.error),
  });
  events.emit('provider:fallback', {
    category: registry.category,
    primary: normalizeProviderName(primaryName),
    fallback: normalizeProviderName(fallbackName),
    reason: getErrorMessage(primary.error),
  });

  const secondary = await attempt(registry, fallbackName, settings);
  if (!secondary.ok) {
    log.error('Fallback provider unusable', {
      category: registry.category,
      fallback: fallbackName,
      ...extractError(secondary.error),
    });
    throw new FallbackExhaustedError(
      registry.category,
      normalizeProviderName(primaryName),
      normalizeProviderName(fallbackName),
      primary.error,
      secondary.error
    );
  }

  return {
    provider: secondary.provider,
    providerName: normalizeProviderName(fallbackName),
    usedFallback: true,
  };
}

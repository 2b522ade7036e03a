/**
 * Provider Architecture Module
 *
 * Generic registry, fallback orchestration and shared types for pluggable
 * provider categories.
 *
 * @module providers
 */

export { ProviderRegistry, normalizeProviderName, deriveProviderName } from './registry';
export { createWithFallback } from './fallback';
export type { FallbackOptions } from './fallback';
export { readStringSetting, readNonEmptySetting } from './settings';

export type {
  AbstractConstructor,
  AnyConstructor,
  AvailabilityAware,
  FallbackResult,
  IProviderRegistry,
  ProviderConstructor,
  ProviderContract,
  ProviderSettings,
  RegistryOptions,
  ResolvedProviderRequest,
} from './types';

/**
 * Generic Provider Types
 *
 * Base types shared by every provider category (financial data, LLM,
 * embedding). A category is described by a ProviderContract: the abstract
 * class every implementation must extend plus the methods it must provide.
 *
 * @module providers/types
 */

import type { ConfigResolver } from '../config';
import type { TypedEventBus } from '../events';

/**
 * Settings payload handed to a provider constructor (API keys, base URLs,
 * local paths). The registry passes it through without inspecting it.
 */
export type ProviderSettings = Readonly<Record<string, unknown>>;

/**
 * Constructor the registry stores and instantiates
 */
export type ProviderConstructor<T> = new (settings: ProviderSettings) => T;

/**
 * Any class reference offered for registration; conformance is checked at runtime
 */
export type AnyConstructor = new (...args: never[]) => unknown;

/**
 * Reference to a category's abstract base class
 */
export type AbstractConstructor<T> = abstract new (...args: never[]) => T;

/**
 * Optional capability: a provider may report that it cannot serve requests
 * (missing data directory, missing API key). Absent means always available.
 */
export interface AvailabilityAware {
  isAvailable?(): boolean | Promise<boolean>;
}

/**
 * Capability contract of one provider category
 */
export interface ProviderContract<T> {
  /**
   * Abstract base class implementations must extend
   */
  base: AbstractConstructor<T>;

  /**
   * Methods that must be functions on the implementation's prototype
   */
  requiredMethods: readonly string[];
}

/**
 * Configuration options for a registry
 */
export interface RegistryOptions<T> {
  /**
   * Category label used in logs, events and errors (e.g. 'data', 'llm')
   */
  category: string;

  contract: ProviderContract<T>;

  /**
   * Built-in provider used when neither caller nor configuration names one
   */
  defaultProvider: string;

  /**
   * Configuration key holding the provider name for this category
   */
  nameKey: string;

  /**
   * Providers registered at construction
   */
  builtins?: Readonly<Record<string, ProviderConstructor<T>>>;

  /**
   * Source of defaults when name or settings are omitted
   * @default the process-wide configuration module
   */
  config?: ConfigResolver;

  /**
   * Bus receiving provider:registered / provider:created events
   * @default the process-wide event bus
   */
  events?: TypedEventBus;
}

/**
 * Name and settings after applying caller arguments, configuration and defaults
 */
export interface ResolvedProviderRequest {
  name: string;
  settings: ProviderSettings;
}

/**
 * Generic provider registry interface
 */
export interface IProviderRegistry<T> {
  readonly category: string;

  /**
   * Resolve a provider name and settings, then construct a fresh instance
   */
  get(name?: string, settings?: ProviderSettings): T;

  /**
   * Register (or replace) a provider constructor under a name
   */
  register(name: string, constructor: AnyConstructor): void;

  /**
   * Sorted, normalized names of all registered providers
   */
  list(): string[];

  has(name: string): boolean;
}

/**
 * Outcome of createWithFallback
 */
export interface FallbackResult<T> {
  provider: T;
  providerName: string;
  usedFallback: boolean;
}

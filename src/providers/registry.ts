/**
 * Generic Provider Registry
 *
 * Maps normalized provider names to constructors for one provider category
 * and mediates every provider construction. The same class backs the data,
 * LLM and embedding registries; each is an explicit object, so tests can
 * build an isolated registry instead of mutating a shared one.
 *
 * @module providers/registry
 */

import { type ConfigResolver, type ConfigSnapshot, configResolver } from '../config';
import { InvalidProviderImplementationError, UnknownProviderKindError } from '../errors';
import { type TypedEventBus, eventBus } from '../events';
import { type Logger, createLogger } from '../utils/logger';
import { redactObject } from '../utils/redact';
import { readStringSetting } from './settings';
import type {
  AnyConstructor,
  IProviderRegistry,
  ProviderConstructor,
  ProviderContract,
  ProviderSettings,
  RegistryOptions,
  ResolvedProviderRequest,
} from './types';

/**
 * Lowercase and trim a provider name. Applied before every lookup and
 * registration, so ' FinnHub ' and 'finnhub' share one slot.
 */
export function normalizeProviderName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Derive a short provider name from a type name by stripping the category
 * suffix, e.g. ('OpenAILLMProvider', 'LLMProvider') -> 'openai'
 */
export function deriveProviderName(typeName: string, suffix: string): string {
  const stripped =
    typeName.endsWith(suffix) && typeName.length > suffix.length
      ? typeName.slice(0, -suffix.length)
      : typeName;
  return stripped.toLowerCase();
}

/**
 * Generic provider registry implementation
 */
export class ProviderRegistry<T extends object> implements IProviderRegistry<T> {
  readonly category: string;
  protected readonly log: Logger;
  private readonly providers = new Map<string, ProviderConstructor<T>>();
  private readonly contract: ProviderContract<T>;
  private readonly defaultProvider: string;
  private readonly nameKey: string;
  private readonly configResolver: ConfigResolver;
  private readonly events: TypedEventBus;

  constructor(options: RegistryOptions<T>) {
    this.category = options.category;
    this.log = createLogger(`REGISTRY:${options.category.toUpperCase()}`);
    this.contract = options.contract;
    this.defaultProvider = normalizeProviderName(options.defaultProvider);
    this.nameKey = options.nameKey;
    this.configResolver = options.config ?? configResolver;
    this.events = options.events ?? eventBus;

    for (const [name, constructor] of Object.entries(options.builtins ?? {})) {
      this.assertConforms(constructor);
      this.providers.set(normalizeProviderName(name), constructor);
    }
  }

  /**
   * Construct a provider.
   *
   * Name: explicit argument, then the category's name key inside explicitly
   * passed settings, then the configuration, then the built-in default.
   * Settings: explicit argument, then the configuration snapshot.
   */
  get(name?: string, settings?: ProviderSettings): T {
    const request = this.resolve(name, settings);
    const constructor = this.providers.get(request.name);

    if (!constructor) {
      throw new UnknownProviderKindError(this.category, request.name, this.list());
    }

    this.log.debug('Creating provider', {
      name: request.name,
      settings: redactObject(request.settings),
    });

    const provider = new constructor(request.settings);

    this.events.emit('provider:created', {
      category: this.category,
      name: request.name,
      typeName: constructor.name,
    });

    return provider;
  }

  /**
   * Register a provider class. The class must extend the category's abstract
   * base and implement every contract method; otherwise the registry is left
   * unchanged. An existing entry under the same name is replaced.
   */
  register(name: string, constructor: AnyConstructor): void {
    this.assertConforms(constructor);

    const key = normalizeProviderName(name);
    const replaced = this.providers.has(key);
    if (replaced) {
      this.log.warn('Provider already registered, replacing', { name: key });
    }

    this.providers.set(key, constructor);
    this.log.info('Provider registered', { name: key, type: constructor.name });

    this.events.emit('provider:registered', {
      category: this.category,
      name: key,
      typeName: constructor.name,
      replaced,
    });
  }

  list(): string[] {
    return Array.from(this.providers.keys()).sort();
  }

  has(name: string): boolean {
    return this.providers.has(normalizeProviderName(name));
  }

  /**
   * Apply the name and settings resolution order without constructing anything
   */
  resolve(name?: string, settings?: ProviderSettings): ResolvedProviderRequest {
    let snapshot: ConfigSnapshot | undefined;
    const config = (): ConfigSnapshot => {
      if (snapshot === undefined) {
        snapshot = this.readConfig();
      }
      return snapshot;
    };

    const rawName =
      name ??
      readStringSetting(settings, this.nameKey) ??
      readStringSetting(config(), this.nameKey) ??
      this.defaultProvider;

    return {
      name: normalizeProviderName(rawName),
      settings: settings ?? config(),
    };
  }

  protected readConfig(): ConfigSnapshot {
    return this.configResolver.getConfig();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private assertConforms(constructor: AnyConstructor): asserts constructor is ProviderConstructor<T> {
    if (!this.conformsToContract(constructor)) {
      const typeName =
        typeof constructor === 'function' ? constructor.name || '<anonymous>' : typeof constructor;
      throw new InvalidProviderImplementationError(
        this.category,
        this.contract.base.name,
        typeName
      );
    }
  }

  private conformsToContract(constructor: AnyConstructor): constructor is ProviderConstructor<T> {
    if (typeof constructor !== 'function') {
      return false;
    }

    const prototype: unknown = constructor.prototype;
    if (!(prototype instanceof this.contract.base)) {
      return false;
    }

    return this.contract.requiredMethods.every(
      (method) => typeof Reflect.get(prototype, method) === 'function'
    );
  }
}

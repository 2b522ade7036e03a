/**
 * Language-Model and Embedding Provider Contracts
 *
 * An LLMProvider hands out two chat model handles, a "deep thinking" one for
 * multi-step reasoning and a "quick thinking" one for cheap calls. Handles
 * are built from the settings on every call and never cached, so a settings
 * change is picked up by the next call.
 *
 * An EmbeddingProvider turns text into a fixed-length vector and reports the
 * model it uses.
 *
 * @module llm/base
 */

import type { LanguageModelV2 } from '@ai-sdk/provider';
import { z } from 'zod';
import { ProviderConfigurationError } from '../errors';
import { deriveProviderName } from '../providers/registry';
import { readNonEmptySetting } from '../providers/settings';
import type { AvailabilityAware, ProviderSettings } from '../providers/types';

export type ModelRole = 'deep' | 'quick';

const MODEL_SETTING: Record<ModelRole, string> = {
  deep: 'deep_think_llm',
  quick: 'quick_think_llm',
};

const UrlSchema = z.string().url();

/**
 * Methods a registered LLM provider must implement
 */
export const LLM_PROVIDER_METHODS = [
  'getDeepThinkingLlm',
  'getQuickThinkingLlm',
  'createChatModel',
] as const;

/**
 * Methods a registered embedding provider must implement
 */
export const EMBEDDING_PROVIDER_METHODS = ['getEmbedding', 'getEmbeddingModelName'] as const;

/**
 * Settings reads shared by both contracts
 */
export abstract class SettingsReader {
  readonly settings: ProviderSettings;

  constructor(settings: ProviderSettings = {}) {
    this.settings = settings;
  }

  abstract getProviderName(): string;

  /**
   * Non-empty string setting, or ProviderConfigurationError
   */
  protected requireSetting(key: string): string {
    const value = readNonEmptySetting(this.settings, key);
    if (value === undefined) {
      throw new ProviderConfigurationError(this.getProviderName(), key);
    }
    return value;
  }

  protected optionalSetting(key: string): string | undefined {
    return readNonEmptySetting(this.settings, key);
  }

  /**
   * URL setting validated with zod; undefined when unset
   */
  protected urlSetting(key: string): string | undefined {
    const value = this.optionalSetting(key);
    if (value === undefined) {
      return undefined;
    }

    const result = UrlSchema.safeParse(value);
    if (!result.success) {
      throw new ProviderConfigurationError(
        this.getProviderName(),
        key,
        `Provider '${this.getProviderName()}' setting '${key}' is not a valid URL: ${value}`
      );
    }
    return result.data;
  }
}

export abstract class LLMProvider extends SettingsReader implements AvailabilityAware {
  /**
   * Chat model for multi-step reasoning (`deep_think_llm`)
   */
  getDeepThinkingLlm(): LanguageModelV2 {
    return this.createChatModel(this.modelId('deep'));
  }

  /**
   * Chat model for fast, inexpensive calls (`quick_think_llm`)
   */
  getQuickThinkingLlm(): LanguageModelV2 {
    return this.createChatModel(this.modelId('quick'));
  }

  isAvailable?(): boolean | Promise<boolean>;

  /**
   * Short name for diagnostics, e.g. OpenAILLMProvider -> 'openai'
   */
  getProviderName(): string {
    return deriveProviderName(this.constructor.name, 'LLMProvider');
  }

  /**
   * Model identifier for a role, read from settings on every call
   */
  modelId(role: ModelRole): string {
    return this.requireSetting(MODEL_SETTING[role]);
  }

  /**
   * Build a new model handle for the backend
   */
  protected abstract createChatModel(modelId: string): LanguageModelV2;
}

export abstract class EmbeddingProvider extends SettingsReader implements AvailabilityAware {
  /**
   * Embed a text string
   */
  abstract getEmbedding(text: string): Promise<number[]>;

  abstract getEmbeddingModelName(): string;

  isAvailable?(): boolean | Promise<boolean>;

  /**
   * Short name for diagnostics, e.g. OllamaEmbeddingProvider -> 'ollama'
   */
  getProviderName(): string {
    return deriveProviderName(this.constructor.name, 'EmbeddingProvider');
  }
}

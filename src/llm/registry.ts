/**
 * LLM and Embedding Provider Registries
 *
 * Both categories are selected by the same `llm_provider` key, so switching
 * the chat backend switches the embedding backend with it.
 *
 * @module llm/registry
 */

import { DEFAULT_LLM_PROVIDER } from '../config';
import { ProviderRegistry } from '../providers/registry';
import type { ProviderConstructor, RegistryOptions } from '../providers/types';
import { AnthropicEmbeddingProvider, AnthropicLLMProvider } from './anthropic';
import {
  EMBEDDING_PROVIDER_METHODS,
  EmbeddingProvider,
  LLM_PROVIDER_METHODS,
  LLMProvider,
} from './base';
import { GoogleEmbeddingProvider, GoogleLLMProvider } from './google';
import { OllamaEmbeddingProvider, OllamaLLMProvider } from './ollama';
import { OpenAIEmbeddingProvider, OpenAILLMProvider } from './openai';
import { OpenRouterEmbeddingProvider, OpenRouterLLMProvider } from './openrouter';

export type ModelRegistryOptions<T> = Pick<RegistryOptions<T>, 'config' | 'events'>;

const BUILTIN_LLM_PROVIDERS: Record<string, ProviderConstructor<LLMProvider>> = {
  openai: OpenAILLMProvider,
  anthropic: AnthropicLLMProvider,
  google: GoogleLLMProvider,
  openrouter: OpenRouterLLMProvider,
  ollama: OllamaLLMProvider,
};

const BUILTIN_EMBEDDING_PROVIDERS: Record<string, ProviderConstructor<EmbeddingProvider>> = {
  openai: OpenAIEmbeddingProvider,
  anthropic: AnthropicEmbeddingProvider,
  google: GoogleEmbeddingProvider,
  openrouter: OpenRouterEmbeddingProvider,
  ollama: OllamaEmbeddingProvider,
};

/**
 * Build an isolated LLM registry holding the built-in providers
 */
export function createLlmProviderRegistry(
  options: ModelRegistryOptions<LLMProvider> = {}
): ProviderRegistry<LLMProvider> {
  return new ProviderRegistry<LLMProvider>({
    category: 'llm',
    contract: { base: LLMProvider, requiredMethods: LLM_PROVIDER_METHODS },
    defaultProvider: DEFAULT_LLM_PROVIDER,
    nameKey: 'llm_provider',
    builtins: BUILTIN_LLM_PROVIDERS,
    ...options,
  });
}

/**
 * Build an isolated embedding registry holding the built-in providers
 */
export function createEmbeddingProviderRegistry(
  options: ModelRegistryOptions<EmbeddingProvider> = {}
): ProviderRegistry<EmbeddingProvider> {
  return new ProviderRegistry<EmbeddingProvider>({
    category: 'embedding',
    contract: { base: EmbeddingProvider, requiredMethods: EMBEDDING_PROVIDER_METHODS },
    defaultProvider: DEFAULT_LLM_PROVIDER,
    nameKey: 'llm_provider',
    builtins: BUILTIN_EMBEDDING_PROVIDERS,
    ...options,
  });
}

export const llmProviders = createLlmProviderRegistry();

export const embeddingProviders = createEmbeddingProviderRegistry();

/**
 * Language-model and embedding providers
 */

export {
  LLMProvider,
  EmbeddingProvider,
  LLM_PROVIDER_METHODS,
  EMBEDDING_PROVIDER_METHODS,
  type ModelRole,
} from './base';
export {
  OpenAILLMProvider,
  OpenAIEmbeddingProvider,
  OpenAICompatibleEmbeddings,
  OpenAIFallbackEmbeddingProvider,
  selectEmbeddingModel,
  DEFAULT_EMBEDDING_MODEL,
  OLLAMA_EMBEDDING_MODEL,
  OLLAMA_LOCAL_URL,
  type EmbeddingEndpoint,
} from './openai';
export { AnthropicLLMProvider, AnthropicEmbeddingProvider } from './anthropic';
export { GoogleLLMProvider, GoogleEmbeddingProvider } from './google';
export { OpenRouterLLMProvider, OpenRouterEmbeddingProvider, OPENROUTER_BASE_URL } from './openrouter';
export { OllamaLLMProvider, OllamaEmbeddingProvider } from './ollama';
export {
  createLlmProviderRegistry,
  createEmbeddingProviderRegistry,
  llmProviders,
  embeddingProviders,
  type ModelRegistryOptions,
} from './registry';

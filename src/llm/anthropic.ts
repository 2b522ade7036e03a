/**
 * Anthropic Providers
 *
 * Anthropic has no embeddings API; AnthropicEmbeddingProvider uses OpenAI.
 * `anthropic_base_url` overrides the SDK's default endpoint.
 *
 * @module llm/anthropic
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import type { LanguageModelV2 } from '@ai-sdk/provider';
import { LLMProvider } from './base';
import { OpenAIFallbackEmbeddingProvider } from './openai';

export class AnthropicLLMProvider extends LLMProvider {
  protected createChatModel(modelId: string): LanguageModelV2 {
    const anthropic = createAnthropic({
      apiKey: this.optionalSetting('anthropic_api_key'),
      baseURL: this.urlSetting('anthropic_base_url'),
    });
    return anthropic.languageModel(modelId);
  }
}

export class AnthropicEmbeddingProvider extends OpenAIFallbackEmbeddingProvider {}

/**
 * OpenRouter Providers
 *
 * OpenRouter speaks the OpenAI Chat Completions protocol, so chat models are
 * OpenAI-compatible handles pointed at `backend_url`.
 *
 * @module llm/openrouter
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModelV2 } from '@ai-sdk/provider';
import { LLMProvider } from './base';
import { OpenAIFallbackEmbeddingProvider } from './openai';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export class OpenRouterLLMProvider extends LLMProvider {
  protected createChatModel(modelId: string): LanguageModelV2 {
    const openrouter = createOpenAI({
      apiKey: this.optionalSetting('openrouter_api_key'),
      baseURL: this.urlSetting('backend_url') ?? OPENROUTER_BASE_URL,
    });
    return openrouter.chat(modelId);
  }
}

export class OpenRouterEmbeddingProvider extends OpenAIFallbackEmbeddingProvider {}

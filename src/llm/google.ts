/**
 * Google Gemini Providers
 *
 * @module llm/google
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModelV2 } from '@ai-sdk/provider';
import { LLMProvider } from './base';
import { OpenAIFallbackEmbeddingProvider } from './openai';

export class GoogleLLMProvider extends LLMProvider {
  protected createChatModel(modelId: string): LanguageModelV2 {
    const google = createGoogleGenerativeAI({
      apiKey: this.optionalSetting('google_api_key'),
      baseURL: this.urlSetting('google_base_url'),
    });
    return google.languageModel(modelId);
  }
}

export class GoogleEmbeddingProvider extends OpenAIFallbackEmbeddingProvider {}

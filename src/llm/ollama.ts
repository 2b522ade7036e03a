/**
 * Ollama Providers
 *
 * Ollama exposes an OpenAI-compatible API, for chat and for embeddings, at
 * `backend_url` (normally http://localhost:11434/v1). No API key is needed;
 * the placeholder 'ollama' is sent.
 *
 * @module llm/ollama
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModelV2 } from '@ai-sdk/provider';
import { EmbeddingProvider, LLMProvider } from './base';
import { OLLAMA_LOCAL_URL, OpenAICompatibleEmbeddings } from './openai';

const OLLAMA_API_KEY = 'ollama';

export class OllamaLLMProvider extends LLMProvider {
  protected createChatModel(modelId: string): LanguageModelV2 {
    const ollama = createOpenAI({
      apiKey: OLLAMA_API_KEY,
      baseURL: this.urlSetting('backend_url') ?? OLLAMA_LOCAL_URL,
    });
    return ollama.chat(modelId);
  }
}

export class OllamaEmbeddingProvider extends EmbeddingProvider {
  private readonly client = new OpenAICompatibleEmbeddings({
    baseURL: this.urlSetting('backend_url') ?? OLLAMA_LOCAL_URL,
    apiKey: OLLAMA_API_KEY,
    model: this.optionalSetting('embedding_model'),
  });

  async getEmbedding(text: string): Promise<number[]> {
    return this.client.embed(text);
  }

  getEmbeddingModelName(): string {
    return this.client.model;
  }
}

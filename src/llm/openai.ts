/**
 * OpenAI Providers
 *
 * Chat models go through the Chat Completions API at `backend_url`, which
 * also serves OpenAI-compatible gateways. Embeddings use `embedding_model`
 * when set; otherwise the model is picked from the backend URL.
 *
 * @module llm/openai
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { EmbeddingModelV2, LanguageModelV2 } from '@ai-sdk/provider';
import { embed } from 'ai';
import { DEFAULT_BACKEND_URL } from '../config';
import { createLogger } from '../utils/logger';
import { EmbeddingProvider, LLMProvider } from './base';

const log = createLogger('LLM:OPENAI');

export const OLLAMA_LOCAL_URL = 'http://localhost:11434/v1';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const OLLAMA_EMBEDDING_MODEL = 'nomic-embed-text';

/**
 * Embedding model for a backend: the explicit choice, `nomic-embed-text` for
 * a local Ollama server, `text-embedding-3-small` otherwise
 */
export function selectEmbeddingModel(backendUrl: string, explicit?: string): string {
  if (explicit) {
    return explicit;
  }
  return backendUrl === OLLAMA_LOCAL_URL ? OLLAMA_EMBEDDING_MODEL : DEFAULT_EMBEDDING_MODEL;
}

export class OpenAILLMProvider extends LLMProvider {
  protected createChatModel(modelId: string): LanguageModelV2 {
    const openai = createOpenAI({
      apiKey: this.optionalSetting('openai_api_key'),
      baseURL: this.urlSetting('backend_url') ?? DEFAULT_BACKEND_URL,
    });
    return openai.chat(modelId);
  }
}

/**
 * Connection details for an OpenAI-compatible embeddings endpoint
 */
export interface EmbeddingEndpoint {
  baseURL: string;
  apiKey?: string;
  model?: string;
}

/**
 * Embeddings through any OpenAI-compatible endpoint. The other providers
 * delegate to this class.
 */
export class OpenAICompatibleEmbeddings {
  readonly baseURL: string;
  readonly model: string;
  private readonly apiKey: string | undefined;

  constructor(endpoint: EmbeddingEndpoint) {
    this.baseURL = endpoint.baseURL;
    this.apiKey = endpoint.apiKey;
    this.model = selectEmbeddingModel(endpoint.baseURL, endpoint.model);
  }

  createModel(): EmbeddingModelV2<string> {
    const openai = createOpenAI({ apiKey: this.apiKey, baseURL: this.baseURL });
    return openai.textEmbeddingModel(this.model);
  }

  async embed(text: string): Promise<number[]> {
    log.debug('Requesting embedding', { model: this.model, baseURL: this.baseURL, length: text.length });
    const { embedding } = await embed({ model: this.createModel(), value: text });
    return embedding;
  }
}

export class OpenAIEmbeddingProvider extends EmbeddingProvider {
  private readonly client = new OpenAICompatibleEmbeddings({
    baseURL: this.urlSetting('backend_url') ?? DEFAULT_BACKEND_URL,
    apiKey: this.optionalSetting('openai_api_key'),
    model: this.optionalSetting('embedding_model'),
  });

  async getEmbedding(text: string): Promise<number[]> {
    return this.client.embed(text);
  }

  getEmbeddingModelName(): string {
    return this.client.model;
  }
}

/**
 * Base for backends without an embeddings API: embeddings are served by
 * OpenAI at `embedding_backend_url` (default api.openai.com) and reported as
 * `openai-fallback-<model>`.
 */
export abstract class OpenAIFallbackEmbeddingProvider extends EmbeddingProvider {
  private readonly fallback = new OpenAICompatibleEmbeddings({
    baseURL: this.urlSetting('embedding_backend_url') ?? DEFAULT_BACKEND_URL,
    apiKey: this.optionalSetting('openai_api_key'),
    model: this.optionalSetting('embedding_model'),
  });

  async getEmbedding(text: string): Promise<number[]> {
    return this.fallback.embed(text);
  }

  getEmbeddingModelName(): string {
    return `openai-fallback-${this.fallback.model}`;
  }
}

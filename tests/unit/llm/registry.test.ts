import { describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { LanguageModelV2 } from '@ai-sdk/provider';
import {
  AnthropicEmbeddingProvider,
  AnthropicLLMProvider,
  EmbeddingProvider,
  LLMProvider,
  OllamaLLMProvider,
  OpenAIEmbeddingProvider,
  OpenAILLMProvider,
  createEmbeddingProviderRegistry,
  createLlmProviderRegistry,
} from '../../../src/llm';
import { InvalidProviderImplementationError } from '../../../src/errors';
import { staticConfig } from '../../helpers/greeters';

class LocalLLMProvider extends LLMProvider {
  protected createChatModel(modelId: string): LanguageModelV2 {
    return new OllamaLLMProvider({
      ...this.settings,
      quick_think_llm: modelId,
    }).getQuickThinkingLlm();
  }
}

class HashEmbeddingProvider extends EmbeddingProvider {
  async getEmbedding(text: string): Promise<number[]> {
    return [text.length, 0, 0];
  }

  getEmbeddingModelName(): string {
    return 'length-hash';
  }
}

// Subclass shaped like an untyped plugin that never supplies the chat model hook
class UnfinishedLLMProvider extends LLMProvider {
  protected createChatModel(): LanguageModelV2 {
    throw new Error('unreachable');
  }
}
Reflect.deleteProperty(UnfinishedLLMProvider.prototype, 'createChatModel');

class ChatOnlyClient {
  getDeepThinkingLlm(): string {
    return 'deep';
  }

  getQuickThinkingLlm(): string {
    return 'quick';
  }
}

const BUILTIN_NAMES = ['anthropic', 'google', 'ollama', 'openai', 'openrouter'];

describe('LLM provider registry', () => {
  it('holds the built-in backends', () => {
    expect(createLlmProviderRegistry({ config: staticConfig({}) }).list()).toEqual(BUILTIN_NAMES);
  });

  it('defaults to openai', () => {
    const registry = createLlmProviderRegistry({ config: staticConfig({}) });
    expect(registry.get()).toBeInstanceOf(OpenAILLMProvider);
  });

  it('follows llm_provider from the configuration', () => {
    const registry = createLlmProviderRegistry({ config: staticConfig({ llm_provider: 'Anthropic' }) });
    expect(registry.get()).toBeInstanceOf(AnthropicLLMProvider);
  });

  it('reads llm_provider from explicitly passed settings', () => {
    const registry = createLlmProviderRegistry({ config: staticConfig({ llm_provider: 'openai' }) });
    const provider = registry.get(undefined, { llm_provider: 'ollama', quick_think_llm: 'llama3' });

    expect(provider).toBeInstanceOf(OllamaLLMProvider);
    expect(provider.getQuickThinkingLlm().modelId).toBe('llama3');
  });

  it('registers a custom backend', () => {
    const registry = createLlmProviderRegistry({ config: staticConfig({}) });
    registry.register('local', LocalLLMProvider);

    const provider = registry.get('LOCAL', { deep_think_llm: 'qwen2.5:14b' });

    expect(provider).toBeInstanceOf(LocalLLMProvider);
    expect(provider.getProviderName()).toBe('local');
    expect(provider.getDeepThinkingLlm().modelId).toBe('qwen2.5:14b');
  });

  it('rejects a class that only looks like a provider', () => {
    const registry = createLlmProviderRegistry({ config: staticConfig({}) });

    expect(() => registry.register('chat-only', ChatOnlyClient)).toThrow(
      InvalidProviderImplementationError
    );
    expect(registry.list()).toEqual(BUILTIN_NAMES);
  });

  it('rejects a subclass without createChatModel at registration', () => {
    const registry = createLlmProviderRegistry({ config: staticConfig({}) });

    expect(() => registry.register('unfinished', UnfinishedLLMProvider)).toThrow(
      'Provider class UnfinishedLLMProvider must extend LLMProvider and implement its methods'
    );
    expect(registry.has('unfinished')).toBe(false);
  });

  it('rejects embedding providers', () => {
    const registry = createLlmProviderRegistry({ config: staticConfig({}) });
    expect(() => registry.register('hash', HashEmbeddingProvider)).toThrow(
      'Provider class HashEmbeddingProvider must extend LLMProvider and implement its methods'
    );
  });
});

describe('embedding provider registry', () => {
  it('holds the built-in backends', () => {
    expect(createEmbeddingProviderRegistry({ config: staticConfig({}) }).list()).toEqual(
      BUILTIN_NAMES
    );
  });

  it('shares the llm_provider key with the LLM registry', () => {
    const config = staticConfig({ llm_provider: 'anthropic' });

    expect(createEmbeddingProviderRegistry({ config }).get()).toBeInstanceOf(
      AnthropicEmbeddingProvider
    );
    expect(createEmbeddingProviderRegistry({ config: staticConfig({}) }).get()).toBeInstanceOf(
      OpenAIEmbeddingProvider
    );
  });

  it('registers a custom embedding backend independently of the LLM registry', async () => {
    const embeddings = createEmbeddingProviderRegistry({ config: staticConfig({}) });
    const llms = createLlmProviderRegistry({ config: staticConfig({}) });

    embeddings.register('hash', HashEmbeddingProvider);

    expect(await embeddings.get('hash', {}).getEmbedding('abcd')).toEqual([4, 0, 0]);
    expect(embeddings.get('hash', {}).getProviderName()).toBe('hash');
    expect(llms.has('hash')).toBe(false);
  });

  it('rejects LLM providers', () => {
    const registry = createEmbeddingProviderRegistry({ config: staticConfig({}) });
    expect(() => registry.register('local', LocalLLMProvider)).toThrow(
      InvalidProviderImplementationError
    );
  });
});

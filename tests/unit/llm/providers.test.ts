import { describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import {
  AnthropicEmbeddingProvider,
  AnthropicLLMProvider,
  EmbeddingProvider,
  GoogleEmbeddingProvider,
  GoogleLLMProvider,
  LLMProvider,
  OllamaEmbeddingProvider,
  OllamaLLMProvider,
  OpenAICompatibleEmbeddings,
  OpenAIEmbeddingProvider,
  OpenAILLMProvider,
  OpenRouterEmbeddingProvider,
  OpenRouterLLMProvider,
  selectEmbeddingModel,
} from '../../../src/llm';
import { ProviderConfigurationError } from '../../../src/errors';
import type { ProviderConstructor } from '../../../src/providers/types';
import { createFakeEmbeddingModel } from '../../helpers/fakeEmbeddingModel';

const llmSettings = {
  deep_think_llm: 'deep-model',
  quick_think_llm: 'quick-model',
  backend_url: 'https://llm.test/v1',
  openai_api_key: 'test-key',
  anthropic_api_key: 'test-key',
  google_api_key: 'test-key',
  openrouter_api_key: 'test-key',
};

const LLM_PROVIDERS: Array<[string, ProviderConstructor<LLMProvider>]> = [
  ['openai', OpenAILLMProvider],
  ['anthropic', AnthropicLLMProvider],
  ['google', GoogleLLMProvider],
  ['openrouter', OpenRouterLLMProvider],
  ['ollama', OllamaLLMProvider],
];

describe('LLM providers', () => {
  describe.each(LLM_PROVIDERS)('%s', (name, Provider) => {
    it('extends the LLM contract and derives its name', () => {
      const provider = new Provider(llmSettings);

      expect(provider).toBeInstanceOf(LLMProvider);
      expect(provider.getProviderName()).toBe(name);
      expect(provider.settings).toBe(llmSettings);
    });

    it('builds deep and quick handles from the configured model ids', () => {
      const provider = new Provider(llmSettings);

      const deep = provider.getDeepThinkingLlm();
      const quick = provider.getQuickThinkingLlm();

      expect(deep.specificationVersion).toBe('v2');
      expect(deep.modelId).toBe('deep-model');
      expect(quick.modelId).toBe('quick-model');
    });

    it('returns a new handle on every call', () => {
      const provider = new Provider(llmSettings);
      expect(provider.getQuickThinkingLlm()).not.toBe(provider.getQuickThinkingLlm());
    });

    it('requires a model id', () => {
      const provider = new Provider({ ...llmSettings, deep_think_llm: '' });

      expect(() => provider.getDeepThinkingLlm()).toThrow(ProviderConfigurationError);
      expect(() => provider.getDeepThinkingLlm()).toThrow(
        `Provider '${name}' requires setting 'deep_think_llm'`
      );
      expect(provider.getQuickThinkingLlm().modelId).toBe('quick-model');
    });
  });

  it('reads model ids at call time', () => {
    const settings: Record<string, unknown> = { ...llmSettings };
    const provider = new OpenAILLMProvider(settings);

    settings.quick_think_llm = 'replacement-model';

    expect(provider.getQuickThinkingLlm().modelId).toBe('replacement-model');
  });

  it('rejects an invalid backend URL', () => {
    const provider = new OpenAILLMProvider({ ...llmSettings, backend_url: 'not a url' });

    expect(() => provider.getDeepThinkingLlm()).toThrow(
      "Provider 'openai' setting 'backend_url' is not a valid URL: not a url"
    );
  });

  it('ignores backend_url for Anthropic unless anthropic_base_url is set', () => {
    const provider = new AnthropicLLMProvider({ ...llmSettings, backend_url: 'not a url' });
    expect(provider.getDeepThinkingLlm().modelId).toBe('deep-model');
  });
});

describe('selectEmbeddingModel', () => {
  it('prefers an explicit model', () => {
    expect(selectEmbeddingModel('http://localhost:11434/v1', 'mxbai-embed-large')).toBe(
      'mxbai-embed-large'
    );
  });

  it('uses nomic-embed-text for a local Ollama backend', () => {
    expect(selectEmbeddingModel('http://localhost:11434/v1')).toBe('nomic-embed-text');
  });

  it('uses text-embedding-3-small elsewhere', () => {
    expect(selectEmbeddingModel('https://api.openai.com/v1')).toBe('text-embedding-3-small');
  });
});

describe('embedding providers', () => {
  it('extend the embedding contract and derive their names', () => {
    const providers: Array<[string, EmbeddingProvider]> = [
      ['openai', new OpenAIEmbeddingProvider({})],
      ['anthropic', new AnthropicEmbeddingProvider({})],
      ['google', new GoogleEmbeddingProvider({})],
      ['openrouter', new OpenRouterEmbeddingProvider({})],
      ['ollama', new OllamaEmbeddingProvider({})],
    ];

    for (const [name, provider] of providers) {
      expect(provider).toBeInstanceOf(EmbeddingProvider);
      expect(provider.getProviderName()).toBe(name);
    }
  });

  it('picks the OpenAI embedding model from the backend', () => {
    expect(new OpenAIEmbeddingProvider({}).getEmbeddingModelName()).toBe('text-embedding-3-small');
    expect(
      new OpenAIEmbeddingProvider({ backend_url: 'http://localhost:11434/v1' }).getEmbeddingModelName()
    ).toBe('nomic-embed-text');
    expect(
      new OpenAIEmbeddingProvider({ embedding_model: 'text-embedding-3-large' }).getEmbeddingModelName()
    ).toBe('text-embedding-3-large');
  });

  it('reports the OpenAI fallback for backends without embeddings', () => {
    const settings = { backend_url: 'https://api.anthropic.com/v1' };

    expect(new AnthropicEmbeddingProvider(settings).getEmbeddingModelName()).toBe(
      'openai-fallback-text-embedding-3-small'
    );
    expect(new GoogleEmbeddingProvider(settings).getEmbeddingModelName()).toBe(
      'openai-fallback-text-embedding-3-small'
    );
    expect(
      new OpenRouterEmbeddingProvider({ embedding_model: 'text-embedding-3-large' })
        .getEmbeddingModelName()
    ).toBe('openai-fallback-text-embedding-3-large');
  });

  it('uses the Ollama backend for Ollama embeddings', () => {
    expect(
      new OllamaEmbeddingProvider({ backend_url: 'http://localhost:11434/v1' }).getEmbeddingModelName()
    ).toBe('nomic-embed-text');
  });

  it('embeds text through the selected endpoint', async () => {
    const endpoints: string[] = [];
    vi.spyOn(OpenAICompatibleEmbeddings.prototype, 'createModel').mockImplementation(
      function (this: OpenAICompatibleEmbeddings) {
        endpoints.push(`${this.baseURL}|${this.model}`);
        return createFakeEmbeddingModel([0.25, 0.5, 0.75]);
      }
    );

    const openai = new OpenAIEmbeddingProvider({ backend_url: 'https://llm.test/v1' });
    const anthropic = new AnthropicEmbeddingProvider({ backend_url: 'https://api.anthropic.com/v1' });
    const ollama = new OllamaEmbeddingProvider({ backend_url: 'http://localhost:11434/v1' });

    expect(await openai.getEmbedding('quarterly earnings')).toEqual([0.25, 0.5, 0.75]);
    expect(await anthropic.getEmbedding('quarterly earnings')).toEqual([0.25, 0.5, 0.75]);
    expect(await ollama.getEmbedding('quarterly earnings')).toEqual([0.25, 0.5, 0.75]);

    expect(endpoints).toEqual([
      'https://llm.test/v1|text-embedding-3-small',
      'https://api.openai.com/v1|text-embedding-3-small',
      'http://localhost:11434/v1|nomic-embed-text',
    ]);
  });

  it('builds an OpenAI embedding model for the chosen id', () => {
    const client = new OpenAICompatibleEmbeddings({
      baseURL: 'https://llm.test/v1',
      apiKey: 'test-key',
    });

    expect(client.createModel().modelId).toBe('text-embedding-3-small');
  });
});

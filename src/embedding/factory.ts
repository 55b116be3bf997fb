import type { Config } from '../config.js';
import type { Embedding } from './types.js';
import { OpenAIEmbedding } from './openai.js';
import type { OpenAIEmbeddingOptions } from './openai.js';

// The OpenAI SDK refuses an empty key; self-hosted servers ignore it.
const PLACEHOLDER_KEYS = { ollama: 'ollama', local: 'local' } as const;

/**
 * Endpoint, key and model the vector index embeds memories and summaries with.
 * Every provider speaks the OpenAI embeddings API; only the target differs.
 */
export function embeddingOptions(config: Config): OpenAIEmbeddingOptions {
  const provider = config.embeddingProvider;
  switch (provider) {
    case 'openai':
      return { apiKey: config.openaiApiKey, baseUrl: config.openaiBaseUrl, model: config.embeddingModel };
    case 'ollama':
      return {
        apiKey: config.openaiApiKey || PLACEHOLDER_KEYS.ollama,
        baseUrl: config.ollamaBaseUrl,
        model: config.embeddingModel,
      };
    case 'local':
      return {
        apiKey: config.openaiApiKey || PLACEHOLDER_KEYS.local,
        baseUrl: config.openaiBaseUrl,
        model: config.embeddingModel,
      };
    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown embedding provider: ${_exhaustive}`);
    }
  }
}

export function createEmbedding(config: Config): Embedding {
  return new OpenAIEmbedding(embeddingOptions(config));
}

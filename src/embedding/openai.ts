import { createHash } from 'node:crypto';
import OpenAI from 'openai';
import type { Embedding, EmbeddingVector } from './types.js';
import { EmbeddingError } from '../errors.js';
import { getConfig } from '../config.js';
import { truncateToSafeLength } from './truncate.js';

const RETRY_DELAYS = [1000, 4000, 16000];
const RETRYABLE_STATUS = new Set([429, 500, 502, 503]);
const MAX_CACHE_SIZE = 2_000;

export function contentHash(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
}

export class OpenAIEmbedding implements Embedding {
  private client: OpenAI;
  private model: string;
  private _dimension = 0;
  private initialized = false;
  // Retrieval re-embeds the same queries and summaries often; keep recent vectors around.
  private cache = new Map<string, EmbeddingVector>();

  constructor(options?: OpenAIEmbeddingOptions) {
    const config = getConfig();
    const apiKey = options?.apiKey ?? config.openaiApiKey;
    const baseUrl = options?.baseUrl ?? config.openaiBaseUrl;
    this.client = new OpenAI({
      apiKey,
      ...(baseUrl && { baseURL: baseUrl }),
    });
    this.model = options?.model ?? config.embeddingModel;
  }

  get dimension(): number {
    return this._dimension;
  }

  async initialize(): Promise<void> {
    try {
      const result = await this.callApi(['dimension probe']);
      this._dimension = result[0].length;
      this.initialized = true;
      console.log(`Embedding model "${this.model}" validated. Dimension: ${this._dimension}`);
    } catch (err) {
      throw new EmbeddingError(
        `Failed to initialize embedding provider. Check your API key, base URL, and model name. ` +
          `Model: "${this.model}"`,
        err,
      );
    }
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const results = await this.embedBatch([text]);
    return results[0];
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (!this.initialized) {
      throw new EmbeddingError('Embedding provider not initialized. Call initialize() before embed/embedBatch.');
    }
    if (texts.length === 0) return [];

    const results = new Map<number, EmbeddingVector>();
    const pending: { index: number; text: string; hash: string }[] = [];

    texts.forEach((text, index) => {
      if (text.trim().length === 0) {
        results.set(index, new Array<number>(this._dimension).fill(0));
        return;
      }
      const hash = contentHash(text);
      const hit = this.cache.get(hash);
      if (hit) {
        results.set(index, hit);
      } else {
        pending.push({ index, text, hash });
      }
    });

    const batchSize = getConfig().embeddingBatchSize;
    for (let offset = 0; offset < pending.length; offset += batchSize) {
      const batch = pending.slice(offset, offset + batchSize);
      const vectors = await this.callWithRetry(batch.map(p => p.text));
      batch.forEach((p, i) => {
        this.remember(p.hash, vectors[i]);
        results.set(p.index, vectors[i]);
      });
    }

    return texts.map((_, index) => {
      const vec = results.get(index);
      if (!vec) {
        throw new EmbeddingError(`Missing embedding for input #${index} after API call.`);
      }
      return vec;
    });
  }

  private remember(hash: string, vec: EmbeddingVector): void {
    if (this.cache.size >= MAX_CACHE_SIZE && !this.cache.has(hash)) {
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) this.cache.delete(oldest);
    }
    this.cache.set(hash, vec);
  }

  private async callWithRetry(texts: string[]): Promise<EmbeddingVector[]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.callApi(texts);
      } catch (err) {
        const status = httpStatus(err);
        const retryable = status !== undefined && RETRYABLE_STATUS.has(status);
        if (!retryable || attempt >= RETRY_DELAYS.length - 1) {
          throw new EmbeddingError(
            `Embedding API call failed after ${attempt + 1} attempt(s). Status: ${status ?? 'unknown'}`,
            err,
          );
        }
        const delay = RETRY_DELAYS[attempt];
        console.warn(`Embedding API error (status ${status}). Retrying in ${delay}ms...`);
        await sleep(delay);
      }
    }
  }

  private async callApi(texts: string[]): Promise<EmbeddingVector[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts.map(t => truncateToSafeLength(t)),
    });

    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    return sorted.map((d) => d.embedding);
  }
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

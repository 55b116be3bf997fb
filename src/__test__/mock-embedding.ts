import type { Embedding, EmbeddingVector } from '../embedding/types.js';

/**
 * Deterministic mock embedding for testing.
 * Generates vectors from charCode values, normalized to unit length.
 */
export class MockEmbedding implements Embedding {
  readonly dimension: number;
  readonly calls: string[][] = [];

  constructor(dimension = 32) {
    this.dimension = dimension;
  }

  async initialize(): Promise<void> {
    // no-op
  }

  async embed(text: string): Promise<EmbeddingVector> {
    this.calls.push([text]);
    return this.deterministicVector(text);
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    this.calls.push(texts);
    return texts.map(t => this.deterministicVector(t));
  }

  private deterministicVector(text: string): EmbeddingVector {
    const vec = new Array<number>(this.dimension).fill(0);
    for (let i = 0; i < text.length; i++) {
      vec[i % this.dimension] += text.charCodeAt(i);
    }
    const magnitude = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
    if (magnitude === 0) return vec;
    return vec.map(v => v / magnitude);
  }
}

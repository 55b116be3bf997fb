export type EmbeddingVector = number[];

export interface Embedding {
  /**
   * Validate provider connectivity and detect the embedding dimension.
   * Must be called once before any embed/embedBatch operations.
   */
  initialize(): Promise<void>;
  embed(text: string): Promise<EmbeddingVector>;
  embedBatch(texts: string[]): Promise<EmbeddingVector[]>;
  readonly dimension: number;
}

export type MetadataValue = string | number | boolean | null;
export type Metadata = Record<string, MetadataValue>;
export type MetadataFilter = Record<string, string | number | boolean>;

/** Logical collections; each maps to one physical collection per prefix. */
export type CollectionKind = 'memories' | 'summaries' | 'topics';

export const COLLECTION_KINDS: readonly CollectionKind[] = ['memories', 'summaries', 'topics'];

export interface VectorHit {
  id: string;
  score: number;
}

export interface VectorEntry {
  id: string;
  text: string;
  metadata: Metadata;
}

/**
 * Derived semantic index. Returns candidate ids only; callers re-resolve
 * every hit through the record store before trusting it.
 */
export interface VectorIndex {
  /** Create missing collections; with reset, drop and recreate all of them. */
  initialize(reset?: boolean): Promise<void>;
  /** Add or replace. Metadata keys not passed keep their stored values. */
  upsert(collection: CollectionKind, id: string, text: string, metadata: Metadata): Promise<void>;
  query(collection: CollectionKind, text: string, k: number, filter?: MetadataFilter): Promise<VectorHit[]>;
  delete(collection: CollectionKind, id: string): Promise<void>;
  getById(collection: CollectionKind, id: string): Promise<VectorEntry | null>;
  count(collection: CollectionKind): Promise<number>;
}

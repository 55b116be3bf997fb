import type {
  CollectionKind,
  Metadata,
  MetadataFilter,
  VectorEntry,
  VectorHit,
  VectorIndex,
} from '../vectordb/types.js';
import { COLLECTION_KINDS } from '../vectordb/types.js';

export interface VectorIndexCall {
  method: 'initialize' | 'upsert' | 'query' | 'delete' | 'getById' | 'count';
  collection?: CollectionKind;
  id?: string;
}

type Operation = Exclude<VectorIndexCall['method'], 'initialize'>;

/**
 * In-memory VectorIndex for testing.
 * Query ranks by the share of query terms found in the stored text.
 * `failOn('upsert', 'summaries')` makes matching calls reject.
 */
export class MockVectorIndex implements VectorIndex {
  readonly collections = new Map<CollectionKind, Map<string, { text: string; metadata: Metadata }>>();
  readonly calls: VectorIndexCall[] = [];
  private failures = new Set<string>();

  constructor() {
    for (const kind of COLLECTION_KINDS) this.collections.set(kind, new Map());
  }

  failOn(method: Operation, collection?: CollectionKind): void {
    this.failures.add(`${method}:${collection ?? '*'}`);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  private check(method: Operation, collection: CollectionKind): void {
    if (this.failures.has(`${method}:${collection}`) || this.failures.has(`${method}:*`)) {
      throw new Error(`injected ${method} failure on ${collection}`);
    }
  }

  private col(collection: CollectionKind): Map<string, { text: string; metadata: Metadata }> {
    let col = this.collections.get(collection);
    if (!col) {
      col = new Map();
      this.collections.set(collection, col);
    }
    return col;
  }

  async initialize(reset = false): Promise<void> {
    this.calls.push({ method: 'initialize' });
    if (reset) {
      for (const col of this.collections.values()) col.clear();
    }
  }

  async upsert(collection: CollectionKind, id: string, text: string, metadata: Metadata): Promise<void> {
    this.calls.push({ method: 'upsert', collection, id });
    this.check('upsert', collection);
    const col = this.col(collection);
    const existing = col.get(id);
    col.set(id, { text, metadata: { ...existing?.metadata, ...metadata } });
  }

  async query(collection: CollectionKind, text: string, k: number, filter?: MetadataFilter): Promise<VectorHit[]> {
    this.calls.push({ method: 'query', collection });
    this.check('query', collection);

    const terms = text.toLowerCase().split(/\s+/).filter(t => t.length > 0);
    const hits: VectorHit[] = [];
    for (const [id, entry] of this.col(collection)) {
      if (filter && !Object.entries(filter).every(([key, value]) => entry.metadata[key] === value)) continue;
      const stored = entry.text.toLowerCase();
      const matched = terms.filter(t => stored.includes(t)).length;
      hits.push({ id, score: matched / Math.max(terms.length, 1) });
    }

    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, k);
  }

  async delete(collection: CollectionKind, id: string): Promise<void> {
    this.calls.push({ method: 'delete', collection, id });
    this.check('delete', collection);
    this.col(collection).delete(id);
  }

  async getById(collection: CollectionKind, id: string): Promise<VectorEntry | null> {
    this.calls.push({ method: 'getById', collection, id });
    this.check('getById', collection);
    const entry = this.col(collection).get(id);
    return entry ? { id, text: entry.text, metadata: { ...entry.metadata } } : null;
  }

  async count(collection: CollectionKind): Promise<number> {
    this.calls.push({ method: 'count', collection });
    this.check('count', collection);
    return this.col(collection).size;
  }

  ids(collection: CollectionKind): string[] {
    return [...this.col(collection).keys()];
  }
}

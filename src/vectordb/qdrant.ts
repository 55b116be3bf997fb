import { QdrantClient } from '@qdrant/js-client-rest';
import { createHash } from 'node:crypto';
import type {
  CollectionKind,
  Metadata,
  MetadataFilter,
  VectorEntry,
  VectorHit,
  VectorIndex,
} from './types.js';
import { COLLECTION_KINDS } from './types.js';
import type { Embedding } from '../embedding/types.js';
import { VectorDBError } from '../errors.js';
import { getConfig } from '../config.js';
import { collectionName } from '../paths.js';

export const RRF_K = 10;
export const RRF_ALPHA = 0.7; // 70% rank-based, 30% raw similarity

const RESERVED_KEYS = new Set(['key', 'text']);
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface QdrantIndexOptions {
  url?: string;
  apiKey?: string;
  prefix?: string;
}

type Payload = Record<string, unknown> | null | undefined;

/**
 * Qdrant point ids must be UUIDs or integers. Memory and summary ids already are;
 * topic names get a stable UUID derived from their MD5.
 */
export function pointId(key: string): string {
  if (UUID_RE.test(key)) return key.toLowerCase();
  const hex = createHash('md5').update(key).digest('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export function toMetadata(payload: Payload): Metadata {
  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(payload ?? {})) {
    if (RESERVED_KEYS.has(key)) continue;
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      metadata[key] = value;
    }
  }
  return metadata;
}

function keyOf(point: { id: string | number; payload?: Payload }): string {
  const key = point.payload?.key;
  return typeof key === 'string' ? key : String(point.id);
}

export class QdrantVectorIndex implements VectorIndex {
  private client: QdrantClient;
  private prefix: string;

  constructor(private embedding: Embedding, options: QdrantIndexOptions = {}) {
    const config = getConfig();
    const apiKey = options.apiKey ?? config.qdrantApiKey;
    this.client = new QdrantClient({
      url: options.url ?? config.qdrantUrl,
      ...(apiKey ? { apiKey } : {}),
    });
    this.prefix = options.prefix ?? config.collectionPrefix;
  }

  private name(collection: CollectionKind): string {
    return collectionName(this.prefix, collection);
  }

  async initialize(reset = false): Promise<void> {
    for (const kind of COLLECTION_KINDS) {
      const name = this.name(kind);
      try {
        const { exists } = await this.client.collectionExists(name);
        if (exists && reset) {
          await this.client.deleteCollection(name);
        }
        if (!exists || reset) {
          await this.createCollection(name);
        }
      } catch (err) {
        throw new VectorDBError(`Failed to initialize collection "${name}"`, err);
      }
    }
  }

  private async createCollection(name: string): Promise<void> {
    await this.client.createCollection(name, {
      vectors: {
        dense: { size: this.embedding.dimension, distance: 'Cosine' },
      },
    });

    await Promise.all([
      this.client.createPayloadIndex(name, { field_name: 'text', field_schema: 'text', wait: true }),
      this.client.createPayloadIndex(name, { field_name: 'key', field_schema: 'keyword', wait: true }),
      this.client.createPayloadIndex(name, { field_name: 'topic', field_schema: 'keyword', wait: true }),
      this.client.createPayloadIndex(name, { field_name: 'memory_id', field_schema: 'keyword', wait: true }),
    ]);
  }

  async upsert(collection: CollectionKind, id: string, text: string, metadata: Metadata): Promise<void> {
    const existing = await this.getById(collection, id);
    const vector = await this.embedding.embed(text);
    const name = this.name(collection);

    try {
      await this.client.upsert(name, {
        wait: true,
        points: [{
          id: pointId(id),
          vector: { dense: vector },
          payload: { ...existing?.metadata, ...metadata, key: id, text },
        }],
      });
    } catch (err) {
      throw new VectorDBError(`Failed to upsert "${id}" into "${name}"`, err);
    }
  }

  async query(collection: CollectionKind, text: string, k: number, filter?: MetadataFilter): Promise<VectorHit[]> {
    const name = this.name(collection);
    const queryVector = await this.embedding.embed(text);
    const conditions = Object.entries(filter ?? {}).map(([key, value]) => ({ key, match: { value } }));
    const fetchLimit = k * 2;

    try {
      const denseResults = await this.client.search(name, {
        vector: { name: 'dense', vector: queryVector },
        limit: fetchLimit,
        with_payload: true,
        ...(conditions.length > 0 ? { filter: { must: conditions } } : {}),
      });

      let textResults: RankedPoint[] = [];
      if (text.trim().length > 0) {
        const textResponse = await this.client.scroll(name, {
          filter: { must: [...conditions, { key: 'text', match: { text } }] },
          limit: fetchLimit,
          with_payload: true,
        });
        textResults = rankByTermFrequency(textResponse.points, text);
      }

      return reciprocalRankFusion(denseResults, textResults, k);
    } catch (err) {
      throw new VectorDBError(`Query failed in collection "${name}"`, err);
    }
  }

  async delete(collection: CollectionKind, id: string): Promise<void> {
    const name = this.name(collection);
    try {
      await this.client.delete(name, { wait: true, points: [pointId(id)] });
    } catch (err) {
      throw new VectorDBError(`Failed to delete "${id}" from "${name}"`, err);
    }
  }

  async getById(collection: CollectionKind, id: string): Promise<VectorEntry | null> {
    const name = this.name(collection);
    try {
      const results = await this.client.retrieve(name, {
        ids: [pointId(id)],
        with_payload: true,
        with_vector: false,
      });
      if (results.length === 0) return null;
      const payload = results[0].payload;
      return {
        id,
        text: typeof payload?.text === 'string' ? payload.text : '',
        metadata: toMetadata(payload),
      };
    } catch (err) {
      throw new VectorDBError(`Failed to retrieve "${id}" from "${name}"`, err);
    }
  }

  async count(collection: CollectionKind): Promise<number> {
    const name = this.name(collection);
    try {
      const result = await this.client.count(name, { exact: true });
      return result.count;
    } catch (err) {
      throw new VectorDBError(`Failed to count points in "${name}"`, err);
    }
  }
}

export interface RankedPoint {
  id: string | number;
  payload?: Payload;
  rawScore: number;
}

// Rank keyword matches by normalized term frequency so fusion receives a meaningful ordering.
export function rankByTermFrequency(
  points: { id: string | number; payload?: Payload }[],
  queryText: string,
): RankedPoint[] {
  if (points.length === 0) return [];

  const terms = [...new Set(queryText.toLowerCase().split(/\s+/).filter(t => t.length > 0))];
  if (terms.length === 0) return points.map(p => ({ ...p, rawScore: 0 }));

  const scored = points.map(point => {
    const text = String(point.payload?.text ?? '').toLowerCase();
    const wordCount = Math.max(1, text.split(/\s+/).length);
    let hits = 0;
    for (const term of terms) {
      let from = text.indexOf(term);
      while (from !== -1) {
        hits++;
        from = text.indexOf(term, from + term.length);
      }
    }
    return { point, tf: hits / wordCount };
  });

  scored.sort((a, b) => b.tf - a.tf);
  const maxTf = scored[0].tf;
  return scored.map(s => ({
    ...s.point,
    rawScore: maxTf > 0 ? s.tf / maxTf : 0,
  }));
}

export function reciprocalRankFusion(
  denseResults: { id: string | number; score?: number; payload?: Payload }[],
  textResults: RankedPoint[],
  limit: number,
): VectorHit[] {
  const scores = new Map<string, number>();

  const blended = (rank: number, rawSimilarity: number) =>
    RRF_ALPHA * (1 / (RRF_K + rank + 1)) + (1 - RRF_ALPHA) * rawSimilarity;

  denseResults.forEach((point, rank) => {
    const key = keyOf(point);
    scores.set(key, (scores.get(key) ?? 0) + blended(rank, point.score ?? 0));
  });
  textResults.forEach((point, rank) => {
    const key = keyOf(point);
    scores.set(key, (scores.get(key) ?? 0) + blended(rank, point.rawScore));
  });

  return [...scores.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([id, score]) => ({ id, score }));
}

import { randomUUID } from 'node:crypto';
import { UsageError } from '../errors.js';
import type { RecordStore } from '../records/store.js';
import type { MemoryRecord, SummaryTier, TopicDeletion } from '../records/types.js';
import type { Metadata, VectorIndex } from '../vectordb/types.js';
import { COLLECTION_KINDS } from '../vectordb/types.js';
import { selectStrategy } from './strategy.js';
import type { Thresholds } from './strategy.js';
import type { SummaryGenerator } from './summarizer.js';
import type {
  DeleteData,
  FailureResult,
  OperationResult,
  ReindexData,
  RetrievalMode,
  RetrievedMemory,
  StatusData,
  StoreData,
  SummaryLength,
  SummaryOutcome,
  SummaryStyle,
  TopicList,
  UpdateData,
} from './types.js';

/** Anything that can take an opportunistic backup; see BackupScheduler. */
export interface BackupTrigger {
  runIfDue(): Promise<string | null>;
}

export interface MemoryServiceOptions {
  thresholds: Thresholds;
  dataDir: string;
  /** Used by retrieve when the caller gives no limit. Defaults to 5. */
  defaultMaxResults?: number;
  backup?: BackupTrigger;
  now?: () => Date;
  newId?: () => string;
}

export interface RetrieveOptions {
  maxResults?: number;
  topic?: string;
  returnType?: RetrievalMode;
}

export interface UpdateFields {
  content?: string;
  topic?: string;
  tags?: string[];
}

export interface SummarizeRequest {
  memoryId?: string;
  query?: string;
  topic?: string;
  style?: SummaryStyle;
  length?: SummaryLength;
}

const SUMMARIZE_CANDIDATES = 10;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function failure(message: string, details?: Record<string, unknown>): FailureResult {
  return details ? { status: 'error', message, error_details: details } : { status: 'error', message };
}

function memoryMetadata(record: MemoryRecord): Metadata {
  return {
    topic: record.topic,
    tags: JSON.stringify(record.tags),
    created_at: record.created_at,
    updated_at: record.updated_at,
    content_size: record.content_size,
    version: record.version,
  };
}

export function topicDescription(topic: string, tags: string[]): string {
  const about = tags.length > 0 ? tags.join(', ') : topic;
  return `Topic ${topic} containing information about ${about}`;
}

/**
 * Coordinates the record store, the vector index and the summary generator.
 *
 * The record store is the durability boundary: a failed write there fails the
 * operation and nothing after it runs. Vector writes and summary generation are
 * best-effort; their outcomes are reported as flags and never undo a record write.
 */
export class MemoryService {
  private now: () => Date;
  private newId: () => string;

  constructor(
    private records: RecordStore,
    private vectors: VectorIndex,
    private summarizer: SummaryGenerator,
    private options: MemoryServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  async initialize(reset: boolean): Promise<OperationResult<{ reset: boolean }>> {
    let recordStoreReady = true;
    let vectorIndexReady = true;
    const details: Record<string, unknown> = {};

    try {
      this.records.initialize(reset);
    } catch (err) {
      recordStoreReady = false;
      details.record_store_error = errorMessage(err);
    }

    try {
      await this.vectors.initialize(reset);
    } catch (err) {
      vectorIndexReady = false;
      details.vector_index_error = errorMessage(err);
    }

    if (!recordStoreReady || !vectorIndexReady) {
      return failure('Error initializing memory system', {
        record_store: recordStoreReady,
        vector_index: vectorIndexReady,
        ...details,
      });
    }

    console.log(`Memory system initialized${reset ? ' (reset)' : ''}`);
    return { status: 'success', message: 'Memory system initialized successfully', reset };
  }

  async store(content: string, topic: string, tags: string[] = []): Promise<OperationResult<StoreData>> {
    if (content.trim() === '') return failure('Content must not be empty');
    if (topic.trim() === '') return failure('Topic must not be empty');

    await this.maybeBackup();

    const id = this.newId();
    const timestamp = this.now().toISOString();

    let record: MemoryRecord;
    try {
      record = this.records.createMemory({ id, content, topic, tags, timestamp });
    } catch (err) {
      return failure(`Error storing content: ${errorMessage(err)}`);
    }

    const indexed = await this.attempt(`index memory ${id}`, () =>
      this.vectors.upsert('memories', id, content, memoryMetadata(record)),
    );
    const topicIndexed = await this.attempt(`index topic ${topic}`, () => this.indexTopic(topic, tags));
    const summary = await this.summarizeNew(record);

    return {
      status: 'success',
      message: 'Content stored successfully',
      memory_id: id,
      topic,
      tags: record.tags,
      timestamp,
      content_size: record.content_size,
      indexed,
      topic_indexed: topicIndexed,
      summary,
    };
  }

  /**
   * Semantic search over summaries. Each hit is re-resolved through the record
   * store; hits whose summary or memory is gone are skipped. Zero matches is `[]`.
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievedMemory[]> {
    if (query.trim() === '') throw new UsageError('Query must not be empty');
    const maxResults = options.maxResults ?? this.options.defaultMaxResults ?? 5;
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new UsageError('max_results must be a positive integer');
    }
    const returnType = options.returnType ?? 'full_text';

    const hits = await this.vectors.query(
      'summaries',
      query,
      maxResults,
      options.topic ? { topic: options.topic } : undefined,
    );

    const results: RetrievedMemory[] = [];
    for (const hit of hits) {
      const summary = this.records.getSummaryById(hit.id);
      if (!summary) {
        console.warn(`Skipping summary ${hit.id}: indexed but not in the record store`);
        continue;
      }
      const memory = this.records.getMemory(summary.memory_id);
      if (!memory) {
        console.warn(`Skipping summary ${hit.id}: memory ${summary.memory_id} no longer exists`);
        continue;
      }

      const item: RetrievedMemory = {
        id: memory.id,
        topic: memory.topic,
        tags: memory.tags,
        created_at: memory.created_at,
        updated_at: memory.updated_at,
      };
      if (returnType !== 'summary') item.content = memory.content;
      if (returnType !== 'full_text') item.summary = summary.summary_text;
      results.push(item);
    }
    return results;
  }

  async update(memoryId: string, fields: UpdateFields): Promise<OperationResult<UpdateData>> {
    const { content, topic, tags } = fields;
    if (content === undefined && topic === undefined && tags === undefined) {
      return failure('At least one of content, topic, or tags must be provided');
    }
    if (content !== undefined && content.trim() === '') return failure('Content must not be empty');
    if (topic !== undefined && topic.trim() === '') return failure('Topic must not be empty');

    await this.maybeBackup();

    let record: MemoryRecord;
    let previousTopic: string;
    try {
      // Re-point the memory first; moving the counters may delete the old topic
      // row, which cascades to any memory still referencing it.
      const updated = this.records.updateMemory(memoryId, { content, topic, tags });
      if (!updated) return failure(`Memory item with ID ${memoryId} not found`);
      record = updated.record;
      previousTopic = updated.previousTopic;
    } catch (err) {
      return failure(`Error updating memory item: ${errorMessage(err)}`);
    }

    // The record write above is committed; from here on every step is reported, not fatal.
    const topicChanged = record.topic !== previousTopic;
    let topicCountsUpdated = true;
    if (topicChanged) {
      try {
        this.records.moveTopicMembership(previousTopic, record.topic);
      } catch (err) {
        topicCountsUpdated = false;
        console.warn(`Failed to move topic counters for memory ${memoryId}: ${errorMessage(err)}`);
      }
    }

    const indexed = await this.attempt(`re-index memory ${memoryId}`, () =>
      this.vectors.upsert('memories', memoryId, record.content, memoryMetadata(record)),
    );

    if (topicChanged) {
      await this.attempt(`index topic ${record.topic}`, () => this.indexTopic(record.topic, record.tags));
      if (!this.records.getTopic(previousTopic)) {
        await this.attempt(`drop topic ${previousTopic}`, () => this.vectors.delete('topics', previousTopic));
      }
    }

    let summaryUpdated = false;
    let summaryType: SummaryTier | null = null;
    if (content !== undefined) {
      const refreshed = await this.refreshSummary(record);
      summaryUpdated = refreshed.updated;
      summaryType = refreshed.tier;
    } else if (topicChanged) {
      const existing = this.records.getAnySummary(memoryId);
      if (existing) {
        await this.attempt(`move summary ${existing.id} to topic ${record.topic}`, () =>
          this.vectors.upsert('summaries', existing.id, existing.summary_text, { topic: record.topic }),
        );
      }
    }

    return {
      status: 'success',
      message: 'Memory item updated successfully',
      memory_id: memoryId,
      version: record.version,
      updated_fields: {
        content: content !== undefined,
        topic: topic !== undefined,
        tags: tags !== undefined,
      },
      timestamp: record.updated_at,
      indexed,
      topic_counts_updated: topicCountsUpdated,
      summary_updated: summaryUpdated,
      summary_type: summaryType,
    };
  }

  async delete(memoryId: string): Promise<OperationResult<DeleteData>> {
    let summaryIds: string[];
    try {
      if (!this.records.getMemory(memoryId)) return failure(`Memory item with ID ${memoryId} not found`);
      summaryIds = this.records.listSummaries(memoryId).map(s => s.id);
    } catch (err) {
      return failure(`Error deleting memory item: ${errorMessage(err)}`);
    }

    await this.maybeBackup();

    let summaryVectorsDeleted = true;
    for (const summaryId of summaryIds) {
      const ok = await this.attempt(`delete summary vector ${summaryId}`, () =>
        this.vectors.delete('summaries', summaryId),
      );
      summaryVectorsDeleted = summaryVectorsDeleted && ok;
    }

    try {
      if (!this.records.deleteMemory(memoryId)) return failure(`Memory item with ID ${memoryId} not found`);
    } catch (err) {
      return failure(`Error deleting memory item: ${errorMessage(err)}`);
    }

    const vectorDeleted = await this.attempt(`delete memory vector ${memoryId}`, () =>
      this.vectors.delete('memories', memoryId),
    );

    return {
      status: 'success',
      message: `Memory item ${memoryId} and its summaries deleted successfully`,
      memory_id: memoryId,
      summaries_deleted: summaryIds.length,
      vector_deleted: vectorDeleted,
      summary_vectors_deleted: summaryVectorsDeleted,
    };
  }

  listTopics(): OperationResult<TopicList> {
    try {
      const topics = this.records.listTopics();
      return {
        status: 'success',
        message: topics.length > 0 ? `Found ${topics.length} topics` : 'No topics found',
        topics,
      };
    } catch (err) {
      return failure(`Error listing topics: ${errorMessage(err)}`);
    }
  }

  async getStatus(): Promise<OperationResult<StatusData>> {
    try {
      const recordStats = this.records.getStatus();
      const vectorCounts: Record<string, number | null> = {};
      for (const kind of COLLECTION_KINDS) {
        try {
          vectorCounts[kind] = await this.vectors.count(kind);
        } catch (err) {
          console.warn(`Could not count vector collection ${kind}: ${errorMessage(err)}`);
          vectorCounts[kind] = null;
        }
      }

      return {
        status: 'success',
        message: 'Memory status retrieved successfully',
        stats: {
          ...recordStats,
          vector_counts: vectorCounts,
          data_dir: this.options.dataDir,
          tiny_content_threshold: this.options.thresholds.tiny,
          small_content_threshold: this.options.thresholds.small,
          system_time: this.now().toISOString(),
        },
      };
    } catch (err) {
      return failure(`Error getting memory status: ${errorMessage(err)}`);
    }
  }

  async deleteEmptyTopic(name: string): Promise<OperationResult> {
    let outcome: TopicDeletion;
    try {
      outcome = this.records.deleteTopicIfEmpty(name);
    } catch (err) {
      return failure(`Error deleting topic: ${errorMessage(err)}`);
    }

    switch (outcome) {
      case 'deleted':
        await this.attempt(`drop topic ${name}`, () => this.vectors.delete('topics', name));
        return { status: 'success', message: `Topic '${name}' deleted successfully because it was empty.` };
      case 'not_empty': {
        const count = this.records.countMemoriesInTopic(name);
        return failure(
          `Topic '${name}' could not be deleted because it is not empty. It contains ${count} items.`,
        );
      }
      case 'not_found':
        return failure(`Topic '${name}' not found.`);
    }
  }

  /**
   * Ad hoc summary of one memory, or of the memories matching a query or topic.
   * Throws UsageError for a query_focused request without a query.
   */
  async summarize(request: SummarizeRequest): Promise<OperationResult<{ summary?: string; source_count?: number }>> {
    const style = request.style ?? 'abstractive';
    const length = request.length ?? 'medium';
    const given = [request.memoryId, request.query, request.topic].filter(v => v !== undefined && v !== '');
    if (given.length !== 1) {
      return failure('Exactly one of memory_id, query, or topic must be provided.');
    }
    if (style === 'query_focused' && !request.query) {
      throw new UsageError('A query is required for query_focused summaries');
    }

    let contents: string[];
    if (request.memoryId) {
      let memory: MemoryRecord | null;
      try {
        memory = this.records.getMemory(request.memoryId);
      } catch (err) {
        return failure(`Error reading memory item: ${errorMessage(err)}`);
      }
      if (!memory) return failure(`Memory item with ID ${request.memoryId} not found.`);
      contents = [memory.content];
    } else {
      const searchText = request.query ?? request.topic ?? '';
      let ids: string[];
      try {
        const hits = await this.vectors.query(
          'memories',
          searchText,
          SUMMARIZE_CANDIDATES,
          request.topic ? { topic: request.topic } : undefined,
        );
        ids = hits.map(h => h.id);
      } catch (err) {
        return failure(`Error searching memories: ${errorMessage(err)}`);
      }
      if (ids.length === 0) {
        return { status: 'success', message: 'No relevant memories found to summarize.' };
      }

      contents = [];
      for (const id of ids) {
        const memory = this.records.getMemory(id);
        if (memory) contents.push(memory.content);
        else console.warn(`Skipping memory ${id}: indexed but not in the record store`);
      }
      if (contents.length === 0) {
        return { status: 'success', message: 'Could not retrieve content for relevant memories.' };
      }
    }

    const summary = await this.summarizer.generate(
      contents.join('\n\n'),
      style,
      length,
      style === 'query_focused' ? request.query : undefined,
    );
    if (!summary) {
      return failure('Failed to generate summary. The provider failed or returned nothing.');
    }
    return {
      status: 'success',
      message: 'Summary generated successfully',
      summary,
      source_count: contents.length,
    };
  }

  /** Rebuild every vector collection from the record store. */
  async reindex(reset = false): Promise<OperationResult<ReindexData>> {
    const counts: ReindexData = { memories: 0, summaries: 0, topics: 0, failures: 0 };

    let memories: MemoryRecord[];
    try {
      memories = this.records.listMemories();
      if (reset) await this.vectors.initialize(true);
    } catch (err) {
      return failure(`Error preparing reindex: ${errorMessage(err)}`);
    }

    const byId = new Map(memories.map(m => [m.id, m]));
    const topicTags = new Map<string, string[]>();

    for (const memory of memories) {
      const ok = await this.attempt(`re-index memory ${memory.id}`, () =>
        this.vectors.upsert('memories', memory.id, memory.content, memoryMetadata(memory)),
      );
      if (ok) counts.memories++;
      else counts.failures++;

      const tags = topicTags.get(memory.topic) ?? [];
      for (const tag of memory.tags) if (!tags.includes(tag)) tags.push(tag);
      topicTags.set(memory.topic, tags);
    }

    for (const summary of this.records.listSummaries()) {
      const parent = byId.get(summary.memory_id);
      if (!parent) continue;
      const ok = await this.attempt(`re-index summary ${summary.id}`, () =>
        this.vectors.upsert('summaries', summary.id, summary.summary_text, {
          memory_id: summary.memory_id,
          summary_type: summary.summary_type,
          topic: parent.topic,
        }),
      );
      if (ok) counts.summaries++;
      else counts.failures++;
    }

    for (const topic of this.records.listTopics()) {
      const ok = await this.attempt(`re-index topic ${topic.name}`, () =>
        this.indexTopic(topic.name, topicTags.get(topic.name) ?? []),
      );
      if (ok) counts.topics++;
      else counts.failures++;
    }

    console.log(
      `Reindexed ${counts.memories} memories, ${counts.summaries} summaries, ${counts.topics} topics (${counts.failures} failures)`,
    );
    if (counts.failures > 0) {
      return failure(`Reindex finished with ${counts.failures} failures`, { ...counts });
    }
    return { status: 'success', message: 'Reindex completed', ...counts };
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private async maybeBackup(): Promise<void> {
    if (!this.options.backup) return;
    try {
      await this.options.backup.runIfDue();
    } catch (err) {
      console.warn(`Backup check failed: ${errorMessage(err)}`);
    }
  }

  /** Run a best-effort step; failures are logged and reported as false. */
  private async attempt(label: string, fn: () => Promise<void>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (err) {
      console.warn(`Failed to ${label}: ${errorMessage(err)}`);
      return false;
    }
  }

  private indexTopic(topic: string, tags: string[]): Promise<void> {
    return this.vectors.upsert('topics', topic, topicDescription(topic, tags), {
      name: topic,
      tags: JSON.stringify(tags),
      updated_at: this.now().toISOString(),
    });
  }

  private async summaryText(record: MemoryRecord): Promise<{ tier: SummaryTier; text: string | null }> {
    const strategy = selectStrategy(record.content_size, this.options.thresholds);
    if (strategy.tier === 'direct_tiny') return { tier: strategy.tier, text: record.content };

    try {
      const text = await this.summarizer.generate(record.content, strategy.style, strategy.length);
      return { tier: strategy.tier, text: text && text.trim() !== '' ? text : null };
    } catch (err) {
      console.warn(`Summary generation for memory ${record.id} failed: ${errorMessage(err)}`);
      return { tier: strategy.tier, text: null };
    }
  }

  private async summarizeNew(record: MemoryRecord): Promise<SummaryOutcome> {
    const { tier, text } = await this.summaryText(record);
    const outcome: SummaryOutcome = {
      summary_generated: text !== null,
      summary_type: tier,
      summary_stored: false,
      summary_embedding_stored: false,
      summary_id: null,
    };
    if (text === null) {
      console.warn(`No summary for memory ${record.id}; stored without one`);
      return outcome;
    }

    const summaryId = this.newId();
    try {
      this.records.createSummary(summaryId, record.id, tier, text);
    } catch (err) {
      console.warn(`Failed to store summary for memory ${record.id}: ${errorMessage(err)}`);
      return outcome;
    }
    outcome.summary_stored = true;
    outcome.summary_id = summaryId;
    outcome.summary_embedding_stored = await this.attempt(`index summary ${summaryId}`, () =>
      this.vectors.upsert('summaries', summaryId, text, {
        memory_id: record.id,
        summary_type: tier,
        topic: record.topic,
      }),
    );
    return outcome;
  }

  /** Regenerate after a content change, overwriting the memory's single summary row. */
  private async refreshSummary(record: MemoryRecord): Promise<{ updated: boolean; tier: SummaryTier }> {
    const { tier, text } = await this.summaryText(record);
    if (text === null) {
      console.warn(`Failed to regenerate summary for memory ${record.id}`);
      return { updated: false, tier };
    }

    let summaryId: string;
    try {
      // Another update may have committed newer content while the summary was generated.
      const current = this.records.getMemory(record.id);
      if (!current || current.version !== record.version) {
        console.warn(`Discarding summary of memory ${record.id} v${record.version}: content changed meanwhile`);
        return { updated: false, tier };
      }
      const existing = this.records.getAnySummary(record.id);
      if (existing) {
        summaryId = existing.id;
        this.records.updateSummary(summaryId, text, tier);
      } else {
        summaryId = this.newId();
        this.records.createSummary(summaryId, record.id, tier, text);
      }
    } catch (err) {
      console.warn(`Failed to store summary for memory ${record.id}: ${errorMessage(err)}`);
      return { updated: false, tier };
    }

    await this.attempt(`index summary ${summaryId}`, () =>
      this.vectors.upsert('summaries', summaryId, text, {
        memory_id: record.id,
        summary_type: tier,
        topic: record.topic,
      }),
    );
    return { updated: true, tier };
  }
}
